// Concurrency primitives for the workloads: a pool limiting the number of
// tasks in flight and a stop event for cooperative shutdown of long running
// background loops.

import assert from 'assert';
import { EventEmitter } from 'events';
import { Logger } from './logger';

const log = Logger('worker-pool');

// A flag which background loops check between their steps. Setting it emits
// "stop" so that waiters wake up immediately.
export class StopEvent extends EventEmitter {
  private flag: boolean;

  constructor () {
    super();
    this.flag = false;
  }

  set () {
    if (!this.flag) {
      this.flag = true;
      this.emit('stop');
    }
  }

  clear () {
    this.flag = false;
  }

  isSet (): boolean {
    return this.flag;
  }

  // Wait until the event is set or the timeout expires.
  //
  // @param timeout  Timeout in seconds.
  // @returns True if the event was set, false on timeout.
  wait (timeout: number): Promise<boolean> {
    if (this.flag) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const onStop = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.removeListener('stop', onStop);
        resolve(false);
      }, timeout * 1000);
      this.once('stop', onStop);
    });
  }
}

type Job = {
  start: () => void;
}

// Runs submitted async tasks with at most maxWorkers of them in flight.
export class WorkerPool {
  readonly maxWorkers: number;
  private running: number;
  private waiting: Job[];
  private inflight: Set<Promise<unknown>>;

  constructor (maxWorkers: number) {
    assert(maxWorkers > 0, 'maxWorkers must be positive');
    this.maxWorkers = maxWorkers;
    this.running = 0;
    this.waiting = [];
    this.inflight = new Set();
  }

  get active (): number {
    return this.running;
  }

  get queued (): number {
    return this.waiting.length;
  }

  // Schedule the task. The returned promise is the future of its result.
  submit<R> (fn: () => Promise<R>): Promise<R> {
    const future = new Promise<R>((resolve, reject) => {
      const start = () => {
        this.running++;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.dispatch();
          });
      };
      this.waiting.push({ start });
    });
    const tracked = future.catch(() => undefined);
    this.inflight.add(tracked);
    void tracked.then(() => this.inflight.delete(tracked));
    this.dispatch();
    return future;
  }

  private dispatch () {
    while (this.running < this.maxWorkers) {
      const job = this.waiting.shift();
      if (!job) {
        return;
      }
      job.start();
    }
  }

  // Run fn for each item and wait for all of them. All tasks settle before
  // the first error (if any) is thrown.
  async map<T, R> (items: T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = await Promise.allSettled(
      items.map((item, i) => this.submit(() => fn(item, i)))
    );
    const values: R[] = [];
    for (const res of results) {
      if (res.status === 'rejected') {
        throw res.reason;
      }
      values.push(res.value);
    }
    return values;
  }

  // Wait for all submitted tasks to finish.
  async shutdown () {
    log.debug(`Waiting for ${this.inflight.size} tasks to finish`);
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }
}
