import { Logger } from './logger';

const log = Logger('workq');

type Task = {
  run: () => Promise<void>;
}

// Implementation of a simple work queue which takes a task, puts it to the
// queue and processes the task when all other tasks that were queued before
// have completed. Concurrent workers use it as a lock around the commands
// which must not overlap (i.e. oc commands switching the kube context).
export class Workq {
  private name: string;
  private queue: Task[];
  private inprog: boolean;

  constructor (name?: string) {
    this.name = name || '';
    this.queue = [];
    this.inprog = false;
  }

  // Number of tasks waiting for their turn, not counting the running one.
  get pending (): number {
    return this.queue.length;
  }

  get busy (): boolean {
    return this.inprog;
  }

  // Put a task to the queue for processing.
  //
  // Since the method is async the caller can decide if it wants to block
  // waiting until the task is processed or continue immediately.
  //
  // @param arg   Opaque context parameter passed to the func.
  // @param func  Async function returning a promise.
  // @returns A promise fulfilled when the task is done.
  //          The value of the promise is the value returned by the func.
  push<A, R> (arg: A, func: (arg: A) => Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const run = async () => {
        try {
          resolve(await func(arg));
        } catch (err) {
          reject(err);
        }
      };
      this.queue.push({ run });
      if (!this.inprog) {
        this.inprog = true;
        this._nextTask();
      } else {
        log.trace(`${this.name} task has been queued for later`);
      }
    });
  }

  // Pick and dispatch next task from the queue.
  _nextTask () {
    const task = this.queue.shift();
    if (!task) {
      this.inprog = false;
      return;
    }

    log.trace(`Dispatching a new ${this.name} task`);
    // run() never rejects, errors go to the promise returned by push()
    void task.run().then(() => this._nextTask());
  }
}
