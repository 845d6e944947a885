// Polling of a function until it returns what we wait for or the time is up.
//
// The sampler is an async iterable. Every iteration calls the function and
// yields its value, so the caller decides what to do with each sample and
// when to stop:
//
//   for await (const pods of new TimeoutSampler(60, 5, getPods, ns)) {
//     if (pods.length === 3) break;
//   }
//
// When the timeout expires the iteration throws TimeoutExpiredError.

import * as _ from 'lodash';
import { TimeoutExpiredError, ValueError } from './exceptions';
import { Logger } from './logger';
import { errorMessage, sleep } from './utils';

const log = Logger('sampler');

function stringify (value: unknown): string {
  if (typeof value === 'string') {
    return `"${value}"`;
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch (err) {
      // circular structures
      return String(value);
    }
  }
  return String(value);
}

export class TimeoutSampler<T, A extends unknown[] = unknown[]> implements AsyncIterable<T> {
  // seconds
  timeout: number;
  sleep: number;
  func: (...args: A) => T | Promise<T>;
  funcArgs: A;
  startTime?: number;
  lastSampleTime?: number;
  timeoutMessage: string;

  // @param timeout  Timeout in seconds.
  // @param sleep    Sleep interval between samples in seconds.
  // @param func     The function to sample.
  // @param args     Arguments for the function.
  constructor (timeout: number, sleep: number, func: (...args: A) => T | Promise<T>, ...args: A) {
    if (timeout < sleep) {
      throw new ValueError('timeout should be larger than sleep time');
    }
    this.timeout = timeout;
    this.sleep = sleep;
    this.func = func;
    this.funcArgs = args;
    this.timeoutMessage = `Timed out after ${timeout}s running ${this.buildCallString()}`;
  }

  buildCallString (): string {
    const name = this.func.name || 'anonymous';
    return `${name}(${this.funcArgs.map(stringify).join(', ')})`;
  }

  private elapsed (): number {
    return (Date.now() - (this.startTime || 0)) / 1000;
  }

  private timeoutError (): TimeoutExpiredError {
    return new TimeoutExpiredError(this.timeout, this.timeoutMessage);
  }

  async * [Symbol.asyncIterator] (): AsyncGenerator<T, void, undefined> {
    if (this.startTime === undefined) {
      this.startTime = Date.now();
    }
    while (true) {
      this.lastSampleTime = Date.now();
      if (this.timeout <= this.elapsed()) {
        throw this.timeoutError();
      }
      let sample: { value: T } | undefined;
      try {
        sample = { value: await this.func(...this.funcArgs) };
      } catch (err) {
        log.error(`Exception raised during iteration: ${errorMessage(err)}`);
      }
      if (sample) {
        yield sample.value;
      }
      if (this.timeout <= this.elapsed()) {
        throw this.timeoutError();
      }
      log.debug(`Going to sleep for ${this.sleep} seconds before next iteration`);
      await sleep(this.sleep);
    }
  }

  // Wait until the func returns the given value (compared deeply).
  async waitForFuncValue (value: T): Promise<void> {
    try {
      for await (const sample of this) {
        if (_.isEqual(sample, value)) {
          return;
        }
      }
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.error(
          `function ${this.func.name} failed to return expected value ` +
          `${stringify(value)} after multiple retries during ${this.timeout} second timeout`
        );
      }
      throw err;
    }
  }

  // Run the func until it returns the expected result or the time is up.
  //
  // @returns True if the result was returned in time, false otherwise.
  async waitForFuncStatus (result: T): Promise<boolean> {
    try {
      await this.waitForFuncValue(result);
      return true;
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        return false;
      }
      throw err;
    }
  }
}

// Variant of the sampler with the func arguments passed as an array.
export class TimeoutIterator<T, A extends unknown[] = unknown[]> extends TimeoutSampler<T, A> {
  constructor (timeout: number, sleep: number, func: (...args: A) => T | Promise<T>, funcArgs: A) {
    super(timeout, sleep, func, ...funcArgs);
  }
}
