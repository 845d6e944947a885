// Retry of async functions failing with given error types. The delay
// between attempts grows by the backoff factor after each failure.

import { Policy } from 'cockatiel';
import { ErrorClass } from './exceptions';
import { Logger } from './logger';
import { errorMessage } from './utils';

const log = Logger('retry');

export type RetryOptions = {
  // total number of attempts
  tries?: number;
  // initial delay between attempts in seconds
  delay?: number;
  // multiplier applied to the delay after each attempt
  backoff?: number;
  // retry only when the error message contains this text
  textInException?: string;
}

// Delays (ms) between the attempts.
export function retryDelays (tries: number, delay: number, backoff: number): number[] {
  const delays: number[] = [];
  let cur = delay;
  for (let i = 1; i < tries; i++) {
    delays.push(cur * 1000);
    cur *= backoff;
  }
  return delays;
}

// Call the function and retry it if it fails with one of the errors.
//
// @param exceptions  Error class or classes which should be retried.
// @param opts        Number of tries, delay and backoff.
// @param fn          Async function to call.
// @returns Return value of the first successful call.
export async function withRetry<R> (
  exceptions: ErrorClass | ErrorClass[],
  opts: RetryOptions,
  fn: () => Promise<R>
): Promise<R> {
  const classes = Array.isArray(exceptions) ? exceptions : [exceptions];
  const tries = opts.tries === undefined ? 4 : opts.tries;
  const delay = opts.delay === undefined ? 3 : opts.delay;
  const backoff = opts.backoff === undefined ? 2 : opts.backoff;
  const text = opts.textInException;

  const handles = (err: unknown) =>
    classes.some((cls) => err instanceof cls) &&
    (!text || errorMessage(err).includes(text));

  if (tries <= 1) {
    return fn();
  }
  const delays = retryDelays(tries, delay, backoff);
  const policy = Policy.handleWhen(handles).retry().delay(delays);

  let attempt = 0;
  return policy.execute(async () => {
    try {
      return await fn();
    } catch (err) {
      if (handles(err) && attempt < delays.length) {
        log.warn(`${errorMessage(err)}, Retrying in ${delays[attempt] / 1000} seconds...`);
      }
      attempt++;
      throw err;
    }
  });
}

// Wrap the function so that each call is retried.
export function retry (exceptions: ErrorClass | ErrorClass[], opts: RetryOptions = {}) {
  return function <A extends unknown[], R> (fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return (...args: A) => withRetry(exceptions, opts, () => fn(...args));
  };
}
