/**
 * Time-budget helpers.
 *
 * External calls are abandoned, not cancelled: when the deadline passes or
 * the caller aborts, the caller stops waiting and a late result is dropped.
 */

import { RequestCancelled } from '../types/errors.js';
import { logger } from './logger.js';

/**
 * Resolve with `work` unless `ms` elapses or `signal` aborts first.
 */
export function withDeadline<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    abandon(work);
    return Promise.reject(new RequestCancelled());
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      action();
    };

    const onAbort = () => {
      abandon(work);
      finish(() => reject(new RequestCancelled()));
    };

    const timer = setTimeout(() => {
      abandon(work);
      finish(() => reject(onTimeout()));
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

function abandon<T>(work: Promise<T>): void {
  work.catch((error: unknown) => {
    logger.debug(`Abandoned call failed after its deadline: ${error}`);
  });
}

/**
 * Milliseconds left until `deadline`, never negative.
 */
export function remaining(deadline: number, now: number = Date.now()): number {
  return Math.max(0, deadline - now);
}
