/**
 * Abort utility for wrapping async operations
 *
 * Stops waiting on an operation once a signal aborts, whether or not the
 * operation itself honours the signal. The operation keeps running in the
 * background; only its result is abandoned.
 */

import { RunCancelledError } from '../types/errors.js';

/**
 * Wrap a promise so it rejects with RunCancelledError when the signal aborts
 *
 * @param promise - The promise to wrap
 * @param signal - Abandons the wait when aborted
 * @param reason - Message for the rejection
 */
export async function withAbort<T>(promise: Promise<T>, signal?: AbortSignal, reason = 'cancelled'): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // Settle the abandoned promise so its rejection is not reported as unhandled
    promise.catch(() => undefined);
    throw new RunCancelledError(reason);
  }

  let onAbort: (() => void) | undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new RunCancelledError(reason));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, abortPromise]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
    promise.catch(() => undefined);
  }
}
