/**
 * Abort Utilities
 * Helpers for bounding async work with an AbortSignal
 */

import { logger } from '../../config/logger.js';

/**
 * The error a signal was aborted with, or a generic one when the reason is not an Error.
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Settle with `work`, or reject with the abort reason as soon as `signal` aborts.
 * Work that is still running after the abort keeps a handler attached; its
 * late failure is logged and otherwise ignored.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          logger.debug('Aborted work settled with an error', {
            error: error instanceof Error ? error.message : String(error),
          });
        }
        reject(error);
      }
    );
  });
}

/**
 * Wait until `work` has finished either way. Its failure is logged; callers
 * already hold the error that matters.
 */
export async function settle(work: Promise<unknown>): Promise<void> {
  try {
    await work;
  } catch (error) {
    logger.debug('Abandoned work settled with an error', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
