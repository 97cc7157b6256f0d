/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utilities for StreamFetch.
 */

/**
 * Converts an abort signal's reason into an Error suitable for rejecting with.
 * @param signal - The aborted signal.
 * @returns The reason if it is an Error, otherwise a generic abort error.
 */
export function abortReason(signal: AbortSignal): Error {

  return (signal.reason instanceof Error) ? signal.reason : new Error("Operation aborted.");
}

/**
 * Creates a promise that resolves after the specified delay. When a signal is supplied, the promise rejects with the signal's reason as soon as it aborts and the
 * timer is cleared.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional abort signal.
 * @returns A promise that resolves after the specified delay.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    throw abortReason(signal);
  }

  return new Promise<void>((resolve, reject) => {

    const onAbort = (): void => {

      clearTimeout(timer);

      if(signal) {

        reject(abortReason(signal));
      }
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
