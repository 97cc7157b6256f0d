/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * timeout.ts: Promise racing with timeout and abort support.
 */
import { abortReason } from "./delay.js";

/* Browser protocol calls and subprocess waits can hang indefinitely when the other side is wedged. raceWithTimeout() bounds any such promise with a timeout and,
 * optionally, an abort signal.
 *
 * IMPORTANT: When we time out or abort, the underlying operation is still pending - we just stop waiting for it locally. A no-op .catch() is attached to the work
 * promise so that its eventual rejection does not surface as an unhandled rejection.
 */

/**
 * Raised when a bounded operation does not settle in time. Callers map it onto their own failure kinds.
 */
export class TimeoutError extends Error {

  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {

    super([ description, " timed out after ", String(timeoutMs), "ms." ].join(""));

    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface RaceOptions {

  // Used in the timeout error message.
  description: string;

  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * Waits for a promise, rejecting early with a TimeoutError when the timeout elapses or with the signal's reason when the signal aborts.
 * @param work - The promise to wait for.
 * @param options - Timeout, description, and optional abort signal.
 * @returns The value of the work promise.
 */
export async function raceWithTimeout<T>(work: Promise<T>, options: RaceOptions): Promise<T> {

  const { description, signal, timeoutMs } = options;

  work.catch(() => { /* Settles after we stopped waiting. */ });

  if(signal?.aborted) {

    throw abortReason(signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {

    timer = setTimeout(() => {

      reject(new TimeoutError(description, timeoutMs));
    }, timeoutMs);

    if(signal) {

      onAbort = (): void => {

        reject(abortReason(signal));
      };

      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {

    return await Promise.race([ work, guard ]);
  } finally {

    clearTimeout(timer);

    if(signal && onAbort) {

      signal.removeEventListener("abort", onAbort);
    }
  }
}
