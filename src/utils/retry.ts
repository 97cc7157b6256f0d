/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retry.ts: Retry logic with exponential backoff for StreamFetch.
 */
import { LOG } from "./logger.js";
import { delay } from "./delay.js";
import { formatError } from "./errors.js";

/* Operations that fail for transient reasons (a dropped connection mid-download, a page that did not load in time) are retried with exponential backoff plus
 * random jitter. The backoff keeps us from hammering a struggling site; the jitter keeps concurrent extractions from retrying in lockstep.
 */

export interface BackoffSettings {

  // Delay before the second attempt, in milliseconds. Doubles for each attempt after that.
  backoffBase: number;

  // Upper bound of the random jitter added to each delay, in milliseconds.
  backoffJitter: number;

  // Cap on the exponential part of the delay, in milliseconds.
  maxBackoffDelay: number;
}

/**
 * Computes the delay to wait after a failed attempt.
 * @param attempt - The attempt that just failed, starting at 1.
 * @param settings - Backoff settings.
 * @param random - Random source in [0, 1).
 * @returns The delay in milliseconds.
 */
export function computeBackoff(attempt: number, settings: BackoffSettings, random: () => number = Math.random): number {

  const baseDelay = Math.min(settings.backoffBase * Math.pow(2, attempt - 1), settings.maxBackoffDelay);

  return Math.round(baseDelay + (random() * settings.backoffJitter));
}

export interface RetryOptions {

  // Human-readable description for logging.
  description: string;

  maxAttempts: number;

  // Random source for the backoff jitter.
  random?: () => number;

  settings: BackoffSettings;

  // Decides whether a failure is worth another attempt. Failures it rejects are thrown immediately. Defaults to retrying everything.
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  // Aborting stops the backoff wait and rejects with the signal's reason.
  signal?: AbortSignal;
}

/**
 * Attempts an operation up to maxAttempts times, waiting with exponential backoff between attempts.
 * @param operation - The operation. Receives the attempt number, starting at 1.
 * @param options - Retry options.
 * @returns The result of the first successful attempt.
 * @throws The last error when every attempt fails, or the first error shouldRetry declines.
 */
export async function retryOperation<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {

  const { description, maxAttempts, random, settings, shouldRetry, signal } = options;

  for(let attempt = 1; ; attempt++) {

    if(attempt > 1) {

      LOG.debug("retry", "Retrying %s (attempt %s of %s).", description, attempt, maxAttempts);
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      return await operation(attempt);
    } catch(error) {

      if((attempt >= maxAttempts) || (shouldRetry && !shouldRetry(error, attempt))) {

        throw error;
      }

      const waitMs = computeBackoff(attempt, settings, random);

      LOG.warn("Attempt %s failed for %s: %s. Retrying in %sms.", attempt, description, formatError(error), waitMs);

      // eslint-disable-next-line no-await-in-loop
      await delay(waitMs, signal);
    }
  }
}
