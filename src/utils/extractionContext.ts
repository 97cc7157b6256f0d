/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * extractionContext.ts: AsyncLocalStorage-based extraction context for automatic log correlation.
 */
import { AsyncLocalStorage } from "node:async_hooks";

/* Every extraction runs inside an async context carrying its extraction id. Log statements anywhere below the coordinator (the pool, the locator, the downloader,
 * the transcoder) pick the id up automatically, so concurrent extractions can be told apart in the log without threading an id parameter through every call.
 *
 * IMPORTANT: The context does not survive a hop into a fresh timer callback created outside the context. Re-establish it with runWithExtractionContext() there.
 */

export interface ExtractionContext {

  // Extraction identifier used as the log prefix.
  extractionId: string;

  // The URL being extracted.
  url?: string;
}

const extractionContextStorage = new AsyncLocalStorage<ExtractionContext>();

/**
 * Runs a function within an extraction context. Everything awaited inside it can read the context via getExtractionId().
 * @param context - The extraction context.
 * @param fn - The async function to run within the context.
 * @returns The result of the function.
 */
export async function runWithExtractionContext<T>(context: ExtractionContext, fn: () => Promise<T>): Promise<T> {

  return extractionContextStorage.run(context, fn);
}

/**
 * Convenience accessor for the extraction id of the current async context.
 * @returns The extraction id, or undefined outside an extraction.
 */
export function getExtractionId(): string | undefined {

  return extractionContextStorage.getStore()?.extractionId;
}
