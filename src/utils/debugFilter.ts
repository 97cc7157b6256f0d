/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for StreamFetch.
 */

/* Category-based control over debug output. Categories use colon-separated namespaces (e.g., "extraction:locator", "browser:pool") and the STREAMFETCH_DEBUG
 * environment variable accepts comma-separated patterns with wildcard and exclusion support.
 *
 * Pattern syntax:
 *   - "*" enables all categories.
 *   - "category" enables an exact category or any sub-category (prefix match).
 *   - "-category" excludes a category or its sub-categories, even when wildcard is active.
 *
 * Examples:
 *   STREAMFETCH_DEBUG=extraction:locator     Only stream locator messages.
 *   STREAMFETCH_DEBUG=browser                All browser sub-categories (browser:pool, browser:launch).
 *   STREAMFETCH_DEBUG=*,-extraction:download Everything except per-part download messages.
 */

// Whether any debug output is configured at all. Fast-path check avoids category string work when debug is off.
let anyEnabled = false;

// Whether wildcard (*) was specified. All categories pass unless explicitly excluded.
let wildcardEnabled = false;

// Categories to include (exact or prefix match).
const includeSet = new Set<string>();

// Categories to exclude (exact or prefix match). Takes priority over includes and wildcard.
const excludeSet = new Set<string>();

/**
 * Checks whether a category matches any pattern in the given set. A pattern matches if it equals the category exactly or if the category starts with the pattern
 * followed by a colon (prefix match for sub-categories).
 * @param category - The category to check.
 * @param patterns - The set of patterns to match against.
 * @returns True if the category matches any pattern.
 */
function matchesAny(category: string, patterns: Set<string>): boolean {

  if(patterns.has(category)) {

    return true;
  }

  for(const pattern of patterns) {

    if(category.startsWith(pattern + ":")) {

      return true;
    }
  }

  return false;
}

/**
 * Parses a comma-separated pattern string and configures the debug filter. Calling this function replaces any previous filter configuration.
 * @param pattern - Comma-separated list of category patterns (e.g., "extraction,-extraction:download").
 */
export function initDebugFilter(pattern: string): void {

  // Reset state.
  includeSet.clear();
  excludeSet.clear();
  wildcardEnabled = false;
  anyEnabled = false;

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  if(parts.length === 0) {

    return;
  }

  for(const part of parts) {

    if(part === "*") {

      wildcardEnabled = true;
    } else if(part.startsWith("-")) {

      excludeSet.add(part.substring(1));
    } else {

      includeSet.add(part);
    }
  }

  anyEnabled = true;
}

/**
 * Checks whether a specific debug category is enabled under the current filter configuration.
 * @param category - The category to check (e.g., "browser:pool").
 * @returns True if debug output should be produced for this category.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!anyEnabled) {

    return false;
  }

  // Excludes always win, even over wildcard.
  if(matchesAny(category, excludeSet)) {

    return false;
  }

  if(wildcardEnabled) {

    return true;
  }

  return matchesAny(category, includeSet);
}

/**
 * Fast-path check for whether any debug categories are configured. When this returns false, callers can skip category string construction entirely.
 * @returns True if at least one debug category is enabled.
 */
export function isAnyDebugEnabled(): boolean {

  return anyEnabled;
}

/**
 * Reconstructs the current filter pattern string from internal state. Returns an empty string when no debug output is configured.
 * @returns The current pattern string (e.g., "*,-extraction:download" or "browser,cookies").
 */
export function getCurrentPattern(): string {

  if(!anyEnabled) {

    return "";
  }

  const parts: string[] = [];

  if(wildcardEnabled) {

    parts.push("*");
  }

  // Exclude entries are prefixed with "-".
  for(const entry of excludeSet) {

    parts.push("-" + entry);
  }

  // Include entries are bare category names.
  for(const entry of includeSet) {

    parts.push(entry);
  }

  return parts.join(",");
}

// Debug Category Registry.

export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

/**
 * Known debug categories, sorted alphabetically. Printed by --list-env so operators know what STREAMFETCH_DEBUG accepts.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "browser:launch", description: "Browser process launch, executable resolution, close." },
  { category: "browser:pool", description: "Session leases, releases, health checks, relaunches, waiters." },
  { category: "cleanup", description: "Stale workspace and expired artifact sweeps." },
  { category: "config", description: "Configuration loading and CLI overrides." },
  { category: "cookies", description: "Cookie file loads, saves, and invalidations." },
  { category: "extraction:coordinator", description: "State transitions, joins, cache hits, retries." },
  { category: "extraction:download", description: "Per-part transfers, resume offsets, checksums." },
  { category: "extraction:locator", description: "Navigation, observed media responses, stream selection." },
  { category: "extraction:transcode", description: "FFmpeg command lines and stderr output." },
  { category: "http", description: "Rate limit refusals." },
  { category: "retry", description: "Retry attempts and backoff delays." },
  { category: "timing:extraction", description: "Elapsed time per pipeline stage." }
];

/**
 * Creates a lightweight elapsed-time closure using performance.now(). Call the returned function to get the elapsed milliseconds since creation.
 * @returns A closure that returns elapsed milliseconds as a number.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
