/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for StreamFetch.
 */

// Longest title fragment kept in an artifact filename.
const MAX_FILENAME_TITLE_LENGTH = 50;

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Formats a byte count with a binary unit: "512 B", "1.5 KiB", "20.0 MiB".
 * @param bytes - The byte count.
 * @returns Formatted size string.
 */
export function formatBytes(bytes: number): string {

  const units = [ "B", "KiB", "MiB", "GiB" ];
  let value = bytes;
  let unit = 0;

  while((value >= 1024) && (unit < (units.length - 1))) {

    value /= 1024;
    unit++;
  }

  return (unit === 0) ? [ String(value), " B" ].join("") : [ value.toFixed(1), " ", units[unit] ].join("");
}

/**
 * Extracts a concise domain from a URL by keeping only the last two portions of the hostname (e.g., "www.youtube.com" becomes "youtube.com", "m.tiktok.com"
 * becomes "tiktok.com"). Used as the key for site profile lookups and cookie invalidation.
 * @param url - The URL to extract the domain from.
 * @returns The concise domain, or the original string if it does not parse as a URL.
 */
export function extractDomain(url: string): string {

  try {

    const parts = new URL(url).hostname.split(".");

    // Single-label and two-label hosts are returned as they are.
    return (parts.length > 2) ? parts.slice(-2).join(".") : parts.join(".");
  } catch {

    return url;
  }
}

/**
 * Turns a page title into a safe filename fragment. Reserved filesystem characters and control characters become underscores, whitespace runs collapse, and the
 * result is capped at 50 characters. An empty result falls back to "media".
 * @param title - The page title.
 * @returns The filename fragment.
 */
export function sanitizeFilename(title: string): string {

  // eslint-disable-next-line no-control-regex
  const cleaned = title.replace(/[<>:"/\\|?*\x00-\x1f\x7f]/g, "_").replace(/\s+/g, " ").trim().slice(0, MAX_FILENAME_TITLE_LENGTH).trim();

  return ((cleaned.length === 0) || /^[._ ]+$/.test(cleaned)) ? "media" : cleaned;
}
