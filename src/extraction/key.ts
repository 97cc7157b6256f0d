/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * key.ts: Extraction request validation and deduplication keys.
 */
import type { ExtractionRequest, OutputFormat, QualityHint } from "../types/index.js";
import { OUTPUT_FORMATS, QUALITY_HINTS } from "../types/index.js";
import { InvalidRequestError } from "./errors.js";
import { createHash } from "node:crypto";

/* Two requests for the same media in the same format must not run side by side, so each request is reduced to an extraction key. URLs are normalized first,
 * because the same video is routinely shared with tracking parameters, a fragment, or a different parameter order.
 */

// Query parameters that identify the share, not the content.
const TRACKING_PARAMS = new Set([ "fbclid", "feature", "gclid", "si" ]);

export interface ExtractionDefaults {

  format: OutputFormat;
  quality: QualityHint;
}

/**
 * Normalizes a media URL: lowercase scheme and host, no default port, no fragment, no trailing slash, no tracking parameters, sorted query.
 * @param url - The URL as requested.
 * @returns The normalized URL.
 * @throws InvalidRequestError when the URL is not an absolute http(s) URL.
 */
export function normalizeUrl(url: string): string {

  let parsed: URL;

  try {

    parsed = new URL(url.trim());
  } catch {

    throw new InvalidRequestError("The url is not a valid absolute URL.");
  }

  if((parsed.protocol !== "http:") && (parsed.protocol !== "https:")) {

    throw new InvalidRequestError("Only http and https URLs can be extracted.");
  }

  // The URL parser already lowercases the scheme and host and drops default ports.
  parsed.hash = "";

  if((parsed.pathname.length > 1) && parsed.pathname.endsWith("/")) {

    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }

  const params = [...parsed.searchParams.entries()]
    .filter(([name]) => !TRACKING_PARAMS.has(name.toLowerCase()) && !name.toLowerCase().startsWith("utm_"))
    .sort(([ nameA, valueA ], [ nameB, valueB ]) => (nameA < nameB) ? -1 : ((nameA > nameB) ? 1 : ((valueA < valueB) ? -1 : ((valueA > valueB) ? 1 : 0))));

  parsed.search = new URLSearchParams(params).toString();

  return parsed.toString();
}

/**
 * Computes the extraction key of a URL and output format.
 * @param url - The requested URL.
 * @param format - The output format.
 * @returns The hex SHA-256 of the normalized URL and format.
 */
export function extractionKey(url: string, format: OutputFormat): string {

  return createHash("sha256").update([ normalizeUrl(url), "|", format ].join("")).digest("hex");
}

/**
 * Validates an API request body and turns it into a frozen extraction request.
 * @param input - The parsed request body.
 * @param defaults - Format and quality used when the body omits them.
 * @returns The extraction request.
 * @throws InvalidRequestError when the body is malformed.
 */
export function createExtractionRequest(input: unknown, defaults: ExtractionDefaults): ExtractionRequest {

  if((typeof input !== "object") || (input === null)) {

    throw new InvalidRequestError("The request body must be a JSON object.");
  }

  const url = Reflect.get(input, "url");
  const format = Reflect.get(input, "format") ?? defaults.format;
  const quality = Reflect.get(input, "quality") ?? defaults.quality;

  if((typeof url !== "string") || (url.trim().length === 0)) {

    throw new InvalidRequestError("The url field is required.");
  }

  const outputFormat = OUTPUT_FORMATS.find((candidate) => candidate === format);

  if(!outputFormat) {

    throw new InvalidRequestError([ "The format must be one of: ", OUTPUT_FORMATS.join(", "), "." ].join(""));
  }

  const qualityHint = QUALITY_HINTS.find((candidate) => candidate === quality);

  if(!qualityHint) {

    throw new InvalidRequestError([ "The quality must be one of: ", QUALITY_HINTS.join(", "), "." ].join(""));
  }

  // Validates the URL.
  normalizeUrl(url);

  return Object.freeze({ format: outputFormat, quality: qualityHint, url: url.trim() });
}
