/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Typed failure kinds for the extraction pipeline.
 */
import type { Nullable } from "../types/index.js";
import { sanitizeMessage } from "../utils/index.js";

/* Every pipeline component reports failures as one of the ExtractionError subclasses below. Components only say what went wrong; the coordinator alone decides
 * whether a kind is retried. The retryable flag tells API callers whether repeating the same request later may succeed.
 *
 * Messages are composed by us and may mention hosts, statuses, and file names, but never cookie values or internal paths. toPublic() runs them through
 * sanitizeMessage() once more before they leave the process.
 */

export type ExtractionErrorKind = "AuthenticationRequired" | "DownloadFailed" | "DownloadTooLarge" | "ExtractionCancelled" | "IncompleteDownload" |
  "InvalidRequest" | "NavigationError" | "PoolExhausted" | "StoreUnavailable" | "StreamNotFound" | "TranscodeFailed";

export interface PublicError {

  kind: ExtractionErrorKind;
  message: string;
  retryable: boolean;
}

export abstract class ExtractionError extends Error {

  abstract readonly kind: ExtractionErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: ErrorOptions) {

    super(message, options);

    this.name = new.target.name;
  }

  /**
   * The caller-facing form of this error.
   * @param secrets - Values that must not appear in the message.
   * @returns Kind, sanitized message, and retryable flag.
   */
  toPublic(secrets: readonly string[] = []): PublicError {

    return { kind: this.kind, message: sanitizeMessage(this.message, secrets), retryable: this.retryable };
  }
}

export class PoolExhaustedError extends ExtractionError {

  readonly kind = "PoolExhausted";
  readonly retryable = true;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {

    super([ "No browser session became available within ", String(timeoutMs), "ms." ].join(""));

    this.timeoutMs = timeoutMs;
  }
}

export class AuthenticationRequiredError extends ExtractionError {

  readonly domain: string;
  readonly kind = "AuthenticationRequired";
  readonly retryable = false;

  constructor(domain: string, detail: string) {

    super([ "Authentication required for ", domain, ": ", detail ].join(""));

    this.domain = domain;
  }
}

export class StreamNotFoundError extends ExtractionError {

  readonly kind = "StreamNotFound";
  readonly retryable = true;

  constructor(url: string, windowMs: number) {

    super([ "No media stream was observed on ", url, " within ", String(windowMs), "ms." ].join(""));
  }
}

export type NavigationFailureReason = "browser" | "dns" | "refused" | "reset" | "timeout" | "tls" | "unknown";

export class NavigationError extends ExtractionError {

  readonly kind = "NavigationError";
  readonly reason: NavigationFailureReason;
  readonly retryable: boolean;
  readonly transient: boolean;

  constructor(reason: NavigationFailureReason, transient: boolean, detail: string, options?: ErrorOptions) {

    super([ "Navigation failed (", reason, "): ", detail ].join(""), options);

    this.reason = reason;
    this.retryable = transient;
    this.transient = transient;
  }
}

export class IncompleteDownloadError extends ExtractionError {

  readonly expected: Nullable<number>;
  readonly kind = "IncompleteDownload";
  readonly received: number;
  readonly retryable = true;

  constructor(file: string, expected: Nullable<number>, received: number, detail?: string) {

    super([ "Download of ", file, " ended after ", String(received), (expected === null) ? "" : [ " of ", String(expected) ].join(""), " bytes",
      detail ? [ ": ", detail ].join("") : "." ].join(""));

    this.expected = expected;
    this.received = received;
  }
}

export class DownloadFailedError extends ExtractionError {

  readonly kind = "DownloadFailed";
  readonly retryable: boolean;
  readonly status: Nullable<number>;

  constructor(host: string, status: Nullable<number>, detail: string) {

    super([ "Media request to ", host, " failed", (status === null) ? "" : [ " with HTTP ", String(status) ].join(""), ": ", detail ].join(""));

    this.status = status;

    // Signed media URLs expire; a fresh locate may succeed.
    this.retryable = (status === null) || (status === 403) || (status === 410) || (status >= 500);
  }
}

export class DownloadTooLargeError extends ExtractionError {

  readonly kind = "DownloadTooLarge";
  readonly retryable = false;

  constructor(limit: number, size: number) {

    super([ "Media part of ", String(size), " bytes exceeds the ", String(limit), " byte limit." ].join(""));
  }
}

export class TranscodeFailedError extends ExtractionError {

  readonly exitCode: Nullable<number>;
  readonly kind = "TranscodeFailed";
  readonly retryable = false;
  readonly timedOut: boolean;

  constructor(diagnostic: string, exitCode: Nullable<number>, timedOut: boolean) {

    const summary = timedOut ? "FFmpeg exceeded its time budget" : [ "FFmpeg exited with code ", String(exitCode) ].join("");

    super([ summary, diagnostic ? [ ": ", diagnostic ].join("") : "." ].join(""));

    this.exitCode = exitCode;
    this.timedOut = timedOut;
  }
}

export class StoreUnavailableError extends ExtractionError {

  readonly kind = "StoreUnavailable";
  readonly retryable = false;

  constructor(detail: string, options?: ErrorOptions) {

    super([ "Cookie store unavailable: ", detail ].join(""), options);
  }
}

export class ExtractionCancelledError extends ExtractionError {

  readonly kind = "ExtractionCancelled";
  readonly retryable = true;

  constructor(detail = "The extraction was cancelled.") {

    super(detail);
  }
}

export class InvalidRequestError extends ExtractionError {

  readonly kind = "InvalidRequest";
  readonly retryable = false;
}

/**
 * Maps a browser or transport error message onto a NavigationError. DNS and certificate failures will not fix themselves; resets, refusals, timeouts, and a
 * browser that went away may.
 * @param error - The error raised by navigation.
 * @param detail - Description of the failure, e.g. the formatted error.
 * @param sessionClosed - True when the page or browser went away underneath the navigation.
 * @returns The classified navigation error.
 */
export function classifyNavigationError(error: unknown, detail: string, sessionClosed: boolean): NavigationError {

  const options = { cause: error };

  if(sessionClosed) {

    return new NavigationError("browser", true, detail, options);
  }

  if(detail.includes("ERR_NAME_NOT_RESOLVED") || detail.includes("ERR_NAME_RESOLUTION_FAILED")) {

    return new NavigationError("dns", false, detail, options);
  }

  if(detail.includes("ERR_CERT_") || detail.includes("ERR_SSL_")) {

    return new NavigationError("tls", false, detail, options);
  }

  if(detail.includes("ERR_CONNECTION_REFUSED")) {

    return new NavigationError("refused", true, detail, options);
  }

  if(detail.includes("ERR_CONNECTION_RESET") || detail.includes("ERR_CONNECTION_CLOSED") || detail.includes("ERR_EMPTY_RESPONSE") ||
    detail.includes("ERR_NETWORK_CHANGED")) {

    return new NavigationError("reset", true, detail, options);
  }

  if(detail.includes("ERR_TIMED_OUT") || detail.includes("ERR_CONNECTION_TIMED_OUT") || /timeout|timed out/i.test(detail) ||
    ((error instanceof Error) && (error.name === "TimeoutError"))) {

    return new NavigationError("timeout", true, detail, options);
  }

  return new NavigationError("unknown", false, detail, options);
}
