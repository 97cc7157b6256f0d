/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and sanitizing utilities for StreamFetch.
 */

/* formatError produces text for our own logs. sanitizeMessage produces text that may leave the process: it strips anything that identifies the host filesystem
 * or carries credentials, because extraction failures are reported back to API callers.
 */

// Longest sanitized message we hand to a caller.
const MAX_PUBLIC_MESSAGE_LENGTH = 500;

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if((typeof error === "object") && (error !== null) && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Narrows an unknown error to a Node.js system error carrying an errno code.
 * @param error - The error to check.
 * @param code - Optional code the error must carry (e.g. "ENOENT").
 * @returns True if the error is a system error (with the given code, when specified).
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {

  if(!(error instanceof Error) || !("code" in error) || (typeof error.code !== "string")) {

    return false;
  }

  return (code === undefined) || (error.code === code);
}

/**
 * Checks whether an error indicates that the browser page or session has been closed or is otherwise unrecoverable. These errors mean the session itself is gone
 * and the operation needs a fresh one rather than another try on the same page.
 * @param error - The error to check.
 * @returns True if the error indicates a closed or unrecoverable state.
 */
export function isSessionClosedError(error: unknown): boolean {

  const message = formatError(error);

  const unrecoverablePatterns = [ "Target closed", "Session closed", "detached Frame", "Connection closed", "Protocol error: Connection closed" ];

  return unrecoverablePatterns.some((pattern) => message.includes(pattern));
}

/**
 * Produces a caller-safe version of a diagnostic string. Absolute file paths are reduced to their basename, cookie headers and any supplied secret values are
 * redacted, line breaks are collapsed, and the result is capped in length.
 * @param text - The diagnostic text.
 * @param secrets - Values that must never appear in the output (cookie values, tokens).
 * @returns The sanitized text.
 */
export function sanitizeMessage(text: string, secrets: readonly string[] = []): string {

  let result = text;

  // Secrets first, before path rewriting can split them.
  for(const secret of secrets) {

    if(secret.length > 0) {

      result = result.split(secret).join("[redacted]");
    }
  }

  // Cookie and Set-Cookie header values, up to the end of the line.
  result = result.replace(/((?:set-)?cookie:\s*)[^\r\n]*/gi, "$1[redacted]");

  // Absolute POSIX and Windows paths become their basename. The lookbehind leaves URLs and relative paths alone.
  result = result.replace(/(?<![\w:/.\\])(?:[A-Za-z]:\\|\/)(?:[^\s'"\\/:]+[\\/])+([^\s'"\\/:]+)/g, "$1");

  result = result.replace(/\s*[\r\n]+\s*/g, " ").trim();

  if(result.length > MAX_PUBLIC_MESSAGE_LENGTH) {

    result = result.slice(0, MAX_PUBLIC_MESSAGE_LENGTH - 3) + "...";
  }

  return result;
}
