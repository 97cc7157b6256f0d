/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * netscape.ts: Netscape cookie file parsing and serialization.
 */
import type { SessionCookie } from "../types/index.js";

/* The Netscape cookie file is the format browser export extensions and command-line downloaders share. Each cookie is one tab-separated line:
 *
 *   domain  include-subdomains  path  secure  expiry  name  value
 *
 * Lines starting with "#" are comments, except that a "#HttpOnly_" prefix on the domain marks an http-only cookie. Expiry is in epoch seconds, 0 for a session
 * cookie. Browser extensions also export JSON arrays of cookie objects, so parseCookieFile() accepts those too.
 */

export const NETSCAPE_HEADER = "# Netscape HTTP Cookie File";

const HTTP_ONLY_PREFIX = "#HttpOnly_";

/**
 * Parses cookie file contents in either Netscape or JSON form. Malformed lines and entries are skipped.
 * @param text - File contents.
 * @returns The cookies found.
 * @throws SyntaxError when the contents look like JSON but do not parse.
 */
export function parseCookieFile(text: string): SessionCookie[] {

  if(text.trimStart().startsWith("[")) {

    return parseJsonCookies(text);
  }

  return parseNetscapeCookies(text);
}

/**
 * Parses Netscape cookie file contents.
 * @param text - File contents.
 * @returns The cookies found. Lines that do not have seven fields are skipped.
 */
export function parseNetscapeCookies(text: string): SessionCookie[] {

  const cookies: SessionCookie[] = [];

  for(const rawLine of text.split(/\r?\n/)) {

    // Only leading whitespace is trimmed: an empty value leaves a trailing tab.
    let line = rawLine.trimStart();
    let httpOnly = false;

    if(line.startsWith(HTTP_ONLY_PREFIX)) {

      httpOnly = true;
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if((line.trim().length === 0) || line.startsWith("#")) {

      continue;
    }

    const fields = line.split("\t");

    if(fields.length < 7) {

      continue;
    }

    const [ domainField, includeSubdomains, path, secure, expiry, name ] = fields;

    // Values may themselves contain tabs.
    const value = fields.slice(6).join("\t");
    const expires = Number(expiry);

    if((domainField.length === 0) || (name.length === 0) || !Number.isFinite(expires)) {

      continue;
    }

    const domain = ((includeSubdomains.toUpperCase() === "TRUE") && !domainField.startsWith(".")) ? "." + domainField : domainField;

    cookies.push({ domain, expires: Math.max(0, Math.trunc(expires)), httpOnly, name, path: path || "/", secure: secure.toUpperCase() === "TRUE", value });
  }

  return cookies;
}

/**
 * Checks whether a JSON value looks like an exported cookie object.
 * @param value - The value to check.
 * @returns True if the value carries string name, value, and domain fields.
 */
function isJsonCookie(value: unknown): value is { domain: string; name: string; value: string } & Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && ("name" in value) && (typeof value.name === "string") && ("value" in value) &&
    (typeof value.value === "string") && ("domain" in value) && (typeof value.domain === "string");
}

/**
 * Parses a JSON array of cookie objects, as exported by browser extensions. Both "expires" and "expirationDate" are accepted for the expiry.
 * @param text - JSON text.
 * @returns The cookies found.
 */
export function parseJsonCookies(text: string): SessionCookie[] {

  const parsed: unknown = JSON.parse(text);

  if(!Array.isArray(parsed)) {

    return [];
  }

  const cookies: SessionCookie[] = [];

  for(const entry of parsed) {

    if(!isJsonCookie(entry) || (entry.name.length === 0) || (entry.domain.length === 0)) {

      continue;
    }

    const expiry = (typeof entry.expires === "number") ? entry.expires : ((typeof entry.expirationDate === "number") ? entry.expirationDate : 0);

    cookies.push({

      domain: entry.domain,
      expires: (Number.isFinite(expiry) && (expiry > 0)) ? Math.trunc(expiry) : 0,
      httpOnly: entry.httpOnly === true,
      name: entry.name,
      path: (typeof entry.path === "string") && (entry.path.length > 0) ? entry.path : "/",
      secure: entry.secure === true,
      value: entry.value
    });
  }

  return cookies;
}

/**
 * Serializes cookies into Netscape cookie file contents.
 * @param cookies - The cookies to write.
 * @returns File contents, ending with a newline.
 */
export function serializeNetscapeCookies(cookies: readonly SessionCookie[]): string {

  const lines = [ NETSCAPE_HEADER, "" ];

  for(const cookie of cookies) {

    lines.push([ cookie.httpOnly ? HTTP_ONLY_PREFIX + cookie.domain : cookie.domain, cookie.domain.startsWith(".") ? "TRUE" : "FALSE", cookie.path,
      cookie.secure ? "TRUE" : "FALSE", String(cookie.expires), cookie.name, cookie.value ].join("\t"));
  }

  return lines.join("\n") + "\n";
}
