/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * store.ts: Persisted session cookie store.
 */
import { LOG, formatError, isErrnoException } from "../utils/index.js";
import { parseCookieFile, serializeNetscapeCookies } from "./netscape.js";
import type { SessionCookie } from "../types/index.js";
import { StoreUnavailableError } from "../extraction/errors.js";
import fs from "node:fs";
import { hostMatchesDomain } from "../config/sites.js";
import path from "node:path";
import { randomUUID } from "node:crypto";

const { promises: fsPromises } = fs;

/*
 * COOKIE STORE
 *
 * The cookie file is shared, process-wide state. Reads (load, forUrl) run concurrently against an in-memory snapshot refreshed by load(). Writes (save,
 * invalidate) are serialized through a promise chain and always replace the file atomically: the new contents go to a uniquely named temp file in the same
 * directory, which is then renamed over the original. A crash mid-write leaves either the old file or the new one, never a torn mix.
 *
 * Cookie values are never logged. Log lines mention counts and domains only.
 */

export interface CookieStoreOptions {

  // Clock in milliseconds, for expiry checks.
  now?: () => number;
}

export class CookieStore {

  readonly filePath: string;
  private readonly now: () => number;
  private snapshot: SessionCookie[] = [];
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: CookieStoreOptions = {}) {

    this.filePath = filePath;
    this.now = options.now ?? Date.now;
  }

  /**
   * Reads the cookie file and refreshes the in-memory snapshot. Expired cookies are dropped from the result.
   * @returns The unexpired cookies.
   * @throws StoreUnavailableError when the file is missing, unreadable, malformed, or holds no cookies. Callers proceed unauthenticated.
   */
  async load(): Promise<SessionCookie[]> {

    const cookies = this.live(await this.readFile());

    if(cookies.length === 0) {

      throw new StoreUnavailableError("the cookie file contains no usable cookies.");
    }

    this.snapshot = cookies;

    LOG.debug("cookies", "Loaded %s cookie(s) from %s.", cookies.length, path.basename(this.filePath));

    return [...cookies];
  }

  /**
   * Returns the cookies from the last load() or write that apply to a URL: matching host, path prefix, and scheme for secure cookies.
   * @param url - The target URL.
   * @returns The applicable unexpired cookies.
   */
  forUrl(url: string): SessionCookie[] {

    let target: URL;

    try {

      target = new URL(url);
    } catch {

      return [];
    }

    return this.live(this.snapshot).filter((cookie) => cookieAppliesTo(cookie, target));
  }

  /**
   * Replaces the persisted cookie set atomically.
   * @param cookies - The new cookie set.
   */
  async save(cookies: readonly SessionCookie[]): Promise<void> {

    await this.exclusive(async () => {

      await this.writeAtomically(cookies);

      this.snapshot = this.live(cookies);

      LOG.info("Saved %s cookie(s) to the cookie store.", cookies.length);
    });
  }

  /**
   * Removes every cookie belonging to a domain: the domain itself, its subdomains, and parent domains whose cookies would be sent to it. The file is rewritten
   * atomically when anything was removed.
   * @param domain - The domain, with or without a leading dot.
   * @returns The number of cookies removed from the file.
   */
  async invalidate(domain: string): Promise<number> {

    const target = normalizeDomain(domain);
    const belongs = (cookie: SessionCookie): boolean => {

      const cookieDomain = normalizeDomain(cookie.domain);

      return (cookieDomain === target) || cookieDomain.endsWith("." + target) || target.endsWith("." + cookieDomain);
    };

    return this.exclusive(async () => {

      let persisted: SessionCookie[];

      try {

        persisted = await this.readFile();
      } catch(error) {

        if(!(error instanceof StoreUnavailableError) || !(error.cause && isErrnoException(error.cause, "ENOENT"))) {

          throw error;
        }

        persisted = [];
      }

      const kept = persisted.filter((cookie) => !belongs(cookie));
      const removed = persisted.length - kept.length;

      if(removed > 0) {

        await this.writeAtomically(kept);
      }

      this.snapshot = this.snapshot.filter((cookie) => !belongs(cookie));

      LOG.info("Invalidated %s cookie(s) for %s.", removed, target);

      return removed;
    });
  }

  // Runs a write operation after every previously queued one has settled.
  private async exclusive<T>(task: () => Promise<T>): Promise<T> {

    const run = this.writeChain.then(task);

    this.writeChain = run.then(() => undefined, () => undefined);

    return run;
  }

  private async readFile(): Promise<SessionCookie[]> {

    let content: string;

    try {

      content = await fsPromises.readFile(this.filePath, "utf-8");
    } catch(error) {

      throw new StoreUnavailableError(isErrnoException(error, "ENOENT") ? "the cookie file does not exist." : "the cookie file could not be read.",
        { cause: error });
    }

    if(content.trim().length === 0) {

      throw new StoreUnavailableError("the cookie file is empty.");
    }

    try {

      return parseCookieFile(content);
    } catch(error) {

      throw new StoreUnavailableError("the cookie file is malformed.", { cause: error });
    }
  }

  private async writeAtomically(cookies: readonly SessionCookie[]): Promise<void> {

    const directory = path.dirname(this.filePath);
    const tempPath = [ this.filePath, ".", String(process.pid), ".", randomUUID(), ".tmp" ].join("");

    await fsPromises.mkdir(directory, { recursive: true });

    try {

      await fsPromises.writeFile(tempPath, serializeNetscapeCookies(cookies), { encoding: "utf-8", mode: 0o600 });
      await fsPromises.rename(tempPath, this.filePath);
    } catch(error) {

      await fsPromises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {

        LOG.warn("Unable to remove temporary cookie file: %s.", formatError(cleanupError));
      });

      throw error;
    }
  }

  // Session cookies (expiry 0) never expire from the store's point of view.
  private live(cookies: readonly SessionCookie[]): SessionCookie[] {

    const nowSeconds = Math.floor(this.now() / 1000);

    return cookies.filter((cookie) => (cookie.expires === 0) || (cookie.expires > nowSeconds));
  }
}

/**
 * Lowercases a cookie domain and strips its leading dot.
 * @param domain - The cookie domain.
 * @returns The normalized domain.
 */
export function normalizeDomain(domain: string): string {

  return domain.trim().toLowerCase().replace(/^\.+/, "");
}

/**
 * Checks whether a browser would send a cookie to a URL: the host is the cookie domain or below it, the path is under the cookie path, and secure cookies only
 * go over HTTPS.
 * @param cookie - The cookie.
 * @param target - The request URL.
 * @returns True if the cookie applies.
 */
export function cookieAppliesTo(cookie: SessionCookie, target: URL): boolean {

  return hostMatchesDomain(target.hostname, [normalizeDomain(cookie.domain)]) && target.pathname.startsWith(cookie.path || "/") &&
    (!cookie.secure || (target.protocol === "https:"));
}
