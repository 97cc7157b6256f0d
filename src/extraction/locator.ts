/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * locator.ts: Stream locator that finds a page's media by watching its network traffic.
 */
import type { BrowserPage, BrowserSession, ExtractionRequest, LocatedStream, NavigationResult, Nullable, SessionCookie, StreamPart } from "../types/index.js";
import { AuthenticationRequiredError, ExtractionCancelledError, NavigationError, StreamNotFoundError, classifyNavigationError } from "./errors.js";
import { LOG, extractDomain, formatError, isSessionClosedError, startTimer } from "../utils/index.js";
import { createMatcher, selectParts } from "./matchers.js";
import { getSiteProfile, isLoginUrl } from "../config/sites.js";
import type { SiteProfile } from "../config/sites.js";
import type { StreamMatcher } from "./matchers.js";

/* Locating a stream means letting the site's own player do the work. We open a tab in the leased session, seed it with the stored cookies for the target, and
 * navigate. Every network response from then on is offered to the site's matcher, and whatever it accepts becomes a candidate part. Once navigation finishes we
 * keep watching for the observation window, or less when the matcher is satisfied: after it first reports satisfaction we wait settleDelay more so that the
 * player has a chance to switch to a higher quality variant, then stop.
 *
 * Sites that want a login do not fail loudly. They redirect to a login page, answer 401/403, or let the page load and then navigate to a login screen from script.
 * All three are reported as AuthenticationRequired so that the coordinator can refresh cookies once.
 */

export interface LocatorSettings {

  navigationTimeout: number;
  observationWindow: number;
  settleDelay: number;

  // Assumed lifetime of located media URLs.
  streamTtl: number;

  userAgent: string;
}

export interface LocateOptions {

  // Stored cookies applicable to the target URL.
  cookies: readonly SessionCookie[];

  extractionId: string;
  now?: () => number;
  settings: LocatorSettings;
  signal?: AbortSignal;
}

interface Observation {

  // Notified whenever a new part is collected.
  onPart: Nullable<() => void>;

  parts: StreamPart[];
  seen: Set<string>;
}

/**
 * Finds the media of a page using a leased browser session.
 * @param session - The leased session.
 * @param request - The extraction request.
 * @param options - Cookies, settings, extraction id, and cancellation.
 * @returns The located stream.
 * @throws AuthenticationRequiredError, StreamNotFoundError, NavigationError, or ExtractionCancelledError.
 */
export async function locate(session: BrowserSession, request: ExtractionRequest, options: LocateOptions): Promise<LocatedStream> {

  const { settings, signal } = options;
  const now = options.now ?? Date.now;
  const elapsed = startTimer();
  const profile = getSiteProfile(request.url);
  const matcher = createMatcher(profile);
  const observation: Observation = { onPart: null, parts: [], seen: new Set() };

  throwIfCancelled(signal);

  let page: BrowserPage;

  try {

    page = await session.driver.newPage();
  } catch(error) {

    throw new NavigationError("browser", true, [ "unable to open a page: ", formatError(error) ].join(""), { cause: error });
  }

  const unsubscribe = page.onExchange((exchange) => {

    const part = matcher.match(exchange);

    if(!part || observation.seen.has(part.url)) {

      return;
    }

    observation.seen.add(part.url);
    observation.parts.push(part);

    LOG.debug("extraction:locator", "Candidate %s part (%s, %s) from %s.", part.kind, part.container ?? "unknown container",
      (part.height === null) ? "unknown height" : [ String(part.height), "p" ].join(""), hostOf(part.url));

    observation.onPart?.();
  });

  try {

    await page.setCookies(options.cookies);

    LOG.debug("extraction:locator", "Navigating to %s with %s cookies using the %s matcher.", request.url, options.cookies.length, matcher.id);

    const result = await navigate(page, request.url, settings.navigationTimeout, signal);

    checkAuthentication(profile, request.url, result);

    await observe(observation, matcher, settings, signal);

    if(observation.parts.length === 0) {

      const currentUrl = page.currentUrl();

      if(isLoginUrl(profile, currentUrl) && !isLoginUrl(profile, request.url)) {

        throw new AuthenticationRequiredError(extractDomain(request.url), "the page navigated to a login screen.");
      }

      throw new StreamNotFoundError(request.url, settings.observationWindow);
    }

    const parts = selectParts(observation.parts, request.quality, request.format);

    if(parts.length === 0) {

      throw new StreamNotFoundError(request.url, settings.observationWindow);
    }

    const pageUrl = page.currentUrl() || result.finalUrl;
    const cookies = await sessionCookies(page, [ pageUrl, ...parts.map((part) => part.url) ], options.cookies);
    const title = await pageTitle(page);
    const locatedAt = now();

    LOG.debug("extraction:locator", "Located %s part(s) among %s candidates in %sms.", parts.length, observation.parts.length, elapsed());

    return {

      candidates: [...observation.parts],
      cookies,
      expiresAt: locatedAt + settings.streamTtl,
      extractionId: options.extractionId,
      headers: buildHeaders(profile, pageUrl, settings.userAgent),
      locatedAt,
      matcher: matcher.id,
      parts,
      title
    };
  } finally {

    unsubscribe();
    observation.onPart = null;

    try {

      await page.close();
    } catch(error) {

      LOG.debug("extraction:locator", "Error closing page: %s.", formatError(error));
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {

  if(signal?.aborted) {

    throw new ExtractionCancelledError();
  }
}

function hostOf(url: string): string {

  try {

    return new URL(url).hostname;
  } catch {

    return "unknown host";
  }
}

async function navigate(page: BrowserPage, url: string, timeoutMs: number, signal?: AbortSignal): Promise<NavigationResult> {

  try {

    return await page.navigate(url, { signal, timeoutMs });
  } catch(error) {

    throwIfCancelled(signal);

    throw classifyNavigationError(error, formatError(error), isSessionClosedError(error));
  }
}

/**
 * Detects a login wall from the navigation outcome: a redirect through a login page, landing on one, or a 401/403 document.
 * @param profile - The site profile.
 * @param targetUrl - The requested URL.
 * @param result - The navigation result.
 * @throws AuthenticationRequiredError when the site wants a login.
 */
export function checkAuthentication(profile: SiteProfile, targetUrl: string, result: NavigationResult): void {

  const domain = extractDomain(targetUrl);

  // A URL that is itself a login page is not evidence of anything.
  if(isLoginUrl(profile, targetUrl)) {

    return;
  }

  if([ ...result.redirectChain, result.finalUrl ].some((url) => isLoginUrl(profile, url))) {

    throw new AuthenticationRequiredError(domain, "the site redirected to a login page.");
  }

  if((result.status === 401) || (result.status === 403)) {

    throw new AuthenticationRequiredError(domain, [ "the page returned HTTP ", String(result.status), "." ].join(""));
  }
}

/**
 * Waits for media to show up: until the observation window ends, or until the matcher is satisfied and the settle delay has passed.
 */
async function observe(observation: Observation, matcher: StreamMatcher, settings: LocatorSettings, signal?: AbortSignal): Promise<void> {

  throwIfCancelled(signal);

  return new Promise<void>((resolve, reject) => {

    let settleTimer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = (): void => {

      clearTimeout(windowTimer);
      clearTimeout(settleTimer);
      signal?.removeEventListener("abort", onAbort);
      observation.onPart = null;
    };

    const finish = (): void => {

      cleanup();
      resolve();
    };

    const onAbort = (): void => {

      cleanup();
      reject(new ExtractionCancelledError());
    };

    const checkSatisfied = (): void => {

      if(!settleTimer && matcher.isSatisfied(observation.parts)) {

        settleTimer = setTimeout(finish, settings.settleDelay);
      }
    };

    const windowTimer = setTimeout(finish, settings.observationWindow);

    signal?.addEventListener("abort", onAbort, { once: true });
    observation.onPart = checkSatisfied;
    checkSatisfied();
  });
}

/**
 * Reads the cookies the session holds for the page and the media hosts after navigation. Sites often set or refresh cookies while loading, and media hosts may
 * require them. Falls back to the stored cookies when the browser cannot be asked.
 */
async function sessionCookies(page: BrowserPage, urls: readonly string[], fallback: readonly SessionCookie[]): Promise<SessionCookie[]> {

  try {

    return await page.cookies(urls);
  } catch(error) {

    LOG.warn("Unable to read session cookies from the browser: %s. Using stored cookies.", formatError(error));

    return [...fallback];
  }
}

async function pageTitle(page: BrowserPage): Promise<Nullable<string>> {

  try {

    const title = (await page.title()).trim();

    return title || null;
  } catch(error) {

    LOG.debug("extraction:locator", "Unable to read the page title: %s.", formatError(error));

    return null;
  }
}

/**
 * Request headers media hosts expect: the page as referer, its origin, and the browser's user agent. Site profiles can pin the referer and origin.
 * @param profile - The site profile.
 * @param pageUrl - The page the media was found on.
 * @param userAgent - The session user agent.
 * @returns Header name to value.
 */
export function buildHeaders(profile: SiteProfile, pageUrl: string, userAgent: string): Record<string, string> {

  const headers: Record<string, string> = { "User-Agent": userAgent };
  let origin: Nullable<string> = null;

  try {

    origin = new URL(pageUrl).origin;
  } catch {

    origin = null;
  }

  headers["Referer"] = profile.referer ?? pageUrl;

  const resolvedOrigin = profile.origin ?? origin;

  if(resolvedOrigin && (resolvedOrigin !== "null")) {

    headers["Origin"] = resolvedOrigin;
  }

  return headers;
}
