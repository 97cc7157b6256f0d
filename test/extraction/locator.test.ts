/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * locator.test.ts: Tests for the stream locator.
 */
import { AuthenticationRequiredError, ExtractionCancelledError, NavigationError, StreamNotFoundError } from "../../src/extraction/errors.js";
import type { BrowserSession, ExtractionRequest, SessionCookie } from "../../src/types/index.js";
import { DEFAULT_SITE_PROFILE, SITE_PROFILES } from "../../src/config/sites.js";
import { FakeDriver, FakePage, exchange } from "../helpers/fakeBrowser.js";
import { buildHeaders, checkAuthentication, locate } from "../../src/extraction/locator.js";
import { describe, expect, it } from "vitest";
import type { LocatorSettings } from "../../src/extraction/locator.js";
import type { PageScript } from "../helpers/fakeBrowser.js";

const SETTINGS: LocatorSettings = { navigationTimeout: 1000, observationWindow: 300, settleDelay: 50, streamTtl: 60000, userAgent: "TestAgent/1.0" };

const STORED: SessionCookie[] = [{ domain: ".example.com", expires: 0, httpOnly: true, name: "SID", path: "/", secure: true, value: "test-secret" }];

const REQUEST: ExtractionRequest = { format: "mp4", quality: "best", url: "https://media.example.com/watch/1" };

const VIDEO_URL = "https://cdn.example.com/v/720p/clip.mp4";

function sessionWith(script: PageScript): { page: FakePage; session: BrowserSession } {

  const page = new FakePage(script);

  return { page, session: { driver: new FakeDriver(() => page), leaseId: 1, slot: 0 } };
}

describe("locate", () => {

  it("should return the matched parts with the session context", async () => {

    const browserCookies = [{ ...STORED[0], value: "test-secret-refreshed" }];
    const { page, session } = sessionWith({

      cookies: browserCookies,
      exchanges: [ exchange("https://media.example.com/player.js", { resourceType: "script" }),
        exchange(VIDEO_URL, { contentLength: 5000000, contentType: "video/mp4" }) ],
      title: "  My Clip  "
    });

    const located = await locate(session, REQUEST, { cookies: STORED, extractionId: "test-id", now: () => 1000, settings: SETTINGS });

    expect(located).toEqual({

      candidates: [{ container: "mp4", height: 720, kind: "muxed", sizeHint: 5000000, url: VIDEO_URL }],
      cookies: browserCookies,
      expiresAt: 61000,
      extractionId: "test-id",
      headers: { "Origin": "https://media.example.com", "Referer": "https://media.example.com/watch/1", "User-Agent": "TestAgent/1.0" },
      locatedAt: 1000,
      matcher: "generic",
      parts: [{ container: "mp4", height: 720, kind: "muxed", sizeHint: 5000000, url: VIDEO_URL }],
      title: "My Clip"
    });

    expect(page.cookiesSet).toEqual(STORED);
    expect(page.navigatedTo).toEqual([REQUEST.url]);
    expect(page.closed).toBe(true);
    expect(page.listenerCount()).toBe(0);
  });

  it("should record each media URL once", async () => {

    const { session } = sessionWith({

      exchanges: [ exchange(VIDEO_URL, { contentType: "video/mp4" }), exchange(VIDEO_URL, { contentType: "video/mp4" }) ]
    });

    const located = await locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: SETTINGS });

    expect(located.parts).toHaveLength(1);
    expect(located.title).toBeNull();
  });

  it("should keep observing during the settle delay to catch a better variant", async () => {

    const base = "https://rr1---sn-test.googlevideo.com/videoplayback?mime=";
    const { session } = sessionWith({

      delayedExchanges: [
        { afterMs: 10, exchange: exchange(base + "audio%2Fmp4&itag=140") },
        { afterMs: 25, exchange: exchange(base + "video%2Fmp4&itag=137") }
      ],
      exchanges: [exchange(base + "video%2Fmp4&itag=136")]
    });

    const located = await locate(session, { ...REQUEST, url: "https://www.youtube.com/watch?v=test" }, { cookies: [], extractionId: "test-id", settings: SETTINGS });

    expect(located.matcher).toBe("youtube");
    expect(located.parts.map((part) => [ part.kind, part.height ])).toEqual([ [ "video", 1080 ], [ "audio", null ] ]);
  });

  it("should report StreamNotFound when nothing matches within the window", async () => {

    const { page, session } = sessionWith({ exchanges: [exchange("https://media.example.com/logo.png", { contentType: "image/png", resourceType: "image" })] });

    await expect(locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: { ...SETTINGS, observationWindow: 50 } }))
      .rejects.toThrow(new StreamNotFoundError(REQUEST.url, 50).message);
    expect(page.closed).toBe(true);
  });

  it("should report a redirect to a login page as AuthenticationRequired", async () => {

    const { page, session } = sessionWith({

      navigate: (url) => ({ finalUrl: "https://media.example.com/login?next=/watch/1", redirectChain: [url], status: 200 })
    });

    await expect(locate(session, REQUEST, { cookies: STORED, extractionId: "test-id", settings: SETTINGS }))
      .rejects.toThrow("Authentication required for example.com: the site redirected to a login page.");
    expect(page.closed).toBe(true);
  });

  it("should report a login screen reached by script as AuthenticationRequired", async () => {

    const { session } = sessionWith({ currentUrl: "https://media.example.com/signin" });

    await expect(locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: { ...SETTINGS, observationWindow: 50 } }))
      .rejects.toThrow(AuthenticationRequiredError);
  });

  it("should classify navigation failures", async () => {

    const { session } = sessionWith({

      navigate: () => {

        throw new Error("net::ERR_NAME_NOT_RESOLVED at https://media.example.com/watch/1");
      }
    });

    const failure = locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: SETTINGS });

    await expect(failure).rejects.toThrow(NavigationError);
    await expect(failure).rejects.toMatchObject({ reason: "dns", transient: false });
  });

  it("should report a page that cannot be opened as a transient browser failure", async () => {

    const session: BrowserSession = {

      driver: new FakeDriver(() => {

        throw new Error("Target closed");
      }),
      leaseId: 1,
      slot: 0
    };

    await expect(locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: SETTINGS }))
      .rejects.toMatchObject({ kind: "NavigationError", reason: "browser", transient: true });
  });

  it("should stop observing when cancelled and close the page", async () => {

    const controller = new AbortController();
    const { page, session } = sessionWith({});
    const located = locate(session, REQUEST, { cookies: [], extractionId: "test-id", settings: { ...SETTINGS, observationWindow: 60000 }, signal: controller.signal });
    const outcome = expect(located).rejects.toThrow(ExtractionCancelledError);

    setTimeout(() => controller.abort(), 10);

    await outcome;
    expect(page.closed).toBe(true);
  });
});

describe("checkAuthentication", () => {

  it("should reject 401 and 403 documents", () => {

    expect(() => checkAuthentication(DEFAULT_SITE_PROFILE, REQUEST.url, { finalUrl: REQUEST.url, redirectChain: [], status: 403 }))
      .toThrow("Authentication required for example.com: the page returned HTTP 403.");
  });

  it("should not treat a requested login page as a login wall", () => {

    const url = "https://media.example.com/login";

    expect(() => checkAuthentication(DEFAULT_SITE_PROFILE, url, { finalUrl: url, redirectChain: [], status: 200 })).not.toThrow();
  });
});

describe("buildHeaders", () => {

  it("should use the page as referer and its origin", () => {

    expect(buildHeaders(DEFAULT_SITE_PROFILE, "https://media.example.com/watch/1", "TestAgent/1.0")).toEqual({

      "Origin": "https://media.example.com",
      "Referer": "https://media.example.com/watch/1",
      "User-Agent": "TestAgent/1.0"
    });
  });

  it("should prefer the profile's pinned referer and origin", () => {

    expect(buildHeaders(SITE_PROFILES.youtube, "https://www.youtube.com/watch?v=test", "TestAgent/1.0")).toEqual({

      "Origin": "https://www.youtube.com",
      "Referer": "https://www.youtube.com/",
      "User-Agent": "TestAgent/1.0"
    });
  });
});
