/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Browser lifecycle management for StreamFetch.
 */
import type { Browser, BrowserContext, HTTPResponse, Page, PuppeteerLaunchOptions } from "puppeteer-core";
import type { BrowserDriver, BrowserLauncher, BrowserPage, NavigateOptions, NavigationResult, NetworkExchange, Nullable, SessionCookie } from "../types/index.js";
import { LOG, formatError, raceWithTimeout, startTimer } from "../utils/index.js";
import fs from "node:fs";
import { launch } from "puppeteer-core";

/* Each pool slot owns one Chrome process driven by puppeteer-core over a pipe. Leases do their work inside a browser context (puppeteer's equivalent of an
 * incognito profile) so that resetting a session is a matter of closing the context and opening a new one: cookies, storage, history, and open pages go with it.
 * The process itself survives resets and is only replaced when it stops responding.
 */

// Upper bound for a graceful browser.close() before the process is killed.
const CLOSE_TIMEOUT = 5000;

// Slack added on top of the navigation timeout puppeteer enforces itself, so its own TimeoutError wins the race when both fire.
const NAVIGATION_GRACE = 1000;

export interface BrowserLaunchSettings {

  executablePath: Nullable<string>;
  userAgent: string;
}

/**
 * Locates the Chrome executable. A configured path (CHROME_BIN) takes precedence; otherwise common installation paths on macOS, Linux, and Windows are searched.
 * @param configured - The configured executable path, or null.
 * @returns Path to the Chrome executable.
 * @throws If no Chrome installation is found.
 */
export function getExecutablePath(configured: Nullable<string>): string {

  if(configured) {

    return configured;
  }

  const paths = [

    // macOS.
    "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
    "/Applications/Chromium.app/Contents/MacOS/Chromium",

    // Linux. Package naming varies by distribution, and container images usually ship Chromium.
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser",

    // Windows.
    "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
    "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe"
  ];

  const found = paths.find((candidate) => fs.existsSync(candidate));

  if(found) {

    return found;
  }

  throw new Error("No Chrome installation found. Set the CHROME_BIN environment variable.");
}

/**
 * Assembles the puppeteer launch options for a pool session.
 *
 * --autoplay-policy=no-user-gesture-required: players start loading media without a click, which is what makes their media requests observable.
 * --disable-blink-features=AutomationControlled: hides navigator.webdriver, which some sites use to refuse automated browsers.
 * --disable-dev-shm-usage: containers often have a tiny /dev/shm, which crashes renderers under load.
 * --mute-audio: nothing is listened to.
 * @param executablePath - The Chrome executable.
 * @returns Puppeteer launch options.
 */
export function buildLaunchOptions(executablePath: string): PuppeteerLaunchOptions {

  return {

    args: [

      "--autoplay-policy=no-user-gesture-required",
      "--disable-background-timer-throttling",
      "--disable-blink-features=AutomationControlled",
      "--disable-dev-shm-usage",
      "--disable-notifications",
      "--hide-crash-restore-bubble",
      "--mute-audio",
      "--no-first-run"
    ],

    defaultViewport: { height: 720, width: 1280 },
    executablePath,
    headless: true,

    // Omit the flag that sets navigator.webdriver.
    ignoreDefaultArgs: ["--enable-automation"],

    // Pipe mode is faster and more reliable than the WebSocket transport.
    pipe: true
  };
}

/**
 * Extracts the total size of a response body: the total from Content-Range for partial responses, otherwise Content-Length.
 * @param headers - Lowercased response headers.
 * @returns The size in bytes, or null when not advertised.
 */
export function advertisedSize(headers: Record<string, string | undefined>): Nullable<number> {

  const rangeTotal = /\/(\d+)\s*$/.exec(headers["content-range"] ?? "");

  if(rangeTotal) {

    return Number(rangeTotal[1]);
  }

  const length = Number(headers["content-length"]);

  return (headers["content-length"] !== undefined) && Number.isFinite(length) ? length : null;
}

class PuppeteerPage implements BrowserPage {

  private readonly page: Page;

  constructor(page: Page) {

    this.page = page;
  }

  async close(): Promise<void> {

    if(!this.page.isClosed()) {

      await this.page.close();
    }
  }

  async cookies(urls: readonly string[]): Promise<SessionCookie[]> {

    const cookies = await this.page.cookies(...urls);

    return cookies.map((cookie) => ({

      domain: cookie.domain,
      expires: (cookie.session || (cookie.expires < 0)) ? 0 : Math.trunc(cookie.expires),
      httpOnly: cookie.httpOnly,
      name: cookie.name,
      path: cookie.path,
      secure: cookie.secure,
      value: cookie.value
    }));
  }

  currentUrl(): string {

    return this.page.url();
  }

  /**
   * Navigates to a URL and waits for DOMContentLoaded. Media requests are observed separately through onExchange(), so there is no point waiting for the network
   * to go idle, which players with persistent connections never do.
   */
  async navigate(url: string, options: NavigateOptions): Promise<NavigationResult> {

    const response = await raceWithTimeout(this.page.goto(url, { timeout: options.timeoutMs, waitUntil: "domcontentloaded" }), {

      description: "Navigation",
      signal: options.signal,
      timeoutMs: options.timeoutMs + NAVIGATION_GRACE
    });

    return {

      finalUrl: this.page.url(),
      redirectChain: response ? response.request().redirectChain().map((request) => request.url()) : [],
      status: response ? response.status() : null
    };
  }

  onExchange(listener: (exchange: NetworkExchange) => void): () => void {

    const handler = (response: HTTPResponse): void => {

      const headers = response.headers();
      const request = response.request();

      listener({

        contentLength: advertisedSize(headers),
        contentType: headers["content-type"] ?? null,
        method: request.method(),
        resourceType: request.resourceType(),
        status: response.status(),
        url: response.url()
      });
    };

    this.page.on("response", handler);

    return (): void => {

      this.page.off("response", handler);
    };
  }

  async setCookies(cookies: readonly SessionCookie[]): Promise<void> {

    if(cookies.length === 0) {

      return;
    }

    await this.page.setCookie(...cookies.map((cookie) => ({

      domain: cookie.domain,
      expires: (cookie.expires > 0) ? cookie.expires : undefined,
      httpOnly: cookie.httpOnly,
      name: cookie.name,
      path: cookie.path,
      secure: cookie.secure,
      value: cookie.value
    })));
  }

  async title(): Promise<string> {

    return this.page.title();
  }
}

class PuppeteerDriver implements BrowserDriver {

  private readonly browser: Browser;
  private context: BrowserContext;
  private readonly slot: number;
  private readonly userAgent: string;

  constructor(browser: Browser, context: BrowserContext, slot: number, userAgent: string) {

    this.browser = browser;
    this.context = context;
    this.slot = slot;
    this.userAgent = userAgent;
  }

  /**
   * Closes the browser, killing the process if it does not close in time.
   */
  async close(): Promise<void> {

    try {

      await raceWithTimeout(this.browser.close(), { description: "Browser close", timeoutMs: CLOSE_TIMEOUT });
    } catch(error) {

      LOG.warn("Browser in slot %s did not close cleanly: %s. Forcing termination.", this.slot, formatError(error));

      this.browser.process()?.kill("SIGKILL");
    }
  }

  isConnected(): boolean {

    return this.browser.connected;
  }

  async isResponsive(): Promise<boolean> {

    try {

      await this.browser.version();

      return true;
    } catch(error) {

      LOG.debug("browser:pool", "Browser in slot %s failed its liveness probe: %s.", this.slot, formatError(error));

      return false;
    }
  }

  async newPage(): Promise<BrowserPage> {

    const page = await this.context.newPage();

    await page.setUserAgent(this.userAgent);

    return new PuppeteerPage(page);
  }

  async reset(): Promise<void> {

    await this.context.close();

    this.context = await this.browser.createBrowserContext();
  }
}

/**
 * Creates the launcher the session pool uses to start a browser in a slot.
 * @param settings - Executable and user agent.
 * @returns A launcher producing one puppeteer-backed driver per call.
 */
export function createPuppeteerLauncher(settings: BrowserLaunchSettings): BrowserLauncher {

  return async (slot: number): Promise<BrowserDriver> => {

    const elapsed = startTimer();
    const browser = await launch(buildLaunchOptions(getExecutablePath(settings.executablePath)));

    browser.on("disconnected", () => {

      LOG.debug("browser:launch", "Browser in slot %s disconnected.", slot);
    });

    try {

      const context = await browser.createBrowserContext();

      LOG.debug("browser:launch", "Browser in slot %s ready: %s. (%sms)", slot, await browser.version(), elapsed());

      return new PuppeteerDriver(browser, context, slot, settings.userAgent);
    } catch(error) {

      browser.process()?.kill("SIGKILL");

      throw error;
    }
  };
}
