/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * coordinator.ts: Extraction coordinator for StreamFetch.
 */
import type { BrowserSession, Config, DownloadedArtifact, ExtractionRequest, ExtractionStatus, ExtractionTransition, FormatListing, LocatedStream,
  OutputFormat, SessionCookie, TranscodedArtifact } from "../types/index.js";
import type { DownloadOptions, DownloadSettings } from "./downloader.js";
import { AuthenticationRequiredError, DownloadFailedError, ExtractionCancelledError, ExtractionError, IncompleteDownloadError, NavigationError,
  StoreUnavailableError, StreamNotFoundError } from "./errors.js";
import { LOG, computeBackoff, delay, formatError, retryOperation, runWithExtractionContext, startTimer } from "../utils/index.js";
import type { LocateOptions, LocatorSettings } from "./locator.js";
import type { TranscodeOptions, TranscodeSettings } from "./transcoder.js";
import { Workspace, artifactFileName, expireArtifacts, publishArtifact, sweepStaleWorkspaces } from "./workspace.js";
import type { BackoffSettings } from "../utils/index.js";
import { ExtractionStateMachine } from "./state.js";
import type { FFmpegSpawner } from "../utils/index.js";
import { describeFormats } from "./matchers.js";
import { download } from "./downloader.js";
import { extractionKey } from "./key.js";
import fs from "node:fs";
import { locate } from "./locator.js";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { transcode } from "./transcoder.js";

const { promises: fsPromises } = fs;

const MAX_STREAM_REFRESHES = 2;

/*
 * EXTRACTION COORDINATOR
 *
 * The coordinator runs each extraction through its state machine and owns every decision about retrying. Components only report what went wrong:
 *
 * - StreamNotFound and transient NavigationError: the locate step is retried with exponential backoff, up to extraction.maxAttempts, each time with a fresh
 *   session lease.
 * - AuthenticationRequired: the domain's cookies are invalidated and the store reloaded, then the locate step runs once more without using up an attempt. A second
 *   AuthenticationRequired is final.
 * - IncompleteDownload: only the download step is retried, up to download.maxAttempts, resuming the partial files. The located stream is reused while it is
 *   fresh.
 * - A located stream past its expiresAt, or one whose media host answers 403 or 410, is located again with a new session and the download starts over. This
 *   happens at most MAX_STREAM_REFRESHES times per extraction.
 * - Everything else fails the extraction immediately.
 *
 * Requests with the same extraction key share one run: later callers join the in-flight extraction and receive its result or its failure. Each caller may cancel
 * independently; the shared work is only aborted when the last caller has gone. The browser session is released as soon as the stream is located, and the
 * workspace is removed when the run settles, whatever the outcome.
 */

/**
 * The parts of the cookie store the coordinator uses.
 */
export interface CookieSource {

  forUrl(url: string): SessionCookie[];
  invalidate(domain: string): Promise<number>;
  load(): Promise<SessionCookie[]>;
}

/**
 * The parts of the session pool the coordinator uses.
 */
export interface SessionSource {

  acquire(timeoutMs: number, signal?: AbortSignal): Promise<BrowserSession>;
  release(session: BrowserSession): Promise<void>;
}

export type LocateFunction = (session: BrowserSession, request: ExtractionRequest, options: LocateOptions) => Promise<LocatedStream>;

export type DownloadFunction = (stream: LocatedStream, destination: string, options: DownloadOptions) => Promise<DownloadedArtifact>;

export type TranscodeFunction = (artifact: DownloadedArtifact, format: OutputFormat, destination: string, options: TranscodeOptions) =>
Promise<TranscodedArtifact>;

export type CoordinatorSettings = Pick<Config, "browser" | "cleanup" | "download" | "extraction" | "transcode">;

export interface CoordinatorOptions {

  cookies: CookieSource;

  // Pipeline steps. Default to the real locator, downloader, and transcoder.
  download?: DownloadFunction;
  locate?: LocateFunction;
  transcode?: TranscodeFunction;

  // Resolved FFmpeg executable.
  ffmpegPath: string;

  now?: () => number;
  onTransition?: (transition: ExtractionTransition) => void;
  outputDir: string;
  pool: SessionSource;

  // Random source for backoff jitter.
  random?: () => number;

  settings: CoordinatorSettings;
  spawner?: FFmpegSpawner;
  workDir: string;
}

interface InFlightExtraction {

  controller: AbortController;
  id: string;
  promise: Promise<TranscodedArtifact>;

  // Settles with the run, never rejects.
  settled: Promise<void>;

  status: ExtractionStatus;
  subscribers: number;
}

interface CachedResult {

  artifact: TranscodedArtifact;
  expiresAt: number;
}

export class ExtractionCoordinator {

  private readonly cache: Map<string, CachedResult>;
  private readonly inFlight: Map<string, InFlightExtraction>;
  private readonly now: () => number;
  private readonly options: CoordinatorOptions;
  private readonly steps: { download: DownloadFunction; locate: LocateFunction; transcode: TranscodeFunction };

  constructor(options: CoordinatorOptions) {

    this.cache = new Map();
    this.inFlight = new Map();
    this.now = options.now ?? Date.now;
    this.options = options;
    this.steps = { download: options.download ?? download, locate: options.locate ?? locate, transcode: options.transcode ?? transcode };
  }

  /**
   * Extracts a media artifact, joining an in-flight extraction of the same key when there is one.
   * @param request - The extraction request.
   * @param signal - Aborting cancels this caller's interest. The shared work stops once every joined caller has cancelled.
   * @returns The transcoded artifact.
   * @throws An ExtractionError describing the failure.
   */
  async extract(request: ExtractionRequest, signal?: AbortSignal): Promise<TranscodedArtifact> {

    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    const key = extractionKey(request.url, request.format);
    const cached = await this.cached(key);

    // The caller may have gone while the cache was checked.
    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    if(cached) {

      LOG.debug("extraction:coordinator", "Serving %s from the result cache.", request.url);

      return cached;
    }

    const existing = this.inFlight.get(key);

    if(existing) {

      // An extraction everyone walked away from is winding down. Wait for it to let go of the key rather than joining a run that is about to fail.
      if(existing.controller.signal.aborted) {

        await existing.settled;

        return this.extract(request, signal);
      }

      existing.status.joined++;

      LOG.withExtractionId(existing.id).info("Joined in-flight extraction of %s (%s caller(s)).", request.url, existing.subscribers + 1);

      return this.subscribe(existing, signal);
    }

    return this.subscribe(this.begin(key, request), signal);
  }

  /**
   * Lists the media a page offers, without downloading anything.
   * @param url - The page URL.
   * @param signal - Aborting cancels the lookup.
   * @returns Every candidate the site's matcher accepted, best first.
   * @throws An ExtractionError describing the failure.
   */
  async listFormats(url: string, signal?: AbortSignal): Promise<FormatListing> {

    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    const { settings } = this.options;
    const id = [ "formats", randomUUID().slice(0, 8) ].join("-");

    // Every candidate counts, so the request is as permissive as a request can be.
    const request: ExtractionRequest = Object.freeze({ format: "mkv", quality: "best", url });

    return runWithExtractionContext({ extractionId: id, url }, async () => {

      const session = await this.options.pool.acquire(settings.browser.acquireTimeout, signal);
      let stream: LocatedStream;

      try {

        stream = await this.steps.locate(session, request, {

          cookies: this.options.cookies.forUrl(url),
          extractionId: id,
          now: this.now,
          settings: this.locatorSettings(),
          signal
        });
      } finally {

        await this.options.pool.release(session);
      }

      LOG.debug("extraction:coordinator", "Found %s candidate(s) on %s.", stream.candidates.length, url);

      return { formats: describeFormats(stream.candidates), matcher: stream.matcher, title: stream.title, url };
    });
  }

  /**
   * Snapshots of the in-flight extractions.
   */
  statuses(): ExtractionStatus[] {

    return [...this.inFlight.values()].map((entry) => ({ ...entry.status }));
  }

  /**
   * Removes stale workspaces and expired artifacts.
   */
  async sweep(): Promise<void> {

    const active = new Set([...this.inFlight.values()].map((entry) => entry.id));

    await sweepStaleWorkspaces(this.options.workDir, active);

    const expired = new Set(await expireArtifacts(this.options.outputDir, this.options.settings.cleanup.artifactMaxAge, this.now()));

    for(const [ key, result ] of this.cache) {

      if(expired.has(path.basename(result.artifact.path)) || (result.expiresAt <= this.now())) {

        this.cache.delete(key);
      }
    }
  }

  /**
   * Cancels every in-flight extraction and waits for them to settle.
   */
  async shutdown(): Promise<void> {

    const entries = [...this.inFlight.values()];

    for(const entry of entries) {

      entry.controller.abort(new ExtractionCancelledError("The server is shutting down."));
    }

    await Promise.all(entries.map(async (entry) => entry.settled));
  }

  private async cached(key: string): Promise<TranscodedArtifact | undefined> {

    const result = this.cache.get(key);

    if(!result) {

      return undefined;
    }

    if(result.expiresAt > this.now()) {

      try {

        await fsPromises.access(result.artifact.path);

        return result.artifact;
      } catch(error) {

        LOG.debug("extraction:coordinator", "Cached artifact is gone: %s.", formatError(error));
      }
    }

    this.cache.delete(key);

    return undefined;
  }

  // Starts the shared run for a key.
  private begin(key: string, request: ExtractionRequest): InFlightExtraction {

    const id = [ key.slice(0, 8), randomUUID().slice(0, 8) ].join("-");
    const controller = new AbortController();
    const status: ExtractionStatus = { attempts: 0, id, joined: 0, startedAt: this.now(), state: "Pending", url: request.url };
    const promise = runWithExtractionContext({ extractionId: id, url: request.url }, async () => this.run(request, id, status, controller.signal));
    const ttl = this.options.settings.extraction.resultCacheTtl;

    const settled = promise.then((artifact) => {

      if(ttl > 0) {

        this.cache.set(key, { artifact, expiresAt: this.now() + ttl });
      }
    }, (error: unknown) => {

      LOG.withExtractionId(id).debug("extraction:coordinator", "Shared extraction settled with %s.", formatError(error));
    }).finally(() => {

      this.inFlight.delete(key);
    });

    const entry: InFlightExtraction = { controller, id, promise, settled, status, subscribers: 0 };

    this.inFlight.set(key, entry);

    return entry;
  }

  // Attaches one caller to a shared run.
  private async subscribe(entry: InFlightExtraction, signal?: AbortSignal): Promise<TranscodedArtifact> {

    entry.subscribers++;

    return new Promise<TranscodedArtifact>((resolve, reject) => {

      let attached = true;

      const detach = (cancelled: boolean): void => {

        if(!attached) {

          return;
        }

        attached = false;
        signal?.removeEventListener("abort", onAbort);
        entry.subscribers--;

        if(cancelled && (entry.subscribers === 0)) {

          LOG.withExtractionId(entry.id).info("Every caller cancelled. Aborting the extraction.");
          entry.controller.abort(new ExtractionCancelledError());
        }
      };

      const onAbort = (): void => {

        detach(true);
        reject(new ExtractionCancelledError());
      };

      if(signal?.aborted) {

        onAbort();

        return;
      }

      signal?.addEventListener("abort", onAbort, { once: true });

      void entry.promise.then((artifact) => {

        detach(false);
        resolve(artifact);
      }, (error: unknown) => {

        detach(false);
        reject(error);
      });
    });
  }

  /**
   * Runs one extraction through the pipeline.
   */
  private async run(request: ExtractionRequest, id: string, status: ExtractionStatus, signal: AbortSignal): Promise<TranscodedArtifact> {

    const elapsed = startTimer();
    const machine = new ExtractionStateMachine(id, (transition) => {

      status.state = transition.to;
      this.options.onTransition?.(transition);
    }, this.now);

    LOG.info("Extracting %s as %s (%s).", request.url, request.format, request.quality);

    let workspace: Workspace | undefined;

    try {

      workspace = await Workspace.create(this.options.workDir, id);

      const located = await this.locateStream(request, id, status, machine, signal);
      const { downloaded, stream } = await this.downloadStream(request, id, status, machine, located, workspace, signal);

      machine.to("Downloaded");

      const artifactId = randomUUID().replace(/-/g, "").slice(0, 12);
      const output = path.join(workspace.root, artifactFileName(stream.title, artifactId, request.format));
      const transcoded = await this.steps.transcode(downloaded, request.format, output, {

        id: artifactId,
        settings: this.transcodeSettings(),
        signal,
        spawner: this.options.spawner
      });

      machine.to("Transcoded");

      await workspace.removeDownloads();

      const published = { ...transcoded, path: await publishArtifact(transcoded.path, this.options.outputDir) };

      machine.to("Completed");

      LOG.info("Extracted %s as %s in %s (%s).", request.url, path.basename(published.path), [ String(elapsed()), "ms" ].join(""),
        published.remuxed ? "remuxed" : "re-encoded");

      return published;
    } catch(error) {

      const failure = (signal.aborted && !(error instanceof ExtractionCancelledError)) ? new ExtractionCancelledError() : error;

      machine.fail((failure instanceof ExtractionError) ? failure.kind : "InternalError");

      LOG.error("Extraction of %s failed: %s.", request.url, formatError(failure));

      throw failure;
    } finally {

      await workspace?.dispose();
    }
  }

  /**
   * Leases a session and locates the stream, retrying as the policy allows.
   */
  private async locateStream(request: ExtractionRequest, id: string, status: ExtractionStatus, machine: ExtractionStateMachine, signal: AbortSignal):
  Promise<LocatedStream> {

    const { maxAttempts } = this.options.settings.extraction;
    let attempt = 0;
    let reauthenticated = false;

    for(;;) {

      attempt++;
      status.attempts++;

      let failure: unknown;

      try {

        // eslint-disable-next-line no-await-in-loop
        const stream = await this.locateOnce(request, id, machine, signal);

        machine.to("StreamLocated");

        return stream;
      } catch(error) {

        failure = error;
      }

      if(signal.aborted) {

        throw failure;
      }

      if((failure instanceof AuthenticationRequiredError) && !reauthenticated) {

        reauthenticated = true;
        attempt--;

        // eslint-disable-next-line no-await-in-loop
        await this.reauthenticate(failure.domain);
        this.backToPending(machine);

        continue;
      }

      if(isRetryableLocateFailure(failure) && (attempt < maxAttempts)) {

        const waitMs = computeBackoff(attempt, this.backoffSettings(), this.options.random);

        LOG.warn("Locating %s failed on attempt %s of %s: %s. Retrying in %sms.", request.url, attempt, maxAttempts, formatError(failure), waitMs);

        this.backToPending(machine);

        // eslint-disable-next-line no-await-in-loop
        await delay(waitMs, signal);

        continue;
      }

      throw failure;
    }
  }

  /**
   * Downloads the located media, resuming partial transfers while the stream is fresh and locating it again once it is not.
   */
  private async downloadStream(request: ExtractionRequest, id: string, status: ExtractionStatus, machine: ExtractionStateMachine, located: LocatedStream,
    workspace: Workspace, signal: AbortSignal): Promise<{ downloaded: DownloadedArtifact; stream: LocatedStream }> {

    const { settings } = this.options;
    let refresh = false;
    let refreshes = 0;
    let stream = located;

    for(;;) {

      if((refresh || this.isExpired(stream)) && (refreshes < MAX_STREAM_REFRESHES)) {

        refreshes++;

        LOG.warn("The located stream of %s is %s. Locating it again (%s of %s).", request.url, refresh ? "refused by the media host" : "past its expiry",
          refreshes, MAX_STREAM_REFRESHES);

        // Partial files of the old URLs may not line up with whatever the page offers now.
        // eslint-disable-next-line no-await-in-loop
        await workspace.removeDownloads();
        machine.to("Pending");

        // eslint-disable-next-line no-await-in-loop
        stream = await this.locateStream(request, id, status, machine, signal);
      }

      refresh = false;

      const current = stream;

      try {

        // eslint-disable-next-line no-await-in-loop
        const downloaded = await retryOperation(async () => this.steps.download(current, workspace.downloadDir, {

          quality: request.quality,
          settings: this.downloadSettings(),
          signal
        }), {

          description: "download",
          maxAttempts: settings.download.maxAttempts,
          random: this.options.random,
          settings: this.backoffSettings(),
          shouldRetry: (error) => (error instanceof IncompleteDownloadError) && !signal.aborted && !this.isExpired(current),
          signal
        });

        return { downloaded, stream: current };
      } catch(error) {

        if(signal.aborted || (refreshes >= MAX_STREAM_REFRESHES) || !this.needsFreshStream(error, current)) {

          throw error;
        }

        refresh = true;
      }
    }
  }

  private isExpired(stream: LocatedStream): boolean {

    return this.now() >= stream.expiresAt;
  }

  // Signed media URLs stop working when they expire, and hosts say so with 403 or 410.
  private needsFreshStream(error: unknown, stream: LocatedStream): boolean {

    if(error instanceof IncompleteDownloadError) {

      return this.isExpired(stream);
    }

    return (error instanceof DownloadFailedError) && ((error.status === 403) || (error.status === 410));
  }

  // One locate attempt on a freshly leased session. The session goes back to the pool before the result is used.
  private async locateOnce(request: ExtractionRequest, id: string, machine: ExtractionStateMachine, signal: AbortSignal): Promise<LocatedStream> {

    const { settings } = this.options;
    const session = await this.options.pool.acquire(settings.browser.acquireTimeout, signal);

    try {

      machine.to("SessionAcquired");

      return await this.steps.locate(session, request, {

        cookies: this.options.cookies.forUrl(request.url),
        extractionId: id,
        now: this.now,
        settings: this.locatorSettings(),
        signal
      });
    } finally {

      await this.options.pool.release(session);
    }
  }

  private backToPending(machine: ExtractionStateMachine): void {

    if(machine.state === "SessionAcquired") {

      machine.to("Pending");
    }
  }

  /**
   * Drops a domain's cookies and reloads the store, so that the retry picks up whatever the store now holds for the site.
   */
  private async reauthenticate(domain: string): Promise<void> {

    const { cookies } = this.options;

    try {

      const removed = await cookies.invalidate(domain);

      LOG.warn("Authentication required for %s. Invalidated %s cookie(s); retrying once.", domain, removed);
    } catch(error) {

      LOG.warn("Unable to invalidate cookies for %s: %s.", domain, formatError(error));
    }

    try {

      await cookies.load();
    } catch(error) {

      if(!(error instanceof StoreUnavailableError)) {

        throw error;
      }

      LOG.warn("%s Retrying without stored cookies.", error.message);
    }
  }

  private backoffSettings(): BackoffSettings {

    const { backoffBase, backoffJitter, maxBackoffDelay } = this.options.settings.extraction;

    return { backoffBase, backoffJitter, maxBackoffDelay };
  }

  private downloadSettings(): DownloadSettings {

    const { idleTimeout, maxFileSize } = this.options.settings.download;

    return { idleTimeout, maxFileSize };
  }

  private locatorSettings(): LocatorSettings {

    const { navigationTimeout, observationWindow, settleDelay, streamTtl } = this.options.settings.extraction;

    return { navigationTimeout, observationWindow, settleDelay, streamTtl, userAgent: this.options.settings.browser.userAgent };
  }

  private transcodeSettings(): TranscodeSettings {

    return { ffmpegPath: this.options.ffmpegPath, timeout: this.options.settings.transcode.timeout };
  }
}

/**
 * Failures of the locate step worth another attempt: nothing was found in the window, or navigation failed in a way that may not happen again.
 * @param error - The failure.
 * @returns True when the locate step should be retried.
 */
export function isRetryableLocateFailure(error: unknown): boolean {

  return (error instanceof StreamNotFoundError) || ((error instanceof NavigationError) && error.transient);
}
