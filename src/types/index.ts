/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for StreamFetch.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values are layered from hard-coded defaults, the user config file, environment variables, and CLI flags, then validated at startup.
 */

/**
 * Browser pool configuration. Each pool slot runs its own Chrome process so that an unresponsive browser can be killed and replaced without disturbing other
 * extractions.
 */
export interface BrowserConfig {

  // Maximum time in milliseconds a caller waits for a free session before failing with PoolExhausted. Environment variable: ACQUIRE_TIMEOUT.
  acquireTimeout: number;

  // Path to the Chrome executable. When null, common installation paths are searched. Environment variable: CHROME_BIN.
  executablePath: Nullable<string>;

  // Upper bound in milliseconds for the liveness probe and state reset performed when a session is released. Environment variable: HEALTH_CHECK_TIMEOUT.
  healthCheckTimeout: number;

  // Number of browser sessions in the pool. Fixed for the lifetime of the process. Environment variable: POOL_SIZE.
  poolSize: number;

  // User agent presented by every session and by the downloader. Environment variable: USER_AGENT.
  userAgent: string;
}

/**
 * Periodic cleanup of stale workspaces and expired artifacts.
 */
export interface CleanupConfig {

  // Age in milliseconds after which a finished artifact in the output directory is deleted. Environment variable: ARTIFACT_MAX_AGE.
  artifactMaxAge: number;

  // Interval in milliseconds between sweeps. Environment variable: CLEANUP_INTERVAL.
  interval: number;
}

/**
 * Cookie persistence configuration.
 */
export interface CookiesConfig {

  // Absolute path of the cookie file. When null, <data-dir>/cookies.txt is used. Environment variable: COOKIES_PATH.
  file: Nullable<string>;
}

/**
 * Downloader configuration.
 */
export interface DownloadConfig {

  // Time in milliseconds without receiving a byte before the transfer is abandoned as incomplete. Environment variable: REQUEST_TIMEOUT.
  idleTimeout: number;

  // Attempts for the download step when a transfer ends short. Environment variable: DOWNLOAD_MAX_ATTEMPTS.
  maxAttempts: number;

  // Largest accepted media part in bytes. Environment variable: MAX_FILE_SIZE.
  maxFileSize: number;
}

/**
 * Extraction coordinator and stream locator configuration.
 */
export interface ExtractionConfig {

  // Random jitter in milliseconds added to each retry delay. Environment variable: BACKOFF_JITTER.
  backoffJitter: number;

  // Initial retry delay in milliseconds, doubled on each subsequent attempt. Environment variable: BACKOFF_BASE.
  backoffBase: number;

  // Output format used when a request does not name one. Environment variable: DEFAULT_FORMAT.
  defaultFormat: OutputFormat;

  // Quality hint used when a request does not name one. Environment variable: DEFAULT_QUALITY.
  defaultQuality: QualityHint;

  // Attempts for locating a stream when the locator reports StreamNotFound or a transient navigation failure. Environment variable: MAX_RETRIES.
  maxAttempts: number;

  // Upper bound in milliseconds for the exponential retry delay. Environment variable: MAX_BACKOFF_DELAY.
  maxBackoffDelay: number;

  // Timeout in milliseconds for the initial page navigation. Environment variable: NAV_TIMEOUT.
  navigationTimeout: number;

  // Time in milliseconds the locator watches network traffic for a media resource. Environment variable: OBSERVATION_WINDOW.
  observationWindow: number;

  // Time in milliseconds completed results are served from memory for repeated requests. Zero disables the cache. Environment variable: RESULT_CACHE_TTL.
  resultCacheTtl: number;

  // Additional time in milliseconds the locator keeps observing after the matcher is satisfied, so that higher quality variants are seen. Environment variable:
  // SETTLE_DELAY.
  settleDelay: number;

  // Lifetime in milliseconds assumed for located (usually signed) media URLs. Environment variable: STREAM_TTL.
  streamTtl: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level: "none", "errors", or "all". Environment variable: HTTP_LOG_LEVEL.
  httpLogLevel: "all" | "errors" | "none";

  // Maximum log file size in bytes before it is trimmed. Environment variable: LOG_MAX_SIZE.
  maxSize: number;
}

/**
 * Filesystem locations. Null values resolve to defaults inside the data directory.
 */
export interface PathsConfig {

  // Log file path. Environment variable: STREAMFETCH_LOG_FILE.
  logFile: Nullable<string>;

  // Directory finished artifacts are moved into. Environment variable: STREAMFETCH_OUTPUT_DIR.
  outputDir: Nullable<string>;

  // Directory holding per-extraction workspaces. Environment variable: STREAMFETCH_WORK_DIR.
  workDir: Nullable<string>;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {

  // Bind address. Environment variable: HOST.
  host: string;

  // TCP port. Environment variable: PORT.
  port: number;

  // Artifact downloads per client per minute, zero for no limit. Environment variable: RATE_LIMIT_DOWNLOAD.
  rateLimitDownload: number;

  // Extraction and format requests per client per minute, zero for no limit. Environment variable: RATE_LIMIT_EXTRACT.
  rateLimitExtract: number;
}

/**
 * Transcoder configuration.
 */
export interface TranscodeConfig {

  // FFmpeg executable. When null, ffmpeg is looked up on the system PATH. Environment variable: FFMPEG_PATH.
  ffmpegPath: Nullable<string>;

  // Time budget in milliseconds for a single FFmpeg run. Environment variable: TRANSCODE_TIMEOUT.
  timeout: number;
}

/**
 * Root configuration object.
 */
export interface Config {

  browser: BrowserConfig;
  cleanup: CleanupConfig;
  cookies: CookiesConfig;
  download: DownloadConfig;
  extraction: ExtractionConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  server: ServerConfig;
  transcode: TranscodeConfig;
}

/*
 * EXTRACTION TYPES
 *
 * The data model flowing through the extraction pipeline. An ExtractionRequest enters the coordinator, a BrowserSession is leased from the pool, the locator
 * turns the page into a LocatedStream, the downloader turns that into a DownloadedArtifact, and the transcoder produces the TranscodedArtifact returned to the
 * caller.
 */

// Delivery formats. Audio formats produce an audio-only artifact.
export const OUTPUT_FORMATS = [ "m4a", "mkv", "mp3", "mp4", "webm" ] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const AUDIO_FORMATS: readonly OutputFormat[] = [ "m4a", "mp3" ];

// Quality hints. A height hint selects the best variant at or below that height.
export const QUALITY_HINTS = [ "best", "worst", "144p", "240p", "360p", "480p", "720p", "1080p", "1440p", "2160p" ] as const;

export type QualityHint = (typeof QUALITY_HINTS)[number];

/**
 * A unit of work. Frozen on creation.
 */
export interface ExtractionRequest {

  readonly format: OutputFormat;
  readonly quality: QualityHint;
  readonly url: string;
}

/**
 * A persisted session cookie. Expiry is in epoch seconds, with 0 marking a session cookie that never expires from the store's point of view.
 */
export interface SessionCookie {

  domain: string;
  expires: number;
  httpOnly: boolean;
  name: string;
  path: string;
  secure: boolean;
  value: string;
}

export type StreamPartKind = "audio" | "muxed" | "video";

/**
 * One media resource identified by a matcher.
 */
export interface StreamPart {

  // Container hint derived from the content type or URL (e.g. "mp4", "webm", "hls"). Null when unknown.
  container: Nullable<string>;

  // Video height in pixels when the matcher could determine it.
  height: Nullable<number>;

  kind: StreamPartKind;

  // Advertised size in bytes when known before downloading.
  sizeHint: Nullable<number>;

  url: string;
}

/**
 * The resolved media for one extraction. Valid only until expiresAt and never shared between extractions.
 */
export interface LocatedStream {

  // Every part the matcher accepted, in observation order. parts is the selection made from them.
  readonly candidates: readonly StreamPart[];

  // Cookies held by the session after navigation, used to authenticate media requests.
  readonly cookies: readonly SessionCookie[];

  readonly expiresAt: number;

  readonly extractionId: string;

  // Request headers the media host expects (referer, origin, user agent).
  readonly headers: Readonly<Record<string, string>>;

  readonly locatedAt: number;

  // Identifier of the matcher that selected the parts.
  readonly matcher: string;

  readonly parts: readonly StreamPart[];

  // Document title of the page, used to name the final artifact.
  readonly title: Nullable<string>;
}

/**
 * One downloaded part on disk.
 */
export interface DownloadedPart {

  // SHA-256 of the file contents, hex encoded.
  checksum: string;

  container: Nullable<string>;
  kind: StreamPartKind;
  path: string;
  size: number;
}

/**
 * The files produced by the downloader for one extraction. Everything the transcoder reads is local.
 */
export interface DownloadedArtifact {

  directory: string;
  parts: DownloadedPart[];
}

/**
 * The final artifact returned to callers.
 */
export interface TranscodedArtifact {

  // Duration in seconds as reported by FFmpeg, or null when it could not be determined.
  duration: Nullable<number>;

  format: OutputFormat;
  id: string;
  path: string;

  // True when the output was produced by stream copy rather than re-encoding.
  remuxed: boolean;

  size: number;
}

/**
 * One media variant a page offers.
 */
export interface AvailableFormat {

  container: Nullable<string>;
  height: Nullable<number>;
  kind: StreamPartKind;

  // Height as a quality label ("720p"), or null when the height is unknown.
  quality: Nullable<string>;

  sizeHint: Nullable<number>;
}

export interface FormatListing {

  formats: AvailableFormat[];
  matcher: string;
  title: Nullable<string>;
  url: string;
}

/**
 * A supported site and the domains that lead to it.
 */
export interface PlatformInfo {

  domains: string[];
  matcher: string;
  name: string;
}

/*
 * BROWSER CAPABILITY TYPES
 *
 * The pool, the locator, and the coordinator only talk to the browser through these interfaces. The puppeteer-core implementation lives in browser/index.ts;
 * tests supply in-process fakes.
 */

/**
 * A network response observed on a page.
 */
export interface NetworkExchange {

  contentLength: Nullable<number>;
  contentType: Nullable<string>;
  method: string;

  // Resource type as reported by the browser ("document", "media", "xhr", "fetch", ...).
  resourceType: string;

  status: number;
  url: string;
}

/**
 * Outcome of a page navigation.
 */
export interface NavigationResult {

  finalUrl: string;

  // URLs visited through HTTP redirects before the final document, in order.
  redirectChain: string[];

  // HTTP status of the final document, or null when the browser did not report one.
  status: Nullable<number>;
}

export interface NavigateOptions {

  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * A single tab within a leased session.
 */
export interface BrowserPage {

  close(): Promise<void>;

  // Cookies the page's context would send to any of the given URLs.
  cookies(urls: readonly string[]): Promise<SessionCookie[]>;

  currentUrl(): string;
  navigate(url: string, options: NavigateOptions): Promise<NavigationResult>;

  // Registers a listener for every network response. Returns a function that removes it.
  onExchange(listener: (exchange: NetworkExchange) => void): () => void;

  setCookies(cookies: readonly SessionCookie[]): Promise<void>;
  title(): Promise<string>;
}

/**
 * One browser process with its current isolated context.
 */
export interface BrowserDriver {

  close(): Promise<void>;
  isConnected(): boolean;

  // Round-trips a protocol command. Resolves false (or never) when the browser is wedged; callers bound it with a timeout.
  isResponsive(): Promise<boolean>;

  newPage(): Promise<BrowserPage>;

  // Discards the current context (cookies, history, storage, open pages) and starts a fresh one.
  reset(): Promise<void>;
}

export type BrowserLauncher = (slot: number) => Promise<BrowserDriver>;

/**
 * An exclusive lease on one pool slot.
 */
export interface BrowserSession {

  readonly driver: BrowserDriver;
  readonly leaseId: number;
  readonly slot: number;
}

/*
 * STATE MACHINE TYPES
 */

export type ExtractionState = "Completed" | "Downloaded" | "Failed" | "Pending" | "SessionAcquired" | "StreamLocated" | "Transcoded";

/**
 * A recorded state change.
 */
export interface ExtractionTransition {

  at: number;
  extractionId: string;
  from: ExtractionState;

  // Failure kind when the transition is into Failed.
  reason?: string;

  to: ExtractionState;
}

/**
 * Snapshot of an in-flight extraction for status reporting.
 */
export interface ExtractionStatus {

  attempts: number;
  id: string;
  joined: number;
  startedAt: number;
  state: ExtractionState;
  url: string;
}

/*
 * API TYPES
 */

/**
 * Body of the health endpoint.
 */
export interface HealthStatus {

  browser: {

    available: number;

    // Sessions whose browser is connected, idle or leased.
    healthy: number;

    leased: number;
    size: number;
    waiting: number;
  };

  extractions: {

    active: number;
  };

  ffmpegAvailable: boolean;

  memory: {

    heapTotal: number;
    heapUsed: number;
    rss: number;
  };

  message?: string;
  status: "degraded" | "healthy" | "unhealthy";
  timestamp: string;

  // Process uptime in seconds.
  uptime: number;

  version: string;
}
