/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for StreamFetch.
 */
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { ExtractionError, PoolExhaustedError, StoreUnavailableError } from "./extraction/errors.js";
import { LOG, createMorganStream, formatError, initializeFileLogger, isFFmpegAvailable, resolveFFmpegPath, setConsoleLogging, shutdownFileLogger } from
  "./utils/index.js";
import type { LoggingConfig, Nullable } from "./types/index.js";
import { getCookiesFilePath, getDataDir, getLogFilePath, getOutputDir, getWorkDir } from "./config/paths.js";
import { BrowserSessionPool } from "./browser/pool.js";
import { CookieStore } from "./cookies/store.js";
import { ExtractionCoordinator } from "./extraction/coordinator.js";
import type { ExtractionErrorKind } from "./extraction/errors.js";
import type { RouteServices } from "./routes/index.js";
import type { Server } from "node:http";
import consoleStamp from "console-stamp";
import { createPuppeteerLauncher } from "./browser/index.js";
import express from "express";
import fs from "node:fs";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

const { promises: fsPromises } = fs;

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/streamfetch.log.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server and the long-lived services are stored globally so they can be shut down in order.
 */

let server: Nullable<Server> = null;
let pool: Nullable<BrowserSessionPool> = null;
let coordinator: Nullable<ExtractionCoordinator> = null;
let cleanupInterval: Nullable<ReturnType<typeof setInterval>> = null;

/*
 * ERROR MAPPING
 *
 * Pipeline failures reach the client as { error: { kind, message, retryable } } with a status code per failure kind. PoolExhausted is backpressure rather than
 * an error, so it carries Retry-After. Anything that is not an ExtractionError is reported as a generic 500 and only its details are logged.
 */

export const STATUS_BY_KIND: Readonly<Record<ExtractionErrorKind, number>> = {

  AuthenticationRequired: 401,
  DownloadFailed: 502,
  DownloadTooLarge: 422,
  ExtractionCancelled: 499,
  IncompleteDownload: 502,
  InvalidRequest: 400,
  NavigationError: 502,
  PoolExhausted: 503,
  StoreUnavailable: 503,
  StreamNotFound: 404,
  TranscodeFailed: 500
};

/**
 * Reads the HTTP status body-parser attaches to the errors it raises (malformed JSON, oversized bodies).
 */
function clientErrorStatus(error: unknown): Nullable<number> {

  if((typeof error !== "object") || (error === null)) {

    return null;
  }

  const status: unknown = Reflect.get(error, "status");

  return ((typeof status === "number") && (status >= 400) && (status < 500)) ? status : null;
}

/**
 * Express error middleware mapping failures onto status codes and typed error bodies.
 */
export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {

  if(res.headersSent) {

    next(error);

    return;
  }

  if(error instanceof ExtractionError) {

    // The client is asked to wait as long as this request waited for a session.
    if(error instanceof PoolExhaustedError) {

      res.setHeader("Retry-After", String(Math.max(1, Math.ceil(error.timeoutMs / 1000))));
    }

    res.status(STATUS_BY_KIND[error.kind]).json({ error: error.toPublic() });

    return;
  }

  const clientStatus = clientErrorStatus(error);

  if(clientStatus !== null) {

    res.status(clientStatus).json({ error: { kind: "InvalidRequest", message: "The request body could not be read.", retryable: false } });

    return;
  }

  LOG.error("Unhandled error in request: %s.", formatError(error));

  res.status(500).json({ error: { kind: "InternalError", message: "Internal server error.", retryable: false } });
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup so that tests
 * can drive the routes with fake services.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param services - The pipeline services the routes use.
 * @param httpLogLevel - HTTP request logging level.
 * @returns The configured Express application.
 */
export function buildApp(services: RouteServices, httpLogLevel: LoggingConfig["httpLogLevel"] = "none"): Express {

  const app = express();

  // Trust proxy headers so that the logged remote address is the client's when running behind a reverse proxy.
  app.set("trust proxy", true);

  // Morgan output goes through morganStream, which handles timestamp formatting consistently for both console and file logging modes.
  if(httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";

    app.use(morgan(morganFormat, {

      skip: (req, res): boolean => {

        if(httpLogLevel === "all") {

          return false;
        }

        // Backpressure with Retry-After is expected under load rather than an error.
        if((res.statusCode === 503) && res.getHeader("Retry-After")) {

          return true;
        }

        return res.statusCode < 400;
      },

      stream: createMorganStream()
    }));
  }

  setupRoutes(app, services);

  app.use(errorHandler);

  return app;
}

/*
 * GRACEFUL SHUTDOWN
 *
 * When the process receives a termination signal, in-flight extractions are cancelled (which releases their sessions and removes their workspaces), the browser
 * pool is closed, and the HTTP server stops accepting connections.
 */

function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    if(cleanupInterval) {

      clearInterval(cleanupInterval);
      cleanupInterval = null;
    }

    try {

      await coordinator?.shutdown();
      await pool?.stop();
    } catch(error) {

      LOG.error("Error stopping the extraction pipeline: %s.", formatError(error));
    }

    try {

      if(server) {

        server.close((): void => {

          LOG.info("HTTP server closed successfully.");
        });
      }
    } catch(error) {

      LOG.error("Error closing server during shutdown: %s.", formatError(error));
    }

    // Shut down file logger if in use.
    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * PERIODIC CLEANUP
 */

function startCleanup(target: ExtractionCoordinator, interval: number): void {

  const sweep = async (): Promise<void> => {

    try {

      await target.sweep();
    } catch(error) {

      LOG.warn("Cleanup sweep failed: %s.", formatError(error));
    }
  };

  void sweep();

  cleanupInterval = setInterval(() => {

    void sweep();
  }, interval);

  cleanupInterval.unref();
}

/*
 * SERVER STARTUP
 */

export interface StartOptions {

  // Setting path to value, from command-line flags.
  cliOverrides?: ReadonlyMap<string, unknown>;

  useConsoleLogging?: boolean;
}

/**
 * Initializes and starts the HTTP server. Before accepting connections, we validate configuration, prepare the data directories, launch the browser pool, and
 * load the cookie store.
 * @param options - Logging mode and CLI overrides.
 */
export async function startServer(options: StartOptions = {}): Promise<void> {

  const useConsoleLogging = options.useConsoleLogging ?? false;

  // Set logging mode early before any log calls.
  usingConsoleLogging = useConsoleLogging;
  setConsoleLogging(useConsoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(useConsoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file, environment variables, and CLI flags, then validate.
  try {

    await initializeConfiguration(options.cliOverrides);
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  const workDir = getWorkDir(CONFIG);
  const outputDir = getOutputDir(CONFIG);

  await fsPromises.mkdir(getDataDir(), { recursive: true });
  await fsPromises.mkdir(workDir, { recursive: true });
  await fsPromises.mkdir(outputDir, { recursive: true });

  // Initialize file logger if not using console logging.
  if(!useConsoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  displayConfiguration();
  setupGracefulShutdown();

  // Extraction can only finish with FFmpeg, but the server still starts without it so that the health endpoint can report the problem.
  const ffmpegPath = await resolveFFmpegPath(CONFIG.transcode.ffmpegPath);

  if(ffmpegPath) {

    LOG.info("Using FFmpeg at: %s", ffmpegPath);
  } else {

    LOG.error("FFmpeg is not available. Install FFmpeg or set FFMPEG_PATH; extractions will fail at the transcode step.");
  }

  const cookies = new CookieStore(getCookiesFilePath(CONFIG));

  try {

    const loaded = await cookies.load();

    LOG.info("Loaded %s cookie(s).", loaded.length);
  } catch(error) {

    if(!(error instanceof StoreUnavailableError)) {

      throw error;
    }

    LOG.warn("%s Extractions will run unauthenticated until cookies are uploaded.", error.message);
  }

  pool = new BrowserSessionPool({

    healthCheckTimeout: CONFIG.browser.healthCheckTimeout,
    launcher: createPuppeteerLauncher({ executablePath: CONFIG.browser.executablePath, userAgent: CONFIG.browser.userAgent }),
    size: CONFIG.browser.poolSize
  });

  const launched = await pool.start();

  if(launched === 0) {

    LOG.error("No browser could be launched. Extractions will retry launching on demand.");
  }

  coordinator = new ExtractionCoordinator({

    cookies,
    ffmpegPath: ffmpegPath ?? CONFIG.transcode.ffmpegPath ?? "ffmpeg",
    outputDir,
    pool,
    settings: CONFIG,
    workDir
  });

  startCleanup(coordinator, CONFIG.cleanup.interval);

  const app = buildApp({

    coordinator,
    cookies,
    defaults: { format: CONFIG.extraction.defaultFormat, quality: CONFIG.extraction.defaultQuality },
    ffmpegAvailable: async () => isFFmpegAvailable(CONFIG.transcode.ffmpegPath),
    outputDir,
    pool,
    rateLimits: { download: CONFIG.server.rateLimitDownload, extract: CONFIG.server.rateLimitExtract }
  }, CONFIG.logging.httpLogLevel);

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("StreamFetch is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });
}
