/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for StreamFetch.
 */
import type { ExtractionRequest, ExtractionStatus, FormatListing, SessionCookie, TranscodedArtifact } from "../types/index.js";
import type { ExtractionDefaults } from "../extraction/key.js";
import type { Express } from "express";
import type { PoolStats } from "../browser/pool.js";
import { setupCookiesEndpoint } from "./cookies.js";
import { setupExtractEndpoints } from "./extract.js";
import { setupFormatsEndpoints } from "./formats.js";
import { setupHealthEndpoint } from "./health.js";

/*
 * ROUTE SETUP
 *
 * Routes reach the pipeline only through the services below, which app.ts assembles at startup and tests assemble from fakes.
 */

export interface RouteServices {

  coordinator: {

    extract(request: ExtractionRequest, signal?: AbortSignal): Promise<TranscodedArtifact>;
    listFormats(url: string, signal?: AbortSignal): Promise<FormatListing>;
    statuses(): ExtractionStatus[];
  };

  cookies: {

    save(cookies: readonly SessionCookie[]): Promise<void>;
  };

  defaults: ExtractionDefaults;

  ffmpegAvailable: () => Promise<boolean>;

  // Directory holding published artifacts.
  outputDir: string;

  pool: {

    healthy(): number;
    stats(): PoolStats;
  };

  // Requests per client per minute. Zero disables a limit.
  rateLimits: {

    download: number;
    extract: number;
  };
}

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param services - The pipeline services.
 */
export function setupRoutes(app: Express, services: RouteServices): void {

  setupCookiesEndpoint(app, services);
  setupExtractEndpoints(app, services);
  setupFormatsEndpoints(app, services);
  setupHealthEndpoint(app, services);
}
