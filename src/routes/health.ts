/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for StreamFetch.
 */
import type { Express, Request, Response } from "express";
import type { HealthStatus } from "../types/index.js";
import type { RouteServices } from "./index.js";
import { getPackageVersion } from "../utils/index.js";

/* The health endpoint reports the state of the browser pool and FFmpeg for monitoring systems. The service can only extract while at least one browser is
 * connected, so it answers 503 when none is; load balancers and monitors can act on the status code alone.
 */

/**
 * Creates the health check endpoint.
 * @param app - The Express application.
 * @param services - The pipeline services.
 */
export function setupHealthEndpoint(app: Express, services: RouteServices): void {

  app.get("/api/v1/health", async (_req: Request, res: Response): Promise<void> => {

    const healthy = services.pool.healthy();
    const stats = services.pool.stats();
    const ffmpegAvailable = await services.ffmpegAvailable();
    const memoryUsage = process.memoryUsage();

    let status: HealthStatus["status"] = "healthy";

    if(healthy === 0) {

      status = "unhealthy";
    } else if((healthy < stats.size) || !ffmpegAvailable) {

      status = "degraded";
    }

    const health: HealthStatus = {

      browser: {

        available: stats.available,
        healthy,
        leased: stats.leased,
        size: stats.size,
        waiting: stats.waiting
      },
      extractions: {

        active: services.coordinator.statuses().length
      },
      ffmpegAvailable,
      memory: {

        heapTotal: memoryUsage.heapTotal,
        heapUsed: memoryUsage.heapUsed,
        rss: memoryUsage.rss
      },
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: getPackageVersion()
    };

    if(healthy === 0) {

      health.message = "No browser session is connected.";
    } else if(!ffmpegAvailable) {

      health.message = "FFmpeg is not available.";
    } else if(healthy < stats.size) {

      health.message = "Some browser sessions are not connected.";
    }

    res.status((status === "unhealthy") ? 503 : 200).json(health);
  });
}
