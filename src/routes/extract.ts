/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * extract.ts: Extraction and artifact routes for StreamFetch.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, formatError } from "../utils/index.js";
import type { RouteServices } from "./index.js";
import type { TranscodedArtifact } from "../types/index.js";
import { createExtractionRequest } from "../extraction/key.js";
import express from "express";
import { findArtifact } from "../extraction/workspace.js";
import path from "node:path";
import { rateLimit } from "./rateLimit.js";

/*
 * EXTRACTION ROUTES
 *
 * POST /api/v1/extract runs an extraction for the duration of the request. A client that disconnects before the response is written cancels its interest in the
 * extraction; the work itself stops once no caller is left. Failures are passed to the error middleware in app.ts, which maps them onto status codes.
 *
 * Responses describe the artifact by id and name only. GET /api/v1/artifacts/:id serves the file. Both routes are rate limited per client.
 */

/**
 * The caller-facing description of an artifact.
 * @param artifact - The transcoded artifact.
 * @returns The artifact without internal paths.
 */
export function describeArtifact(artifact: TranscodedArtifact): Record<string, unknown> {

  return {

    duration: artifact.duration,
    format: artifact.format,
    id: artifact.id,
    name: path.basename(artifact.path),
    remuxed: artifact.remuxed,
    size: artifact.size,
    url: [ "/api/v1/artifacts/", artifact.id ].join("")
  };
}

/**
 * Creates the extraction, artifact, and extraction status endpoints.
 * @param app - The Express application.
 * @param services - The pipeline services.
 */
export function setupExtractEndpoints(app: Express, services: RouteServices): void {

  app.post("/api/v1/extract", rateLimit("extract", services.rateLimits.extract), express.json({ limit: "16kb" }), async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    const controller = new AbortController();

    const onClose = (): void => {

      if(!res.writableFinished) {

        LOG.debug("extraction:coordinator", "Client disconnected before the extraction finished.");
        controller.abort();
      }
    };

    res.on("close", onClose);

    try {

      const request = createExtractionRequest(req.body, services.defaults);
      const artifact = await services.coordinator.extract(request, controller.signal);

      res.json({ artifact: describeArtifact(artifact) });
    } catch(error) {

      next(error);
    } finally {

      res.off("close", onClose);
    }
  });

  app.get("/api/v1/artifacts/:id", rateLimit("download", services.rateLimits.download), async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    try {

      const artifactPath = await findArtifact(services.outputDir, req.params.id);

      if(!artifactPath) {

        res.status(404).json({ error: { kind: "ArtifactNotFound", message: "No artifact exists with that id.", retryable: false } });

        return;
      }

      res.download(artifactPath, path.basename(artifactPath), (error?: Error): void => {

        if(!error) {

          return;
        }

        if(res.headersSent) {

          LOG.warn("Artifact transfer of %s ended early: %s.", req.params.id, formatError(error));

          return;
        }

        next(error);
      });
    } catch(error) {

      next(error);
    }
  });

  app.get("/api/v1/extractions", (_req: Request, res: Response): void => {

    res.json({ extractions: services.coordinator.statuses() });
  });
}
