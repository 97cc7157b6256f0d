/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * formats.ts: Format listing and supported platform routes for StreamFetch.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { InvalidRequestError } from "../extraction/errors.js";
import { LOG } from "../utils/index.js";
import type { RouteServices } from "./index.js";
import { listPlatforms } from "../config/sites.js";
import { normalizeUrl } from "../extraction/key.js";
import { rateLimit } from "./rateLimit.js";

/*
 * FORMAT ROUTES
 *
 * GET /api/v1/formats?url= opens the page in a browser session and lists the media variants it offers, without downloading anything. It holds a session for a
 * whole observation window, so it shares the extraction rate limit. GET /api/v1/platforms lists the sites with dedicated handling; any other http(s) page can
 * still be tried with the generic matcher.
 */

/**
 * Creates the format listing and platform endpoints.
 * @param app - The Express application.
 * @param services - The pipeline services.
 */
export function setupFormatsEndpoints(app: Express, services: RouteServices): void {

  app.get("/api/v1/formats", rateLimit("formats", services.rateLimits.extract), async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    const controller = new AbortController();

    const onClose = (): void => {

      if(!res.writableFinished) {

        LOG.debug("extraction:coordinator", "Client disconnected before the format listing finished.");
        controller.abort();
      }
    };

    res.on("close", onClose);

    try {

      const { url } = req.query;

      if((typeof url !== "string") || (url.trim().length === 0)) {

        throw new InvalidRequestError("The url query parameter is required.");
      }

      res.json(await services.coordinator.listFormats(normalizeUrl(url), controller.signal));
    } catch(error) {

      next(error);
    } finally {

      res.off("close", onClose);
    }
  });

  app.get("/api/v1/platforms", (_req: Request, res: Response): void => {

    res.json({ platforms: listPlatforms() });
  });
}
