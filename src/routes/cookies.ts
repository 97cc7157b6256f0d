/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cookies.ts: Cookie upload route for StreamFetch.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { InvalidRequestError } from "../extraction/errors.js";
import type { RouteServices } from "./index.js";
import type { SessionCookie } from "../types/index.js";
import express from "express";
import { parseCookieFile } from "../cookies/netscape.js";

/* PUT /api/v1/cookies replaces the persisted cookie set with the uploaded file, either a Netscape cookie file or a JSON array as exported by browser extensions.
 * The response reports how many cookies were stored; cookie values are never echoed back.
 */

/**
 * Creates the cookie upload endpoint.
 * @param app - The Express application.
 * @param services - The pipeline services.
 */
export function setupCookiesEndpoint(app: Express, services: RouteServices): void {

  app.put("/api/v1/cookies", express.text({ limit: "1mb", type: "*/*" }), async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    try {

      const body: unknown = req.body;

      if((typeof body !== "string") || (body.trim().length === 0)) {

        throw new InvalidRequestError("The request body must be a Netscape cookie file or a JSON cookie array.");
      }

      let cookies: SessionCookie[];

      try {

        cookies = parseCookieFile(body);
      } catch(error) {

        // Parser messages can quote the input, so only the error type is reported.
        throw new InvalidRequestError([ "The cookie file could not be parsed (", (error instanceof Error) ? error.name : "unknown error", ")." ].join(""));
      }

      if(cookies.length === 0) {

        throw new InvalidRequestError("The cookie file contains no cookies.");
      }

      await services.cookies.save(cookies);

      res.json({ count: cookies.length, domains: [...new Set(cookies.map((cookie) => cookie.domain.replace(/^\./, "")))].sort() });
    } catch(error) {

      next(error);
    }
  });
}
