/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * routes.test.ts: Tests for the HTTP API against fake pipeline services.
 */
import { AuthenticationRequiredError, PoolExhaustedError, StoreUnavailableError, StreamNotFoundError } from "../../src/extraction/errors.js";
import type { ExtractionStatus } from "../../src/types/index.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Express } from "express";
import type { Mock } from "vitest";
import type { RouteServices } from "../../src/routes/index.js";
import { buildApp } from "../../src/app.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import request from "supertest";

const { promises: fsPromises } = fs;

const MEDIA_URL = "https://media.example.com/watch/1";

type Services = RouteServices;

interface FakeServices extends RouteServices {

  coordinator: {

    extract: Mock<Services["coordinator"]["extract"]>;
    listFormats: Mock<Services["coordinator"]["listFormats"]>;
    statuses: Mock<Services["coordinator"]["statuses"]>;
  };
  cookies: { save: Mock<Services["cookies"]["save"]> };
  ffmpegAvailable: Mock<Services["ffmpegAvailable"]>;
  pool: { healthy: Mock<Services["pool"]["healthy"]>; stats: Mock<Services["pool"]["stats"]> };
}

describe("HTTP API", () => {

  let app: Express;
  let outputDir: string;
  let services: FakeServices;

  beforeEach(async () => {

    outputDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "streamfetch-routes-"));

    services = {

      coordinator: {

        extract: vi.fn<Services["coordinator"]["extract"]>(async () => ({ duration: 12.5, format: "mp4", id: "0123456789ab", path: path.join(outputDir, "Clip-0123456789ab.mp4"),
          remuxed: true, size: 5 })),
        listFormats: vi.fn<Services["coordinator"]["listFormats"]>(async (url) => ({

          formats: [{ container: "mp4", height: 720, kind: "muxed", quality: "720p", sizeHint: null }],
          matcher: "generic",
          title: "Clip",
          url
        })),
        statuses: vi.fn<Services["coordinator"]["statuses"]>(() => [])
      },
      cookies: { save: vi.fn<Services["cookies"]["save"]>(async () => undefined) },
      defaults: { format: "mp4", quality: "720p" },
      ffmpegAvailable: vi.fn<Services["ffmpegAvailable"]>(async () => true),
      outputDir,
      pool: {

        healthy: vi.fn<Services["pool"]["healthy"]>(() => 2),
        stats: vi.fn<Services["pool"]["stats"]>(() => ({ available: 1, leased: 1, size: 2, waiting: 0 }))
      },
      rateLimits: { download: 0, extract: 0 }
    };

    app = buildApp(services);
  });

  afterEach(async () => {

    await fsPromises.rm(outputDir, { force: true, recursive: true });
  });

  describe("POST /api/v1/extract", () => {

    it("should run the extraction with defaults and describe the artifact", async () => {

      const response = await request(app).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ artifact: { duration: 12.5, format: "mp4", id: "0123456789ab", name: "Clip-0123456789ab.mp4", remuxed: true, size: 5,
        url: "/api/v1/artifacts/0123456789ab" } });
      expect(services.coordinator.extract.mock.calls[0][0]).toEqual({ format: "mp4", quality: "720p", url: MEDIA_URL });
    });

    it("should pass the requested format and quality through", async () => {

      await request(app).post("/api/v1/extract").send({ format: "mp3", quality: "best", url: MEDIA_URL });

      expect(services.coordinator.extract.mock.calls[0][0]).toEqual({ format: "mp3", quality: "best", url: MEDIA_URL });
    });

    it("should reject a body without a URL", async () => {

      const response = await request(app).post("/api/v1/extract").send({ format: "mp4" });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: { kind: "InvalidRequest", message: "The url field is required.", retryable: false } });
      expect(services.coordinator.extract).not.toHaveBeenCalled();
    });

    it("should reject an unknown format", async () => {

      const response = await request(app).post("/api/v1/extract").send({ format: "avi", url: MEDIA_URL });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe("The format must be one of: m4a, mkv, mp3, mp4, webm.");
    });

    it("should reject malformed JSON", async () => {

      const response = await request(app).post("/api/v1/extract").set("Content-Type", "application/json").send("{\"url\":");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: { kind: "InvalidRequest", message: "The request body could not be read.", retryable: false } });
    });

    it("should map pipeline failures onto status codes", async () => {

      services.coordinator.extract.mockRejectedValueOnce(new StreamNotFoundError(MEDIA_URL, 15000));
      services.coordinator.extract.mockRejectedValueOnce(new AuthenticationRequiredError("media.example.com", "redirected to a login page."));

      const notFound = await request(app).post("/api/v1/extract").send({ url: MEDIA_URL });
      const unauthorized = await request(app).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect(notFound.status).toBe(404);
      expect(notFound.body).toEqual({ error: { kind: "StreamNotFound", message: "No media stream was observed on " + MEDIA_URL + " within 15000ms.", retryable: true } });
      expect(unauthorized.status).toBe(401);
      expect(unauthorized.body.error).toEqual({ kind: "AuthenticationRequired", message: "Authentication required for media.example.com: redirected to a login page.",
        retryable: false });
    });

    it("should ask the client to retry when the pool is exhausted", async () => {

      services.coordinator.extract.mockRejectedValueOnce(new PoolExhaustedError(2500));

      const response = await request(app).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect(response.status).toBe(503);
      expect(response.headers["retry-after"]).toBe("3");
      expect(response.body.error).toEqual({ kind: "PoolExhausted", message: "No browser session became available within 2500ms.", retryable: true });
    });

    it("should hide the details of unexpected failures", async () => {

      services.coordinator.extract.mockRejectedValueOnce(new Error("database at /var/lib/secret exploded"));

      const response = await request(app).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: { kind: "InternalError", message: "Internal server error.", retryable: false } });
    });
  });

  describe("GET /api/v1/artifacts/:id", () => {

    it("should serve a published artifact as a download", async () => {

      await fsPromises.writeFile(path.join(outputDir, "Clip-0123456789ab.mp4"), "media");

      const response = await request(app).get("/api/v1/artifacts/0123456789ab");

      expect(response.status).toBe(200);
      expect(response.headers["content-disposition"]).toBe("attachment; filename=\"Clip-0123456789ab.mp4\"");
      expect(response.headers["content-length"]).toBe("5");
    });

    it("should answer 404 for unknown or malformed ids", async () => {

      const unknown = await request(app).get("/api/v1/artifacts/ba9876543210");
      const malformed = await request(app).get("/api/v1/artifacts/not-an-id");

      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ error: { kind: "ArtifactNotFound", message: "No artifact exists with that id.", retryable: false } });
      expect(malformed.status).toBe(404);
    });
  });

  describe("GET /api/v1/formats", () => {

    it("should list the formats of the normalized URL", async () => {

      const response = await request(app).get("/api/v1/formats").query({ url: MEDIA_URL + "?utm_source=newsletter#t=10" });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ formats: [{ container: "mp4", height: 720, kind: "muxed", quality: "720p", sizeHint: null }], matcher: "generic",
        title: "Clip", url: MEDIA_URL });
      expect(services.coordinator.listFormats.mock.calls[0][0]).toBe(MEDIA_URL);
    });

    it("should reject a missing or unsupported URL", async () => {

      const missing = await request(app).get("/api/v1/formats");
      const ftp = await request(app).get("/api/v1/formats").query({ url: "ftp://media.example.com/clip.mp4" });

      expect(missing.status).toBe(400);
      expect(missing.body).toEqual({ error: { kind: "InvalidRequest", message: "The url query parameter is required.", retryable: false } });
      expect(ftp.status).toBe(400);
      expect(ftp.body.error.message).toBe("Only http and https URLs can be extracted.");
      expect(services.coordinator.listFormats).not.toHaveBeenCalled();
    });

    it("should map lookup failures onto status codes", async () => {

      services.coordinator.listFormats.mockRejectedValueOnce(new StreamNotFoundError(MEDIA_URL, 15000));

      const response = await request(app).get("/api/v1/formats").query({ url: MEDIA_URL });

      expect(response.status).toBe(404);
      expect(response.body.error.kind).toBe("StreamNotFound");
    });
  });

  describe("GET /api/v1/platforms", () => {

    it("should list the supported sites", async () => {

      const response = await request(app).get("/api/v1/platforms");

      expect(response.status).toBe(200);
      expect(response.body.platforms).toHaveLength(6);
      expect(response.body.platforms[5]).toEqual({ domains: [ "youtu.be", "youtube.com" ], matcher: "youtube", name: "YouTube" });
    });
  });

  describe("rate limiting", () => {

    it("should refuse extractions over the per-client limit", async () => {

      const limited = buildApp({ ...services, rateLimits: { download: 0, extract: 2 } });

      const first = await request(limited).post("/api/v1/extract").send({ url: MEDIA_URL });
      const second = await request(limited).post("/api/v1/extract").send({ url: MEDIA_URL });
      const third = await request(limited).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect([ first.status, second.status ]).toEqual([ 200, 200 ]);
      expect(second.headers["x-ratelimit-remaining"]).toBe("0");
      expect(third.status).toBe(429);
      expect(third.headers["retry-after"]).toBe("30");
      expect(third.body).toEqual({ error: { kind: "RateLimited", message: "Too many requests. The limit is 2 per minute.", retryable: true } });
      expect(services.coordinator.extract).toHaveBeenCalledTimes(2);

      const other = await request(limited).post("/api/v1/extract").set("X-Forwarded-For", "203.0.113.7").send({ url: MEDIA_URL });

      expect(other.status).toBe(200);
    });

    it("should limit artifact downloads separately", async () => {

      const limited = buildApp({ ...services, rateLimits: { download: 1, extract: 0 } });

      await fsPromises.writeFile(path.join(outputDir, "Clip-0123456789ab.mp4"), "media");

      const first = await request(limited).get("/api/v1/artifacts/0123456789ab");
      const second = await request(limited).get("/api/v1/artifacts/0123456789ab");
      const extraction = await request(limited).post("/api/v1/extract").send({ url: MEDIA_URL });

      expect(first.status).toBe(200);
      expect(second.status).toBe(429);
      expect(second.headers["retry-after"]).toBe("60");
      expect(extraction.status).toBe(200);
    });
  });

  describe("GET /api/v1/extractions", () => {

    it("should list in-flight extractions", async () => {

      const status: ExtractionStatus = { attempts: 1, id: "abcdef01-23456789", joined: 2, startedAt: 1000, state: "StreamLocated", url: MEDIA_URL };

      services.coordinator.statuses.mockReturnValue([status]);

      const response = await request(app).get("/api/v1/extractions");

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ extractions: [status] });
    });
  });

  describe("PUT /api/v1/cookies", () => {

    it("should store an uploaded Netscape cookie file without echoing values", async () => {

      const file = [ "# Netscape HTTP Cookie File", ".example.com\tTRUE\t/\tTRUE\t0\tSID\ttest-secret", "#HttpOnly_media.example.org\tFALSE\t/\tFALSE\t0\ta\tb", "" ]
        .join("\n");

      const response = await request(app).put("/api/v1/cookies").set("Content-Type", "text/plain").send(file);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ count: 2, domains: [ "example.com", "media.example.org" ] });
      expect(response.text).not.toContain("test-secret");
      expect(services.cookies.save.mock.calls[0][0]).toEqual([
        { domain: ".example.com", expires: 0, httpOnly: false, name: "SID", path: "/", secure: true, value: "test-secret" },
        { domain: "media.example.org", expires: 0, httpOnly: true, name: "a", path: "/", secure: false, value: "b" }
      ]);
    });

    it("should accept a JSON cookie export", async () => {

      const response = await request(app).put("/api/v1/cookies").set("Content-Type", "application/json")
        .send(JSON.stringify([{ domain: ".example.com", expirationDate: 2000000000.5, name: "SID", value: "test-secret" }]));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ count: 1, domains: ["example.com"] });
    });

    it("should reject empty and unparseable uploads", async () => {

      const empty = await request(app).put("/api/v1/cookies").set("Content-Type", "text/plain").send("   ");
      const broken = await request(app).put("/api/v1/cookies").set("Content-Type", "text/plain").send("[{\"name\": \"SID\", \"value\": \"test-secret\"");
      const noCookies = await request(app).put("/api/v1/cookies").set("Content-Type", "text/plain").send("# only a comment\n");

      expect(empty.body.error.message).toBe("The request body must be a Netscape cookie file or a JSON cookie array.");
      expect(broken.status).toBe(400);
      expect(broken.body.error.message).toBe("The cookie file could not be parsed (SyntaxError).");
      expect(noCookies.body.error.message).toBe("The cookie file contains no cookies.");
      expect(services.cookies.save).not.toHaveBeenCalled();
    });

    it("should report an unavailable cookie store", async () => {

      services.cookies.save.mockRejectedValueOnce(new StoreUnavailableError("the cookie file is not writable."));

      const response = await request(app).put("/api/v1/cookies").set("Content-Type", "text/plain").send(".example.com\tTRUE\t/\tTRUE\t0\tSID\ttest-secret\n");

      expect(response.status).toBe(503);
      expect(response.body.error).toEqual({ kind: "StoreUnavailable", message: "Cookie store unavailable: the cookie file is not writable.", retryable: false });
    });
  });

  describe("GET /api/v1/health", () => {

    it("should report a healthy service", async () => {

      const response = await request(app).get("/api/v1/health");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({

        browser: { available: 1, healthy: 2, leased: 1, size: 2, waiting: 0 },
        extractions: { active: 0 },
        ffmpegAvailable: true,
        status: "healthy"
      });
      expect(response.body.message).toBeUndefined();
    });

    it("should report degraded without FFmpeg", async () => {

      services.ffmpegAvailable.mockResolvedValue(false);

      const response = await request(app).get("/api/v1/health");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ ffmpegAvailable: false, message: "FFmpeg is not available.", status: "degraded" });
    });

    it("should answer 503 when no browser is connected", async () => {

      services.pool.healthy.mockReturnValue(0);

      const response = await request(app).get("/api/v1/health");

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ message: "No browser session is connected.", status: "unhealthy" });
    });
  });
});
