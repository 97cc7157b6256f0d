/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * downloader.test.ts: Tests for the resumable downloader against a local HTTP server.
 */
import { DownloadFailedError, DownloadTooLargeError, ExtractionCancelledError, IncompleteDownloadError } from "../../src/extraction/errors.js";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { LocatedStream, StreamPart } from "../../src/types/index.js";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { buildCookieHeader, download, parseContentRange } from "../../src/extraction/downloader.js";
import { createHash } from "node:crypto";
import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

const BODY = Buffer.from(Array.from({ length: 64 * 1024 }, (_, index) => index % 251));
const BODY_SHA256 = createHash("sha256").update(BODY).digest("hex");
const INIT = Buffer.from("init");

const SETTINGS = { idleTimeout: 2000, maxFileSize: 10 * 1024 * 1024 };

interface SeenRequest {

  acceptEncoding: string | undefined;
  cookie: string | undefined;
  path: string;
  range: string | undefined;
  userAgent: string | undefined;
}

let server: Server;
let baseUrl: string;
let seen: SeenRequest[] = [];
let flakyRequests = 0;

// Serves BODY honoring "bytes=N-" ranges.
function serveRanged(req: IncomingMessage, res: ServerResponse): void {

  const match = /^bytes=(\d+)-$/.exec(req.headers.range ?? "");

  if(!match) {

    res.writeHead(200, { "Content-Length": BODY.length, "Content-Type": "video/mp4" });
    res.end(BODY);

    return;
  }

  const start = Number(match[1]);

  if(start >= BODY.length) {

    res.writeHead(416, { "Content-Range": [ "bytes */", String(BODY.length) ].join("") });
    res.end();

    return;
  }

  res.writeHead(206, { "Content-Length": BODY.length - start, "Content-Range": [ "bytes ", String(start), "-", String(BODY.length - 1), "/", String(BODY.length) ].join(""),
    "Content-Type": "video/mp4" });
  res.end(BODY.subarray(start));
}

function handle(req: IncomingMessage, res: ServerResponse): void {

  const url = req.url ?? "/";

  seen.push({ acceptEncoding: req.headers["accept-encoding"], cookie: req.headers.cookie, path: url, range: req.headers.range, userAgent: req.headers["user-agent"] });

  switch(url) {

    case "/full.mp4":

      serveRanged(req, res);

      return;

    case "/no-range.mp4":

      res.writeHead(200, { "Content-Length": BODY.length });
      res.end(BODY);

      return;

    case "/bad-range.mp4":

      res.writeHead(206, { "Content-Range": [ "bytes 0-", String(BODY.length - 1), "/", String(BODY.length) ].join(""), "Content-Length": BODY.length });
      res.end(BODY);

      return;

    case "/chunked.mp4":

      res.writeHead(200, { "Content-Type": "video/mp4" });
      res.end(BODY);

      return;

    case "/flaky.mp4":

      // The first request is cut off halfway through; later ones are served normally.
      if(flakyRequests++ === 0) {

        res.writeHead(200, { "Content-Length": BODY.length });
        res.write(BODY.subarray(0, BODY.length / 2), () => res.destroy());

        return;
      }

      serveRanged(req, res);

      return;

    case "/stall.mp4":

      res.writeHead(200, { "Content-Length": BODY.length });
      res.write(BODY.subarray(0, 1024));

      return;

    case "/hls/master.m3u8":

      res.writeHead(200, { "Content-Type": "application/vnd.apple.mpegurl" });
      res.end("#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720\nv/index.m3u8\n");

      return;

    case "/hls/v/index.m3u8":

      res.writeHead(200, { "Content-Type": "application/vnd.apple.mpegurl" });
      res.end("#EXTM3U\n#EXT-X-TARGETDURATION:6\n#EXT-X-MAP:URI=\"init.mp4\"\n#EXTINF:6.0,\nseg-1.m4s\n#EXTINF:6.0,\nseg-2.m4s\n#EXT-X-ENDLIST");

      return;

    case "/hls/v/init.mp4":

      res.writeHead(200, { "Content-Length": INIT.length });
      res.end(INIT);

      return;

    case "/hls/v/seg-1.m4s":

      res.writeHead(200, { "Content-Length": BODY.length / 2 });
      res.end(BODY.subarray(0, BODY.length / 2));

      return;

    case "/hls/v/seg-2.m4s":

      res.writeHead(200, { "Content-Length": BODY.length / 2 });
      res.end(BODY.subarray(BODY.length / 2));

      return;

    case "/hls/flaky.m3u8":

      res.writeHead(200, { "Content-Type": "application/vnd.apple.mpegurl" });
      res.end("#EXTM3U\n#EXTINF:6.0,\n/flaky.mp4\n#EXT-X-ENDLIST");

      return;

    case "/hls/empty.m3u8":

      res.writeHead(200, { "Content-Type": "application/vnd.apple.mpegurl" });
      res.end("#EXTM3U\n#EXT-X-ENDLIST");

      return;

    default:

      res.writeHead(404);
      res.end();
  }
}

function located(urlPath: string, overrides: Partial<StreamPart> = {}): LocatedStream {

  return {

    candidates: [],
    cookies: [{ domain: "127.0.0.1", expires: 0, httpOnly: false, name: "SID", path: "/", secure: false, value: "test-secret" }],
    expiresAt: Date.now() + 60000,
    extractionId: "test-id",
    headers: { Referer: "https://media.example.com/watch/1", "User-Agent": "TestAgent/1.0" },
    locatedAt: Date.now(),
    matcher: "generic",
    parts: [{ container: "mp4", height: 720, kind: "muxed", sizeHint: null, url: baseUrl + urlPath, ...overrides }],
    title: null
  };
}

describe("download", () => {

  let dir: string;

  beforeAll(async () => {

    server = http.createServer(handle);

    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

    const address = server.address();

    if(!address || (typeof address === "string")) {

      throw new Error("The test server has no TCP address.");
    }

    baseUrl = [ "http://127.0.0.1:", String(address.port) ].join("");
  });

  afterAll(async () => {

    server.closeAllConnections();

    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(async () => {

    seen = [];
    flakyRequests = 0;
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "streamfetch-download-"));
  });

  afterEach(async () => {

    await fsPromises.rm(dir, { force: true, recursive: true });
  });

  it("should download a part and report its checksum", async () => {

    const stream = located("/full.mp4");
    const artifact = await download(stream, dir, { quality: "best", settings: SETTINGS });

    expect(artifact).toEqual({

      directory: dir,
      parts: [{ checksum: BODY_SHA256, container: "mp4", kind: "muxed", path: path.join(dir, "0-muxed.mp4"), size: BODY.length }]
    });
    expect(seen).toEqual([{ acceptEncoding: "identity", cookie: "SID=test-secret", path: "/full.mp4", range: undefined,
      userAgent: "TestAgent/1.0" }]);
    expect(await fsPromises.readdir(dir)).toEqual(["0-muxed.mp4"]);
  });

  it("should name files by index, kind, and container", async () => {

    const stream: LocatedStream = { ...located("/full.mp4"), parts: [
      { container: "webm", height: 1080, kind: "video", sizeHint: null, url: baseUrl + "/full.mp4" },
      { container: null, height: null, kind: "audio", sizeHint: null, url: baseUrl + "/no-range.mp4" }
    ] };

    const artifact = await download(stream, dir, { quality: "best", settings: SETTINGS });

    expect(artifact.parts.map((part) => path.basename(part.path))).toEqual([ "0-video.webm", "1-audio.bin" ]);
  });

  it("should resume an interrupted transfer with a range request", async () => {

    const stream = located("/flaky.mp4");
    const partial = path.join(dir, "0-muxed.mp4.part");

    await expect(download(stream, dir, { quality: "best", settings: SETTINGS })).rejects.toThrow(IncompleteDownloadError);

    const resumeFrom = (await fsPromises.stat(partial)).size;

    expect(resumeFrom).toBeLessThanOrEqual(BODY.length / 2);

    const artifact = await download(stream, dir, { quality: "best", settings: SETTINGS });

    expect(artifact.parts[0].checksum).toBe(BODY_SHA256);
    expect(artifact.parts[0].size).toBe(BODY.length);
    expect(seen[1].range).toBe((resumeFrom > 0) ? [ "bytes=", String(resumeFrom), "-" ].join("") : undefined);
  });

  it("should restart from zero when the server ignores the range", async () => {

    await fsPromises.writeFile(path.join(dir, "0-muxed.mp4.part"), "stale bytes");

    const artifact = await download(located("/no-range.mp4"), dir, { quality: "best", settings: SETTINGS });

    expect(seen[0].range).toBe("bytes=11-");
    expect(artifact.parts[0].checksum).toBe(BODY_SHA256);
  });

  it("should accept a complete partial file when the server answers 416", async () => {

    await fsPromises.writeFile(path.join(dir, "0-muxed.mp4.part"), BODY);

    const artifact = await download(located("/full.mp4"), dir, { quality: "best", settings: SETTINGS });

    expect(artifact.parts[0]).toMatchObject({ checksum: BODY_SHA256, size: BODY.length });
    expect(await fsPromises.readdir(dir)).toEqual(["0-muxed.mp4"]);
  });

  it("should discard a partial file the server cannot resume", async () => {

    const partial = path.join(dir, "0-muxed.mp4.part");

    await fsPromises.writeFile(partial, Buffer.concat([ BODY, Buffer.from("extra") ]));

    await expect(download(located("/full.mp4"), dir, { quality: "best", settings: SETTINGS })).rejects.toThrow("the server rejected the resume offset.");
    await expect(fsPromises.access(partial)).rejects.toThrow();
  });

  it("should discard a partial file when the server resumes from the wrong offset", async () => {

    const partial = path.join(dir, "0-muxed.mp4.part");

    await fsPromises.writeFile(partial, BODY.subarray(0, 10));

    await expect(download(located("/bad-range.mp4"), dir, { quality: "best", settings: SETTINGS })).rejects.toThrow("the server resumed from an unexpected offset.");
    await expect(fsPromises.access(partial)).rejects.toThrow();
  });

  it("should reuse a completed file without a request", async () => {

    await fsPromises.writeFile(path.join(dir, "0-muxed.mp4"), BODY);

    const artifact = await download(located("/full.mp4"), dir, { quality: "best", settings: SETTINGS });

    expect(artifact.parts[0].checksum).toBe(BODY_SHA256);
    expect(seen).toEqual([]);
  });

  it("should report HTTP errors as DownloadFailed", async () => {

    const failure = download(located("/missing.mp4"), dir, { quality: "best", settings: SETTINGS });

    await expect(failure).rejects.toThrow(DownloadFailedError);
    await expect(failure).rejects.toMatchObject({ retryable: false, status: 404 });
  });

  it("should refuse a part whose advertised size exceeds the limit", async () => {

    await expect(download(located("/full.mp4"), dir, { quality: "best", settings: { ...SETTINGS, maxFileSize: 1000 } }))
      .rejects.toThrow(new DownloadTooLargeError(1000, BODY.length).message);
  });

  it("should stop a transfer that grows past the limit without a Content-Length", async () => {

    await expect(download(located("/chunked.mp4"), dir, { quality: "best", settings: { ...SETTINGS, maxFileSize: 1000 } })).rejects.toThrow(DownloadTooLargeError);
    expect(await fsPromises.readdir(dir)).toEqual([]);
  });

  it("should abandon a stalled transfer after the idle timeout", async () => {

    await expect(download(located("/stall.mp4"), dir, { quality: "best", settings: { ...SETTINGS, idleTimeout: 200 } }))
      .rejects.toThrow("no data received before the idle timeout.");
  });

  it("should not start when already cancelled", async () => {

    const controller = new AbortController();

    controller.abort();

    await expect(download(located("/full.mp4"), dir, { quality: "best", settings: SETTINGS, signal: controller.signal })).rejects.toThrow(ExtractionCancelledError);
    expect(seen).toEqual([]);
  });

  it("should download HLS segments and point the stored playlist at them", async () => {

    const stream = located("/hls/master.m3u8", { container: "hls", height: null });
    const artifact = await download(stream, dir, { quality: "best", settings: SETTINGS });
    const playlist = path.join(dir, "0-muxed.m3u8");

    expect(await fsPromises.readFile(playlist, "utf-8")).toBe([ "#EXTM3U", "#EXT-X-TARGETDURATION:6", "#EXT-X-MAP:URI=\"0-muxed/00000.mp4\"", "#EXTINF:6.0,",
      "0-muxed/00001.m4s", "#EXTINF:6.0,", "0-muxed/00002.m4s", "#EXT-X-ENDLIST" ].join("\n"));
    expect(await fsPromises.readdir(path.join(dir, "0-muxed"))).toEqual([ "00000.mp4", "00001.m4s", "00002.m4s" ]);
    expect(artifact).toEqual({

      directory: dir,
      parts: [{ checksum: createHash("sha256").update(Buffer.concat([ INIT, BODY ])).digest("hex"), container: "hls", kind: "muxed", path: playlist,
        size: INIT.length + BODY.length }]
    });
    expect(seen.map((request) => request.path)).toEqual([ "/hls/master.m3u8", "/hls/v/index.m3u8", "/hls/v/init.mp4", "/hls/v/seg-1.m4s", "/hls/v/seg-2.m4s" ]);
    expect(seen.every((request) => request.cookie === "SID=test-secret")).toBe(true);
  });

  it("should count every HLS segment against the size limit", async () => {

    const stream = located("/hls/master.m3u8", { container: "hls", height: null });

    await expect(download(stream, dir, { quality: "best", settings: { ...SETTINGS, maxFileSize: 40000 } }))
      .rejects.toThrow(new DownloadTooLargeError(40000, INIT.length + BODY.length).message);
  });

  it("should resume an interrupted HLS segment", async () => {

    const stream = located("/hls/flaky.m3u8", { container: "hls", height: null });

    await expect(download(stream, dir, { quality: "best", settings: SETTINGS })).rejects.toThrow(IncompleteDownloadError);

    const artifact = await download(stream, dir, { quality: "best", settings: SETTINGS });

    expect(artifact.parts[0]).toMatchObject({ checksum: BODY_SHA256, container: "hls", size: BODY.length });
    expect(await fsPromises.readFile(path.join(dir, "0-muxed", "00000.mp4"))).toEqual(BODY);
  });

  it("should refuse an HLS playlist without segments", async () => {

    await expect(download(located("/hls/empty.m3u8", { container: "hls", height: null }), dir, { quality: "best", settings: SETTINGS }))
      .rejects.toThrow("the HLS playlist lists no segments.");
  });
});

describe("parseContentRange", () => {

  it("should read the start and total", () => {

    expect(parseContentRange("bytes 100-199/1000")).toEqual({ start: 100, total: 1000 });
    expect(parseContentRange("bytes */1000")).toEqual({ start: null, total: 1000 });
    expect(parseContentRange("bytes 0-99/*")).toEqual({ start: 0, total: null });
    expect(parseContentRange(null)).toEqual({ start: null, total: null });
  });
});

describe("buildCookieHeader", () => {

  it("should join the cookies that apply to the URL", () => {

    const cookies = [
      { domain: ".example.com", expires: 0, httpOnly: false, name: "a", path: "/", secure: true, value: "1" },
      { domain: ".example.com", expires: 0, httpOnly: false, name: "b", path: "/", secure: false, value: "2" },
      { domain: ".other.org", expires: 0, httpOnly: false, name: "c", path: "/", secure: false, value: "3" }
    ];

    expect(buildCookieHeader(cookies, "https://cdn.example.com/v.mp4")).toBe("a=1; b=2");
    expect(buildCookieHeader(cookies, "http://cdn.example.com/v.mp4")).toBe("b=2");
    expect(buildCookieHeader(cookies, "https://unrelated.net/")).toBeNull();
  });
});
