/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * downloader.ts: Resumable media downloader for located streams.
 */
import type { DownloadedArtifact, DownloadedPart, LocatedStream, Nullable, QualityHint, SessionCookie, StreamPart } from "../types/index.js";
import { DownloadFailedError, DownloadTooLargeError, ExtractionCancelledError, IncompleteDownloadError } from "./errors.js";
import { LOG, formatBytes, formatError, isErrnoException, startTimer } from "../utils/index.js";
import { Readable, Transform } from "node:stream";
import type { TransformCallback } from "node:stream";
import { cookieAppliesTo } from "../cookies/store.js";
import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { MediaPlaylist, ResolvedHls } from "./hls.js";
import { listPlaylistResources, resolveHlsPlaylist, rewritePlaylistResources } from "./hls.js";

const { promises: fsPromises } = fs;

/*
 * DOWNLOADER
 *
 * Each located part is streamed to its own file in the extraction's download directory: <index>-<kind>.<ext>. Bytes go to a ".part" file first and the file is
 * renamed once its size matches what the server advertised, so a file without the suffix is always complete.
 *
 * A ".part" file left over from an earlier attempt is resumed with a Range request:
 *
 * - 206 Partial Content: the body continues where the file ends and is appended, after checking that Content-Range starts at our offset.
 * - 200 OK: the server ignored the range. The file is truncated and the transfer restarts from zero.
 * - 416 Range Not Satisfiable: the partial file already holds the whole resource when its size equals the advertised total.
 *
 * A transfer that stalls for idleTimeout, or ends before the advertised size, fails with IncompleteDownload and leaves the ".part" file for the next attempt.
 *
 * HLS parts are resolved to their media playlists, and every segment, initialization segment and key a playlist names is downloaded the same way into
 * <index>-<kind>/ beside it. The stored playlist <index>-<kind>.m3u8 points at those local files. The size limit applies to a playlist's files together, and
 * the checksum covers them in playlist order.
 */

export interface DownloadSettings {

  idleTimeout: number;
  maxFileSize: number;
}

export interface DownloadOptions {

  // Injectable for tests.
  fetch?: typeof fetch;

  // Selects the HLS variant.
  quality: QualityHint;

  settings: DownloadSettings;
  signal?: AbortSignal;
}

/**
 * Downloads every part of a located stream.
 * @param stream - The located stream.
 * @param destination - Directory the part files are written to. Created when missing.
 * @param options - Settings, quality hint, cancellation, and fetch implementation.
 * @returns The downloaded artifact.
 * @throws DownloadFailedError, DownloadTooLargeError, IncompleteDownloadError, or ExtractionCancelledError.
 */
export async function download(stream: LocatedStream, destination: string, options: DownloadOptions): Promise<DownloadedArtifact> {

  const elapsed = startTimer();
  const parts: DownloadedPart[] = [];

  await fsPromises.mkdir(destination, { recursive: true });

  for(const [ index, part ] of stream.parts.entries()) {

    if(part.container === "hls") {

      // eslint-disable-next-line no-await-in-loop
      parts.push(...await downloadPlaylist(stream, part, index, destination, options));

      continue;
    }

    const target = path.join(destination, [ String(index), "-", part.kind, ".", part.container ?? "bin" ].join(""));

    // eslint-disable-next-line no-await-in-loop
    parts.push(await downloadPart(stream, part, target, options));
  }

  LOG.debug("extraction:download", "Downloaded %s part(s), %s in total, in %sms.", parts.length, formatBytes(parts.reduce((sum, part) => sum + part.size, 0)),
    elapsed());

  return { directory: destination, parts };
}

/**
 * Builds the Cookie header a browser would send to a URL.
 * @param cookies - The session cookies.
 * @param url - The request URL.
 * @returns The header value, or null when no cookie applies.
 */
export function buildCookieHeader(cookies: readonly SessionCookie[], url: string): Nullable<string> {

  let target: URL;

  try {

    target = new URL(url);
  } catch {

    return null;
  }

  const applicable = cookies.filter((cookie) => cookieAppliesTo(cookie, target));

  return (applicable.length > 0) ? applicable.map((cookie) => [ cookie.name, "=", cookie.value ].join("")).join("; ") : null;
}

/**
 * Parses a Content-Range header of the form "bytes start-end/total" or "bytes * /total".
 * @param header - The header value.
 * @returns The start offset and total size, each null when absent.
 */
export function parseContentRange(header: Nullable<string>): { start: Nullable<number>; total: Nullable<number> } {

  const match = /^bytes\s+(?:(\d+)-\d+|\*)\/(\d+|\*)$/i.exec((header ?? "").trim());

  if(!match) {

    return { start: null, total: null };
  }

  return {

    start: (match[1] === undefined) ? null : Number(match[1]),
    total: (match[2] === "*") ? null : Number(match[2])
  };
}

function hostOf(url: string): string {

  try {

    return new URL(url).hostname;
  } catch {

    return "unknown host";
  }
}

function requestHeaders(stream: LocatedStream, url: string, offset: number): Record<string, string> {

  // Sizes are checked against Content-Length, which only describes the bytes we receive when nothing is compressed in transit.
  const headers: Record<string, string> = { ...stream.headers, Accept: "*/*", "Accept-Encoding": "identity" };
  const cookie = buildCookieHeader(stream.cookies, url);

  if(cookie) {

    headers["Cookie"] = cookie;
  }

  if(offset > 0) {

    headers["Range"] = [ "bytes=", String(offset), "-" ].join("");
  }

  return headers;
}

async function fileSize(file: string): Promise<Nullable<number>> {

  try {

    return (await fsPromises.stat(file)).size;
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      return null;
    }

    throw error;
  }
}

/**
 * Computes the SHA-256 of a file.
 * @param file - Path of the file.
 * @returns The hex digest.
 */
export async function hashFile(file: string): Promise<string> {

  const hash = createHash("sha256");

  await pipeline(fs.createReadStream(file), hash);

  return hash.digest("hex");
}

// Sends a request, mapping transport failures onto our failure kinds. The idle controller bounds the wait for the response headers too.
async function request(url: string, headers: Record<string, string>, idle: AbortController, options: DownloadOptions): Promise<Response> {

  const fetchImpl = options.fetch ?? fetch;
  const signal = options.signal ? AbortSignal.any([ options.signal, idle.signal ]) : idle.signal;

  try {

    return await fetchImpl(url, { headers, redirect: "follow", signal });
  } catch(error) {

    if(options.signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    throw new DownloadFailedError(hostOf(url), null, idle.signal.aborted ? "no response before the idle timeout." : formatError(error));
  }
}

async function discardBody(response: Response): Promise<void> {

  try {

    await response.body?.cancel();
  } catch(error) {

    LOG.debug("extraction:download", "Error discarding response body: %s.", formatError(error));
  }
}

/**
 * Downloads one part with resume support.
 */
async function downloadPart(stream: LocatedStream, part: StreamPart, target: string, options: DownloadOptions): Promise<DownloadedPart> {

  const size = await fetchFile(stream, part, target, options, 0);

  return { checksum: await hashFile(target), container: part.container, kind: part.kind, path: target, size };
}

/**
 * Fetches one URL into a file, resuming a ".part" file left by an earlier attempt.
 * @param source - The URL and its advertised size, when known.
 * @param target - Final path of the file.
 * @param counted - Bytes already downloaded for the same media part. They count against the size limit.
 * @returns The size of the complete file.
 */
async function fetchFile(stream: LocatedStream, source: Pick<StreamPart, "sizeHint" | "url">, target: string, options: DownloadOptions, counted: number):
Promise<number> {

  const { idleTimeout, maxFileSize } = options.settings;
  const name = path.basename(target);
  const partial = [ target, ".part" ].join("");
  const host = hostOf(source.url);
  const finished = await fileSize(target);

  // A completed file from an earlier attempt.
  if(finished !== null) {

    return finished;
  }

  if(options.signal?.aborted) {

    throw new ExtractionCancelledError();
  }

  const offset = await fileSize(partial) ?? 0;
  const idle = new AbortController();
  let idleTimer = setTimeout(() => idle.abort(), idleTimeout);
  const touch = (): void => {

    clearTimeout(idleTimer);
    idleTimer = setTimeout(() => idle.abort(), idleTimeout);
  };

  try {

    const response = await request(source.url, requestHeaders(stream, source.url, offset), idle, options);
    const range = parseContentRange(response.headers.get("content-range"));

    if((response.status === 416) && (offset > 0)) {

      await discardBody(response);

      if((range.total ?? source.sizeHint) === offset) {

        LOG.debug("extraction:download", "%s was already complete.", name);

        return await finalize(partial, target, offset);
      }

      await fsPromises.rm(partial, { force: true });

      throw new IncompleteDownloadError(name, range.total, offset, "the server rejected the resume offset.");
    }

    if(!response.ok) {

      await discardBody(response);

      throw new DownloadFailedError(host, response.status, response.statusText || "request failed.");
    }

    let start = 0;
    let total: Nullable<number>;

    if(response.status === 206) {

      if((range.start !== null) && (range.start !== offset)) {

        await discardBody(response);
        await fsPromises.rm(partial, { force: true });

        throw new IncompleteDownloadError(name, range.total, 0, "the server resumed from an unexpected offset.");
      }

      const length = response.headers.get("content-length");

      start = offset;
      total = range.total ?? ((length === null) ? null : (offset + Number(length)));
    } else {

      const length = response.headers.get("content-length");

      total = (length === null) ? null : Number(length);

      if(offset > 0) {

        LOG.debug("extraction:download", "%s: server ignored the range request, restarting from zero.", name);
      }
    }

    if((total !== null) && ((counted + total) > maxFileSize)) {

      await discardBody(response);
      await fsPromises.rm(partial, { force: true });

      throw new DownloadTooLargeError(maxFileSize, counted + total);
    }

    if(!response.body) {

      throw new IncompleteDownloadError(name, total, start, "the response has no body.");
    }

    if(start > 0) {

      LOG.debug("extraction:download", "Resuming %s at %s.", name, formatBytes(start));
    }

    const received = await transfer(Readable.fromWeb(response.body), { counted, idleSignal: idle.signal, maxFileSize, name, partial, signal: options.signal, start,
      total, touch });

    if((total !== null) && (received !== total)) {

      if(received > total) {

        await fsPromises.rm(partial, { force: true });
      }

      throw new IncompleteDownloadError(name, total, received);
    }

    return await finalize(partial, target, received);
  } finally {

    clearTimeout(idleTimer);
  }
}

interface TransferTarget {

  // Bytes of other files that count against the same size limit.
  counted: number;

  idleSignal: AbortSignal;
  maxFileSize: number;
  name: string;
  partial: string;
  signal?: AbortSignal;

  // Bytes already in the partial file that the body continues from.
  start: number;

  total: Nullable<number>;

  // Called for every chunk to push the idle deadline back.
  touch: () => void;
}

/**
 * Streams a response body into the partial file, enforcing the size limit.
 * @returns The size of the partial file afterwards.
 */
async function transfer(body: Readable, target: TransferTarget): Promise<number> {

  const { counted, idleSignal, maxFileSize, name, partial, signal, start, total, touch } = target;
  let received = start;

  const guard = new Transform({

    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {

      received += chunk.length;
      touch();

      if((counted + received) > maxFileSize) {

        callback(new DownloadTooLargeError(maxFileSize, counted + received));

        return;
      }

      callback(null, chunk);
    }
  });

  try {

    await pipeline(body, guard, fs.createWriteStream(partial, { flags: (start > 0) ? "a" : "w" }));
  } catch(error) {

    if(error instanceof DownloadTooLargeError) {

      await fsPromises.rm(partial, { force: true });

      throw error;
    }

    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    const written = await fileSize(partial) ?? 0;

    throw new IncompleteDownloadError(name, total, written, idleSignal.aborted ? "no data received before the idle timeout." : formatError(error));
  }

  return received;
}

async function finalize(partial: string, target: string, size: number): Promise<number> {

  await fsPromises.rename(partial, target);

  return size;
}

/**
 * Resolves an HLS part and stores its media playlist, plus a separate audio playlist when the variant has one.
 */
async function downloadPlaylist(stream: LocatedStream, part: StreamPart, index: number, destination: string, options: DownloadOptions):
Promise<DownloadedPart[]> {

  const host = hostOf(part.url);

  const fetcher = async (url: string): Promise<{ text: string; url: string }> => {

    const idle = new AbortController();
    const timer = setTimeout(() => idle.abort(), options.settings.idleTimeout);

    try {

      const response = await request(url, requestHeaders(stream, url, 0), idle, options);

      if(!response.ok) {

        await discardBody(response);

        throw new DownloadFailedError(hostOf(url), response.status, response.statusText || "playlist request failed.");
      }

      return { text: await response.text(), url: response.url || url };
    } finally {

      clearTimeout(timer);
    }
  };

  let resolved: ResolvedHls;

  try {

    resolved = await resolveHlsPlaylist(part.url, options.quality, fetcher);
  } catch(error) {

    if((error instanceof DownloadFailedError) || (error instanceof ExtractionCancelledError)) {

      throw error;
    }

    if(options.signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    throw new DownloadFailedError(host, null, formatError(error));
  }

  const playlists: { kind: StreamPart["kind"]; playlist: MediaPlaylist }[] = [{ kind: resolved.audio ? "video" : part.kind, playlist: resolved.video }];

  if(resolved.audio) {

    playlists.push({ kind: "audio", playlist: resolved.audio });
  }

  const written: DownloadedPart[] = [];

  for(const { kind, playlist } of playlists) {

    // eslint-disable-next-line no-await-in-loop
    written.push(await downloadMediaPlaylist(stream, playlist, [ String(index), "-", kind ].join(""), kind, destination, options));
  }

  return written;
}

/**
 * Downloads the resources of one media playlist and stores the playlist rewritten to the local copies.
 * @param baseName - Name of the stored playlist without its extension, and of the directory holding its resources.
 */
async function downloadMediaPlaylist(stream: LocatedStream, playlist: MediaPlaylist, baseName: string, kind: StreamPart["kind"], destination: string,
  options: DownloadOptions): Promise<DownloadedPart> {

  const resources = listPlaylistResources(playlist.text);

  if(!resources.some((resource) => resource.type === "segment")) {

    throw new DownloadFailedError(hostOf(playlist.url), null, "the HLS playlist lists no segments.");
  }

  const directory = path.join(destination, baseName);
  const localNames = new Map<string, string>();
  const files: string[] = [];
  let size = 0;

  await fsPromises.mkdir(directory, { recursive: true });

  for(const [ position, resource ] of resources.entries()) {

    const file = [ String(position).padStart(5, "0"), ".", resourceExtension(resource.type, resource.url) ].join("");
    const target = path.join(directory, file);

    // eslint-disable-next-line no-await-in-loop
    const stored = await fetchFile(stream, { sizeHint: null, url: resource.url }, target, options, size);

    size += stored;

    localNames.set(resource.url, [ baseName, "/", file ].join(""));
    files.push(target);
  }

  const text = rewritePlaylistResources(playlist.text, (url) => localNames.get(url) ?? url);
  const target = path.join(destination, [ baseName, ".m3u8" ].join(""));

  await fsPromises.writeFile(target, text);

  LOG.debug("extraction:download", "Stored %s HLS resource(s) of %s, %s in total.", resources.length, baseName, formatBytes(size));

  return { checksum: await hashFiles(files), container: "hls", kind, path: target, size };
}

// Segment files keep their own extension when it looks like one.
function resourceExtension(type: "key" | "map" | "segment", url: string): string {

  if(type === "key") {

    return "key";
  }

  let extension = "";

  try {

    extension = path.posix.extname(new URL(url).pathname).slice(1).toLowerCase();
  } catch {

    extension = "";
  }

  return /^[a-z0-9]{1,5}$/.test(extension) ? extension : ((type === "map") ? "mp4" : "ts");
}

// SHA-256 over several files, in order, as if they were one.
async function hashFiles(files: readonly string[]): Promise<string> {

  const hash = createHash("sha256");

  for(const file of files) {

    // eslint-disable-next-line no-await-in-loop
    hash.update(await fsPromises.readFile(file));
  }

  return hash.digest("hex");
}
