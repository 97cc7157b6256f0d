/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * matchers.ts: Network matchers that pick media resources out of a page's traffic.
 */
import type { AvailableFormat, NetworkExchange, Nullable, OutputFormat, QualityHint, StreamPart } from "../types/index.js";
import type { MatcherId, SiteProfile } from "../config/sites.js";
import { AUDIO_FORMATS } from "../types/index.js";
import { fileURLToPath } from "node:url";
import { hostMatchesDomain } from "../config/sites.js";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

/* A matcher looks at one network response at a time and decides whether it is a media resource, and if so which kind (video, audio, or both muxed together),
 * which container, and which height. The locator collects the parts a matcher accepts while the page plays; isSatisfied() tells it when enough has been seen to
 * stop waiting early. Choosing among the collected parts is the job of selectParts(), which is matcher-independent.
 *
 * Matchers are plain strategy objects keyed by MatcherId. Site profiles name the matcher for their domains.
 */

export interface StreamMatcher {

  readonly id: MatcherId;

  // True once the collected parts are enough to produce an artifact.
  isSatisfied(parts: readonly StreamPart[]): boolean;

  // Returns the part this response represents, or null when it is not media.
  match(exchange: NetworkExchange): Nullable<StreamPart>;
}

// Resource types that never carry the media itself.
const IGNORED_RESOURCE_TYPES = new Set([ "document", "font", "image", "manifest", "ping", "script", "stylesheet", "websocket" ]);

// Media file extensions and the part kind they imply.
const MEDIA_EXTENSIONS: Record<string, "audio" | "muxed"> = {

  aac: "audio",
  m4a: "audio",
  m4v: "muxed",
  mkv: "muxed",
  mov: "muxed",
  mp3: "audio",
  mp4: "muxed",
  oga: "audio",
  ogg: "audio",
  opus: "audio",
  webm: "muxed"
};

// Fragments of segmented streams. The playlist is what we want, never its segments.
const SEGMENT_EXTENSIONS = new Set([ "m4s", "ts" ]);
const SEGMENT_CONTENT_TYPES = new Set([ "video/iso.segment", "video/mp2t" ]);

// Content type subtypes mapped to container hints.
const CONTAINER_BY_SUBTYPE: Record<string, string> = {

  aac: "aac",
  mp4: "mp4",
  mpeg: "mp3",
  ogg: "ogg",
  quicktime: "mov",
  webm: "webm",
  "x-m4a": "m4a",
  "x-matroska": "mkv"
};

// An octet-stream this large is assumed to be media when its URL gives no better clue.
const OCTET_STREAM_MEDIA_SIZE = 1024 * 1024;

// Anything typed as video but smaller than this is a poster, a beacon, or a player probe.
const MIN_VIDEO_SIZE = 16 * 1024;

const TIKTOK_MEDIA_DOMAINS = [ "byteoversea.com", "muscdn.com", "tiktokcdn-us.com", "tiktokcdn.com", "tiktokv.com" ];

// Query parameters that select a byte range of a googlevideo.com resource. Dropping them gives the URL of the whole stream.
const YOUTUBE_RANGE_PARAMS = [ "range", "rbuf", "rn", "ump" ];

// Legacy formats carrying both video and audio.
const YOUTUBE_MUXED_ITAGS = new Set([ 17, 18, 22 ]);

const YOUTUBE_ITAG_HEIGHTS = loadItagHeights();

/**
 * Reads the itag to video height table shipped in data/youtube-itags.json.
 * @returns Height by itag.
 */
function loadItagHeights(): Map<number, number> {

  // This file is in src/extraction/ or dist/extraction/, and the data directory is in the project root.
  const currentDir = fileURLToPath(new URL(".", import.meta.url));
  const table: unknown = JSON.parse(readFileSync(resolve(currentDir, "../../data/youtube-itags.json"), "utf-8"));
  const heights = new Map<number, number>();

  if((typeof table !== "object") || (table === null)) {

    return heights;
  }

  for(const [ itag, height ] of Object.entries(table)) {

    if(typeof height === "number") {

      heights.set(Number(itag), height);
    }
  }

  return heights;
}

/**
 * Parses a URL, returning null for anything the URL parser rejects.
 */
function parseUrl(url: string): Nullable<URL> {

  try {

    return new URL(url);
  } catch {

    return null;
  }
}

/**
 * Returns the lowercase extension of a URL path, without the dot.
 */
function pathExtension(url: URL): string {

  const match = /\.([a-z0-9]{2,5})$/i.exec(url.pathname);

  return match ? match[1].toLowerCase() : "";
}

/**
 * Splits a Content-Type header into its lowercase type and subtype, dropping parameters.
 */
function parseContentType(contentType: Nullable<string>): { subtype: string; type: string } {

  const [ essence ] = (contentType ?? "").toLowerCase().split(";");
  const [ type = "", subtype = "" ] = essence.trim().split("/");

  return { subtype, type };
}

function isSuccessful(exchange: NetworkExchange): boolean {

  return (exchange.status >= 200) && (exchange.status < 300);
}

/**
 * Finds a video height in a media URL, either a "720p" style path token or a height query parameter.
 * @param url - The media URL.
 * @returns The height in pixels, or null.
 */
export function heightFromUrl(url: URL): Nullable<number> {

  const param = Number(url.searchParams.get("height") ?? NaN);

  if(Number.isInteger(param) && (param > 0)) {

    return param;
  }

  const token = /(?:^|[^0-9])(\d{3,4})p(?![a-z])/i.exec(decodeURIComponent(url.pathname));

  return token ? Number(token[1]) : null;
}

/**
 * Matches any site's media by content type, file extension, and size. Manifests of segmented streams are matched as HLS; their segments are not.
 */
const genericMatcher = (mediaDomains: readonly string[]): StreamMatcher => ({

  id: "generic",

  isSatisfied: (parts) => parts.length > 0,

  match: (exchange) => {

    if(!isSuccessful(exchange) || IGNORED_RESOURCE_TYPES.has(exchange.resourceType)) {

      return null;
    }

    const url = parseUrl(exchange.url);

    if(!url || ((mediaDomains.length > 0) && !hostMatchesDomain(url.hostname, mediaDomains))) {

      return null;
    }

    const extension = pathExtension(url);
    const { subtype, type } = parseContentType(exchange.contentType);
    const essence = [ type, subtype ].join("/");
    const part = (kind: StreamPart["kind"], container: Nullable<string>): StreamPart => ({

      container,
      height: (kind === "audio") ? null : heightFromUrl(url),
      kind,
      sizeHint: exchange.contentLength,
      url: exchange.url
    });

    if(subtype.includes("mpegurl") || (extension === "m3u8")) {

      return part("muxed", "hls");
    }

    if(SEGMENT_EXTENSIONS.has(extension) || SEGMENT_CONTENT_TYPES.has(essence) || (extension === "mpd") || subtype.includes("dash")) {

      return null;
    }

    if(type === "video") {

      if((exchange.contentLength !== null) && (exchange.contentLength < MIN_VIDEO_SIZE)) {

        return null;
      }

      return part("muxed", Object.hasOwn(CONTAINER_BY_SUBTYPE, subtype) ? CONTAINER_BY_SUBTYPE[subtype] : (extension || null));
    }

    if(type === "audio") {

      const container = Object.hasOwn(CONTAINER_BY_SUBTYPE, subtype) ? CONTAINER_BY_SUBTYPE[subtype] : (extension || null);

      return part("audio", (container === "mp4") ? "m4a" : container);
    }

    if(Object.hasOwn(MEDIA_EXTENSIONS, extension) && ((type === "") || (essence === "application/octet-stream") || (essence === "binary/octet-stream"))) {

      return part(MEDIA_EXTENSIONS[extension], extension);
    }

    if(((essence === "application/octet-stream") || (essence === "binary/octet-stream")) && ((exchange.contentLength ?? 0) >= OCTET_STREAM_MEDIA_SIZE)) {

      return part("muxed", extension || null);
    }

    return null;
  }
});

/**
 * Matches YouTube's googlevideo.com stream requests. Adaptive formats arrive as separate video and audio streams fetched in byte ranges; the range parameters
 * are stripped so that each stream is recorded once, as a URL for the whole resource.
 */
const youtubeMatcher = (): StreamMatcher => ({

  id: "youtube",

  isSatisfied: (parts) => parts.some((part) => part.kind === "muxed") ||
    (parts.some((part) => part.kind === "video") && parts.some((part) => part.kind === "audio")),

  match: (exchange) => {

    if(!isSuccessful(exchange)) {

      return null;
    }

    const url = parseUrl(exchange.url);

    if(!url || !hostMatchesDomain(url.hostname, ["googlevideo.com"]) || (url.pathname !== "/videoplayback")) {

      return null;
    }

    const { subtype, type } = parseContentType(url.searchParams.get("mime"));

    if((type !== "video") && (type !== "audio")) {

      return null;
    }

    const itag = Number(url.searchParams.get("itag") ?? NaN);
    const length = Number(url.searchParams.get("clen") ?? NaN);

    for(const param of YOUTUBE_RANGE_PARAMS) {

      url.searchParams.delete(param);
    }

    const kind = (type === "audio") ? "audio" : (YOUTUBE_MUXED_ITAGS.has(itag) ? "muxed" : "video");

    return {

      container: ((type === "audio") && (subtype === "mp4")) ? "m4a" : (subtype || null),
      height: (kind === "audio") ? null : (YOUTUBE_ITAG_HEIGHTS.get(itag) ?? null),
      kind,
      sizeHint: Number.isFinite(length) ? length : null,
      url: url.toString()
    };
  }
});

/**
 * Matches TikTok's CDN video responses, which are always muxed MP4 files.
 */
const tiktokMatcher = (): StreamMatcher => ({

  id: "tiktok",

  isSatisfied: (parts) => parts.length > 0,

  match: (exchange) => {

    if(!isSuccessful(exchange) || IGNORED_RESOURCE_TYPES.has(exchange.resourceType)) {

      return null;
    }

    const url = parseUrl(exchange.url);

    if(!url || !hostMatchesDomain(url.hostname, TIKTOK_MEDIA_DOMAINS)) {

      return null;
    }

    if((parseContentType(exchange.contentType).type !== "video") && !url.pathname.includes("/video/")) {

      return null;
    }

    return { container: "mp4", height: heightFromUrl(url), kind: "muxed", sizeHint: exchange.contentLength, url: exchange.url };
  }
});

/**
 * Creates the matcher a site profile names.
 * @param profile - The site profile of the target URL.
 * @returns A matcher instance.
 */
export function createMatcher(profile: SiteProfile): StreamMatcher {

  switch(profile.matcher) {

    case "tiktok":

      return tiktokMatcher();

    case "youtube":

      return youtubeMatcher();

    default:

      return genericMatcher(profile.mediaDomains);
  }
}

/**
 * Converts a quality hint into a height cap.
 * @param quality - The quality hint.
 * @returns The height in pixels, or null for "best" and "worst".
 */
export function qualityHeight(quality: QualityHint): Nullable<number> {

  const match = /^(\d+)p$/.exec(quality);

  return match ? Number(match[1]) : null;
}

// Orders parts by height, then by advertised size.
function compareParts(a: StreamPart, b: StreamPart): number {

  return ((a.height ?? 0) - (b.height ?? 0)) || ((a.sizeHint ?? 0) - (b.sizeHint ?? 0));
}

function highest(parts: readonly StreamPart[]): StreamPart {

  return parts.reduce((best, part) => (compareParts(part, best) > 0) ? part : best);
}

function lowest(parts: readonly StreamPart[]): StreamPart {

  return parts.reduce((worst, part) => (compareParts(part, worst) < 0) ? part : worst);
}

/**
 * Picks one part by quality: the highest at or below the hint's height, or the lowest when every part exceeds it. "best" and "worst" pick the extremes.
 * @param parts - Candidate parts, non-empty.
 * @param quality - The quality hint.
 * @returns The chosen part.
 */
export function pickByQuality(parts: readonly StreamPart[], quality: QualityHint): StreamPart {

  if(quality === "worst") {

    return lowest(parts);
  }

  const cap = qualityHeight(quality);

  if(cap === null) {

    return highest(parts);
  }

  const eligible = parts.filter((part) => (part.height ?? 0) <= cap);

  return (eligible.length > 0) ? highest(eligible) : lowest(parts);
}

/**
 * Chooses the parts to download from everything a matcher collected. Audio formats take the best audio stream, falling back to a muxed one. Video formats take a
 * separate video and audio pair when both exist, then a muxed stream, then a video-only stream.
 * @param parts - Collected parts in observation order.
 * @param quality - The quality hint.
 * @param format - The requested output format.
 * @returns The parts to download, empty when nothing suitable was collected.
 */
export function selectParts(parts: readonly StreamPart[], quality: QualityHint, format: OutputFormat): StreamPart[] {

  const audio = parts.filter((part) => part.kind === "audio");
  const muxed = parts.filter((part) => part.kind === "muxed");
  const video = parts.filter((part) => part.kind === "video");

  // Audio has no height, so the hint only decides between the largest and the smallest stream.
  const pickAudio = (): StreamPart => (quality === "worst") ? lowest(audio) : highest(audio);

  if(AUDIO_FORMATS.includes(format)) {

    if(audio.length > 0) {

      return [pickAudio()];
    }

    return (muxed.length > 0) ? [pickByQuality(muxed, quality)] : [];
  }

  if((video.length > 0) && (audio.length > 0)) {

    return [ pickByQuality(video, quality), pickAudio() ];
  }

  if(muxed.length > 0) {

    return [pickByQuality(muxed, quality)];
  }

  if(video.length > 0) {

    return [pickByQuality(video, quality)];
  }

  return (audio.length > 0) ? [pickAudio()] : [];
}

// Listing order for format kinds.
const KIND_ORDER: Record<StreamPart["kind"], number> = { audio: 2, muxed: 0, video: 1 };

/**
 * Describes the collected parts as the formats a page offers: muxed streams first, then video-only, then audio, each from the highest quality down. Part URLs are
 * signed and short-lived, so they are left out.
 * @param parts - Collected parts in observation order.
 * @returns One entry per part.
 */
export function describeFormats(parts: readonly StreamPart[]): AvailableFormat[] {

  return [...parts].sort((a, b) => (KIND_ORDER[a.kind] - KIND_ORDER[b.kind]) || compareParts(b, a)).map((part) => ({

    container: part.container,
    height: part.height,
    kind: part.kind,
    quality: (part.height === null) ? null : [ String(part.height), "p" ].join(""),
    sizeHint: part.sizeHint
  }));
}
