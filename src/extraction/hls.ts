/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * hls.ts: HLS playlist resolution for located streams.
 */
import type { Nullable, QualityHint, StreamPart } from "../types/index.js";
import { pickByQuality } from "./matchers.js";

/*
 * HLS PLAYLISTS
 *
 * A located HLS stream is a playlist URL. Players usually load a master playlist listing one variant per quality, each pointing at a media playlist of segments:
 *
 * #EXTM3U
 * #EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720,AUDIO="aac"
 * 720p/index.m3u8
 * #EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="aac",DEFAULT=YES,URI="audio/index.m3u8"
 *
 * We resolve the master to the variant matching the quality hint (plus its audio rendition when audio is carried separately) and make every URI of each media
 * playlist absolute. The downloader then fetches the resources a media playlist names (segments, the #EXT-X-MAP initialization segment, #EXT-X-KEY keys) and
 * rewrites the playlist to point at the local copies, so FFmpeg never goes to the network.
 */

// Masters pointing at masters do exist, but never deeply.
const MAX_PLAYLIST_DEPTH = 3;

export interface HlsVariant {

  // GROUP-ID of the separate audio rendition, when the variant has one.
  audioGroup: Nullable<string>;

  bandwidth: number;
  height: Nullable<number>;
  url: string;
}

export interface HlsRendition {

  groupId: string;
  isDefault: boolean;
  type: string;
  url: string;
}

export interface MasterPlaylist {

  renditions: HlsRendition[];
  variants: HlsVariant[];
}

export interface FetchedPlaylist {

  text: string;

  // URL the playlist was served from, after redirects. Relative URIs resolve against it.
  url: string;
}

export type PlaylistFetcher = (url: string) => Promise<FetchedPlaylist>;

/**
 * A media playlist ready to be written to disk.
 */
export interface MediaPlaylist {

  // Playlist text with absolute URIs.
  text: string;

  url: string;
}

/**
 * A file a media playlist needs in order to be played.
 */
export interface PlaylistResource {

  type: "key" | "map" | "segment";

  // Absolute URL.
  url: string;
}

export interface ResolvedHls {

  audio: Nullable<MediaPlaylist>;
  video: MediaPlaylist;
}

export function isPlaylist(text: string): boolean {

  return text.trimStart().startsWith("#EXTM3U");
}

export function isMasterPlaylist(text: string): boolean {

  return /^#EXT-X-STREAM-INF:/m.test(text);
}

/**
 * Parses an HLS attribute list (KEY=value,KEY="quoted, value") into a record. Keys are returned as written; quotes are removed from values.
 * @param list - The text after the tag's colon.
 * @returns Attribute values by name.
 */
export function parseAttributes(list: string): Record<string, string> {

  const attributes: Record<string, string> = {};
  const pattern = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;

  for(const match of list.matchAll(pattern)) {

    const value = match[2];

    attributes[match[1]] = (value.startsWith("\"") && value.endsWith("\"")) ? value.slice(1, -1) : value;
  }

  return attributes;
}

/**
 * Parses the variants and renditions of a master playlist.
 * @param text - The playlist text.
 * @param baseUrl - URL the playlist was served from.
 * @returns Variants in playlist order and the renditions they reference.
 */
export function parseMasterPlaylist(text: string, baseUrl: string): MasterPlaylist {

  const lines = text.split(/\r?\n/).map((line) => line.trim());
  const renditions: HlsRendition[] = [];
  const variants: HlsVariant[] = [];

  for(const [ index, line ] of lines.entries()) {

    if(line.startsWith("#EXT-X-MEDIA:")) {

      const attributes = parseAttributes(line.slice("#EXT-X-MEDIA:".length));

      if(attributes["URI"] && attributes["GROUP-ID"]) {

        renditions.push({

          groupId: attributes["GROUP-ID"],
          isDefault: attributes["DEFAULT"] === "YES",
          type: attributes["TYPE"] ?? "",
          url: new URL(attributes["URI"], baseUrl).toString()
        });
      }

      continue;
    }

    if(!line.startsWith("#EXT-X-STREAM-INF:")) {

      continue;
    }

    // The variant URI is the next line that is neither blank nor a tag.
    const uri = lines.slice(index + 1).find((candidate) => (candidate.length > 0) && !candidate.startsWith("#"));

    if(!uri) {

      continue;
    }

    const attributes = parseAttributes(line.slice("#EXT-X-STREAM-INF:".length));
    const resolution = /^\d+x(\d+)$/.exec(attributes["RESOLUTION"] ?? "");
    const bandwidth = Number(attributes["BANDWIDTH"] ?? 0);

    variants.push({

      audioGroup: attributes["AUDIO"] ?? null,
      bandwidth: Number.isFinite(bandwidth) ? bandwidth : 0,
      height: resolution ? Number(resolution[1]) : null,
      url: new URL(uri, baseUrl).toString()
    });
  }

  return { renditions, variants };
}

/**
 * Rewrites every URI in a playlist, both URI lines and URI="..." attributes of tags such as #EXT-X-KEY and #EXT-X-MAP, to absolute form.
 * @param text - The playlist text.
 * @param baseUrl - URL the playlist was served from.
 * @returns The rewritten playlist.
 */
export function absolutizePlaylist(text: string, baseUrl: string): string {

  return text.split(/\r?\n/).map((line) => {

    const trimmed = line.trim();

    if(trimmed.length === 0) {

      return trimmed;
    }

    if(trimmed.startsWith("#")) {

      return trimmed.replace(/URI="([^"]*)"/g, (_, uri: string) => [ "URI=\"", new URL(uri, baseUrl).toString(), "\"" ].join(""));
    }

    return new URL(trimmed, baseUrl).toString();
  }).join("\n");
}

/**
 * Lists the resources of a media playlist with absolute URIs, in playlist order and without duplicates. Byte-range segments of one file list that file once.
 * @param text - The media playlist text.
 * @returns The resources to download.
 */
export function listPlaylistResources(text: string): PlaylistResource[] {

  const resources: PlaylistResource[] = [];
  const seen = new Set<string>();

  const add = (type: PlaylistResource["type"], url: string): void => {

    if(!seen.has(url)) {

      seen.add(url);
      resources.push({ type, url });
    }
  };

  for(const line of text.split(/\r?\n/).map((candidate) => candidate.trim())) {

    if(line.length === 0) {

      continue;
    }

    if(!line.startsWith("#")) {

      add("segment", line);

      continue;
    }

    const type = localResourceType(line);
    const uri = type ? parseAttributes(line.slice(line.indexOf(":") + 1))["URI"] : undefined;

    if(type && uri) {

      add(type, uri);
    }
  }

  return resources;
}

/**
 * Rewrites the resource URIs of a media playlist, leaving every other line as it is.
 * @param text - The media playlist text with absolute URIs.
 * @param rename - Maps a resource URL to its replacement.
 * @returns The rewritten playlist.
 */
export function rewritePlaylistResources(text: string, rename: (url: string) => string): string {

  return text.split(/\r?\n/).map((line) => {

    const trimmed = line.trim();

    if(trimmed.length === 0) {

      return trimmed;
    }

    if(!trimmed.startsWith("#")) {

      return rename(trimmed);
    }

    if(!localResourceType(trimmed)) {

      return trimmed;
    }

    return trimmed.replace(/URI="([^"]*)"/, (_, uri: string) => [ "URI=\"", rename(uri), "\"" ].join(""));
  }).join("\n");
}

// Tags whose URI names a file the player fetches: the initialization segment and decryption keys. METHOD=NONE keys have no file.
function localResourceType(tag: string): Nullable<"key" | "map"> {

  if(tag.startsWith("#EXT-X-MAP:")) {

    return "map";
  }

  if(tag.startsWith("#EXT-X-KEY:") && (parseAttributes(tag.slice("#EXT-X-KEY:".length))["METHOD"] !== "NONE")) {

    return "key";
  }

  return null;
}

/**
 * Picks the variant for a quality hint using the same rule as stream parts: the highest at or below the hint, otherwise the lowest. Bandwidth breaks ties.
 * @param variants - The variants, non-empty.
 * @param quality - The quality hint.
 * @returns The chosen variant.
 */
export function chooseVariant(variants: readonly HlsVariant[], quality: QualityHint): HlsVariant {

  const parts = variants.map((variant): StreamPart => ({ container: "hls", height: variant.height, kind: "muxed", sizeHint: variant.bandwidth, url: variant.url }));
  const position = parts.indexOf(pickByQuality(parts, quality));

  return variants[Math.max(position, 0)];
}

/**
 * Resolves an HLS URL to the media playlists to download: the variant matching the quality hint and, when the variant's audio is a separate rendition, the
 * audio playlist.
 * @param url - The located playlist URL.
 * @param quality - The quality hint.
 * @param fetcher - Fetches playlist text.
 * @returns The media playlists with absolute URIs.
 * @throws Error when a response is not a playlist or a master playlist lists no variants.
 */
export async function resolveHlsPlaylist(url: string, quality: QualityHint, fetcher: PlaylistFetcher): Promise<ResolvedHls> {

  let current = await fetchPlaylist(url, fetcher);
  let audio: Nullable<MediaPlaylist> = null;

  for(let depth = 0; isMasterPlaylist(current.text); depth++) {

    if(depth >= MAX_PLAYLIST_DEPTH) {

      throw new Error("HLS master playlists are nested too deeply.");
    }

    const master = parseMasterPlaylist(current.text, current.url);

    if(master.variants.length === 0) {

      throw new Error("the HLS master playlist lists no variants.");
    }

    const variant = chooseVariant(master.variants, quality);
    const group = master.renditions.filter((rendition) => (rendition.type === "AUDIO") && (rendition.groupId === variant.audioGroup));
    const rendition = group.find((candidate) => candidate.isDefault) ?? group.at(0);

    if(rendition) {

      // eslint-disable-next-line no-await-in-loop
      const fetched = await fetchPlaylist(rendition.url, fetcher);

      audio = { text: absolutizePlaylist(fetched.text, fetched.url), url: fetched.url };
    }

    // eslint-disable-next-line no-await-in-loop
    current = await fetchPlaylist(variant.url, fetcher);
  }

  return { audio, video: { text: absolutizePlaylist(current.text, current.url), url: current.url } };
}

async function fetchPlaylist(url: string, fetcher: PlaylistFetcher): Promise<FetchedPlaylist> {

  const fetched = await fetcher(url);

  if(!isPlaylist(fetched.text)) {

    throw new Error("the response is not an HLS playlist.");
  }

  return fetched;
}
