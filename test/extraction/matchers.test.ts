/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * matchers.test.ts: Tests for network matchers and part selection.
 */
import { DEFAULT_SITE_PROFILE, SITE_PROFILES } from "../../src/config/sites.js";
import { createMatcher, describeFormats, pickByQuality, qualityHeight, selectParts } from "../../src/extraction/matchers.js";
import { describe, expect, it } from "vitest";
import type { StreamPart } from "../../src/types/index.js";
import { exchange } from "../helpers/fakeBrowser.js";

function part(kind: StreamPart["kind"], height: number | null, sizeHint: number | null = null): StreamPart {

  return { container: "mp4", height, kind, sizeHint, url: [ "https://cdn.example.com/", kind, "/", String(height), "/", String(sizeHint) ].join("") };
}

describe("generic matcher", () => {

  const matcher = createMatcher(DEFAULT_SITE_PROFILE);

  it("should match a progressive video file", () => {

    const url = "https://cdn.example.com/v/720p/clip.mp4";

    expect(matcher.match(exchange(url, { contentLength: 5000000, contentType: "video/mp4" }))).toEqual({

      container: "mp4",
      height: 720,
      kind: "muxed",
      sizeHint: 5000000,
      url
    });
  });

  it("should match an HLS playlist requested by script", () => {

    const url = "https://cdn.example.com/live/master.m3u8";

    expect(matcher.match(exchange(url, { contentType: "application/vnd.apple.mpegurl", resourceType: "xhr" }))).toEqual({

      container: "hls",
      height: null,
      kind: "muxed",
      sizeHint: null,
      url
    });
  });

  it("should ignore segments and DASH manifests", () => {

    expect(matcher.match(exchange("https://cdn.example.com/live/seg-001.ts", { contentType: "video/mp2t" }))).toBeNull();
    expect(matcher.match(exchange("https://cdn.example.com/live/chunk.m4s", { contentType: "video/iso.segment" }))).toBeNull();
    expect(matcher.match(exchange("https://cdn.example.com/live/stream.mpd", { contentType: "application/dash+xml" }))).toBeNull();
  });

  it("should ignore tiny videos, failed responses, and non-media resource types", () => {

    expect(matcher.match(exchange("https://cdn.example.com/probe.mp4", { contentLength: 1000, contentType: "video/mp4" }))).toBeNull();
    expect(matcher.match(exchange("https://cdn.example.com/clip.mp4", { contentType: "video/mp4", status: 404 }))).toBeNull();
    expect(matcher.match(exchange("https://cdn.example.com/poster.mp4", { contentType: "video/mp4", resourceType: "image" }))).toBeNull();
  });

  it("should match audio and name mp4 audio m4a", () => {

    expect(matcher.match(exchange("https://cdn.example.com/track", { contentType: "audio/mp4" }))).toMatchObject({ container: "m4a", height: null, kind: "audio" });
  });

  it("should match octet-streams by extension or size", () => {

    expect(matcher.match(exchange("https://cdn.example.com/file.mp4", { contentType: "application/octet-stream" })))
      .toMatchObject({ container: "mp4", kind: "muxed" });
    expect(matcher.match(exchange("https://cdn.example.com/blob", { contentLength: 2097152, contentType: "application/octet-stream" })))
      .toMatchObject({ container: null, kind: "muxed" });
    expect(matcher.match(exchange("https://cdn.example.com/blob", { contentLength: 2048, contentType: "application/octet-stream" }))).toBeNull();
  });

  it("should only accept the profile's media domains when it names some", () => {

    const twitter = createMatcher(SITE_PROFILES.twitter);

    expect(twitter.match(exchange("https://ads.example.com/promo.mp4", { contentType: "video/mp4" }))).toBeNull();
    expect(twitter.match(exchange("https://video.twimg.com/ext_tw_video/1/vid/clip.mp4", { contentType: "video/mp4" })))
      .toMatchObject({ container: "mp4", kind: "muxed" });
  });
});

describe("youtube matcher", () => {

  const matcher = createMatcher(SITE_PROFILES.youtube);

  it("should strip range parameters and read the itag height", () => {

    const matched = matcher.match(exchange("https://rr1---sn-test.googlevideo.com/videoplayback?itag=137&mime=video%2Fmp4&clen=1000&range=0-500&rn=3",
      { resourceType: "xhr" }));

    expect(matched).toEqual({

      container: "mp4",
      height: 1080,
      kind: "video",
      sizeHint: 1000,
      url: "https://rr1---sn-test.googlevideo.com/videoplayback?itag=137&mime=video%2Fmp4&clen=1000"
    });
  });

  it("should classify audio and legacy muxed formats", () => {

    expect(matcher.match(exchange("https://rr1---sn-test.googlevideo.com/videoplayback?itag=140&mime=audio%2Fmp4")))
      .toMatchObject({ container: "m4a", height: null, kind: "audio", sizeHint: null });
    expect(matcher.match(exchange("https://rr1---sn-test.googlevideo.com/videoplayback?itag=18&mime=video%2Fmp4")))
      .toMatchObject({ height: 360, kind: "muxed" });
  });

  it("should ignore other hosts and paths", () => {

    expect(matcher.match(exchange("https://www.youtube.com/videoplayback?itag=18&mime=video%2Fmp4"))).toBeNull();
    expect(matcher.match(exchange("https://rr1---sn-test.googlevideo.com/generate_204"))).toBeNull();
  });

  it("should be satisfied by a muxed part or a video and audio pair", () => {

    expect(matcher.isSatisfied([part("video", 720)])).toBe(false);
    expect(matcher.isSatisfied([ part("video", 720), part("audio", null) ])).toBe(true);
    expect(matcher.isSatisfied([part("muxed", 360)])).toBe(true);
  });
});

describe("tiktok matcher", () => {

  const matcher = createMatcher(SITE_PROFILES.tiktok);

  it("should match CDN video responses as muxed mp4", () => {

    expect(matcher.match(exchange("https://v16.tiktokcdn.com/abc/video/tos/clip"))).toMatchObject({ container: "mp4", kind: "muxed" });
    expect(matcher.match(exchange("https://www.tiktok.com/api/item", { contentType: "video/mp4" }))).toBeNull();
  });
});

describe("qualityHeight", () => {

  it("should parse height hints", () => {

    expect(qualityHeight("1080p")).toBe(1080);
    expect(qualityHeight("best")).toBeNull();
  });
});

describe("pickByQuality", () => {

  const parts = [ part("muxed", 360), part("muxed", 1080), part("muxed", 720) ];

  it("should pick the highest part at or below the hint", () => {

    expect(pickByQuality(parts, "720p").height).toBe(720);
    expect(pickByQuality(parts, "480p").height).toBe(360);
  });

  it("should fall back to the lowest part when every part exceeds the hint", () => {

    expect(pickByQuality(parts, "144p").height).toBe(360);
  });

  it("should pick the extremes for best and worst", () => {

    expect(pickByQuality(parts, "best").height).toBe(1080);
    expect(pickByQuality(parts, "worst").height).toBe(360);
  });

  it("should break height ties by size", () => {

    expect(pickByQuality([ part("muxed", 720, 100), part("muxed", 720, 300) ], "best").sizeHint).toBe(300);
  });
});

describe("selectParts", () => {

  const video720 = part("video", 720);
  const video1080 = part("video", 1080);
  const smallAudio = part("audio", null, 100);
  const largeAudio = part("audio", null, 200);
  const muxed360 = part("muxed", 360);
  const all = [ video1080, smallAudio, video720, muxed360, largeAudio ];

  it("should prefer a video and audio pair for video formats", () => {

    expect(selectParts(all, "720p", "mp4")).toEqual([ video720, largeAudio ]);
  });

  it("should take only audio for audio formats", () => {

    expect(selectParts(all, "best", "mp3")).toEqual([largeAudio]);
    expect(selectParts(all, "worst", "m4a")).toEqual([smallAudio]);
  });

  it("should fall back to a muxed part", () => {

    expect(selectParts([ video1080, muxed360 ], "best", "mp4")).toEqual([muxed360]);
    expect(selectParts([muxed360], "best", "mp3")).toEqual([muxed360]);
  });

  it("should fall back to a video-only part", () => {

    expect(selectParts([video1080], "best", "webm")).toEqual([video1080]);
  });

  it("should return nothing when nothing was collected", () => {

    expect(selectParts([], "best", "mp4")).toEqual([]);
  });
});

describe("describeFormats", () => {

  it("should list muxed, then video, then audio from the highest quality down", () => {

    const formats = describeFormats([ part("audio", null, 100), part("video", 720), part("muxed", 360), part("video", 1080), part("audio", null, 200) ]);

    expect(formats).toEqual([

      { container: "mp4", height: 360, kind: "muxed", quality: "360p", sizeHint: null },
      { container: "mp4", height: 1080, kind: "video", quality: "1080p", sizeHint: null },
      { container: "mp4", height: 720, kind: "video", quality: "720p", sizeHint: null },
      { container: "mp4", height: null, kind: "audio", quality: null, sizeHint: 200 },
      { container: "mp4", height: null, kind: "audio", quality: null, sizeHint: 100 }
    ]);
  });

  it("should return nothing for no parts", () => {

    expect(describeFormats([])).toEqual([]);
  });
});
