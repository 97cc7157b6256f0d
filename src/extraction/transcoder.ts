/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * transcoder.ts: FFmpeg transcoding of downloaded parts into the delivery format.
 */
import type { DownloadedArtifact, DownloadedPart, OutputFormat, TranscodedArtifact } from "../types/index.js";
import { ExtractionCancelledError, TranscodeFailedError } from "./errors.js";
import { LOG, formatError, parseFFmpegDuration, runFFmpeg, sanitizeMessage, startTimer } from "../utils/index.js";
import { AUDIO_FORMATS } from "../types/index.js";
import type { FFmpegRunResult, FFmpegSpawner } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * TRANSCODING POLICY
 *
 * Whether to copy streams or re-encode them is decided here, from the containers of the downloaded parts. When every input comes in a container whose codecs the
 * target container can carry, FFmpeg copies the streams untouched ("-c copy"), which is fast and lossless. Otherwise the format's codec set is used. Audio formats
 * take a single input, the separate audio part when there is one and the muxed part otherwise, and drop video with -vn.
 *
 * HLS inputs are local media playlists whose segments the downloader already fetched. FFmpeg may only follow them to local files (and decrypt AES-128
 * segments with a local key), and segment names are not held to FFmpeg's list of media extensions.
 */

// Input containers that can be copied into each output container.
const REMUX_SOURCES: Record<OutputFormat, readonly string[]> = {

  m4a: [ "m4a", "mp4" ],
  mkv: [ "hls", "m4a", "mkv", "mp4", "webm" ],
  mp3: ["mp3"],
  mp4: [ "hls", "m4a", "mp4" ],
  webm: ["webm"]
};

// Codec arguments when re-encoding.
const ENCODE_ARGS: Record<OutputFormat, readonly string[]> = {

  m4a: [ "-c:a", "aac", "-b:a", "192k" ],
  mkv: [ "-c:v", "libx264", "-preset", "veryfast", "-crf", "23", "-c:a", "aac", "-b:a", "192k" ],
  mp3: [ "-c:a", "libmp3lame", "-b:a", "192k" ],
  mp4: [ "-c:v", "libx264", "-preset", "veryfast", "-crf", "23", "-c:a", "aac", "-b:a", "192k" ],
  webm: [ "-c:v", "libvpx-vp9", "-b:v", "0", "-crf", "32", "-row-mt", "1", "-c:a", "libopus", "-b:a", "128k" ]
};

// FFmpeg muxer names.
const MUXERS: Record<OutputFormat, string> = { m4a: "ipod", mkv: "matroska", mp3: "mp3", mp4: "mp4", webm: "webm" };

// How many trailing stderr lines go into a failure diagnostic.
const DIAGNOSTIC_LINES = 5;

export interface TranscodePlan {

  args: string[];

  // The parts used as inputs, in input order.
  inputs: DownloadedPart[];

  remux: boolean;
}

export interface TranscodeSettings {

  ffmpegPath: string;
  timeout: number;
}

export interface TranscodeOptions {

  // Artifact id recorded on the result.
  id: string;

  settings: TranscodeSettings;
  signal?: AbortSignal;

  // Injectable for tests.
  spawner?: FFmpegSpawner;
}

/**
 * Chooses the inputs for an output format. Audio formats use one audio-bearing part; video formats use every part.
 * @param parts - The downloaded parts.
 * @param format - The output format.
 * @returns The parts to feed to FFmpeg.
 */
export function selectInputs(parts: readonly DownloadedPart[], format: OutputFormat): DownloadedPart[] {

  if(!AUDIO_FORMATS.includes(format)) {

    return [...parts];
  }

  const source = parts.find((part) => part.kind === "audio") ?? parts.find((part) => part.kind === "muxed") ?? parts.at(0);

  return source ? [source] : [];
}

/**
 * Builds the FFmpeg arguments for producing an output format from downloaded parts.
 * @param artifact - The downloaded artifact.
 * @param format - The output format.
 * @param output - The output file path.
 * @returns The argument list and whether it remuxes.
 * @throws Error when there is nothing to transcode.
 */
export function planTranscode(artifact: DownloadedArtifact, format: OutputFormat, output: string): TranscodePlan {

  const inputs = selectInputs(artifact.parts, format);

  if(inputs.length === 0) {

    throw new Error("There are no downloaded parts to transcode.");
  }

  const audioOnly = AUDIO_FORMATS.includes(format);
  const remux = inputs.every((part) => (part.container !== null) && REMUX_SOURCES[format].includes(part.container));
  const hasHls = inputs.some((part) => part.container === "hls");
  const args = [ "-hide_banner", "-nostats", "-y" ];

  for(const part of inputs) {

    if(part.container === "hls") {

      args.push("-protocol_whitelist", "file,crypto", "-allowed_extensions", "ALL");
    }

    args.push("-i", part.path);
  }

  for(const [ index, part ] of inputs.entries()) {

    if(audioOnly) {

      args.push("-map", [ String(index), ":a:0" ].join(""));

      continue;
    }

    switch(part.kind) {

      case "audio":

        args.push("-map", [ String(index), ":a:0" ].join(""));

        break;

      case "video":

        args.push("-map", [ String(index), ":v:0" ].join(""));

        break;

      default:

        // Trailing "?" keeps the mapping optional for muxed files that turn out to lack a stream.
        args.push("-map", [ String(index), ":v:0?" ].join(""), "-map", [ String(index), ":a:0?" ].join(""));

        break;
    }
  }

  if(audioOnly) {

    args.push("-vn");
  }

  args.push(...(remux ? [ "-c", "copy" ] : ENCODE_ARGS[format]));

  // HLS carries AAC in ADTS framing, which MP4 containers need converted.
  if(remux && hasHls && ((format === "mp4") || (format === "m4a"))) {

    args.push("-bsf:a", "aac_adtstoasc");
  }

  if((format === "mp4") || (format === "m4a")) {

    args.push("-movflags", "+faststart");
  }

  args.push("-f", MUXERS[format], output);

  return { args, inputs, remux };
}

/**
 * Reduces FFmpeg stderr to a short caller-safe diagnostic: the last few non-empty lines, with paths, cookies, and any given secrets removed.
 * @param stderr - The stderr tail.
 * @param secrets - Values to redact.
 * @returns The diagnostic.
 */
export function summarizeStderr(stderr: string, secrets: readonly string[] = []): string {

  const lines = stderr.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0);

  return sanitizeMessage(lines.slice(-DIAGNOSTIC_LINES).join(" | "), secrets);
}

/**
 * Transcodes (or remuxes) a downloaded artifact into the delivery format.
 * @param artifact - The downloaded artifact.
 * @param format - The output format.
 * @param destination - The output file path.
 * @param options - Artifact id, FFmpeg settings, cancellation, and spawner.
 * @returns The transcoded artifact.
 * @throws TranscodeFailedError on a non-zero exit or timeout, ExtractionCancelledError on abort.
 */
export async function transcode(artifact: DownloadedArtifact, format: OutputFormat, destination: string, options: TranscodeOptions): Promise<TranscodedArtifact> {

  const { settings, signal } = options;
  const elapsed = startTimer();
  const plan = planTranscode(artifact, format, destination);

  LOG.debug("extraction:transcode", "%s %s input(s) to %s.", plan.remux ? "Remuxing" : "Re-encoding", plan.inputs.length, format);

  let result: FFmpegRunResult;

  try {

    result = await runFFmpeg(plan.args, { ffmpegPath: settings.ffmpegPath, signal, spawner: options.spawner, timeoutMs: settings.timeout });
  } catch(error) {

    await removeQuietly(destination);

    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    throw new TranscodeFailedError(sanitizeMessage(formatError(error)), null, false);
  }

  if(result.timedOut || (result.exitCode !== 0)) {

    await removeQuietly(destination);

    throw new TranscodeFailedError(summarizeStderr(result.stderr), result.exitCode, result.timedOut);
  }

  let size: number;

  try {

    size = (await fsPromises.stat(destination)).size;
  } catch(error) {

    LOG.debug("extraction:transcode", "Output missing after FFmpeg exited: %s.", formatError(error));

    throw new TranscodeFailedError("FFmpeg exited cleanly but produced no output.", result.exitCode, false);
  }

  LOG.debug("extraction:transcode", "Produced %s bytes in %sms.", size, elapsed());

  return { duration: parseFFmpegDuration(result.stderr), format, id: options.id, path: destination, remuxed: plan.remux, size };
}

async function removeQuietly(file: string): Promise<void> {

  try {

    await fsPromises.rm(file, { force: true });
  } catch(error) {

    LOG.warn("Unable to remove incomplete output %s: %s.", file, formatError(error));
  }
}
