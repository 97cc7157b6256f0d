/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management.
 */
import type { EventEmitter } from "node:events";
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import type { Readable } from "node:stream";
import { abortReason } from "./delay.js";
import { spawn } from "node:child_process";

/*
 * FFMPEG PATH RESOLUTION
 *
 * FFmpeg is found in one of two places, in order of preference:
 * 1. The path configured under transcode.ffmpegPath (or FFMPEG_PATH).
 * 2. The system PATH.
 *
 * A path is only accepted once "ffmpeg -version" runs and exits cleanly. The result is cached per configured path.
 */

const resolvedPaths = new Map<string, Nullable<string>>();

/**
 * Checks if FFmpeg exists at a specific path by attempting to run it.
 * @param pathToCheck - Full path to the FFmpeg executable, or a bare command name to look up on PATH.
 * @returns Promise resolving to true if FFmpeg runs successfully at this path.
 */
export async function checkFFmpegAtPath(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(pathToCheck, ["-version"], {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the FFmpeg executable: the configured path when it works, otherwise "ffmpeg" from PATH.
 * @param configuredPath - The configured FFmpeg path, or null.
 * @returns The usable FFmpeg command, or null if FFmpeg is not available.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string>): Promise<Nullable<string>> {

  const cacheKey = configuredPath ?? "";
  const cached = resolvedPaths.get(cacheKey);

  if(cached !== undefined) {

    return cached;
  }

  let resolved: Nullable<string> = null;

  if(configuredPath && (await checkFFmpegAtPath(configuredPath))) {

    resolved = configuredPath;
  } else {

    if(configuredPath) {

      LOG.warn("FFmpeg was not found at the configured path %s. Falling back to the system PATH.", configuredPath);
    }

    if(await checkFFmpegAtPath("ffmpeg")) {

      resolved = "ffmpeg";
    }
  }

  resolvedPaths.set(cacheKey, resolved);

  return resolved;
}

/**
 * Checks if FFmpeg is available, resolving and caching its path.
 * @param configuredPath - The configured FFmpeg path, or null.
 * @returns True if FFmpeg is available.
 */
export async function isFFmpegAvailable(configuredPath: Nullable<string>): Promise<boolean> {

  return (await resolveFFmpegPath(configuredPath)) !== null;
}

/*
 * FFMPEG EXECUTION
 *
 * runFFmpeg() runs one FFmpeg invocation to completion. Only stderr is piped: FFmpeg reads and writes files named in its arguments, and stderr carries its
 * diagnostics. We keep the most recent STDERR_TAIL_BYTES of stderr for error reports and duration parsing. A timeout or an abort sends SIGTERM, and SIGKILL follows
 * if the process is still alive after KILL_GRACE_MS. The process spawner is injectable so the lifecycle can be exercised without a real FFmpeg binary.
 */

const STDERR_TAIL_BYTES = 65536;
const KILL_GRACE_MS = 5000;

/**
 * The parts of a child process runFFmpeg() relies on. A ChildProcess satisfies it.
 */
export interface FFmpegChild extends EventEmitter {

  kill(signal?: NodeJS.Signals): boolean;
  stderr: Nullable<Readable>;
}

export type FFmpegSpawner = (command: string, args: string[]) => FFmpegChild;

export interface RunFFmpegOptions {

  ffmpegPath: string;

  // Aborting terminates the process. The returned promise rejects with the signal's reason.
  signal?: AbortSignal;

  spawner?: FFmpegSpawner;

  // Wall-clock limit for the whole run, in milliseconds.
  timeoutMs: number;
}

export interface FFmpegRunResult {

  exitCode: Nullable<number>;
  signal: Nullable<string>;

  // Tail of stderr.
  stderr: string;

  timedOut: boolean;
}

const defaultSpawner: FFmpegSpawner = (command, args) => spawn(command, args, { stdio: [ "ignore", "ignore", "pipe" ] });

/**
 * Runs FFmpeg to completion.
 * @param args - FFmpeg arguments.
 * @param options - Executable, timeout, abort signal, and spawner.
 * @returns The exit status and stderr tail. A non-zero exit resolves; interpreting it is up to the caller.
 * @throws The spawn error when the process cannot be started, or the abort reason when the signal aborts.
 */
export async function runFFmpeg(args: string[], options: RunFFmpegOptions): Promise<FFmpegRunResult> {

  const { ffmpegPath, signal, spawner = defaultSpawner, timeoutMs } = options;

  if(signal?.aborted) {

    throw abortReason(signal);
  }

  // Request headers for network inputs can carry cookies.
  LOG.debug("extraction:transcode", "Running %s %s.", ffmpegPath, args.map((arg, index) => (args[index - 1] === "-headers") ? "[headers]" : arg).join(" "));

  return new Promise<FFmpegRunResult>((resolve, reject) => {

    const child = spawner(ffmpegPath, args);

    let stderrTail = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const terminate = (): void => {

      child.kill("SIGTERM");

      killTimer ??= setTimeout(() => {

        LOG.debug("extraction:transcode", "FFmpeg ignored SIGTERM, sending SIGKILL.");
        child.kill("SIGKILL");
      }, KILL_GRACE_MS);
    };

    const timeoutTimer = setTimeout(() => {

      timedOut = true;
      terminate();
    }, timeoutMs);

    const onAbort = (): void => {

      aborted = true;
      terminate();
    };

    const cleanup = (): void => {

      settled = true;
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);
      signal?.removeEventListener("abort", onAbort);
    };

    signal?.addEventListener("abort", onAbort, { once: true });

    child.stderr?.on("data", (data: Buffer) => {

      stderrTail += data.toString();

      if(stderrTail.length > STDERR_TAIL_BYTES) {

        stderrTail = stderrTail.slice(-STDERR_TAIL_BYTES);
      }
    });

    child.on("error", (error: Error) => {

      if(settled) {

        return;
      }

      cleanup();
      reject(error);
    });

    child.on("close", (code: Nullable<number>, exitSignal: Nullable<string>) => {

      if(settled) {

        return;
      }

      cleanup();

      if(aborted && signal) {

        reject(abortReason(signal));

        return;
      }

      resolve({ exitCode: code, signal: exitSignal, stderr: stderrTail, timedOut });
    });
  });
}

/**
 * Parses the input duration FFmpeg reports on stderr ("Duration: 00:03:25.48").
 * @param stderr - FFmpeg stderr output.
 * @returns The duration in seconds, or null when none is reported.
 */
export function parseFFmpegDuration(stderr: string): Nullable<number> {

  const match = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(stderr);

  if(!match) {

    return null;
  }

  return (Number(match[1]) * 3600) + (Number(match[2]) * 60) + Number(match[3]);
}
