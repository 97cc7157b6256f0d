/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Buffered file logging with size-based trimming for StreamFetch.
 */
import { formatError, isErrnoException } from "./errors.js";
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log lines are buffered in memory and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY writes the real file size is checked, and a file over
 * the configured maximum is cut down to the most recent half, on a line boundary, through a temp file and a rename. Timestamps use the console-stamp format so
 * console and file output look the same.
 */

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;

// After a failed write, file logging pauses this long before trying again.
const ERROR_RETRY_DELAY_MS = 60000;

const ANSI_RESET = "\x1b[0m";
const TIMESTAMP_FORMAT = "yyyy/mm/dd HH:MM:ss.l";

interface FileLoggerState {

  approximateSize: number;
  disabledAt: number;
  flushTimer: Nullable<ReturnType<typeof setInterval>>;
  logFilePath: Nullable<string>;
  maxLogSize: number;
  writeBuffer: string[];
  writeCount: number;
}

const state: FileLoggerState = {

  approximateSize: 0,
  disabledAt: 0,
  flushTimer: null,
  logFilePath: null,
  maxLogSize: 1048576,
  writeBuffer: [],
  writeCount: 0
};

/**
 * Initializes the file logger, creating the log file and its directory when missing. A failure is reported on the console and leaves file logging off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  state.maxLogSize = maxSize;

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    try {

      state.approximateSize = (await fsPromises.stat(logPath)).size;
    } catch(error) {

      if(!isErrnoException(error, "ENOENT")) {

        throw error;
      }

      await fsPromises.writeFile(logPath, "", "utf-8");
      state.approximateSize = 0;
    }

    state.logFilePath = logPath;

    state.flushTimer = setInterval((): void => {

      void flushLogBuffer();
    }, FLUSH_INTERVAL_MS);

    state.flushTimer.unref();
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", formatError(error));
  }
}

/**
 * Queues a log line for the next flush.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code for the line.
 * @param categoryTag - Debug category, rendered as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state.logFilePath) {

    return;
  }

  if(state.disabledAt > 0) {

    if((Date.now() - state.disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    state.disabledAt = 0;
  }

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");
  const entry = [ "[", df(new Date(), TIMESTAMP_FORMAT), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");

  state.writeBuffer.push(entry);
  state.approximateSize += entry.length;
  state.writeCount++;

  if((state.writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void checkAndTrimFile();
  }
}

/**
 * Appends the buffered lines to the log file.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state.logFilePath || (state.writeBuffer.length === 0)) {

    return;
  }

  const content = state.writeBuffer.join("");

  state.writeBuffer = [];

  try {

    await fsPromises.appendFile(state.logFilePath, content, "utf-8");
  } catch(error) {

    state.disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.", formatError(error), ERROR_RETRY_DELAY_MS / 1000);
  }
}

// Used at shutdown, when there is no event loop turn left for an async append.
export function flushLogBufferSync(): void {

  if(!state.logFilePath || (state.writeBuffer.length === 0)) {

    return;
  }

  const content = state.writeBuffer.join("");

  state.writeBuffer = [];

  try {

    fs.appendFileSync(state.logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", formatError(error));
  }
}

async function checkAndTrimFile(): Promise<void> {

  if(!state.logFilePath) {

    return;
  }

  try {

    state.approximateSize = (await fsPromises.stat(state.logFilePath)).size;

    // Debug sessions keep their full output.
    if((state.approximateSize > state.maxLogSize) && !isAnyDebugEnabled()) {

      await trimLogFile(state.logFilePath);
    }
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      state.approximateSize = 0;
    }

    // eslint-disable-next-line no-console
    console.warn("Error checking log file size: %s.", formatError(error));
  }
}

/**
 * Keeps the most recent half of the maximum size, starting at a line boundary.
 * @param logPath - The log file.
 */
async function trimLogFile(logPath: string): Promise<void> {

  try {

    const content = await fsPromises.readFile(logPath, "utf-8");
    const cutPosition = content.length - Math.floor(state.maxLogSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    const newline = content.indexOf("\n", cutPosition);
    const trimmedContent = content.substring((newline === -1) ? cutPosition : (newline + 1));
    const tempPath = logPath + ".tmp";

    await fsPromises.writeFile(tempPath, trimmedContent, "utf-8");
    await fsPromises.rename(tempPath, logPath);

    state.approximateSize = trimmedContent.length;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", formatError(error));
  }
}

/**
 * Stops the flush timer and writes out whatever is still buffered.
 */
export function shutdownFileLogger(): void {

  if(state.flushTimer) {

    clearInterval(state.flushTimer);
    state.flushTimer = null;
  }

  flushLogBufferSync();
  state.logFilePath = null;
}
