/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for StreamFetch.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "node:util";
import { getExtractionId } from "./extractionContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Warnings appear in yellow, errors in red, and debug output in cyan. The reset code restores the default color after each colored message.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

export type LogLevel = "debug" | "error" | "info" | "warn";

/* The logger writes either to the console (stdout/stderr, with console-stamp adding timestamps) or to the log file. File mode is the default; --console switches to
 * console mode for containers and interactive use. Until the file logger is initialized, file mode output is discarded, which keeps library use and tests quiet.
 */

let useConsoleLogging = false;

/**
 * Sets the logging mode.
 * @param enabled - True to log to the console, false to log to the file.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables all debug categories. Equivalent to STREAMFETCH_DEBUG=* when enabled.
 * @param enabled - True to enable all debug logging.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all levels. Prefixes the extraction id (explicit, or from the async context) and routes the line to its destination.
 * @param level - The log level.
 * @param color - ANSI color code for the line, or an empty string.
 * @param message - The format string.
 * @param args - Format arguments.
 * @param explicitId - Extraction id to use instead of the async context's.
 * @param categoryTag - Debug category, for debug lines.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], explicitId?: string, categoryTag?: string): void {

  const extractionId = explicitId ?? getExtractionId();
  const formatted = (args.length > 0) ? format(message, ...args) : message;
  const line = extractionId ? [ "[", extractionId, "] ", formatted ].join("") : formatted;

  if(!useConsoleLogging) {

    writeLogEntry(level, line, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, line, ANSI_COLORS.reset);
  } else {

    consoleMethod(line);
  }
}

/**
 * Logger bound to a fixed extraction id, returned by LOG.withExtractionId().
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

/* The LOG object takes printf-style format strings (%s, %d, %j, %o) via util.format(). Inside an extraction context every line is prefixed with the extraction id.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan. Only produced when the category is enabled via STREAMFETCH_DEBUG or --debug.
   * @param category - The debug category (e.g., "browser:pool", "extraction:locator").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Use for failures that end an extraction or stop the server from working.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning in yellow. Use for recovered problems: a retried attempt, an unhealthy session that was replaced, an unreadable cookie file.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a logger with a fixed extraction id, for code that reports on an extraction from outside its async context (shutdown, the in-flight table).
   * @param extractionId - The extraction id to prefix.
   * @returns A bound logger.
   */
  withExtractionId: function(extractionId: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, extractionId, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, extractionId); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, extractionId); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, extractionId); }
    };
  }
};
