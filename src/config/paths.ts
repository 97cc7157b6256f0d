/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for StreamFetch.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for the filesystem locations StreamFetch uses. The data directory is resolved once at startup, before config.json is
 * loaded, because it determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (STREAMFETCH_DATA_DIR)
 *   3. Default (~/.streamfetch)
 *
 * The cookie file, log file, work directory, and output directory are configurable (config.json, environment, CLI) and default to locations inside the data
 * directory.
 */

let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called again with a CLI flag to override the initial resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag, already validated as absolute.
 * @throws If STREAMFETCH_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.STREAMFETCH_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("STREAMFETCH_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".streamfetch");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the cookie file path: cookies.file when set, otherwise cookies.txt in the data directory.
 * @param config - The application configuration.
 * @returns The absolute path to the cookie file.
 */
export function getCookiesFilePath(config: Config): string {

  return config.cookies.file ?? path.join(getDataDir(), "cookies.txt");
}

export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "streamfetch.log");
}

/**
 * Returns the directory that holds per-extraction workspaces.
 * @param config - The application configuration.
 * @returns The absolute path to the work directory.
 */
export function getWorkDir(config: Config): string {

  return config.paths.workDir ?? path.join(getDataDir(), "work");
}

/**
 * Returns the directory finished artifacts are kept in until they expire.
 * @param config - The application configuration.
 * @returns The absolute path to the output directory.
 */
export function getOutputDir(config: Config): string {

  return config.paths.outputDir ?? path.join(getDataDir(), "output");
}
