/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for StreamFetch.
 */
import { LOG, formatError, isErrnoException } from "../utils/index.js";
import { OUTPUT_FORMATS, QUALITY_HINTS } from "../types/index.js";
import type { Config, Nullable } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * StreamFetch reads optional settings from config.json in the data directory. The final configuration is layered, lowest priority first:
 *
 * 1. Hard-coded defaults (DEFAULTS)
 * 2. The user config file
 * 3. Environment variables
 * 4. CLI flags
 *
 * Container deployments typically use environment variables; standalone installations can keep their settings in the config file.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, and environment variable. mergeConfiguration() uses it to find and parse overrides,
 * validateSettings() to check the merged values, and --list-env to document them.
 */

/**
 * Metadata describing a single configuration setting. Defaults live in DEFAULTS; use getNestedValue(DEFAULTS, setting.path) to read one.
 */
export interface SettingMetadata {

  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: Nullable<string>;

  // Bounds for numeric settings, inclusive.
  max?: number;
  min?: number;

  // Dot-separated path to the setting (e.g., "browser.poolSize").
  path: string;

  // "path" settings are nullable absolute paths. "string" settings may restrict their values through validValues.
  type: "host" | "integer" | "path" | "port" | "string";

  unit?: string;
  validValues?: readonly string[];
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  browser: [
    { description: "Maximum time to wait for a free browser session before rejecting a request.", envVar: "ACQUIRE_TIMEOUT", max: 600000, min: 100,
      path: "browser.acquireTimeout", type: "integer", unit: "ms" },
    { description: "Path to the Chrome executable. Leave empty to autodetect.", envVar: "CHROME_BIN", path: "browser.executablePath", type: "path" },
    { description: "Time allowed for the liveness probe and context reset when a session is returned to the pool.", envVar: "HEALTH_CHECK_TIMEOUT", max: 60000,
      min: 100, path: "browser.healthCheckTimeout", type: "integer", unit: "ms" },
    { description: "Number of browser sessions. Each session is a separate Chrome process.", envVar: "POOL_SIZE", max: 32, min: 1, path: "browser.poolSize",
      type: "integer" },
    { description: "User agent presented by browser sessions and media downloads.", envVar: "USER_AGENT", path: "browser.userAgent", type: "string" }
  ],

  cleanup: [
    { description: "Age after which finished artifacts are deleted.", envVar: "ARTIFACT_MAX_AGE", max: 2592000000, min: 60000, path: "cleanup.artifactMaxAge",
      type: "integer", unit: "ms" },
    { description: "Interval between sweeps of stale workspaces and expired artifacts.", envVar: "CLEANUP_INTERVAL", max: 86400000, min: 10000,
      path: "cleanup.interval", type: "integer", unit: "ms" }
  ],

  cookies: [
    { description: "Netscape-format cookie file used to authenticate browser sessions.", envVar: "COOKIES_PATH", path: "cookies.file", type: "path" }
  ],

  download: [
    { description: "Time without receiving data before a transfer is abandoned.", envVar: "REQUEST_TIMEOUT", max: 600000, min: 1000,
      path: "download.idleTimeout", type: "integer", unit: "ms" },
    { description: "Attempts for the download step when a transfer ends early.", envVar: "DOWNLOAD_MAX_ATTEMPTS", max: 10, min: 1, path: "download.maxAttempts",
      type: "integer" },
    { description: "Largest accepted media part.", envVar: "MAX_FILE_SIZE", max: 107374182400, min: 1048576, path: "download.maxFileSize", type: "integer",
      unit: "bytes" }
  ],

  extraction: [
    { description: "Delay before the first retry. Doubles with each further attempt.", envVar: "BACKOFF_BASE", max: 60000, min: 10, path: "extraction.backoffBase",
      type: "integer", unit: "ms" },
    { description: "Maximum random jitter added to each retry delay.", envVar: "BACKOFF_JITTER", max: 60000, min: 0, path: "extraction.backoffJitter",
      type: "integer", unit: "ms" },
    { description: "Output format used when a request does not name one.", envVar: "DEFAULT_FORMAT", path: "extraction.defaultFormat", type: "string",
      validValues: OUTPUT_FORMATS },
    { description: "Quality hint used when a request does not name one.", envVar: "DEFAULT_QUALITY", path: "extraction.defaultQuality", type: "string",
      validValues: QUALITY_HINTS },
    { description: "Attempts for locating a stream when none is found or navigation fails transiently.", envVar: "MAX_RETRIES", max: 10, min: 1,
      path: "extraction.maxAttempts", type: "integer" },
    { description: "Upper bound for the exponential part of the retry delay.", envVar: "MAX_BACKOFF_DELAY", max: 300000, min: 10,
      path: "extraction.maxBackoffDelay", type: "integer", unit: "ms" },
    { description: "Timeout for loading the target page.", envVar: "NAV_TIMEOUT", max: 600000, min: 1000, path: "extraction.navigationTimeout", type: "integer",
      unit: "ms" },
    { description: "Time spent watching network traffic for a media resource.", envVar: "OBSERVATION_WINDOW", max: 300000, min: 500,
      path: "extraction.observationWindow", type: "integer", unit: "ms" },
    { description: "Time completed results are reused for identical requests. Zero disables reuse.", envVar: "RESULT_CACHE_TTL", max: 86400000, min: 0,
      path: "extraction.resultCacheTtl", type: "integer", unit: "ms" },
    { description: "Extra observation time after a confident match, to catch higher quality variants.", envVar: "SETTLE_DELAY", max: 60000, min: 0,
      path: "extraction.settleDelay", type: "integer", unit: "ms" },
    { description: "Assumed lifetime of located media URLs.", envVar: "STREAM_TTL", max: 86400000, min: 10000, path: "extraction.streamTtl", type: "integer",
      unit: "ms" }
  ],

  logging: [
    { description: "HTTP request logging level. \"none\" disables it, \"errors\" logs only 4xx/5xx responses, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL", path: "logging.httpLogLevel", type: "string", validValues: [ "all", "errors", "none" ] },
    { description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent logs.", envVar: "LOG_MAX_SIZE",
      max: 104857600, min: 10240, path: "logging.maxSize", type: "integer", unit: "bytes" }
  ],

  paths: [
    { description: "Log file path.", envVar: "STREAMFETCH_LOG_FILE", path: "paths.logFile", type: "path" },
    { description: "Directory finished artifacts are served from.", envVar: "STREAMFETCH_OUTPUT_DIR", path: "paths.outputDir", type: "path" },
    { description: "Directory for per-extraction temporary files.", envVar: "STREAMFETCH_WORK_DIR", path: "paths.workDir", type: "path" }
  ],

  server: [
    { description: "HTTP server bind address.", envVar: "HOST", path: "server.host", type: "host" },
    { description: "HTTP server port.", envVar: "PORT", max: 65535, min: 1, path: "server.port", type: "port" },
    { description: "Artifact downloads allowed per client per minute. Zero disables the limit.", envVar: "RATE_LIMIT_DOWNLOAD", max: 100000, min: 0,
      path: "server.rateLimitDownload", type: "integer" },
    { description: "Extraction and format requests allowed per client per minute. Zero disables the limit.", envVar: "RATE_LIMIT_EXTRACT", max: 100000, min: 0,
      path: "server.rateLimitExtract", type: "integer" }
  ],

  transcode: [
    { description: "Path to the FFmpeg executable. Leave empty to use ffmpeg from the system PATH.", envVar: "FFMPEG_PATH", path: "transcode.ffmpegPath",
      type: "path" },
    { description: "Time budget for a single FFmpeg run.", envVar: "TRANSCODE_TIMEOUT", max: 86400000, min: 1000, path: "transcode.timeout", type: "integer",
      unit: "ms" }
  ]
};

/**
 * Hard-coded default configuration values.
 */
export const DEFAULTS: Config = {

  browser: {

    acquireTimeout: 30000,
    executablePath: null,
    healthCheckTimeout: 5000,
    poolSize: 2,
    userAgent: "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36"
  },

  cleanup: {

    artifactMaxAge: 86400000,
    interval: 3600000
  },

  cookies: {

    file: null
  },

  download: {

    idleTimeout: 30000,
    maxAttempts: 3,
    maxFileSize: 524288000
  },

  extraction: {

    backoffBase: 1000,
    backoffJitter: 500,
    defaultFormat: "mp4",
    defaultQuality: "720p",
    maxAttempts: 3,
    maxBackoffDelay: 8000,
    navigationTimeout: 30000,
    observationWindow: 15000,
    resultCacheTtl: 300000,
    settleDelay: 1500,
    streamTtl: 21600000
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null,
    outputDir: null,
    workDir: null
  },

  server: {

    host: "0.0.0.0",
    port: 8000,
    rateLimitDownload: 10,
    rateLimitExtract: 30
  },

  transcode: {

    ffmpegPath: null,
    timeout: 600000
  }
};

/*
 * CONFIG FILE OPERATIONS
 */

// Parsed contents of config.json. Only the paths named in CONFIG_METADATA are read from it.
export type UserConfig = Record<string, unknown>;

export interface UserConfigLoadResult {

  config: UserConfig;

  // True if the config file exists but is not a JSON object.
  parseError: boolean;

  parseErrorMessage?: string;
}

/**
 * Loads user configuration from the config file. A missing file yields an empty configuration; an unreadable or malformed one is logged and ignored.
 * @param configFilePath - Absolute path to config.json.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(configFilePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    if(!isErrnoException(error, "ENOENT")) {

      LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));
    }

    return { config: {}, parseError: false };
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, formatError(error));

    return { config: {}, parseError: true, parseErrorMessage: formatError(error) };
  }

  if((typeof parsed !== "object") || (parsed === null) || Array.isArray(parsed)) {

    LOG.warn("Configuration file %s does not contain a JSON object. Using defaults.", configFilePath);

    return { config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." };
  }

  return { config: Object.fromEntries(Object.entries(parsed)), parseError: false };
}

/*
 * CONFIGURATION MERGING
 */

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if it does not parse. Integers that fail to parse are left for validation to report.
 */
function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<number | string> | undefined {

  switch(type) {

    case "integer":
    case "port": {

      return (value.trim().length === 0) ? undefined : Number(value);
    }

    case "path": {

      // An empty value clears a path override.
      return (value.length === 0) ? null : value;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "browser.poolSize").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if((typeof current !== "object") || (current === null) || !Object.hasOwn(current, part)) {

      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "browser.poolSize").
 * @param value - The value to set.
 */
export function setNestedValue(obj: object, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  const leaf = parts.pop();
  let current: object = obj;

  for(const part of parts) {

    let next: unknown = Reflect.get(current, part);

    if((typeof next !== "object") || (next === null)) {

      next = {};
      Reflect.set(current, part, next);
    }

    if((typeof next === "object") && (next !== null)) {

      current = next;
    }
  }

  if(leaf !== undefined) {

    Reflect.set(current, leaf, value);
  }
}

/**
 * Merges defaults, the user config file, environment variables, and CLI overrides, in increasing priority. The result has not been validated yet.
 * @param userConfig - User configuration from the config file.
 * @param cliOverrides - Setting path to value, from command-line flags.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, cliOverrides: ReadonlyMap<string, unknown> = new Map()): Config {

  const config = structuredClone(DEFAULTS);

  for(const setting of Object.values(CONFIG_METADATA).flat()) {

    const userValue = getNestedValue(userConfig, setting.path);

    if(userValue !== undefined) {

      setNestedValue(config, setting.path, userValue);
    }

    const envValue = setting.envVar ? process.env[setting.envVar] : undefined;

    if(envValue !== undefined) {

      const parsedValue = parseEnvValue(envValue, setting.type);

      if(parsedValue !== undefined) {

        setNestedValue(config, setting.path, parsedValue);
      }
    }

    if(cliOverrides.has(setting.path)) {

      setNestedValue(config, setting.path, cliOverrides.get(setting.path));
    }
  }

  return config;
}

/**
 * Checks one merged value against its metadata.
 * @param setting - The setting's metadata.
 * @param value - The merged value.
 * @returns An error message, or null if the value is valid.
 */
export function validateSetting(setting: SettingMetadata, value: unknown): Nullable<string> {

  const name = setting.envVar ?? setting.path;

  switch(setting.type) {

    case "integer":
    case "port": {

      if((typeof value !== "number") || !Number.isInteger(value)) {

        return [ name, " must be an integer, got: ", String(value) ].join("");
      }

      if((setting.min !== undefined) && (value < setting.min)) {

        return [ name, " must be at least ", String(setting.min), ", got: ", String(value) ].join("");
      }

      if((setting.max !== undefined) && (value > setting.max)) {

        return [ name, " must be at most ", String(setting.max), ", got: ", String(value) ].join("");
      }

      return null;
    }

    case "path": {

      if((value === null) || ((typeof value === "string") && path.isAbsolute(value))) {

        return null;
      }

      return [ name, " must be an absolute path, got: ", String(value) ].join("");
    }

    default: {

      if((typeof value !== "string") || (value.trim().length === 0)) {

        return [ name, " must be a non-empty string, got: ", String(value) ].join("");
      }

      if(setting.validValues && !setting.validValues.includes(value)) {

        return [ name, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join("");
      }

      return null;
    }
  }
}

/**
 * Validates every setting described in CONFIG_METADATA.
 * @param config - The merged configuration.
 * @returns The error messages, empty when every value is valid.
 */
export function validateSettings(config: Config): string[] {

  const errors: string[] = [];

  for(const setting of Object.values(CONFIG_METADATA).flat()) {

    const error = validateSetting(setting, getNestedValue(config, setting.path));

    if(error) {

      errors.push(error);
    }
  }

  return errors;
}
