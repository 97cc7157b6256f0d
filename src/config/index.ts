/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for StreamFetch.
 */
import { DEFAULTS, loadUserConfig, mergeConfiguration, validateSettings } from "./userConfig.js";
import { LOG, formatBytes, formatDuration } from "../utils/index.js";
import type { Config } from "../types/index.js";
import { getConfigFilePath } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Priority, highest to lowest:
 *
 * 1. CLI flags
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP server
 * - browser: Chrome executable and session pool sizing and timeouts
 * - cookies: Location of the persisted cookie file
 * - extraction: Locator timing, retry backoff, defaults, and result reuse
 * - download: Transfer idle timeout, retry count, and size cap
 * - transcode: FFmpeg location and time budget
 * - logging: HTTP access logging and log file size
 * - paths: Log file, work directory, and output directory
 * - cleanup: Sweeper interval and artifact retention
 *
 * Lower-level modules take their settings as options; only the application wiring reads CONFIG.
 */

// Starts as a copy of DEFAULTS and is replaced by the merged configuration in initializeConfiguration().
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Loads config.json, merges it with defaults, environment variables, and CLI overrides, and installs the result as CONFIG. Call validateConfiguration() next.
 * @param cliOverrides - Setting path to value, from command-line flags.
 */
export async function initializeConfiguration(cliOverrides: ReadonlyMap<string, unknown> = new Map()): Promise<void> {

  const result = await loadUserConfig(getConfigFilePath());

  CONFIG = mergeConfiguration(result.config, cliOverrides);

  LOG.debug("config", "Configuration merged with %s CLI override(s).", cliOverrides.size);
}

/**
 * Returns a deep copy of the default configuration.
 * @returns A copy of the default configuration.
 */
export function getDefaults(): Config {

  return structuredClone(DEFAULTS);
}

/*
 * CONFIGURATION VALIDATION
 *
 * Every setting is checked against its metadata, then a few relationships between settings are checked. All errors are collected before failing so the operator
 * can fix everything in one pass.
 */

/**
 * Validates a configuration and throws if anything is invalid.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors = validateSettings(config);

  // Relationships only make sense once the individual values are valid.
  if(errors.length === 0) {

    if(config.extraction.settleDelay >= config.extraction.observationWindow) {

      errors.push([ "SETTLE_DELAY (", String(config.extraction.settleDelay), ") must be smaller than OBSERVATION_WINDOW (",
        String(config.extraction.observationWindow), ")." ].join(""));
    }

    if(config.extraction.maxBackoffDelay < config.extraction.backoffBase) {

      errors.push([ "MAX_BACKOFF_DELAY (", String(config.extraction.maxBackoffDelay), ") must be at least BACKOFF_BASE (",
        String(config.extraction.backoffBase), ")." ].join(""));
    }

    if(config.paths.workDir && config.paths.outputDir && (config.paths.workDir === config.paths.outputDir)) {

      errors.push("STREAMFETCH_WORK_DIR and STREAMFETCH_OUTPUT_DIR must be different directories.");
    }
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the most commonly adjusted settings at startup.
 */
export function displayConfiguration(): void {

  LOG.info("Starting StreamFetch with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Rate limits per client: %s extraction(s) and %s download(s) per minute", CONFIG.server.rateLimitExtract || "no limit on",
    CONFIG.server.rateLimitDownload || "no limit on");
  LOG.info("  Browser pool size: %s (acquire timeout %s)", CONFIG.browser.poolSize, formatDuration(CONFIG.browser.acquireTimeout));
  LOG.info("  Chrome executable: %s", CONFIG.browser.executablePath ?? "autodetect");
  LOG.info("  Defaults: %s at %s", CONFIG.extraction.defaultFormat, CONFIG.extraction.defaultQuality);
  LOG.info("  Locate attempts: %s, download attempts: %s", CONFIG.extraction.maxAttempts, CONFIG.download.maxAttempts);
  LOG.info("  Max file size: %s", formatBytes(CONFIG.download.maxFileSize));
  LOG.info("  FFmpeg: %s (timeout %s)", CONFIG.transcode.ffmpegPath ?? "from PATH", formatDuration(CONFIG.transcode.timeout));
}
