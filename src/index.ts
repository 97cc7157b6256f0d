#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for StreamFetch.
 */
import { LOG, flushLogBufferSync, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { initializeDataDir } from "./config/paths.js";
import path from "node:path";
import { startServer } from "./app.js";

/* Extraction failures are reported per request. An error that escapes every handler is logged rather than allowed to take down the server and every other
 * extraction in flight with it.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: streamfetch [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: 8000)");
  console.log("  -v, --version                   Show version number");
  console.log("  --cookies <path>                Set the Netscape cookie file (default: <data-dir>/cookies.txt)");
  console.log("  --data-dir <path>               Set data directory (default: ~/.streamfetch)");
  console.log("  --list-env                      List all environment variables");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  CHROME_BIN                      Path to Chrome executable");
  console.log("  FFMPEG_PATH                     Path to FFmpeg executable");
  console.log("  HOST                            HTTP server bind address");
  console.log("  POOL_SIZE                       Number of browser sessions");
  console.log("  PORT                            HTTP server port");
  console.log("  STREAMFETCH_DATA_DIR            Data directory path (default: ~/.streamfetch)");
  console.log("  STREAMFETCH_DEBUG               Debug category filter (e.g., 'extraction:locator', 'extraction:*', '*,-browser:pool')");
  console.log("");
  console.log("  Run 'streamfetch --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints every environment variable with its description and default, generated from CONFIG_METADATA.
 */
async function printEnvironmentVariables(): Promise<void> {

  const { CONFIG_METADATA, DEFAULTS, getNestedValue } = await import("./config/userConfig.js");
  const { DEBUG_CATEGORIES } = await import("./utils/debugFilter.js");

  /* eslint-disable no-console */

  // Server first, then the pipeline in the order a request flows through it.
  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Browser", key: "browser" },
    { displayName: "Cookies", key: "cookies" },
    { displayName: "Extraction", key: "extraction" },
    { displayName: "Download", key: "download" },
    { displayName: "Transcode", key: "transcode" },
    { displayName: "Cleanup", key: "cleanup" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" }
  ];

  // Null path settings resolve at runtime.
  const dynamicDefaults: Record<string, string> = {

    "browser.executablePath": "autodetect",
    "cookies.file": "<data-dir>/cookies.txt",
    "paths.logFile": "<data-dir>/streamfetch.log",
    "paths.outputDir": "<data-dir>/output",
    "paths.workDir": "<data-dir>/work",
    "transcode.ffmpegPath": "ffmpeg from PATH"
  };

  console.log("StreamFetch Environment Variables");
  console.log("");
  console.log("All settings can also be configured in config.json inside the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key] ?? [];

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      const envVar = setting.envVar;

      if(!envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + envVar);
      console.log("    " + setting.description);

      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // These are read before config.json is loaded, so they cannot live in it.
  console.log("");
  console.log("Special:");
  console.log("  STREAMFETCH_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.streamfetch");
  console.log("");
  console.log("  STREAMFETCH_DEBUG");
  console.log("    Debug category filter (e.g., 'extraction:locator', 'extraction:*', '*,-browser:pool').");
  console.log("    Default: (disabled)");
  console.log("");
  console.log("Debug categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(24) + entry.description);
  }

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  cookiesFile?: string;
  dataDir?: string;
  debugLogging: boolean;
  port?: number;
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments. Values are returned rather than written to CONFIG so that the merge applies them at the right priority.
 * @param args - Arguments after the script name.
 * @returns Parsed argument flags and values.
 */
function parseArgs(args: string[]): ParsedArgs {

  let consoleLogging = false;
  let cookiesFile: string | undefined;
  let dataDir: string | undefined;
  let debugLogging = false;
  let port: number | undefined;

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    if((arg === "-c") || (arg === "--console")) {

      consoleLogging = true;
    }

    if((arg === "-d") || (arg === "--debug")) {

      debugLogging = true;
    }

    if((arg === "-h") || (arg === "--help")) {

      printUsage();

      process.exit(0);
    }

    if((arg === "-p") || (arg === "--port")) {

      const parsed = parseInt(args[++i] ?? "");

      if(!isNaN(parsed)) {

        port = parsed;
      }
    }

    if(arg === "--data-dir") {

      dataDir = requireAbsolutePath("--data-dir", args[++i]);
    }

    if(arg === "--cookies") {

      cookiesFile = requireAbsolutePath("--cookies", args[++i]);
    }

    if((arg === "-v") || (arg === "--version")) {

      // eslint-disable-next-line no-console
      console.log("StreamFetch v" + getPackageVersion());

      process.exit(0);
    }
  }

  return { consoleLogging, cookiesFile, dataDir, debugLogging, port };
}

const rawArgs = process.argv.slice(2);

if(rawArgs.includes("--list-env")) {

  printEnvironmentVariables().then(() => {

    process.exit(0);
  }).catch((error: unknown) => {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error));

    process.exit(1);
  });
} else {

  const parsedArgs = parseArgs(rawArgs);

  try {

    initializeDataDir(parsedArgs.dataDir);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error));

    process.exit(1);
  }

  // STREAMFETCH_DEBUG takes precedence over --debug, allowing fine-grained category selection.
  const debugEnv = process.env.STREAMFETCH_DEBUG;

  if(debugEnv) {

    initDebugFilter(debugEnv);
  } else if(parsedArgs.debugLogging) {

    setDebugLogging(true);
  }

  const cliOverrides = new Map<string, unknown>();

  if(parsedArgs.port !== undefined) {

    cliOverrides.set("server.port", parsedArgs.port);
  }

  if(parsedArgs.cookiesFile) {

    cliOverrides.set("cookies.file", parsedArgs.cookiesFile);
  }

  // Fatal startup errors exit through process.exit(), which skips graceful shutdown. Buffered log lines still need to reach disk.
  process.on("exit", (): void => {

    flushLogBufferSync();
  });

  startServer({ cliOverrides, useConsoleLogging: parsedArgs.consoleLogging }).catch((error: unknown): void => {

    LOG.error("Fatal startup error occurred: %s.", formatError(error));

    process.exit(1);
  });
}
