/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan output adapter for StreamFetch.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/**
 * Creates the Morgan stream option that sends HTTP access lines wherever application logs go. Console lines get the same timestamp prefix console-stamp adds to
 * application output; file lines are timestamped by the file logger.
 * @returns StreamOptions for Morgan.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      const line = message.trim();

      if(!isConsoleLogging()) {

        writeLogEntry("info", line);

        return;
      }

      // eslint-disable-next-line no-console
      console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", line ].join(""));
    }
  };
}
