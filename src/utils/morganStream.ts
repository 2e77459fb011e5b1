/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for the chanledger server.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes request lines to a stream. This adapter sends them wherever application logs go: stdout with a console-stamp style timestamp in console mode, or
 * the file logger (which adds its own timestamp) otherwise.
 */

/**
 * Creates a Morgan stream that follows the current logging mode.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan appends a newline; both outputs add their own.
      const trimmedMessage = message.trim();

      if(isConsoleLogging()) {

        // eslint-disable-next-line no-console
        console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", trimmedMessage ].join(""));
      } else {

        writeLogEntry("info", trimmedMessage);
      }
    }
  };
}
