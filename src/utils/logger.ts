/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for chanledger.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "util";
import { getRunId } from "./runContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow and errors in red. The reset code restores the default color after each colored
 * message.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* The logger can operate in two modes: console mode (output to stdout/stderr with colors) or file mode (output to the configured log file). The server uses file
 * mode unless --console is given. One-shot commands (assign, list, check) always log to the console.
 */

// Flag indicating whether to use console logging instead of file logging.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables debug logging. When called with true, initializes the debug filter with wildcard (*) to enable all categories.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Returns whether any debug logging is currently enabled.
 * @returns True if any debug categories are enabled, false otherwise.
 */
export function isDebugLogging(): boolean {

  return isAnyDebugEnabled();
}

type LogLevel = "debug" | "error" | "info" | "warn";

/**
 * Core logging implementation shared by all log levels. Handles run ID prefixing and output routing.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Optional debug category tag.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], categoryTag?: string): void {

  const runId = getRunId();
  const formatted = args.length > 0 ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, runId ? [ "[", runId, "] ", formatted ].join("") : formatted, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  let consoleMethod;

  switch(level) {

    case "error": {

      consoleMethod = console.error;

      break;
    }

    case "warn": {

      consoleMethod = console.warn;

      break;
    }

    default: {

      consoleMethod = console.log;

      break;
    }
  }
  /* eslint-enable no-console */

  if(runId && color) {

    consoleMethod("%s[%s] %s%s", color, runId, formatted, ANSI_COLORS.reset);
  } else if(runId) {

    consoleMethod("[%s] %s", runId, formatted);
  } else if(color) {

    consoleMethod("%s%s%s", color, formatted, ANSI_COLORS.reset);
  } else {

    consoleMethod(formatted);
  }
}

/* The LOG object provides a centralized logging interface with printf-style format strings (%s, %d, %j, %o via util.format). Inside a run context, every line is
 * prefixed with the run ID.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Output only appears when the category is enabled via CHANLEDGER_DEBUG or --debug.
   * @param category - The debug category (e.g., "store", "allocator", "http").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red. Used for failures that abort a run or prevent startup.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Used for problems that do not stop the run, such as skipped discovery entries.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};
