/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with size-based trimming for the chanledger server.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* When the server runs without --console, log lines are buffered in memory and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY writes the real
 * file size is checked, and a file above the configured maximum is cut down to its most recent half, on a line boundary, by writing the kept tail to a temp file
 * and renaming it over the log. Timestamps use the console-stamp format (yyyy/mm/dd HH:MM:ss.l) so file and console output read the same.
 */

// Path to the log file, set during initialization.
let logFilePath: Nullable<string> = null;

// Buffered entries awaiting the next flush.
let writeBuffer: string[] = [];

// File size tracked in memory between real size checks.
let approximateSize = 0;

// Writes since the last size check.
let writeCount = 0;

let flushTimer: Nullable<ReturnType<typeof setInterval>> = null;
let isInitialized = false;

// Set after a failed append so that a broken disk does not produce an error per log line. Cleared after ERROR_RETRY_DELAY_MS.
let disabledAt: Nullable<number> = null;

let maxLogSize = 1048576;

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;
const ERROR_RETRY_DELAY_MS = 60000;

const ANSI_RESET = "\x1b[0m";

/**
 * Initializes the file logger, creating the log file and its directory if needed. File logging is best-effort: a failure here is reported on the console and file
 * logging stays off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  logFilePath = logPath;
  maxLogSize = maxSize;

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    // Opening in append mode creates the file when it is missing and leaves existing content alone.
    const handle = await fsPromises.open(logPath, "a");

    try {

      approximateSize = (await handle.stat()).size;
    } finally {

      await handle.close();
    }

    flushTimer = setInterval((): void => {

      void flushLogBuffer();
    }, FLUSH_INTERVAL_MS);

    // The flush timer must not keep a finished process alive.
    flushTimer.unref();

    isInitialized = true;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Formats a log line and adds it to the write buffer.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code applied to the level prefix and message.
 * @param categoryTag - Optional debug category, shown as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!isInitialized || !logFilePath) {

    return;
  }

  if(disabledAt !== null) {

    if((Date.now() - disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    disabledAt = null;
  }

  const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");
  const entry = [ "[", timestamp, "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");

  writeBuffer.push(entry);
  approximateSize += entry.length;
  writeCount++;

  if((writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void checkAndTrimFile();
  }
}

/**
 * Appends the buffered entries to the log file.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!isInitialized || !logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    await fsPromises.appendFile(logFilePath, content, "utf-8");
  } catch(error) {

    disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.",
      (error instanceof Error) ? error.message : String(error), ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Appends the buffered entries synchronously. Used on process exit, where asynchronous work never completes.
 */
export function flushLogBufferSync(): void {

  if(!isInitialized || !logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Checks the real file size and trims the file when it exceeds the maximum. Trimming is skipped while debug logging is on, since a debug session is exactly the
 * output being collected.
 */
async function checkAndTrimFile(): Promise<void> {

  if(!logFilePath) {

    return;
  }

  try {

    approximateSize = (await fsPromises.stat(logFilePath)).size;

    if((approximateSize > maxLogSize) && !isAnyDebugEnabled()) {

      await trimLogFile(logFilePath);
    }
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error checking log file size: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Keeps the most recent half of the maximum size, starting at a line boundary, and replaces the log file with it.
 * @param filePath - The log file.
 */
async function trimLogFile(filePath: string): Promise<void> {

  const content = await fsPromises.readFile(filePath, "utf-8");
  const cutPosition = content.length - Math.floor(maxLogSize / 2);

  if(cutPosition <= 0) {

    return;
  }

  const newline = content.indexOf("\n", cutPosition);
  const trimmedContent = content.substring((newline === -1) ? cutPosition : (newline + 1));
  const tempPath = filePath + ".tmp";

  await fsPromises.writeFile(tempPath, trimmedContent, "utf-8");
  await fsPromises.rename(tempPath, filePath);

  approximateSize = trimmedContent.length;
}

/**
 * Stops the flush timer and writes out anything still buffered.
 */
export function shutdownFileLogger(): void {

  if(!isInitialized) {

    return;
  }

  if(flushTimer) {

    clearInterval(flushTimer);
    flushTimer = null;
  }

  flushLogBufferSync();

  isInitialized = false;
}
