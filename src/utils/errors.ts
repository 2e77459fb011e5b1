/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types and formatting utilities for chanledger.
 */

/* Every failure to read, validate or write the channel map surfaces as a MappingStoreError. The subclasses let callers tell a malformed file from a map that
 * violates the one-number-per-path rule, but all of them are fatal to an assignment run: nothing is allocated on top of a store that could not be read.
 */

/**
 * Base class for channel map failures.
 */
export class MappingStoreError extends Error {

  /**
   * @param message - The diagnostic.
   * @param options - Optional underlying cause.
   */
  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "MappingStoreError";
  }
}

/**
 * The channel map file exists but is not a JSON object of positive integer channel numbers.
 */
export class CorruptStateError extends MappingStoreError {

  // The stream path whose value is invalid, when a single entry is at fault.
  readonly key?: string;

  /**
   * @param message - The diagnostic, naming the file and the problem.
   * @param options - The offending key and underlying cause, when known.
   */
  constructor(message: string, options?: { cause?: unknown; key?: string }) {

    super(message, { cause: options?.cause });

    this.key = options?.key;
    this.name = "CorruptStateError";
  }
}

/**
 * A channel number shared by more than one stream path.
 */
export interface DuplicateNumber {

  channelNumber: number;
  streamPaths: string[];
}

/**
 * Two or more stream paths in the channel map share a channel number. This only happens through a manual edit, and the map cannot be used until an operator
 * resolves it.
 */
export class DuplicateNumberError extends MappingStoreError {

  readonly duplicates: DuplicateNumber[];

  /**
   * @param location - The channel map location for the diagnostic.
   * @param duplicates - Each shared number with every stream path that uses it.
   */
  constructor(location: string, duplicates: DuplicateNumber[]) {

    const details = duplicates.map((entry) => [ "#", String(entry.channelNumber), " is used by ", entry.streamPaths.map((key) => "\"" + key + "\"").join(", ") ]
      .join(""));

    super([ "Duplicate channel numbers in ", location, ": ", details.join("; "), "." ].join(""));

    this.duplicates = duplicates;
    this.name = "DuplicateNumberError";
  }
}

/**
 * The next channel number would exceed Number.MAX_SAFE_INTEGER. Raised before anything is saved, so the channel map stays as it was.
 */
export class ChannelNumberExhaustedError extends MappingStoreError {

  readonly streamPath: string;

  /**
   * @param streamPath - The first stream path that could not be numbered.
   * @param highest - The highest number in use when allocation stopped.
   */
  constructor(streamPath: string, highest: number) {

    super([ "Unable to number \"", streamPath, "\": the next channel number after ", String(highest), " exceeds the largest supported channel number ",
      String(Number.MAX_SAFE_INTEGER), "." ].join(""));

    this.name = "ChannelNumberExhaustedError";
    this.streamPath = streamPath;
  }
}

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(hasMessage(error)) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Narrows an unknown thrown value to one carrying a string message.
 * @param error - The thrown value.
 * @returns True if the value is an object with a string message property.
 */
function hasMessage(error: unknown): error is { message: string } {

  return (typeof error === "object") && (error !== null) && ("message" in error) && (typeof error.message === "string");
}

/**
 * Checks whether a filesystem error is a missing-file error.
 * @param error - The error thrown by an fs call.
 * @returns True if the error code is ENOENT.
 */
export function isNotFoundError(error: unknown): boolean {

  return (typeof error === "object") && (error !== null) && ("code" in error) && (error.code === "ENOENT");
}
