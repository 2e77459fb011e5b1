/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Reading scraper output into discovered channel records.
 */
import { LOG, formatError, parseM3U } from "../utils/index.js";
import type { DiscoveredChannel } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * DISCOVERY INPUT
 *
 * The scraper that finds channels runs separately and hands its results over in one of two forms.
 *
 * JSON, either a bare array or an object with a "channels" array:
 *
 *   [ { "stream_path": "/live/news-24", "name": "News 24", "logo": "https://...", "tags": "News", "url": "https://..." } ]
 *
 * Only stream_path is required. Entries without one are skipped with a warning, since there is nothing to number.
 *
 * Extended M3U. The stream path of an entry is its tvg-id when present. Otherwise it is the path component of the stream URL: hosts and query-string tokens
 * rotate between scrapes, the path does not.
 */

/**
 * Thrown when discovery input has neither accepted shape.
 */
export class DiscoveryError extends Error {

  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "DiscoveryError";
  }
}

/**
 * Reads an optional string field from a discovery entry.
 * @param entry - The entry.
 * @param field - The field name.
 * @returns The value if it is a non-empty string, otherwise undefined.
 */
function optionalString(entry: object, field: string): string | undefined {

  const value: unknown = Reflect.get(entry, field);

  return ((typeof value === "string") && (value.length > 0)) ? value : undefined;
}

/**
 * Converts parsed JSON discovery input into channel records.
 * @param value - Parsed JSON: an array of entries or an object with a channels array.
 * @param source - Where the input came from, for diagnostics.
 * @returns The channels, in input order.
 * @throws DiscoveryError if the value has neither shape.
 */
export function parseDiscoveryJson(value: unknown, source: string): DiscoveredChannel[] {

  let entries: unknown = value;

  if((typeof value === "object") && (value !== null) && !Array.isArray(value)) {

    entries = Reflect.get(value, "channels");
  }

  if(!Array.isArray(entries)) {

    throw new DiscoveryError("Discovery input " + source + " must be an array of channels or an object with a \"channels\" array.");
  }

  const channels: DiscoveredChannel[] = [];

  entries.forEach((entry: unknown, index: number): void => {

    const streamPath = ((typeof entry === "object") && (entry !== null)) ? optionalString(entry, "stream_path") : undefined;

    if((typeof entry !== "object") || (entry === null) || !streamPath) {

      LOG.warn("Skipping discovery entry %d in %s: missing stream_path.", index + 1, source);

      return;
    }

    channels.push({

      logo: optionalString(entry, "logo"),
      name: optionalString(entry, "name"),
      streamPath,
      tags: optionalString(entry, "tags"),
      url: optionalString(entry, "url")
    });
  });

  return channels;
}

/**
 * Derives a stream path from a stream URL.
 * @param url - The stream URL.
 * @returns The URL's path component, or the URL unchanged if it cannot be parsed.
 */
export function streamPathFromUrl(url: string): string {

  try {

    return new URL(url).pathname;
  } catch {

    return url;
  }
}

/**
 * Converts M3U discovery input into channel records.
 * @param content - The playlist text.
 * @param source - Where the input came from, for diagnostics.
 * @returns The channels, in playlist order.
 */
export function parseDiscoveryM3U(content: string, source: string): DiscoveredChannel[] {

  const result = parseM3U(content);

  for(const error of result.errors) {

    LOG.warn("%s: %s", source, error);
  }

  return result.channels.map((channel) => ({

    logo: channel.logo,
    name: channel.name,
    streamPath: channel.tvgId ?? streamPathFromUrl(channel.url),
    tags: channel.group,
    url: channel.url
  }));
}

/**
 * Loads discovered channels from a file. Files ending in .m3u or .m3u8, or starting with #EXTM3U, are read as M3U; everything else as JSON.
 * @param filePath - The discovery file.
 * @returns The channels, in file order.
 * @throws DiscoveryError if the file cannot be read or parsed.
 */
export async function loadDiscovery(filePath: string): Promise<DiscoveredChannel[]> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    throw new DiscoveryError("Unable to read discovery file " + filePath + ": " + formatError(error) + ".", { cause: error });
  }

  const extension = path.extname(filePath).toLowerCase();

  if((extension === ".m3u") || (extension === ".m3u8") || content.trimStart().startsWith("#EXTM3U")) {

    LOG.debug("discovery", "Reading %s as M3U.", filePath);

    return parseDiscoveryM3U(content, filePath);
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    throw new DiscoveryError("Discovery file " + filePath + " is not valid JSON: " + formatError(error) + ".", { cause: error });
  }

  LOG.debug("discovery", "Reading %s as JSON.", filePath);

  return parseDiscoveryJson(parsed, filePath);
}
