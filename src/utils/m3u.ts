/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * m3u.ts: M3U playlist parsing and escaping utilities.
 */
import type { Nullable } from "../types/index.js";

/*
 * M3U PARSING
 *
 * Scrapers frequently hand over their results as an extended M3U playlist rather than JSON. This parser reads #EXTINF lines and the URL that follows each, and
 * extracts the attributes discovery needs: tvg-id (the preferred stream path), tvg-name, tvg-logo and group-title.
 *
 * Standard M3U format:
 * #EXTM3U
 * #EXTINF:-1 tvg-id="news-24" tvg-name="News 24" tvg-logo="https://example.com/news.png" group-title="News",News 24
 * https://example.com/live/news-24/index.m3u8?token=abc
 */

/**
 * A channel parsed from an M3U playlist.
 */
export interface M3UChannel {

  // Value of group-title, if present.
  group?: string;

  // Value of tvg-logo, if present.
  logo?: string;

  // Display name from tvg-name or the #EXTINF comma suffix.
  name: string;

  // Value of tvg-id, if present.
  tvgId?: string;

  // Stream URL.
  url: string;
}

/**
 * Result of parsing an M3U playlist.
 */
export interface M3UParseResult {

  // Successfully parsed channels.
  channels: M3UChannel[];

  // Parse errors with line numbers for user feedback.
  errors: string[];
}

/**
 * Extracts an attribute value from an #EXTINF line. Handles both quoted and unquoted attribute values.
 * @param line - The #EXTINF line to parse.
 * @param attribute - The attribute name to extract (e.g., "tvg-name").
 * @returns The trimmed attribute value, or null if missing or blank.
 */
function extractAttribute(line: string, attribute: string): Nullable<string> {

  // Match attribute="value" (quoted), then attribute=value (unquoted, ends at space or comma). The leading boundary keeps "tvg-id" from matching inside
  // "xtvg-id".
  const quotedMatch = new RegExp("(?:^|\\s)" + attribute + "=\"([^\"]*)\"", "i").exec(line);
  const unquotedMatch = quotedMatch ? null : new RegExp("(?:^|\\s)" + attribute + "=([^\\s,\"]+)", "i").exec(line);
  const value = (quotedMatch ?? unquotedMatch)?.[1].trim();

  return value ? value : null;
}

/**
 * Extracts the display name from an #EXTINF line. First tries tvg-name attribute, then falls back to the comma-separated suffix.
 * @param line - The #EXTINF line to parse.
 * @returns The display name, or null if not found.
 */
function extractName(line: string): Nullable<string> {

  const tvgName = extractAttribute(line, "tvg-name");

  if(tvgName) {

    return tvgName;
  }

  // Fall back to the part after the last comma. Format: #EXTINF:-1 attributes,Display Name
  const commaIndex = line.lastIndexOf(",");

  if(commaIndex !== -1) {

    const suffix = line.slice(commaIndex + 1).trim();

    if(suffix.length > 0) {

      return suffix;
    }
  }

  return null;
}

/**
 * Parses an M3U playlist and extracts channel information. Handles extended M3U format with #EXTINF tags.
 * @param content - The M3U file content as a string.
 * @returns Parse result containing channels and any errors encountered.
 */
export function parseM3U(content: string): M3UParseResult {

  const channels: M3UChannel[] = [];
  const errors: string[] = [];
  const lines = content.split(/\r?\n/);

  let pending: Nullable<Omit<M3UChannel, "url"> & { lineNumber: number }> = null;

  for(let i = 0; i < lines.length; i++) {

    const lineNumber = i + 1;
    const line = lines[i].trim();

    // Skip empty lines and comments (except #EXTINF).
    if((line.length === 0) || (line.startsWith("#") && !line.startsWith("#EXTINF"))) {

      continue;
    }

    if(line.startsWith("#EXTINF:")) {

      if(pending) {

        errors.push("Line " + String(pending.lineNumber) + ": Missing URL after #EXTINF.");
      }

      const name = extractName(line);

      if(!name) {

        errors.push("Line " + String(lineNumber) + ": Could not extract channel name from #EXTINF.");
        pending = null;

        continue;
      }

      pending = { group: extractAttribute(line, "group-title") ?? undefined, lineNumber, logo: extractAttribute(line, "tvg-logo") ?? undefined, name,
        tvgId: extractAttribute(line, "tvg-id") ?? undefined };

      continue;
    }

    // A URL line must follow an #EXTINF. URLs without one carry no name and are skipped.
    if((line.startsWith("http://") || line.startsWith("https://")) && pending) {

      const { lineNumber: _lineNumber, ...entry } = pending;

      channels.push({ ...entry, url: line });
      pending = null;
    }
  }

  if(pending) {

    errors.push("Line " + String(pending.lineNumber) + ": Missing URL after #EXTINF.");
  }

  return { channels, errors };
}

/**
 * Makes a value safe for a quoted #EXTINF attribute. Double quotes would end the attribute early, so they become single quotes. Line breaks become spaces.
 * @param value - The raw attribute value.
 * @returns The escaped value.
 */
export function escapeM3UAttribute(value: string): string {

  return value.replace(/"/g, "'").replace(/[\r\n]+/g, " ");
}
