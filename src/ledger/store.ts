/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * store.ts: Channel map persistence.
 */
import type { ChannelMapping, MappingStore } from "../types/index.js";
import { CorruptStateError, DuplicateNumberError, LOG, MappingStoreError, formatError, isNotFoundError, writeFileAtomic } from "../utils/index.js";
import type { DuplicateNumber } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * CHANNEL MAP FILE
 *
 * The channel map is a JSON object whose keys are stream paths and whose values are positive integer channel numbers:
 *
 *   {
 *     "/live/news-24": 1,
 *     "/live/sports-1": 2
 *   }
 *
 * It is the only record of which number belongs to which stream path, so it is handled strictly. A missing file means no channel has been numbered yet. A file
 * that exists but cannot be read, is not a JSON object of positive integers, or gives one number to two stream paths stops the run: allocating on top of it could
 * hand out a number that is already in use. Operators resolve such a file by hand.
 *
 * JSON.parse keeps only the last value of a repeated key, so a hand-edited file that lists a stream path twice would silently lose a number. The raw text is
 * scanned for repeated keys before it is trusted.
 *
 * Saves go through writeFileAtomic(), so the file on disk is always either the previous map or the new one.
 */

/**
 * Validates parsed channel map content and converts it to a ChannelMapping.
 * @param parsed - The result of JSON.parse on the file content.
 * @param location - The file path, for diagnostics.
 * @returns The mapping, in file order.
 * @throws CorruptStateError if the content is not an object of positive integers.
 * @throws DuplicateNumberError if two stream paths share a number.
 */
export function parseChannelMap(parsed: unknown, location: string): ChannelMapping {

  if((typeof parsed !== "object") || (parsed === null) || Array.isArray(parsed)) {

    throw new CorruptStateError([ "Channel map ", location, " must contain a JSON object, found ", Array.isArray(parsed) ? "an array" : String(parsed), "." ].join(""));
  }

  const mapping = new Map<string, number>();
  const pathsByNumber = new Map<number, string[]>();

  for(const [ streamPath, value ] of Object.entries(parsed)) {

    if((typeof value !== "number") || !Number.isSafeInteger(value) || (value < 1)) {

      throw new CorruptStateError([ "Channel map ", location, " assigns \"", streamPath, "\" the invalid channel number ", JSON.stringify(value),
        "; channel numbers must be positive integers." ].join(""), { key: streamPath });
    }

    mapping.set(streamPath, value);

    const paths = pathsByNumber.get(value);

    if(paths) {

      paths.push(streamPath);
    } else {

      pathsByNumber.set(value, [streamPath]);
    }
  }

  const duplicates: DuplicateNumber[] = [];

  for(const [ channelNumber, streamPaths ] of pathsByNumber) {

    if(streamPaths.length > 1) {

      duplicates.push({ channelNumber, streamPaths });
    }
  }

  if(duplicates.length > 0) {

    throw new DuplicateNumberError(location, duplicates.sort((a, b) => a.channelNumber - b.channelNumber));
  }

  return mapping;
}

/**
 * Finds the keys that appear more than once in the top-level object of JSON text. The text must already have parsed.
 * @param content - The channel map file content.
 * @returns Each repeated key once, in order of its second appearance.
 */
export function findRepeatedKeys(content: string): string[] {

  const keys = new Set<string>();
  const repeated = new Set<string>();
  let depth = 0;
  let index = 0;

  while(index < content.length) {

    const char = content[index];

    if(char === "\"") {

      let end = index + 1;

      while((end < content.length) && (content[end] !== "\"")) {

        end += (content[end] === "\\") ? 2 : 1;
      }

      const token = content.slice(index, end + 1);

      index = end + 1;

      let next = index;

      while((next < content.length) && /\s/.test(content[next])) {

        next++;
      }

      // A string directly inside the outer object and followed by a colon is a key.
      if((depth === 1) && (content[next] === ":")) {

        const key: unknown = JSON.parse(token);

        if(typeof key === "string") {

          if(keys.has(key)) {

            repeated.add(key);
          } else {

            keys.add(key);
          }
        }
      }

      continue;
    }

    if((char === "{") || (char === "[")) {

      depth++;
    } else if((char === "}") || (char === "]")) {

      depth--;
    }

    index++;
  }

  return [...repeated];
}

/**
 * Serializes a mapping in channel number order with two-space indentation and a trailing newline.
 * @param mapping - The mapping to serialize.
 * @returns The file content.
 */
export function serializeChannelMap(mapping: ChannelMapping): string {

  // Object.fromEntries defines own properties, so a "__proto__" stream path is written as an ordinary key.
  const sorted = Object.fromEntries([...mapping.entries()].sort(([ , a ], [ , b ]) => a - b));

  return JSON.stringify(sorted, null, 2) + "\n";
}

/**
 * The channel map store backed by a JSON file.
 */
export class FileMappingStore implements MappingStore {

  readonly location: string;

  /**
   * @param filePath - Absolute path to the channel map file.
   */
  constructor(filePath: string) {

    this.location = filePath;
  }

  /**
   * Loads the channel map.
   * @returns The persisted mapping, or an empty mapping when the file does not exist.
   * @throws CorruptStateError (including a stream path listed twice), DuplicateNumberError, or MappingStoreError for any other read failure.
   */
  async load(): Promise<ChannelMapping> {

    let content: string;

    try {

      content = await fsPromises.readFile(this.location, "utf-8");
    } catch(error) {

      if(isNotFoundError(error)) {

        LOG.debug("store", "Channel map %s does not exist yet, starting with an empty map.", this.location);

        return new Map();
      }

      throw new MappingStoreError([ "Unable to read channel map ", this.location, ": ", formatError(error), "." ].join(""), { cause: error });
    }

    let parsed: unknown;

    try {

      parsed = JSON.parse(content);
    } catch(error) {

      throw new CorruptStateError([ "Channel map ", this.location, " is not valid JSON: ", formatError(error), "." ].join(""), { cause: error });
    }

    const repeated = findRepeatedKeys(content);

    if(repeated.length > 0) {

      throw new CorruptStateError([ "Channel map ", this.location, " lists ", repeated.map((key) => "\"" + key + "\"").join(", "),
        " more than once; each stream path may appear only once." ].join(""), { key: repeated[0] });
    }

    const mapping = parseChannelMap(parsed, this.location);

    LOG.debug("store", "Loaded %d channel numbers from %s.", mapping.size, this.location);

    return mapping;
  }

  /**
   * Replaces the channel map file with the given mapping.
   * @param mapping - The complete mapping to persist.
   * @throws MappingStoreError if the file cannot be written. The previous file is left intact.
   */
  async save(mapping: ChannelMapping): Promise<void> {

    try {

      await writeFileAtomic(this.location, serializeChannelMap(mapping));
    } catch(error) {

      throw new MappingStoreError([ "Unable to write channel map ", this.location, ": ", formatError(error), "." ].join(""), { cause: error });
    }

    LOG.debug("store", "Saved %d channel numbers to %s.", mapping.size, this.location);
  }
}
