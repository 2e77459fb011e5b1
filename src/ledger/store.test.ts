/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * store.test.ts: Tests for the file-backed channel map store.
 */
import { CorruptStateError, DuplicateNumberError, MappingStoreError } from "../utils/index.js";
import { FileMappingStore, findRepeatedKeys, parseChannelMap, serializeChannelMap } from "./store.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("parseChannelMap", () => {

  it("keeps entries in file order", () => {

    const mapping = parseChannelMap({ "/b": 2, "/a": 1 }, "map.json");

    expect([...mapping]).toEqual([ [ "/b", 2 ], [ "/a", 1 ] ]);
  });

  it("rejects content that is not an object", () => {

    expect(() => parseChannelMap([], "map.json")).toThrow("Channel map map.json must contain a JSON object, found an array.");
    expect(() => parseChannelMap(null, "map.json")).toThrow("Channel map map.json must contain a JSON object, found null.");
    expect(() => parseChannelMap(7, "map.json")).toThrow(CorruptStateError);
  });

  it("names the key holding an invalid number", () => {

    for(const value of [ 0, -3, 1.5, "4", null ]) {

      let caught: unknown;

      try {

        parseChannelMap({ "/ok": 1, "/bad": value }, "map.json");
      } catch(error) {

        caught = error;
      }

      expect(caught).toBeInstanceOf(CorruptStateError);
      expect(caught).toHaveProperty("key", "/bad");
    }

    expect(() => parseChannelMap({ "/bad": 0 }, "map.json"))
      .toThrow("Channel map map.json assigns \"/bad\" the invalid channel number 0; channel numbers must be positive integers.");
  });

  it("reports every shared number with all of its stream paths", () => {

    let caught: unknown;

    try {

      parseChannelMap({ "/a": 1, "/b": 1, "/c": 5, "/d": 5, "/e": 5, "/f": 2 }, "map.json");
    } catch(error) {

      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateNumberError);
    expect(caught).toBeInstanceOf(MappingStoreError);
    expect(caught).toHaveProperty("duplicates", [ { channelNumber: 1, streamPaths: [ "/a", "/b" ] }, { channelNumber: 5, streamPaths: [ "/c", "/d", "/e" ] } ]);
    expect(caught).toHaveProperty("message", "Duplicate channel numbers in map.json: #1 is used by \"/a\", \"/b\"; #5 is used by \"/c\", \"/d\", \"/e\".");
  });
});

describe("findRepeatedKeys", () => {

  it("finds keys listed twice, including ones spelled with escapes", () => {

    expect(findRepeatedKeys("{ \"/a\": 1, \"/b\": 2, \"/a\": 3, \"/\\u0062\": 4 }")).toEqual([ "/a", "/b" ]);
  });

  it("ignores strings that are values or sit in nested values", () => {

    expect(findRepeatedKeys("{ \"/a\": 1, \"x\": \"\\\"/a\\\": 2\", \"y\": { \"/a\": 3 } }")).toEqual([]);
  });
});

describe("serializeChannelMap", () => {

  it("writes entries in number order with a trailing newline", () => {

    expect(serializeChannelMap(new Map([ [ "/z", 150 ], [ "/a", 1 ] ]))).toBe("{\n  \"/a\": 1,\n  \"/z\": 150\n}\n");
  });

  it("writes an empty mapping as an empty object", () => {

    expect(serializeChannelMap(new Map())).toBe("{}\n");
  });
});

describe("FileMappingStore", () => {

  let dir: string;
  let mapFile: string;

  beforeEach(async () => {

    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "chanledger-store-"));
    mapFile = path.join(dir, "channel_map.json");
  });

  afterEach(async () => {

    await fsPromises.rm(dir, { force: true, recursive: true });
  });

  it("loads a missing file as an empty mapping", async () => {

    const mapping = await new FileMappingStore(mapFile).load();

    expect(mapping.size).toBe(0);
  });

  it("round-trips a mapping through save and load", async () => {

    const store = new FileMappingStore(mapFile);
    const mapping = new Map([ [ "/live/news", 1 ], [ "/live/sports", 2 ], [ "/live/film", 150 ] ]);

    await store.save(mapping);

    expect(await store.load()).toEqual(mapping);
  });

  it("leaves the bytes unchanged when a loaded mapping is saved again", async () => {

    const content = "{\n  \"/a\": 1,\n  \"/b\": 2\n}\n";

    await fsPromises.writeFile(mapFile, content);

    const store = new FileMappingStore(mapFile);

    await store.save(await store.load());

    expect(await fsPromises.readFile(mapFile, "utf-8")).toBe(content);
  });

  it("keeps a __proto__ stream path as an ordinary entry", async () => {

    const store = new FileMappingStore(mapFile);

    await store.save(new Map([ [ "__proto__", 3 ], [ "/a", 1 ] ]));

    expect([...await store.load()]).toEqual([ [ "/a", 1 ], [ "__proto__", 3 ] ]);
  });

  it("creates missing parent directories and leaves no temporary files", async () => {

    const nested = path.join(dir, "nested", "deeper", "channel_map.json");

    await new FileMappingStore(nested).save(new Map([[ "/a", 1 ]]));

    expect(await fsPromises.readdir(path.dirname(nested))).toEqual(["channel_map.json"]);
  });

  it("raises CorruptStateError for invalid JSON and leaves the file alone", async () => {

    await fsPromises.writeFile(mapFile, "{ \"/a\": 1,");

    await expect(new FileMappingStore(mapFile).load()).rejects.toBeInstanceOf(CorruptStateError);
    expect(await fsPromises.readFile(mapFile, "utf-8")).toBe("{ \"/a\": 1,");
  });

  it("treats an empty file as corrupt", async () => {

    await fsPromises.writeFile(mapFile, "");

    await expect(new FileMappingStore(mapFile).load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  it("rejects a stream path listed twice instead of keeping the last number", async () => {

    await fsPromises.writeFile(mapFile, "{ \"/a\": 1, \"/a\": 2 }");

    await expect(new FileMappingStore(mapFile).load()).rejects.toThrow(new CorruptStateError("Channel map " + mapFile +
      " lists \"/a\" more than once; each stream path may appear only once."));
    expect(await fsPromises.readFile(mapFile, "utf-8")).toBe("{ \"/a\": 1, \"/a\": 2 }");
  });

  it("raises DuplicateNumberError for a shared number", async () => {

    await fsPromises.writeFile(mapFile, "{ \"/a\": 1, \"/b\": 1 }");

    await expect(new FileMappingStore(mapFile).load()).rejects.toBeInstanceOf(DuplicateNumberError);
  });

  it("wraps read failures other than a missing file", async () => {

    // A directory where the file should be makes readFile fail with EISDIR.
    await fsPromises.mkdir(mapFile);

    const error: unknown = await new FileMappingStore(mapFile).load().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MappingStoreError);
    expect(error).not.toBeInstanceOf(CorruptStateError);
  });

  it("wraps write failures and keeps the previous file", async () => {

    const store = new FileMappingStore(mapFile);

    await store.save(new Map([[ "/a", 1 ]]));

    // The parent path is an existing file, so the directory for the new map cannot be created.
    const blocked = new FileMappingStore(path.join(mapFile, "child.json"));

    await expect(blocked.save(new Map([[ "/b", 2 ]]))).rejects.toBeInstanceOf(MappingStoreError);
    expect(await store.load()).toEqual(new Map([[ "/a", 1 ]]));
  });
});
