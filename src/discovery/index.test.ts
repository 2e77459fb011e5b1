/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.test.ts: Tests for reading discovery input.
 */
import { DiscoveryError, loadDiscovery, parseDiscoveryJson, parseDiscoveryM3U, streamPathFromUrl } from "./index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("parseDiscoveryJson", () => {

  it("accepts a bare array and keeps only string fields", () => {

    expect(parseDiscoveryJson([{ logo: 5, name: "News", stream_path: "/live/news", tags: "News", url: "https://cdn.example.com/news.m3u8" }], "test"))
      .toEqual([{ logo: undefined, name: "News", streamPath: "/live/news", tags: "News", url: "https://cdn.example.com/news.m3u8" }]);
  });

  it("accepts an object with a channels array", () => {

    expect(parseDiscoveryJson({ channels: [ { stream_path: "/a" }, { stream_path: "/b" } ] }, "test").map((channel) => channel.streamPath)).toEqual([ "/a", "/b" ]);
  });

  it("skips entries without a usable stream path", () => {

    const channels = parseDiscoveryJson([ { name: "No path" }, { stream_path: "" }, { stream_path: 12 }, "text", null, { stream_path: "/kept" } ], "test");

    expect(channels.map((channel) => channel.streamPath)).toEqual(["/kept"]);
  });

  it("rejects input with neither shape", () => {

    expect(() => parseDiscoveryJson({ items: [] }, "body")).toThrow(DiscoveryError);
    expect(() => parseDiscoveryJson("text", "body")).toThrow("Discovery input body must be an array of channels or an object with a \"channels\" array.");
    expect(() => parseDiscoveryJson(null, "body")).toThrow(DiscoveryError);
  });
});

describe("streamPathFromUrl", () => {

  it("drops the host and query string", () => {

    expect(streamPathFromUrl("https://edge-3.example.com/live/news/index.m3u8?token=abc")).toBe("/live/news/index.m3u8");
  });

  it("returns text that is not a URL unchanged", () => {

    expect(streamPathFromUrl("not a url")).toBe("not a url");
  });
});

describe("parseDiscoveryM3U", () => {

  it("prefers tvg-id and falls back to the URL path", () => {

    const content = [
      "#EXTM3U",
      "#EXTINF:-1 tvg-id=\"news\" tvg-logo=\"https://img.example.com/n.png\" group-title=\"News\",News",
      "https://cdn.example.com/live/news.m3u8?token=1",
      "#EXTINF:-1,Films",
      "https://cdn.example.com/live/films.m3u8?token=2"
    ].join("\n");

    expect(parseDiscoveryM3U(content, "test")).toEqual([
      { logo: "https://img.example.com/n.png", name: "News", streamPath: "news", tags: "News", url: "https://cdn.example.com/live/news.m3u8?token=1" },
      { logo: undefined, name: "Films", streamPath: "/live/films.m3u8", tags: undefined, url: "https://cdn.example.com/live/films.m3u8?token=2" }
    ]);
  });
});

describe("loadDiscovery", () => {

  let dir: string;

  beforeEach(async () => {

    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "chanledger-discovery-"));
  });

  afterEach(async () => {

    await fsPromises.rm(dir, { force: true, recursive: true });
  });

  it("reads JSON files", async () => {

    const file = path.join(dir, "scrape.json");

    await fsPromises.writeFile(file, JSON.stringify({ channels: [{ name: "A", stream_path: "/a" }] }));

    expect(await loadDiscovery(file)).toEqual([{ logo: undefined, name: "A", streamPath: "/a", tags: undefined, url: undefined }]);
  });

  it("reads M3U files by extension or content", async () => {

    const playlist = "#EXTM3U\n#EXTINF:-1,A\nhttps://cdn.example.com/live/a.m3u8\n";
    const byExtension = path.join(dir, "scrape.m3u8");
    const byContent = path.join(dir, "scrape.txt");

    await fsPromises.writeFile(byExtension, playlist);
    await fsPromises.writeFile(byContent, playlist);

    expect((await loadDiscovery(byExtension)).map((channel) => channel.streamPath)).toEqual(["/live/a.m3u8"]);
    expect((await loadDiscovery(byContent)).map((channel) => channel.streamPath)).toEqual(["/live/a.m3u8"]);
  });

  it("raises DiscoveryError for invalid JSON and missing files", async () => {

    const file = path.join(dir, "scrape.json");

    await fsPromises.writeFile(file, "[ {");

    await expect(loadDiscovery(file)).rejects.toBeInstanceOf(DiscoveryError);
    await expect(loadDiscovery(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(DiscoveryError);
  });
});
