/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * m3u.test.ts: Tests for M3U parsing and escaping.
 */
import { describe, expect, it } from "vitest";
import { escapeM3UAttribute, parseM3U } from "./m3u.js";

describe("parseM3U", () => {

  it("reads attributes and the URL of each entry", () => {

    const content = [
      "#EXTM3U",
      "#EXTINF:-1 tvg-id=\"news-24\" tvg-name=\"News 24\" tvg-logo=\"https://img.example.com/n.png\" group-title=\"News\",News 24",
      "https://cdn.example.com/live/news-24/index.m3u8?token=abc",
      "",
      "#EXTINF:-1,Plain Channel",
      "http://cdn.example.com/plain.m3u8"
    ].join("\r\n");

    expect(parseM3U(content)).toEqual({

      channels: [
        { group: "News", logo: "https://img.example.com/n.png", name: "News 24", tvgId: "news-24", url: "https://cdn.example.com/live/news-24/index.m3u8?token=abc" },
        { group: undefined, logo: undefined, name: "Plain Channel", tvgId: undefined, url: "http://cdn.example.com/plain.m3u8" }
      ],
      errors: []
    });
  });

  it("does not read an attribute out of a longer attribute name", () => {

    const result = parseM3U("#EXTINF:-1 xtvg-id=\"wrong\",Name\nhttps://cdn.example.com/a");

    expect(result.channels[0].tvgId).toBeUndefined();
  });

  it("reads unquoted attribute values", () => {

    const result = parseM3U("#EXTINF:-1 tvg-id=abc group-title=Films,Name\nhttps://cdn.example.com/a");

    expect(result.channels[0]).toMatchObject({ group: "Films", tvgId: "abc" });
  });

  it("reports entries without a URL or a name", () => {

    const result = parseM3U([ "#EXTM3U", "#EXTINF:-1 tvg-id=\"a\",First", "#EXTINF:-1 tvg-id=\"b\"", "https://cdn.example.com/b", "#EXTINF:-1,Last" ].join("\n"));

    expect(result.channels).toEqual([]);
    expect(result.errors).toEqual([
      "Line 2: Missing URL after #EXTINF.",
      "Line 3: Could not extract channel name from #EXTINF.",
      "Line 5: Missing URL after #EXTINF."
    ]);
  });
});

describe("escapeM3UAttribute", () => {

  it("replaces double quotes and line breaks", () => {

    expect(escapeM3UAttribute("A \"quoted\"\r\nname")).toBe("A 'quoted' name");
  });
});
