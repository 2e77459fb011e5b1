/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.test.ts: Tests for the HTTP endpoints.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AddressInfo } from "node:net";
import { FileMappingStore } from "./ledger/index.js";
import type { LedgerContext } from "./types/index.js";
import type { Server } from "node:http";
import { buildApp } from "./app.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("HTTP endpoints", () => {

  let baseUrl: string;
  let context: LedgerContext;
  let dir: string;
  let mapFile: string;
  let server: Server;

  beforeEach(async () => {

    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "chanledger-http-"));
    mapFile = path.join(dir, "channel_map.json");
    context = {

      firstNumber: 1,
      playlist: { defaultGroup: "Uncategorized", enabled: true, jsonFile: path.join(dir, "playlist.json"), m3uFile: path.join(dir, "playlist.m3u") },
      store: new FileMappingStore(mapFile)
    };

    const app = buildApp(context);

    server = await new Promise<Server>((resolve) => {

      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });

    const address: AddressInfo | string | null = server.address();

    if((address === null) || (typeof address === "string")) {

      throw new Error("Server did not bind to a TCP port.");
    }

    baseUrl = "http://127.0.0.1:" + String(address.port);
  });

  afterEach(async () => {

    server.closeAllConnections();

    await new Promise<void>((resolve) => {

      server.close(() => resolve());
    });

    await fsPromises.rm(dir, { force: true, recursive: true });
  });

  /**
   * Posts a JSON body to /assign.
   */
  async function postAssign(body: string): Promise<Response> {

    return fetch(baseUrl + "/assign", { body, headers: { "Content-Type": "application/json" }, method: "POST" });
  }

  it("reports a healthy empty ledger", async () => {

    const response = await fetch(baseUrl + "/health");
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ channels: 0, highestNumber: 0, mapFile, status: "healthy" });
  });

  it("reports an unloadable map as unhealthy", async () => {

    await fsPromises.writeFile(mapFile, "{ \"/a\": 1, \"/b\": 1 }");

    const response = await fetch(baseUrl + "/health");
    const body: unknown = await response.json();

    expect(response.status).toBe(503);
    expect(body).toMatchObject({ message: "Duplicate channel numbers in " + mapFile + ": #1 is used by \"/a\", \"/b\"", status: "unhealthy" });
  });

  it("assigns posted channels and lists them", async () => {

    const response = await postAssign(JSON.stringify({ channels: [ { name: "B", stream_path: "/b" }, { name: "A", stream_path: "/a" } ] }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ assigned: [ { channel_number: 1, stream_path: "/b" }, { channel_number: 2, stream_path: "/a" } ], total: 2 });

    const again = await postAssign(JSON.stringify([ { stream_path: "/a" }, { stream_path: "/c" } ]));

    expect(await again.json()).toEqual({ assigned: [{ channel_number: 3, stream_path: "/c" }], total: 3 });

    const channels = await fetch(baseUrl + "/channels");

    expect(await channels.json()).toEqual([
      { channel_number: 1, stream_path: "/b" },
      { channel_number: 2, stream_path: "/a" },
      { channel_number: 3, stream_path: "/c" }
    ]);
  });

  it("serializes concurrent assignment requests", async () => {

    const responses = await Promise.all([ "/x", "/y", "/z" ].map(async (streamPath) => postAssign(JSON.stringify([{ stream_path: streamPath }]))));
    const bodies: unknown[] = await Promise.all(responses.map(async (response) => response.json()));

    expect(bodies.map((body) => (body !== null) && (typeof body === "object") && ("total" in body) ? body.total : null).sort()).toEqual([ 1, 2, 3 ]);

    const mapping = await context.store.load();

    expect(new Set(mapping.values())).toEqual(new Set([ 1, 2, 3 ]));
  });

  it("rejects bodies with neither discovery shape", async () => {

    const response = await postAssign(JSON.stringify({ items: [] }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Discovery input request body must be an array of channels or an object with a \"channels\" array." });
  });

  it("rejects malformed JSON bodies", async () => {

    const response = await postAssign("{ not json");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Request body is not valid JSON." });
  });

  it("answers 500 with the diagnostic when the map is corrupt", async () => {

    await fsPromises.writeFile(mapFile, "not json");

    const response = await postAssign(JSON.stringify([{ stream_path: "/a" }]));
    const body: unknown = await response.json();

    expect(response.status).toBe(500);
    expect(body).toHaveProperty("error");
    expect(await fsPromises.readFile(mapFile, "utf-8")).toBe("not json");
  });

  it("serves playlists only after a run has written them", async () => {

    expect((await fetch(baseUrl + "/playlist.m3u")).status).toBe(404);

    await postAssign(JSON.stringify([{ name: "A", stream_path: "/a", url: "https://cdn.example.com/a.m3u8" }]));

    const m3u = await fetch(baseUrl + "/playlist.m3u");
    const text = await m3u.text();

    expect(m3u.status).toBe(200);
    expect(m3u.headers.get("content-type")).toContain("audio/x-mpegurl");
    expect(text.split("\n").slice(3, 5)).toEqual([
      "#EXTINF:-1 tvg-id=\"A\" tvg-name=\"A\" tvg-chno=\"1\" tvg-logo=\"\" group-title=\"Uncategorized\",A",
      "https://cdn.example.com/a.m3u8"
    ]);

    const json = await fetch(baseUrl + "/playlist.json");

    expect(await json.json()).toHaveProperty("channels.0.channel_number", 1);
  });
});
