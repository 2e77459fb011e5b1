/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * playlist.ts: Routes serving the last written playlists.
 */
import type { Express, NextFunction, Request, Response } from "express";
import type { LedgerContext } from "../types/index.js";
import fs from "node:fs";
import { isNotFoundError } from "../utils/index.js";

const { promises: fsPromises } = fs;

/* The playlists are files written at the end of each assignment run, not generated per request: a player fetching the lineup sees exactly what the last run
 * produced. Until the first run completes there is nothing to serve.
 */

/**
 * Sends a playlist file, or 404 if it has not been written yet.
 * @param filePath - The playlist file.
 * @param contentType - The Content-Type to send.
 * @param res - The Express response.
 */
async function sendPlaylistFile(filePath: string, contentType: string, res: Response): Promise<void> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    if(isNotFoundError(error)) {

      res.status(404).json({ error: "No playlist has been generated yet." });

      return;
    }

    throw error;
  }

  res.set("Content-Type", contentType);
  res.send(content);
}

/**
 * Creates the playlist endpoints.
 * @param app - The Express application.
 * @param context - The ledger context.
 */
export function setupPlaylistEndpoints(app: Express, context: LedgerContext): void {

  app.get("/playlist.m3u", async (_req: Request, res: Response, next: NextFunction): Promise<void> => {

    try {

      await sendPlaylistFile(context.playlist.m3uFile, "audio/x-mpegurl", res);
    } catch(error) {

      next(error);
    }
  });

  app.get("/playlist.json", async (_req: Request, res: Response, next: NextFunction): Promise<void> => {

    try {

      await sendPlaylistFile(context.playlist.jsonFile, "application/json; charset=utf-8", res);
    } catch(error) {

      next(error);
    }
  });
}
