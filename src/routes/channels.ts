/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channels.ts: Channel map listing route.
 */
import type { Express, NextFunction, Request, Response } from "express";
import type { LedgerContext } from "../types/index.js";

/**
 * Response entry for a single channel in the GET /channels response.
 */
interface ChannelEntry {

  channel_number: number;
  stream_path: string;
}

/**
 * Creates an endpoint that lists the channel map, sorted by channel number. Load failures go to the global error handler.
 * @param app - The Express application.
 * @param context - The ledger context.
 */
export function setupChannelsEndpoint(app: Express, context: LedgerContext): void {

  app.get("/channels", async (_req: Request, res: Response, next: NextFunction): Promise<void> => {

    try {

      const mapping = await context.store.load();
      const channels: ChannelEntry[] = [...mapping].map(([ streamPath, channelNumber ]) => ({ channel_number: channelNumber, stream_path: streamPath }));

      res.json(channels.sort((a, b) => a.channel_number - b.channel_number));
    } catch(error) {

      next(error);
    }
  });
}
