/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * assign.ts: Assignment route for scrapers that post their results.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, MappingStoreError, formatError } from "../utils/index.js";
import { DiscoveryError, parseDiscoveryJson } from "../discovery/index.js";
import { createRunQueue, processDiscovery } from "../ledger/index.js";
import type { DiscoveredChannel, LedgerContext } from "../types/index.js";

/* POST /assign takes a scrape in either JSON discovery shape and runs it through the ledger. Requests are queued and run one at a time, since two overlapping runs
 * would both allocate from the same highest number. A request that arrives while another is running waits for it.
 */

/**
 * Creates the assignment endpoint.
 * @param app - The Express application.
 * @param context - The ledger context.
 */
export function setupAssignEndpoint(app: Express, context: LedgerContext): void {

  const queue = createRunQueue();

  app.post("/assign", async (req: Request, res: Response, next: NextFunction): Promise<void> => {

    let discovered: DiscoveredChannel[];

    try {

      discovered = parseDiscoveryJson(req.body, "request body");
    } catch(error) {

      if(error instanceof DiscoveryError) {

        res.status(400).json({ error: error.message });

        return;
      }

      next(error);

      return;
    }

    if(queue.pending > 0) {

      LOG.debug("http", "Waiting behind %d queued assignment runs.", queue.pending);
    }

    try {

      const result = await queue.enqueue(async () => processDiscovery(discovered, context, "http"));

      res.json({

        assigned: result.assigned.map((assignment) => ({ channel_number: assignment.channelNumber, stream_path: assignment.streamPath })),
        total: result.mapping.size
      });
    } catch(error) {

      if(error instanceof MappingStoreError) {

        LOG.error("Assignment run failed: %s.", formatError(error));

        res.status(500).json({ error: error.message });

        return;
      }

      next(error);
    }
  });
}
