/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route.
 */
import type { Express, Request, Response } from "express";
import { formatError, getPackageVersion } from "../utils/index.js";
import type { HealthStatus, LedgerContext } from "../types/index.js";
import { highestNumber } from "../ledger/index.js";

/* The health endpoint loads the channel map on every request, so a map that has been corrupted by hand since the last run shows up here before the next scrape
 * trips over it. Returns HTTP 503 when the map cannot be loaded so monitoring can detect the problem from the status code alone.
 */

/**
 * Creates a health check endpoint.
 * @param app - The Express application.
 * @param context - The ledger context.
 */
export function setupHealthEndpoint(app: Express, context: LedgerContext): void {

  app.get("/health", async (_req: Request, res: Response): Promise<void> => {

    const health: HealthStatus = {

      channels: 0,
      highestNumber: 0,
      mapFile: context.store.location,
      status: "healthy",
      uptime: Math.round(process.uptime()),
      version: getPackageVersion()
    };

    try {

      const mapping = await context.store.load();

      health.channels = mapping.size;
      health.highestNumber = highestNumber(mapping.values());
    } catch(error) {

      health.message = formatError(error);
      health.status = "unhealthy";
    }

    res.status((health.status === "healthy") ? 200 : 503).json(health);
  });
}
