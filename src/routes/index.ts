/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator.
 */
import type { Express } from "express";
import type { LedgerContext } from "../types/index.js";
import { setupAssignEndpoint } from "./assign.js";
import { setupChannelsEndpoint } from "./channels.js";
import { setupEventsEndpoint } from "./events.js";
import { setupHealthEndpoint } from "./health.js";
import { setupPlaylistEndpoints } from "./playlist.js";

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param context - The ledger context every endpoint reads from.
 */
export function setupRoutes(app: Express, context: LedgerContext): void {

  setupAssignEndpoint(app, context);
  setupChannelsEndpoint(app, context);
  setupEventsEndpoint(app);
  setupHealthEndpoint(app, context);
  setupPlaylistEndpoints(app, context);
}

export { setupAssignEndpoint } from "./assign.js";
export { setupChannelsEndpoint } from "./channels.js";
export { setupEventsEndpoint } from "./events.js";
export { setupHealthEndpoint } from "./health.js";
export { setupPlaylistEndpoints } from "./playlist.js";
