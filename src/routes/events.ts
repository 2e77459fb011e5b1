/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * events.ts: Server-Sent Events stream of new channel assignments.
 */
import type { Express, Request, Response } from "express";
import { LOG } from "../utils/index.js";
import { subscribeToAssignments } from "../ledger/index.js";

/**
 * Creates the assignment event stream endpoint. Each newly persisted assignment is sent as an "assignment" event whose data is the JSON-encoded event.
 * @param app - The Express application.
 */
export function setupEventsEndpoint(app: Express): void {

  app.get("/events", (req: Request, res: Response): void => {

    // Set SSE headers. The Content-Type must be text/event-stream for the client to recognize this as an SSE connection.
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");

    // Disable response buffering to ensure events are sent immediately.
    res.flushHeaders();

    const unsubscribe = subscribeToAssignments((event) => {

      res.write("event: assignment\n");
      res.write("data: " + JSON.stringify(event) + "\n\n");
    });

    // Send a named heartbeat event every 30 seconds to keep the connection alive through proxies.
    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, 30000);

    LOG.debug("http", "Event stream client connected from %s.", req.socket.remoteAddress ?? "unknown");

    req.on("close", () => {

      LOG.debug("http", "Event stream client disconnected.");

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
