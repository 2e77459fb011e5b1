/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder and HTTP server lifecycle.
 */
import { CONFIG, type CliOverrides, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, setConsoleLogging } from "./utils/index.js";
import { ensureDataDirectory, getLogFilePath } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { LedgerContext, Nullable } from "./types/index.js";
import type { Server } from "http";
import consoleStamp from "console-stamp";
import { createLedgerContext } from "./ledger/index.js";
import express from "express";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/chanledger.log.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

// The HTTP server instance, kept so it can be closed during graceful shutdown.
let server: Nullable<Server> = null;

/**
 * Options for starting the server: the CLI overrides plus the logging mode.
 */
export interface ServerOptions extends CliOverrides {

  consoleLogging: boolean;
}

/*
 * GRACEFUL SHUTDOWN
 *
 * On SIGINT or SIGTERM we stop accepting connections and flush the file logger before exiting. An assignment run in progress finishes its atomic save or leaves
 * the previous map in place; either way the map on disk is whole.
 */

/**
 * Sets up signal handlers for graceful shutdown.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  function shutdown(): void {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    if(server) {

      server.close((error?: Error): void => {

        if(error) {

          LOG.error("Error closing server during shutdown: %s.", formatError(error));
        } else {

          LOG.info("HTTP server closed successfully.");
        }

        // Shut down file logger if in use.
        if(!usingConsoleLogging) {

          shutdownFileLogger();
        }

        process.exit(0);
      });

      // Open /events streams hold their connections indefinitely.
      server.closeAllConnections();

      return;
    }

    process.exit(0);
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/**
 * Tells whether an error comes from the JSON body parser rejecting a malformed request body.
 * @param error - The error.
 * @returns True for body parse failures.
 */
function isBodyParseError(error: unknown): boolean {

  return (error instanceof SyntaxError) && ("type" in error) && (error.type === "entity.parse.failed");
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup so tests can
 * build an application against their own ledger context.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param context - The ledger context the routes serve.
 * @returns The configured Express application.
 */
export function buildApp(context: LedgerContext): Express {

  const app = express();

  // Scrape results can carry thousands of channels.
  app.use(express.json({ limit: "10mb" }));

  // Configure Morgan for HTTP request logging based on httpLogLevel configuration. Morgan output goes through morganStream which handles timestamp formatting
  // consistently for both console and file logging modes.
  if(CONFIG.logging.httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";
    const morganStream = createMorganStream();

    if(CONFIG.logging.httpLogLevel === "errors") {

      // Log requests with 4xx or 5xx status codes only.
      app.use(morgan(morganFormat, { skip: (_req, res): boolean => res.statusCode < 400, stream: morganStream }));
    } else {

      // Log all requests.
      app.use(morgan(morganFormat, { stream: morganStream }));
    }
  }

  // Set up all HTTP endpoints.
  setupRoutes(app, context);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    if(isBodyParseError(err)) {

      res.status(400).json({ error: "Request body is not valid JSON." });

      return;
    }

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).json({ error: formatError(err) });
    }
  });

  return app;
}

/*
 * SERVER STARTUP
 */

/**
 * Initializes configuration and logging, then starts the HTTP server.
 * @param options - CLI overrides and the logging mode.
 */
export async function startServer(options: ServerOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(options.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file, environment variables and CLI flags, then validate.
  try {

    await initializeConfiguration(options);
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  // Ensure the data directory exists before any operations that depend on it.
  await ensureDataDirectory();

  // Initialize file logger if not using console logging.
  if(!options.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  displayConfiguration();
  setupGracefulShutdown();

  const context = createLedgerContext(CONFIG);

  // Surface a damaged channel map at startup rather than on the first scrape. The server still starts so /health can report it.
  try {

    const mapping = await context.store.load();

    LOG.info("Channel map %s holds %d channel numbers.", context.store.location, mapping.size);
  } catch(error) {

    LOG.error("The channel map cannot be loaded: %s. Assignment runs will fail until it is repaired.", formatError(error));
  }

  const app = buildApp(context);

  await new Promise<void>((resolve, reject) => {

    server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

      LOG.info("chanledger is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);

      resolve();
    });

    server.once("error", reject);
  });
}
