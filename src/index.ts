#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for chanledger.
 */
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setConsoleLogging, setDebugLogging } from "./utils/index.js";
import { DataDirError, initializeDataDir } from "./config/paths.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import path from "node:path";
import { startServer } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions so a stray error in one request does not take the server down. Assignment runs report
 * their own failures; anything arriving here is logged and the process continues.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

// Commands that run once and exit. Anything else starts the server.
const LEDGER_COMMANDS = [ "assign", "check", "list" ];

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: chanledger [command] [options]");
  console.log("");
  console.log("Commands:");
  console.log("  assign <discovery-file>         Assign channel numbers to newly discovered streams (JSON or M3U)");
  console.log("  check                           Validate the channel map");
  console.log("  list                            Print the channel map sorted by channel number");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: 5590)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.chanledger)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/chanledger.log)");
  console.log("  --map-file <path>               Set channel map path (default: <data-dir>/channel_map.json)");
  console.log("");
  console.log("If no command is specified, starts the chanledger server.");
  console.log("");
  console.log("  Run 'chanledger --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generates output dynamically from CONFIG_METADATA so it is always accurate.
 */
async function printEnvironmentVariables(): Promise<void> {

  const { CONFIG_METADATA, DEFAULTS, getNestedValue } = await import("./config/userConfig.js");

  /* eslint-disable no-console */

  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Ledger", key: "ledger" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Playlist", key: "playlist" }
  ];

  // Path settings default to null and resolve against the data directory at runtime.
  const dynamicDefaults = new Map<string, string>([

    [ "ledger.mapFile", "<data-dir>/channel_map.json" ],
    [ "paths.logFile", "<data-dir>/chanledger.log" ],
    [ "playlist.jsonFile", "<data-dir>/playlist.json" ],
    [ "playlist.m3uFile", "<data-dir>/playlist.m3u" ]
  ]);

  console.log("chanledger Environment Variables");
  console.log("");
  console.log("All settings can also be configured via config.json in the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of CONFIG_METADATA[category.key]) {

      const envVar = setting.envVar;

      if(!envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + envVar);

      // Truncate description to first sentence for brevity.
      const desc = setting.description;
      const periodSpace = desc.indexOf(". ");

      console.log("    " + ((periodSpace !== -1) ? desc.slice(0, periodSpace + 1) : desc));

      let defaultStr = dynamicDefaults.get(setting.path);

      if(defaultStr === undefined) {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // CHANLEDGER_DATA_DIR is resolved before config.json is loaded, since it decides where config.json lives. CHANLEDGER_DEBUG is read by the entry point only.
  console.log("");
  console.log("Special:");
  console.log("  CHANLEDGER_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.chanledger");
  console.log("");
  console.log("  CHANLEDGER_DEBUG");
  console.log("    Debug category filter (e.g., 'store', 'allocator,assign', '*,-http').");
  console.log("    Categories: " + DEBUG_CATEGORIES.map((entry) => entry.category).join(", "));
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  listEnv: boolean;
  logFile?: string;
  mapFile?: string;
  port?: number;
  positionals: string[];
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments. Values are returned rather than written to CONFIG, so that the configuration merge applies them at the correct priority.
 * @param args - The arguments after the script name.
 * @returns Parsed flags, values and positional arguments.
 */
function parseArgs(args: string[]): ParsedArgs {

  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false, listEnv: false, positionals: [] };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      case "-p":
      case "--port": {

        const port = parseInt(args[++i]);

        if(isNaN(port)) {

          // eslint-disable-next-line no-console
          console.error("Error: --port requires a numeric argument.");

          process.exit(1);
        }

        parsed.port = port;

        break;
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("chanledger v" + getPackageVersion());

        process.exit(0);
      }

      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--list-env": {

        parsed.listEnv = true;

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--map-file": {

        parsed.mapFile = requireAbsolutePath(arg, args[++i]);

        break;
      }

      default: {

        if(arg.startsWith("-")) {

          // eslint-disable-next-line no-console
          console.error("Error: Unknown option '" + arg + "'. Run 'chanledger --help' for usage.");

          process.exit(1);
        }

        parsed.positionals.push(arg);
      }
    }
  }

  return parsed;
}

const parsedArgs = parseArgs(process.argv.slice(2));

// Resolve the data directory before anything reads a path. The CLI flag takes precedence over CHANLEDGER_DATA_DIR.
try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  if(!(error instanceof DataDirError)) {

    throw error;
  }

  // eslint-disable-next-line no-console
  console.error("Error: " + error.message);

  process.exit(1);
}

// Enable debug logging before anything else runs. The CHANLEDGER_DEBUG environment variable takes precedence over the --debug flag, allowing category selection.
const debugEnv = process.env.CHANLEDGER_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

const [ command, ...commandArgs ] = parsedArgs.positionals;
const overrides = { logFile: parsedArgs.logFile, mapFile: parsedArgs.mapFile, port: parsedArgs.port };

if(parsedArgs.listEnv) {

  printEnvironmentVariables().then(() => {

    process.exit(0);
  }).catch((error: unknown) => {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error));

    process.exit(1);
  });
} else if(command !== undefined) {

  if(!LEDGER_COMMANDS.includes(command)) {

    // eslint-disable-next-line no-console
    console.error("Error: Unknown command '" + command + "'. Run 'chanledger --help' for usage.");

    process.exit(1);
  }

  // One-shot commands always log to the console. The command module loads lazily so the server path never pulls it in.
  setConsoleLogging(true);

  import("./cli/commands.js").then(async ({ handleLedgerCommand }) => handleLedgerCommand(command, commandArgs, overrides)).then((exitCode) => {

    process.exit(exitCode);
  }).catch((error: unknown) => {

    // eslint-disable-next-line no-console
    console.error("Command failed: " + formatError(error));

    process.exit(1);
  });
} else {

  /* Safety net for server exit paths. Fatal startup errors call process.exit(1) while their messages are still in the file logger's write buffer. The 'exit'
   * event runs synchronously, so only the synchronous flush is safe here. Graceful shutdown flushes through shutdownFileLogger() before reaching this point.
   */
  process.on("exit", (): void => {

    flushLogBufferSync();
  });

  startServer({ ...overrides, consoleLogging: parsedArgs.consoleLogging }).catch((error: unknown): void => {

    LOG.error("Fatal startup error occurred: %s.", formatError(error));

    process.exit(1);
  });
}
