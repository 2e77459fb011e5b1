/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * commands.ts: One-shot ledger commands run from the command line.
 */
import { CONFIG, type CliOverrides, initializeConfiguration, validateConfiguration } from "../config/index.js";
import { LOG, formatError } from "../utils/index.js";
import { createLedgerContext, highestNumber, processDiscovery } from "../ledger/index.js";
import type { LedgerContext } from "../types/index.js";
import { loadDiscovery } from "../discovery/index.js";
import path from "node:path";

/* Each handler returns a process exit code instead of exiting, so the entry point owns process.exit() and tests can call handlers directly. Results go to stdout;
 * diagnostics go through LOG, which is in console mode for every command.
 */

/**
 * Prints a message to stdout.
 * @param message - The message to print.
 */
function print(message: string): void {

  // eslint-disable-next-line no-console
  console.log(message);
}

/**
 * Prints an error message to stderr.
 * @param message - The error message to print.
 */
function printError(message: string): void {

  // eslint-disable-next-line no-console
  console.error(message);
}

/**
 * Runs one assignment pass over a discovery file.
 * @param context - The ledger context.
 * @param discoveryFile - The scraper output, JSON or M3U. Relative paths resolve against the working directory.
 * @returns Exit code: 0 on success, 1 on any failure.
 */
export async function handleAssign(context: LedgerContext, discoveryFile: string | undefined): Promise<number> {

  if(!discoveryFile) {

    printError("Error: assign requires a discovery file.");
    printError("Usage: chanledger assign <discovery-file>");

    return 1;
  }

  const source = path.resolve(discoveryFile);

  try {

    const discovered = await loadDiscovery(source);
    const result = await processDiscovery(discovered, context, source);

    print([ String(result.assigned.length), " new channel numbers assigned, ", String(result.mapping.size), " channels in ", context.store.location, "." ].join(""));

    return 0;
  } catch(error) {

    LOG.error("Assignment failed: %s.", formatError(error));

    return 1;
  }
}

/**
 * Prints the channel map sorted by channel number, one "<number>  <stream path>" line per channel.
 * @param context - The ledger context.
 * @returns Exit code: 0 on success, 1 if the map cannot be loaded.
 */
export async function handleList(context: LedgerContext): Promise<number> {

  try {

    const mapping = await context.store.load();
    const entries = [...mapping].sort((a, b) => a[1] - b[1]);

    for(const [ streamPath, channelNumber ] of entries) {

      print(String(channelNumber) + "  " + streamPath);
    }

    return 0;
  } catch(error) {

    LOG.error("Unable to list channels: %s.", formatError(error));

    return 1;
  }
}

/**
 * Loads and validates the channel map, printing its size and highest number.
 * @param context - The ledger context.
 * @returns Exit code: 0 if the map is valid or absent, 1 otherwise.
 */
export async function handleCheck(context: LedgerContext): Promise<number> {

  try {

    const mapping = await context.store.load();

    print([ "Channel map ", context.store.location, " is valid: ", String(mapping.size), " channels, highest number ", String(highestNumber(mapping.values())),
      "." ].join(""));

    return 0;
  } catch(error) {

    printError("Channel map check failed: " + formatError(error) + ".");

    return 1;
  }
}

/**
 * Initializes configuration and dispatches a ledger command.
 * @param command - The command name.
 * @param args - Positional arguments after the command.
 * @param overrides - Settings from CLI flags.
 * @returns Exit code.
 */
export async function handleLedgerCommand(command: string, args: string[], overrides: CliOverrides): Promise<number> {

  try {

    await initializeConfiguration(overrides);
    validateConfiguration();
  } catch(error) {

    printError(formatError(error));

    return 1;
  }

  const context = createLedgerContext(CONFIG);

  switch(command) {

    case "assign": {

      return handleAssign(context, args[0]);
    }

    case "check": {

      return handleCheck(context);
    }

    case "list": {

      return handleList(context);
    }

    default: {

      printError("Error: Unknown command '" + command + "'.");

      return 1;
    }
  }
}
