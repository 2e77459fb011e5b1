/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for chanledger.
 */
import type { Config, PlaylistOutput } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

/* This module is the single source of truth for all filesystem paths. The data directory is resolved once at startup via initializeDataDir(), before config.json is
 * loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (CHANLEDGER_DATA_DIR)
 *   3. Default (~/.chanledger)
 *
 * The channel map, playlist and log file paths are stored in Config (settable via config.json, env var, or CLI flag) and fall back to files inside the data
 * directory.
 */

let resolvedDataDir: string | undefined;

/**
 * Thrown when the data directory setting is unusable.
 */
export class DataDirError extends Error {

  constructor(message: string) {

    super(message);

    this.name = "DataDirError";
  }
}

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time with a CLI flag to override the initial
 * resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws DataDirError if CHANLEDGER_DATA_DIR is not an absolute path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.CHANLEDGER_DATA_DIR;

  if(cliDataDir) {

    // The CLI flag is validated by requireAbsolutePath() in index.ts.
    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new DataDirError("CHANLEDGER_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".chanledger");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the channel map file path.
 * @param config - The application configuration.
 * @returns config.ledger.mapFile when set, otherwise channel_map.json inside the data directory.
 */
export function getChannelMapFilePath(config: Config): string {

  return config.ledger.mapFile ?? path.join(getDataDir(), "channel_map.json");
}

/**
 * Returns the JSON playlist path.
 * @param config - The application configuration.
 * @returns config.playlist.jsonFile when set, otherwise playlist.json inside the data directory.
 */
export function getPlaylistJsonFilePath(config: Config): string {

  return config.playlist.jsonFile ?? path.join(getDataDir(), "playlist.json");
}

/**
 * Returns the M3U playlist path.
 * @param config - The application configuration.
 * @returns config.playlist.m3uFile when set, otherwise playlist.m3u inside the data directory.
 */
export function getPlaylistM3UFilePath(config: Config): string {

  return config.playlist.m3uFile ?? path.join(getDataDir(), "playlist.m3u");
}

/**
 * Returns the log file path.
 * @param config - The application configuration.
 * @returns config.paths.logFile when set, otherwise chanledger.log inside the data directory.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "chanledger.log");
}

/**
 * Resolves the playlist settings against the data directory.
 * @param config - The application configuration.
 * @returns The playlist settings with both file paths filled in.
 */
export function getPlaylistOutput(config: Config): PlaylistOutput {

  return { defaultGroup: config.playlist.defaultGroup, enabled: config.playlist.enabled, jsonFile: getPlaylistJsonFilePath(config),
    m3uFile: getPlaylistM3UFilePath(config) };
}

/**
 * Creates the data directory if it does not exist.
 */
export async function ensureDataDirectory(): Promise<void> {

  try {

    await fsPromises.mkdir(getDataDir(), { recursive: true });

    LOG.debug("config", "Data directory ready: %s.", getDataDir());
  } catch(error) {

    LOG.error("Failed to create data directory %s: %s.", getDataDir(), formatError(error));

    throw error;
  }
}
