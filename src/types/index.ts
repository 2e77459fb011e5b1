/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for chanledger.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, environment variables and CLI flags, and are validated at startup.
 */

/**
 * Channel ledger configuration.
 */
export interface LedgerConfig {

  // The lowest channel number the allocator hands out. New numbers are always above the highest number already in use, and never below this floor. Environment
  // variable: CHANLEDGER_FIRST_NUMBER. Default: 1.
  firstNumber: number;

  // Absolute path to the channel map file. When null, channel_map.json inside the data directory is used. Environment variable: CHANLEDGER_MAP_FILE.
  mapFile: Nullable<string>;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level: "none" disables it, "errors" logs 4xx/5xx responses only, "all" logs every request. Environment variable: HTTP_LOG_LEVEL.
  httpLogLevel: "all" | "errors" | "none";

  // Maximum log file size in bytes. When exceeded, the file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1MB).
  maxSize: number;
}

/**
 * Filesystem paths that can be overridden individually.
 */
export interface PathsConfig {

  // Absolute path to the log file. When null, chanledger.log inside the data directory is used. Environment variable: CHANLEDGER_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Playlist output configuration.
 */
export interface PlaylistConfig {

  // Group title for channels whose discovery record carries no tags. Environment variable: PLAYLIST_DEFAULT_GROUP.
  defaultGroup: string;

  // Whether assignment runs write the JSON and M3U playlists. Environment variable: PLAYLIST_ENABLED.
  enabled: boolean;

  // Absolute path to the JSON playlist. When null, playlist.json inside the data directory is used. Environment variable: PLAYLIST_JSON_FILE.
  jsonFile: Nullable<string>;

  // Absolute path to the M3U playlist. When null, playlist.m3u inside the data directory is used. Environment variable: PLAYLIST_M3U_FILE.
  m3uFile: Nullable<string>;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {

  // Address to bind. Environment variable: HOST. Default: 0.0.0.0.
  host: string;

  // TCP port. Environment variable: PORT. Default: 5590.
  port: number;
}

/**
 * Root configuration object.
 */
export interface Config {

  ledger: LedgerConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  playlist: PlaylistConfig;
  server: ServerConfig;
}

/*
 * LEDGER TYPES
 */

/**
 * The persisted stream path to channel number mapping. A Map rather than a plain object so that any string is a valid key.
 */
export type ChannelMapping = ReadonlyMap<string, number>;

/**
 * A single newly minted stream path to channel number pair.
 */
export interface ChannelAssignment {

  channelNumber: number;
  streamPath: string;
}

/**
 * The notification emitted once per new assignment.
 */
export interface AssignmentEvent extends ChannelAssignment {

  // ISO 8601 time at which the assignment was persisted.
  timestamp: string;
}

/**
 * Durable storage for the channel mapping. Implementations must fail on unreadable state rather than return an empty mapping, and must replace the stored mapping
 * atomically on save.
 */
export interface MappingStore {

  // Human-readable description of the backing resource, used in diagnostics.
  readonly location: string;

  load(): Promise<ChannelMapping>;
  save(mapping: ChannelMapping): Promise<void>;
}

/*
 * DISCOVERY AND PLAYLIST TYPES
 */

/**
 * A channel as reported by the upstream scraper. Only the stream path takes part in numbering; the rest is carried through to the playlist.
 */
export interface DiscoveredChannel {

  logo?: string;
  name?: string;
  streamPath: string;
  tags?: string;
  url?: string;
}

/**
 * What an assignment run needs: the store, the allocation floor and the playlist settings. Built once from CONFIG by the CLI and the server.
 */
export interface LedgerContext {

  firstNumber: number;
  playlist: PlaylistOutput;
  store: MappingStore;
}

/**
 * Where and whether to write playlists, with file paths already resolved against the data directory.
 */
export interface PlaylistOutput {

  defaultGroup: string;
  enabled: boolean;
  jsonFile: string;
  m3uFile: string;
}

/**
 * A channel record in the generated playlist. Field names match the playlist.json format.
 */
export interface PlaylistRecord {

  channel_number: number;
  group: string;
  logo: string;
  name: string;
  stream_path: string;
  url: Nullable<string>;
}

/*
 * HTTP TYPES
 */

/**
 * Health status returned by the /health endpoint.
 */
export interface HealthStatus {

  channels: number;
  highestNumber: number;
  mapFile: string;
  message?: string;
  status: "healthy" | "unhealthy";
  uptime: number;
  version: string;
}
