/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for chanledger.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError, isNotFoundError } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * Settings live in config.json inside the data directory. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (highest priority, applied in config/index.ts)
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here; use getNestedValue(DEFAULTS, setting.path).
 */
export interface SettingMetadata {

  // Human-readable description, listed by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "ledger.firstNumber").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "host" | "integer" | "path" | "port" | "string";

  // Unit of measurement (e.g., "bytes").
  unit?: string;

  // Valid values for string type settings.
  validValues?: string[];
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  ledger: [
    {

      description: "Absolute path to the channel map file. Leave empty to use channel_map.json in the data directory.",
      envVar: "CHANLEDGER_MAP_FILE",
      path: "ledger.mapFile",
      type: "path"
    },
    {

      description: "Lowest channel number handed out. New channels always get a number above the highest one already assigned, and never below this floor.",
      envVar: "CHANLEDGER_FIRST_NUMBER",
      max: 999999,
      min: 1,
      path: "ledger.firstNumber",
      type: "integer"
    }
  ],

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables logging, \"errors\" logs only 4xx/5xx responses, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "all" ]
    },
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent logs.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Absolute path to the log file. Leave empty to use chanledger.log in the data directory.",
      envVar: "CHANLEDGER_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    }
  ],

  playlist: [
    {

      description: "Write playlist.json and playlist.m3u after every assignment run.",
      envVar: "PLAYLIST_ENABLED",
      path: "playlist.enabled",
      type: "boolean"
    },
    {

      description: "Group title for channels that arrive without tags.",
      envVar: "PLAYLIST_DEFAULT_GROUP",
      path: "playlist.defaultGroup",
      type: "string"
    },
    {

      description: "Absolute path to the JSON playlist. Leave empty to use playlist.json in the data directory.",
      envVar: "PLAYLIST_JSON_FILE",
      path: "playlist.jsonFile",
      type: "path"
    },
    {

      description: "Absolute path to the M3U playlist. Leave empty to use playlist.m3u in the data directory.",
      envVar: "PLAYLIST_M3U_FILE",
      path: "playlist.m3uFile",
      type: "path"
    }
  ],

  server: [
    {

      description: "TCP port for the HTTP server.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    },
    {

      description: "Address the HTTP server binds to. Use 127.0.0.1 to accept local connections only.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    }
  ]
};

/*
 * USER CONFIG TYPES
 *
 * The user config file stores partial configuration: only the settings that differ from defaults.
 */

/**
 * Raw contents of config.json: a partial Config holding only the settings that differ from defaults. Values are untrusted until merged and validated.
 */
export type UserConfig = Record<string, unknown>;

/**
 * Checks whether a value is a plain JSON object.
 * @param value - The value to check.
 * @returns True for non-null, non-array objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if file missing or parse error).
  config: UserConfig;

  // True if the config file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but is not a JSON
 * object. A broken config file is not fatal: the defaults are safe, unlike a broken channel map.
 * @param configFilePath - Path to config.json.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(configFilePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if(!isNotFoundError(error)) {

      LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));
    }

    return { config: {}, parseError: false };
  }

  try {

    const parsed: unknown = JSON.parse(content);

    if(!isPlainObject(parsed)) {

      throw new Error("expected a JSON object");
    }

    return { config: parsed, parseError: false };
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }
}

/**
 * Hard-coded default configuration values.
 */
export const DEFAULTS: Config = {

  ledger: {

    firstNumber: 1,
    mapFile: null
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  playlist: {

    defaultGroup: "Uncategorized",
    enabled: true,
    jsonFile: null,
    m3uFile: null
  },

  server: {

    host: "0.0.0.0",
    port: 5590
  }
};

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string> | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      // An empty path variable restores the data directory default.
      return (value.length > 0) ? value : null;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "server.port").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isPlainObject(current) || !Object.hasOwn(current, part)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "server.port").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(let i = 0; i < (parts.length - 1); i++) {

    const part = parts[i];
    const next = current[part];

    if(isPlainObject(next)) {

      current = next;
    } else {

      const created: Record<string, unknown> = {};

      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults. Only settings
 * described in CONFIG_METADATA are read from either source.
 * @param userConfig - User configuration from the config file.
 * @param env - The environment to read overrides from.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env): Config {

  // Start with a deep copy of defaults. Merged values are type-checked afterwards by validateConfiguration().
  const config = structuredClone(DEFAULTS);
  const target = config as unknown as Record<string, unknown>;

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const userValue = getNestedValue(userConfig, setting.path);

      if(userValue !== undefined) {

        setNestedValue(target, setting.path, userValue);
      }

      const envValue = setting.envVar ? env[setting.envVar] : undefined;
      const parsedValue = (envValue === undefined) ? undefined : parseEnvValue(envValue, setting.type);

      if(parsedValue !== undefined) {

        setNestedValue(target, setting.path, parsedValue);
      }
    }
  }

  return config;
}
