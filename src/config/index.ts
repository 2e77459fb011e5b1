/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for chanledger.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import type { Config, Nullable } from "../types/index.js";
import { getChannelMapFilePath, getConfigFilePath, getLogFilePath, getPlaylistJsonFilePath, getPlaylistM3UFilePath } from "./paths.js";
import { LOG } from "../utils/index.js";
import path from "node:path";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters. Priority (highest to lowest):
 *
 * 1. CLI flags (--port, --map-file, --log-file)
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - ledger: Channel map location and the lowest number handed out
 * - playlist: Whether and where playlists are written
 * - server: Network binding for the HTTP server
 * - logging: HTTP request logging and log file size
 * - paths: Log file location
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Indicates whether a user config file parse error occurred during initialization.
 */
export let configParseError = false;

/**
 * Settings given on the command line. They override every other source.
 */
export interface CliOverrides {

  logFile?: string;
  mapFile?: string;
  port?: number;
}

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable and CLI overrides. This must be called
 * after initializeDataDir() and before any code reads CONFIG.
 * @param overrides - Settings from CLI flags.
 */
export async function initializeConfiguration(overrides: CliOverrides = {}): Promise<void> {

  const result = await loadUserConfig(getConfigFilePath());

  configParseError = result.parseError;

  CONFIG = mergeConfiguration(result.config);

  if(overrides.port !== undefined) {

    CONFIG.server.port = overrides.port;
  }

  if(overrides.mapFile !== undefined) {

    CONFIG.ledger.mapFile = overrides.mapFile;
  }

  if(overrides.logFile !== undefined) {

    CONFIG.paths.logFile = overrides.logFile;
  }

  LOG.debug("config", "Configuration initialized from defaults, user config, environment variables and CLI flags.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Validation runs once after initialization. All errors are collected before failing so an operator can fix every problem in one pass. Values from config.json are
 * untrusted, so every setting is checked against its declared type as well as its range.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range. Returns an error message if validation fails, allowing the caller to collect
 * all errors before reporting them.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: unknown, min?: number, max?: number): Nullable<string> {

  if((typeof value !== "number") || !Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates a configuration object against CONFIG_METADATA.
 * @param config - The configuration to check.
 * @returns The list of problems, empty when the configuration is valid.
 */
export function collectConfigurationErrors(config: Config): string[] {

  const errors: string[] = [];

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const name = setting.envVar ?? setting.path;
      const value = getNestedValue(config, setting.path);

      switch(setting.type) {

        case "boolean": {

          if(typeof value !== "boolean") {

            errors.push(name + " must be true or false, got: " + String(value));
          }

          break;
        }

        case "integer":
        case "port": {

          const error = validatePositiveInt(name, value, setting.min, setting.max);

          if(error) {

            errors.push(error);
          }

          break;
        }

        case "path": {

          if((value !== null) && ((typeof value !== "string") || !path.isAbsolute(value))) {

            errors.push(name + " must be an absolute path, got: " + String(value));
          }

          break;
        }

        default: {

          if((typeof value !== "string") || (value.length === 0)) {

            errors.push(name + " must be a non-empty string, got: " + String(value));
          } else if(setting.validValues && !setting.validValues.includes(value)) {

            errors.push(name + " must be one of " + setting.validValues.join(", ") + ", got: " + value);
          }

          break;
        }
      }
    }
  }

  return errors;
}

/**
 * Validates the active configuration.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(): void {

  const errors = collectConfigurationErrors(CONFIG);

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the active configuration at server startup.
 */
export function displayConfiguration(): void {

  LOG.info("Starting chanledger with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Channel map: %s", getChannelMapFilePath(CONFIG));
  LOG.info("  First channel number: %s", CONFIG.ledger.firstNumber);
  LOG.info("  Playlists: %s", CONFIG.playlist.enabled ? getPlaylistJsonFilePath(CONFIG) + ", " + getPlaylistM3UFilePath(CONFIG) : "disabled");
  LOG.info("  Log file: %s", getLogFilePath(CONFIG));

  if(configParseError) {

    LOG.warn("The configuration file %s could not be parsed. Defaults are in effect.", getConfigFilePath());
  }
}
