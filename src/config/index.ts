/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for icytune.
 */
import { CONFIG_METADATA, getDefaults, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import type { Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters. Priority (highest to lowest):
 *
 * 1. Command-line flags (applied by index.ts after initialization)
 * 2. Environment variables (ICYTUNE_* naming)
 * 3. User config file (<data dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - catalog: Where the channel list comes from, how long it is cached, preferred stream quality
 * - player: Which external player to launch
 * - playback: Station identification handling and verbose output
 * - tracks: Track log recording and deduplication
 * - notifications: Desktop notifications and the custom per-track command
 * - status: The now-playing HTTP mirror
 * - logging: Log file size
 */

// Starts as a copy of DEFAULTS and is replaced by the merged configuration during startup.
export let CONFIG: Config = getDefaults();

/**
 * Indicates whether config.json contained invalid JSON during initialization.
 */
export let configParseError = false;

/**
 * Loads the user config file, merges it with defaults, and applies environment variable overrides. Must be called after initializeDataDir() and before any code
 * reads CONFIG.
 */
export async function initializeConfiguration(): Promise<void> {

  const result = await loadUserConfig();

  configParseError = result.parseError;
  CONFIG = mergeConfiguration(result.config);

  LOG.debug("session", "Configuration initialized from defaults, user config, and environment variables.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Validation collects every problem before reporting, so a user fixing config.json sees the complete list at once.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

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
 * Validates a configuration against the bounds and valid values in CONFIG_METADATA.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const value = getNestedValue(config, setting.path);
      const name = setting.envVar ?? setting.path;

      if(((setting.type === "integer") || (setting.type === "port")) && (typeof value === "number")) {

        const error = validatePositiveInt(name, value, setting.min, setting.max);

        if(error) {

          errors.push(error);
        }
      }

      if(setting.validValues && (typeof value === "string") && !setting.validValues.includes(value)) {

        errors.push([ name, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join(""));
      }
    }
  }

  try {

    new URL(config.catalog.url);
  } catch {

    errors.push([ "ICYTUNE_CATALOG_URL must be a valid URL, got: ", config.catalog.url ].join(""));
  }

  if(config.status.host.trim().length === 0) {

    errors.push("ICYTUNE_STATUS_HOST must not be empty.");
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the active configuration at startup.
 */
export function displayConfiguration(): void {

  LOG.info("Starting icytune with configuration:");
  LOG.info("  Player: %s", CONFIG.player.kind ?? "autodetect");
  LOG.info("  Catalog: %s (cached for %s minutes, %s quality)", CONFIG.catalog.url, Math.round(CONFIG.catalog.cacheTtl / 60000), CONFIG.catalog.quality);
  LOG.info("  Station IDs: %s", CONFIG.playback.stationIds.join(", ") || "none");
  LOG.info("  Track log: %s", CONFIG.tracks.enabled ? (CONFIG.tracks.deduplicate ? "enabled, deduplicated" : "enabled") : "disabled");
  LOG.info("  Notifications: %s", CONFIG.notifications.enabled ? "enabled" : "disabled");
  LOG.info("  Status server: %s", CONFIG.status.enabled ? [ CONFIG.status.host, ":", String(CONFIG.status.port) ].join("") : "disabled");

  if(configParseError) {

    LOG.warn("config.json could not be parsed and was ignored.");
  }
}
