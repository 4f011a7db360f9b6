/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for icytune.
 */
import type { Config, Nullable, PlayerKind } from "../types/index.js";
import { LOG, formatError, hasErrorCode } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";
import { isPlayerKind } from "../streaming/dialects.js";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * icytune reads optional settings from config.json in the data directory (~/.icytune by default). The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data dir>/config.json)
 * 3. Environment variables
 * 4. Command-line flags (applied by the CLI after merging)
 *
 * A value of the wrong type in config.json is ignored with a warning, leaving the default in place. Range checks happen afterwards in validateConfiguration().
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, environment variable name, and a description. This metadata drives environment parsing, the
 * --list-env output, and the type checks applied to config.json values.
 */

/**
 * Metadata describing a single configuration setting. Default values live in DEFAULTS.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "status.port").
  path: string;

  // Data type for parsing and validation. "list" values are comma-separated in the environment and arrays in config.json.
  type: "boolean" | "host" | "integer" | "list" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement shown by --list-env (e.g., "ms", "bytes").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  catalog: [
    {

      description: "URL of the channel list.",
      envVar: "ICYTUNE_CATALOG_URL",
      path: "catalog.url",
      type: "string"
    },
    {

      description: "How long the cached channel list is used before it is fetched again.",
      envVar: "ICYTUNE_CATALOG_TTL",
      max: 604800000,
      min: 60000,
      path: "catalog.cacheTtl",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Preferred stream quality when a channel offers several.",
      envVar: "ICYTUNE_QUALITY",
      path: "catalog.quality",
      type: "string",
      validValues: [ "highest", "high", "low" ]
    }
  ],

  logging: [
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent entries.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  notifications: [
    {

      description: "Show a desktop notification for every new track.",
      envVar: "ICYTUNE_NOTIFY",
      path: "notifications.enabled",
      type: "boolean"
    },
    {

      description: "Command to run for every new track. The title and channel name are appended as arguments.",
      envVar: "ICYTUNE_NOTIFY_COMMAND",
      path: "notifications.command",
      type: "string"
    },
    {

      description: "Download channel icons and show them in desktop notifications.",
      envVar: "ICYTUNE_NOTIFY_ICONS",
      path: "notifications.icons",
      type: "boolean"
    }
  ],

  playback: [
    {

      description: "Highlight station identification titles.",
      envVar: "ICYTUNE_STATION_HIGHLIGHT",
      path: "playback.stationHighlight",
      type: "boolean"
    },
    {

      description: "Substrings that mark a title as a station identification. These titles are shown but never logged or announced.",
      envVar: "ICYTUNE_STATION_IDS",
      path: "playback.stationIds",
      type: "list"
    },
    {

      description: "Echo player output lines that are neither header fields nor titles.",
      envVar: "ICYTUNE_VERBOSE",
      path: "playback.verbose",
      type: "boolean"
    }
  ],

  player: [
    {

      description: "Player to use. Leave empty to use the first of mpv, mplayer, mpg123 that is installed.",
      envVar: "ICYTUNE_PLAYER",
      path: "player.kind",
      type: "string",
      validValues: [ "mpv", "mplayer", "mpg123" ]
    }
  ],

  status: [
    {

      description: "Serve the now-playing state over HTTP so another device can follow along.",
      envVar: "ICYTUNE_STATUS",
      path: "status.enabled",
      type: "boolean"
    },
    {

      description: "Address the status server binds to.",
      envVar: "ICYTUNE_STATUS_HOST",
      path: "status.host",
      type: "host"
    },
    {

      description: "TCP port of the status server.",
      envVar: "ICYTUNE_STATUS_PORT",
      max: 65535,
      min: 1,
      path: "status.port",
      type: "port"
    }
  ],

  tracks: [
    {

      description: "Remove repeated titles per channel when the track log is written.",
      envVar: "ICYTUNE_DEDUPLICATE",
      path: "tracks.deduplicate",
      type: "boolean"
    },
    {

      description: "Record played titles in the track log.",
      envVar: "ICYTUNE_TRACK_LOG",
      path: "tracks.enabled",
      type: "boolean"
    }
  ]
};

/**
 * Result of loading the user config file.
 */
export interface UserConfigLoadResult {

  // The parsed file content, or an empty object if the file is missing or unreadable.
  config: unknown;

  // True if the config file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file contains invalid JSON.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(): Promise<UserConfigLoadResult> {

  const configFilePath = getConfigFilePath();
  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    // A missing file is normal: defaults apply.
    if(!hasErrorCode(error, "ENOENT")) {

      LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));
    }

    return { config: {}, parseError: false };
  }

  try {

    const config: unknown = JSON.parse(content);

    return { config, parseError: false };
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }
}

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  catalog: {

    cacheTtl: 86400000,
    quality: "highest",
    url: "https://somafm.com/channels.json"
  },

  logging: {

    maxSize: 1048576
  },

  notifications: {

    command: null,
    enabled: false,
    icons: true
  },

  playback: {

    stationHighlight: true,
    stationIds: [ "SomaFM" ],
    verbose: false
  },

  player: {

    kind: null
  },

  status: {

    enabled: false,
    host: "127.0.0.1",
    port: 5590
  },

  tracks: {

    deduplicate: true,
    enabled: true
  }
};

/**
 * Returns a deep copy of the default configuration.
 * @returns A copy of DEFAULTS that callers may modify.
 */
export function getDefaults(): Config {

  return structuredClone(DEFAULTS);
}

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): boolean | number | string | string[] | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.trim().toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "list": {

      return value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0);
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "status.port").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if((current === null) || (typeof current !== "object") || !Object.hasOwn(current, part)) {

      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

/**
 * Finds the metadata of a setting.
 * @param settingPath - Dot-separated path of the setting.
 * @returns The metadata, or undefined for an unknown path.
 */
export function getSettingByPath(settingPath: string): SettingMetadata | undefined {

  for(const settings of Object.values(CONFIG_METADATA)) {

    const setting = settings.find((entry) => entry.path === settingPath);

    if(setting) {

      return setting;
    }
  }

  return undefined;
}

/*
 * CONFIGURATION MERGING
 *
 * Each setting is resolved on its own: the environment variable when set and parseable, then the config file value, then the default. The typed readers below check
 * the resolved value against the setting's TypeScript type, so the merged Config is well-typed without trusting the content of config.json.
 */

/**
 * Resolves the raw value of a setting from the environment and the user config.
 * @param userConfig - Parsed config.json content.
 * @param settingPath - Dot-separated path of the setting.
 * @returns The raw value, or undefined when neither layer provides one.
 */
function resolveRawValue(userConfig: unknown, settingPath: string): unknown {

  const setting = getSettingByPath(settingPath);
  const envValue = setting?.envVar ? process.env[setting.envVar] : undefined;

  if(setting && (envValue !== undefined)) {

    const parsed = parseEnvValue(envValue, setting.type);

    if(parsed !== undefined) {

      return parsed;
    }

    LOG.warn("Ignoring %s=%s: not a valid %s.", setting.envVar, envValue, setting.type);
  }

  return getNestedValue(userConfig, settingPath);
}

/**
 * Reads a setting, accepting the resolved value only when it passes the type guard.
 * @param userConfig - Parsed config.json content.
 * @param settingPath - Dot-separated path of the setting.
 * @param fallback - The default value.
 * @param guard - Type guard for the setting's type.
 * @param expected - Description of the expected type for the warning.
 * @returns The resolved value, or the fallback.
 */
function readSetting<T>(userConfig: unknown, settingPath: string, fallback: T, guard: (value: unknown) => value is T, expected: string): T {

  const value = resolveRawValue(userConfig, settingPath);

  if(value === undefined) {

    return fallback;
  }

  if(guard(value)) {

    return value;
  }

  LOG.warn("Ignoring configuration value for %s: expected %s, got %j.", settingPath, expected, value);

  return fallback;
}

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isNumber = (value: unknown): value is number => (typeof value === "number") && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === "string";
const isStringList = (value: unknown): value is string[] => Array.isArray(value) && value.every((entry) => typeof entry === "string");

// An empty string clears an optional setting, which lets an environment variable override a value from config.json with "nothing".
const isOptionalString = (value: unknown): value is Nullable<string> => (value === null) || (typeof value === "string");
const isOptionalPlayer = (value: unknown): value is Nullable<PlayerKind> => (value === null) || ((typeof value === "string") && isPlayerKind(value));

/**
 * Normalizes an optional string so that blank values become null.
 * @param value - The value to normalize.
 * @returns The trimmed value, or null.
 */
function blankToNull<T extends string>(value: Nullable<T>): Nullable<T> {

  return ((value === null) || (value.trim().length === 0)) ? null : value;
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults.
 * @param userConfig - Parsed config.json content.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: unknown): Config {

  return {

    catalog: {

      cacheTtl: readSetting(userConfig, "catalog.cacheTtl", DEFAULTS.catalog.cacheTtl, isNumber, "a number"),
      quality: readSetting(userConfig, "catalog.quality", DEFAULTS.catalog.quality, isString, "a string"),
      url: readSetting(userConfig, "catalog.url", DEFAULTS.catalog.url, isString, "a string")
    },

    logging: {

      maxSize: readSetting(userConfig, "logging.maxSize", DEFAULTS.logging.maxSize, isNumber, "a number")
    },

    notifications: {

      command: blankToNull(readSetting(userConfig, "notifications.command", DEFAULTS.notifications.command, isOptionalString, "a string")),
      enabled: readSetting(userConfig, "notifications.enabled", DEFAULTS.notifications.enabled, isBoolean, "true or false"),
      icons: readSetting(userConfig, "notifications.icons", DEFAULTS.notifications.icons, isBoolean, "true or false")
    },

    playback: {

      stationHighlight: readSetting(userConfig, "playback.stationHighlight", DEFAULTS.playback.stationHighlight, isBoolean, "true or false"),
      stationIds: [...readSetting(userConfig, "playback.stationIds", DEFAULTS.playback.stationIds, isStringList, "a list of strings")],
      verbose: readSetting(userConfig, "playback.verbose", DEFAULTS.playback.verbose, isBoolean, "true or false")
    },

    player: {

      kind: resolvePlayerKind(resolveRawValue(userConfig, "player.kind") ?? DEFAULTS.player.kind)
    },

    status: {

      enabled: readSetting(userConfig, "status.enabled", DEFAULTS.status.enabled, isBoolean, "true or false"),
      host: readSetting(userConfig, "status.host", DEFAULTS.status.host, isString, "a string"),
      port: readSetting(userConfig, "status.port", DEFAULTS.status.port, isNumber, "a number")
    },

    tracks: {

      deduplicate: readSetting(userConfig, "tracks.deduplicate", DEFAULTS.tracks.deduplicate, isBoolean, "true or false"),
      enabled: readSetting(userConfig, "tracks.enabled", DEFAULTS.tracks.enabled, isBoolean, "true or false")
    }
  };
}

/**
 * Turns the raw player setting into a player kind. Blank means autodetect; an unknown name is reported and also falls back to autodetection.
 * @param value - The raw setting value.
 * @returns The configured player, or null for autodetection.
 */
function resolvePlayerKind(value: unknown): Nullable<PlayerKind> {

  const candidate = (typeof value === "string") ? blankToNull(value.trim().toLowerCase()) : value;

  if(isOptionalPlayer(candidate)) {

    return candidate;
  }

  LOG.warn("Ignoring configuration value for player.kind: expected one of mpv, mplayer, mpg123, got %j.", value);

  return null;
}
