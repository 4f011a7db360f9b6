/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for icytune.
 */
import os from "node:os";
import path from "node:path";

/* Every file icytune reads or writes lives under one data directory: config.json, the cached channel list, downloaded channel icons, the track log, the log file
 * and the single-instance lock. The directory is resolved once at startup, before config.json is loaded, since it determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (ICYTUNE_DATA_DIR)
 *   3. Default (~/.icytune)
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time to override an earlier resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws If ICYTUNE_DATA_DIR or the flag is not an absolute path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const candidate = cliDataDir ?? process.env.ICYTUNE_DATA_DIR;

  if(!candidate) {

    resolvedDataDir = path.join(os.homedir(), ".icytune");

    return;
  }

  if(!path.isAbsolute(candidate)) {

    throw new Error([ cliDataDir ? "--data-dir" : "ICYTUNE_DATA_DIR", " must be an absolute path, got: ", candidate ].join(""));
  }

  resolvedDataDir = candidate;
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
 * Returns the path of the cached channel catalog.
 * @returns The absolute path to channels.json inside the data directory.
 */
export function getCatalogCachePath(): string {

  return path.join(getDataDir(), "channels.json");
}

/**
 * Returns the directory holding downloaded channel icons.
 * @returns The absolute path to the icons directory.
 */
export function getIconsDir(): string {

  return path.join(getDataDir(), "icons");
}

/**
 * Returns the path of the persisted track log.
 * @returns The absolute path to tracks.json inside the data directory.
 */
export function getTrackLogPath(): string {

  return path.join(getDataDir(), "tracks.json");
}

/**
 * Returns the path of the single-instance lock file.
 * @returns The absolute path to icytune.lock inside the data directory.
 */
export function getLockFilePath(): string {

  return path.join(getDataDir(), "icytune.lock");
}

/**
 * Returns the log file path.
 * @returns The absolute path to icytune.log inside the data directory.
 */
export function getLogFilePath(): string {

  return path.join(getDataDir(), "icytune.log");
}
