/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for icytune.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "node:util";
import { writeLogEntry } from "./fileLogger.js";

/* The terminal belongs to the player output we render (stream header, timestamped titles), so diagnostics go to a log file by default. The --console flag sends
 * them to stderr instead, colored, which is handy when debugging a dialect. Either way, debug messages are filtered by category (see debugFilter.ts).
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

export type LogLevel = "debug" | "error" | "info" | "warn";

// Flag indicating whether to log to the console instead of the log file.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to the console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables all debug categories. ICYTUNE_DEBUG allows finer selection.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all log levels.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Debug category, for debug messages.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], categoryTag?: string): void {

  const formatted = args.length > 0 ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, formatted, color || undefined, categoryTag);

    return;
  }

  // Everything goes to stderr in console mode so that stdout carries only the now-playing output.
  /* eslint-disable no-console */
  if(color) {

    console.error("%s%s%s", color, formatted, ANSI_COLORS.reset);
  } else {

    console.error(formatted);
  }
  /* eslint-enable no-console */
}

/* The LOG object is the single logging interface. All methods accept a printf-style format string (%s, %d, %j, %o) followed by arguments.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan when its category is enabled via ICYTUNE_DEBUG or --debug.
   * @param category - The debug category (e.g., "session", "player").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for degraded but recoverable situations: an unreadable track log, a failed notification, a player that exited
   * with an error.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};
