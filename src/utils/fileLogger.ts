/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with automatic size-based trimming for icytune.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log entries are collected in memory and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY entries the real file size is checked; a file larger
 * than the configured maximum is cut down to its most recent half, on a line boundary, by writing a temporary file and renaming it over the original. Trimming is
 * skipped while debug logging is on. Timestamps match the console-stamp format used in console mode.
 */

// Interval in milliseconds between buffer flushes.
const FLUSH_INTERVAL_MS = 1000;

// Number of writes between file size checks.
const SIZE_CHECK_FREQUENCY = 100;

// How long file logging stays off after a write error before it is tried again.
const ERROR_RETRY_DELAY_MS = 60000;

const ANSI_RESET = "\x1b[0m";

interface FileLoggerState {

  buffer: string[];
  disabledAt: number;
  flushTimer: Nullable<ReturnType<typeof setInterval>>;
  maxSize: number;
  path: string;
  writes: number;
}

// Null until initializeFileLogger() succeeds, and again after shutdownFileLogger().
let state: Nullable<FileLoggerState> = null;

/**
 * Initializes the file logger, creating the log file and its directory when needed. Failures are reported on the console and leave file logging off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });
    await fsPromises.appendFile(logPath, "", "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));

    return;
  }

  const flushTimer = setInterval((): void => {

    void flushLogBuffer();
  }, FLUSH_INTERVAL_MS);

  // The flush timer alone must not keep the process alive.
  flushTimer.unref();

  state = { buffer: [], disabledAt: 0, flushTimer, maxSize, path: logPath, writes: 0 };
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code applied to the level prefix and message.
 * @param categoryTag - Optional debug category, shown as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state) {

    return;
  }

  if(state.disabledAt > 0) {

    if((Date.now() - state.disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    state.disabledAt = 0;
  }

  const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  state.buffer.push([ "[", timestamp, "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join(""));
  state.writes++;

  if((state.writes % SIZE_CHECK_FREQUENCY) === 0) {

    void trimIfNeeded(state);
  }
}

/**
 * Appends the buffered entries to the log file. A write error turns file logging off for a minute.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const current = state;
  const content = current.buffer.join("");

  current.buffer = [];

  try {

    await fsPromises.appendFile(current.path, content, "utf-8");
  } catch(error) {

    current.disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.", (error instanceof Error) ? error.message : String(error),
      ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Appends the buffered entries synchronously. Used on exit, when there is no event loop left to run an asynchronous flush.
 */
export function flushLogBufferSync(): void {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    fs.appendFileSync(state.path, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Trims the log file to the most recent half of the maximum size when it has grown past the maximum.
 * @param current - The logger state.
 */
async function trimIfNeeded(current: FileLoggerState): Promise<void> {

  try {

    const stats = await fsPromises.stat(current.path);

    if((stats.size <= current.maxSize) || isAnyDebugEnabled()) {

      return;
    }

    const content = await fsPromises.readFile(current.path, "utf-8");
    const cut = content.length - Math.floor(current.maxSize / 2);

    if(cut <= 0) {

      return;
    }

    // Keep whole lines: start after the first newline past the cut point.
    const newline = content.indexOf("\n", cut);
    const tempPath = current.path + ".tmp";

    await fsPromises.writeFile(tempPath, content.substring((newline === -1) ? cut : (newline + 1)), "utf-8");
    await fsPromises.rename(tempPath, current.path);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Stops the flush timer and writes out whatever is still buffered.
 */
export function shutdownFileLogger(): void {

  if(!state) {

    return;
  }

  if(state.flushTimer) {

    clearInterval(state.flushTimer);
  }

  flushLogBufferSync();

  state = null;
}
