/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for the now-playing status server.
 */
import { LOG } from "./logger.js";
import type { StreamOptions } from "morgan";

/* Requests to the status server are diagnostics, not now-playing output, so they must never land on stdout between track titles. Morgan writes each formatted
 * request line here and we hand it to the logger under the "status" debug category, which puts it in the log file, or on stderr in console mode.
 */

/**
 * Creates a Morgan stream options object that routes request lines through the logger.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan terminates every entry with a newline; the logger adds its own.
      LOG.debug("status", message.trim());
    }
  };
}
