/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * status.ts: Now-playing status route for icytune.
 */
import type { Express, Request, Response } from "express";
import type { NowPlayingStore } from "../status/nowPlaying.js";

/* GET /status returns the current snapshot: channel, player, header fields, the current title with its start time and station-ID flag, and the recent history.
 * A device polling this endpoint can mirror the terminal display.
 */

/**
 * Creates the now-playing endpoint.
 * @param app - The Express application.
 * @param store - The now-playing store.
 */
export function setupStatusEndpoint(app: Express, store: NowPlayingStore): void {

  app.get("/status", (_req: Request, res: Response): void => {

    res.set("Cache-Control", "no-store");
    res.json(store.snapshot());
  });
}
