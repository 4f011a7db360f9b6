/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for the icytune status server.
 */
import type { Express } from "express";
import type { NowPlayingStore } from "../status/nowPlaying.js";
import type { TrackLogData } from "../streaming/trackLog.js";
import { setupStatusEndpoint } from "./status.js";
import { setupTracksEndpoint } from "./tracks.js";

/**
 * Data sources behind the status server routes.
 */
export interface RouteSources {

  getTracks: () => TrackLogData;
  store: NowPlayingStore;
}

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param sources - Where the routes read their data.
 */
export function setupRoutes(app: Express, sources: RouteSources): void {

  setupStatusEndpoint(app, sources.store);
  setupTracksEndpoint(app, sources.getTracks);
}

export { setupStatusEndpoint } from "./status.js";
export { selectTracks, setupTracksEndpoint } from "./tracks.js";
