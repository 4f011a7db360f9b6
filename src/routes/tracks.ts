/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * tracks.ts: Track log route for icytune.
 */
import type { Express, Request, Response } from "express";
import type { TrackLogData } from "../streaming/trackLog.js";

/* GET /tracks returns the track log: everything persisted before this session plus the titles recorded since, per channel. ?channel=<name> narrows the result to
 * one channel, matched case-insensitively; an unknown channel gives 404.
 */

/**
 * Selects the part of the track log a request asks for.
 * @param data - The full track log.
 * @param channel - Optional channel name from the query string.
 * @returns The matching entries, or null when the named channel has none.
 */
export function selectTracks(data: TrackLogData, channel?: string): TrackLogData | null {

  if(!channel) {

    return data;
  }

  const wanted = channel.trim().toLowerCase();
  const name = Object.keys(data).find((key) => key.toLowerCase() === wanted);

  return (name === undefined) ? null : { [name]: data[name] ?? [] };
}

/**
 * Creates the track log endpoint.
 * @param app - The Express application.
 * @param getTracks - Returns the current track log.
 */
export function setupTracksEndpoint(app: Express, getTracks: () => TrackLogData): void {

  app.get("/tracks", (req: Request, res: Response): void => {

    const channel = (typeof req.query.channel === "string") ? req.query.channel : undefined;
    const selected = selectTracks(getTracks(), channel);

    res.set("Cache-Control", "no-store");

    if(!selected) {

      res.status(404).json({ error: [ "No tracks logged for channel ", channel ?? "", "." ].join("") });

      return;
    }

    res.json(selected);
  });
}
