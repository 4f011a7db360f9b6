/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * nowPlaying.ts: In-memory now-playing state mirrored to the status server.
 */
import type { HeaderField, Nullable, NowPlayingSnapshot, PlayerKind, TrackDisplay } from "../types/index.js";
import { LOG } from "../utils/index.js";

// Number of titles kept in the history, most recent first.
export const HISTORY_LIMIT = 20;

interface HistoryEntry {

  startedAt: Date;
  stationId: boolean;
  title: string;
}

/**
 * Holds what is playing right now. The session's render hooks feed it; the status server reads snapshots of it. Every title that reaches the console reaches the
 * store, station IDs included, so a second device shows exactly what the terminal shows.
 */
export class NowPlayingStore {

  private channel: Nullable<string> = null;
  private header: Partial<Record<HeaderField, string>> = {};
  private history: HistoryEntry[] = [];
  private player: Nullable<PlayerKind> = null;
  private playing = false;

  /**
   * Marks the start of playback, clearing whatever the previous session left behind.
   * @param channel - The channel title from the catalog, if known.
   * @param player - The player in use.
   */
  public start(channel: Nullable<string>, player: PlayerKind): void {

    this.channel = channel;
    this.header = {};
    this.history = [];
    this.player = player;
    this.playing = true;
  }

  /**
   * Records a header field. The channel header replaces the catalog channel name, matching what the session logs titles under.
   * @param field - The header field.
   * @param value - Its value.
   */
  public setHeader(field: HeaderField, value: string): void {

    this.header[field] = value;

    if(field === "channel") {

      this.channel = value;
    }
  }

  /**
   * Records a new title.
   * @param title - The title.
   * @param display - The display information from the session.
   */
  public setTrack(title: string, display: TrackDisplay): void {

    this.history.unshift({ startedAt: display.timestamp, stationId: display.stationId, title });

    if(this.history.length > HISTORY_LIMIT) {

      this.history.length = HISTORY_LIMIT;
    }

    LOG.debug("status", "Now playing: %s.", title);
  }

  /**
   * Marks the end of playback. The last title and history stay visible.
   */
  public stop(): void {

    this.playing = false;
  }

  /**
   * Returns a JSON-ready copy of the state.
   * @returns The snapshot.
   */
  public snapshot(): NowPlayingSnapshot {

    const current = this.history[0];

    return {

      channel: this.channel,
      header: { ...this.header },
      history: this.history.map((entry) => ({ startedAt: entry.startedAt.toISOString(), stationId: entry.stationId, title: entry.title })),
      player: this.player,
      playing: this.playing,
      since: current ? current.startedAt.toISOString() : null,
      stationId: current ? current.stationId : false,
      title: current ? current.title : null
    };
  }
}
