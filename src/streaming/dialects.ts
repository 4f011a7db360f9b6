/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * dialects.ts: Console output dialects of the supported players.
 */
import type { DialectProfile, PlayerKind } from "../types/index.js";

/* None of the players document their console output, so these tables capture what they print in practice when streaming an ICY (Shoutcast/Icecast) source.
 *
 * mplayer announces itself, then prints a block of stream properties and finally the bitrate before playback begins:
 *
 *   MPlayer 1.5 (Debian), built with gcc-12 (C) 2000-2022 MPlayer Team
 *   Name   : Groove Salad: a nicely chilled plate of ambient beats [SomaFM]
 *   Genre  : Ambient Chill
 *   Bitrate: 128kbit/s
 *   ICY Info: StreamTitle='Artist - Track';StreamUrl='http://somafm.com/';
 *
 * mpg123 prints its banner, the ICY headers it received and a stream-info line carrying the bitrate:
 *
 *   High Performance MPEG 1.0/2.0/2.5 Audio Player for Layers 1, 2 and 3
 *   ICY-NAME: Groove Salad: a nicely chilled plate of ambient beats [SomaFM]
 *   ICY-GENRE: Ambient Chill
 *   MPEG 1.0 L III cbr128 44100 j-s
 *   ICY-META: StreamTitle='Artist - Track';StreamUrl='http://somafm.com/';
 *
 * mpv prints a single "Playing:" line and then the current ICY title as a plain file tag:
 *
 *   Playing: https://ice1.somafm.com/groovesalad-128-mp3
 *    icy-title: Artist - Track
 *
 * Lines are trimmed before matching, so the indentation mpv uses for tags does not matter. Adding a player means adding a table here.
 */

const MPLAYER: DialectProfile = {

  endOfHeader: "bitrate",
  headerRules: [

    { extract: "line", field: "player", prefix: "MPlayer" },
    { extract: "colonSegment", field: "channel", prefix: "Name" },
    { extract: "afterSecondColon", field: "genre", prefix: "Genre" },
    { extract: "afterColon", field: "bitrate", prefix: "Bitrate" }
  ],
  kind: "mplayer",
  requiresHeader: true,
  trackRule: { format: "icy", prefix: "ICY Info:" }
};

const MPG123: DialectProfile = {

  endOfHeader: "bitrate",
  headerRules: [

    { extract: "line", field: "player", prefix: "High Performance MPEG" },
    { extract: "colonSegment", field: "channel", prefix: "ICY-NAME:" },
    { extract: "afterSecondColon", field: "genre", prefix: "ICY-GENRE:" },
    { extract: "cbrBitrate", field: "bitrate", prefix: "MPEG " }
  ],
  kind: "mpg123",
  requiresHeader: true,
  trackRule: { format: "icy", prefix: "ICY-META:" }
};

const MPV: DialectProfile = {

  endOfHeader: "player",
  headerRules: [

    { extract: "line", field: "player", prefix: "Playing:" }
  ],
  kind: "mpv",
  requiresHeader: false,
  trackRule: { format: "plain", prefix: "icy-title:" }
};

/**
 * Dialect profiles keyed by player kind.
 */
export const DIALECTS: Readonly<Record<PlayerKind, DialectProfile>> = Object.freeze({

  mpg123: MPG123,
  mplayer: MPLAYER,
  mpv: MPV
});

/**
 * The player kinds in autodetection order.
 */
export const PLAYER_KINDS: readonly PlayerKind[] = [ "mpv", "mplayer", "mpg123" ];

/**
 * Returns the dialect profile for a player kind.
 * @param kind - The player kind.
 * @returns The read-only profile.
 */
export function getDialect(kind: PlayerKind): DialectProfile {

  return DIALECTS[kind];
}

/**
 * Type guard for player kind strings coming from configuration or the command line.
 * @param value - The value to check.
 * @returns True if the value names a supported player.
 */
export function isPlayerKind(value: unknown): value is PlayerKind {

  return (typeof value === "string") && PLAYER_KINDS.some((kind) => kind === value);
}
