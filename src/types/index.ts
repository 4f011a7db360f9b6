/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for icytune.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * PLAYER DIALECTS
 *
 * Each supported external player prints stream information to its console in its own undocumented format. A dialect profile describes that format as a static table
 * of line-prefix rules, one table per player kind. The classifier reads these tables; nothing mutates them at runtime.
 */

/**
 * The external players icytune knows how to drive.
 */
export type PlayerKind = "mpg123" | "mplayer" | "mpv";

/**
 * The header roles a dialect can report before per-track updates begin.
 */
export type HeaderField = "bitrate" | "channel" | "genre" | "player";

/**
 * How a header value is cut out of its line.
 *
 * - "line": the whole trimmed line.
 * - "afterColon": text after the first colon.
 * - "afterSecondColon": text after the second colon, or after the first when there is only one.
 * - "colonSegment": text between the first and second colon (or the end of the line).
 * - "cbrBitrate": the cbrNNN / vbrNNN / abrNNN token of an mpg123 stream-info line, rendered as "NNN kbit/s".
 */
export type FieldExtraction = "afterColon" | "afterSecondColon" | "cbrBitrate" | "colonSegment" | "line";

/**
 * A single header rule: lines starting with the prefix carry the given field.
 */
export interface HeaderRule {

  extract: FieldExtraction;
  field: HeaderField;
  prefix: string;
}

/**
 * How track titles are carried: either ICY metadata (StreamTitle='...';) after a prefix, or plain text after a marker.
 */
export interface TrackRule {

  format: "icy" | "plain";
  prefix: string;
}

/**
 * The per-player line format.
 */
export interface DialectProfile {

  // The header field whose rule marks the end of the header block.
  endOfHeader: HeaderField;

  // Header rules in priority order.
  headerRules: readonly HeaderRule[];

  kind: PlayerKind;

  // Whether track updates are gated on the header having been printed. The mpv dialect has no meaningful header.
  requiresHeader: boolean;

  trackRule: TrackRule;
}

/**
 * The result of classifying one line of player output.
 */
export type ClassifiedEvent =
  | { field: HeaderField; type: "header"; value: string }
  | { title: string; type: "track" }
  | { line: string; type: "unrecognized" };

/*
 * SESSION TYPES
 */

/**
 * Mutable state of one playback session. Created by runSession(), owned exclusively by it, and handed back to the caller when the session ends.
 */
export interface SessionState {

  // Learned from the header, or seeded from the catalog for dialects that do not report it. Required before a title can be logged.
  channelName: Nullable<string>;

  // Header values seen so far.
  header: Partial<Record<HeaderField, string>>;

  headerPrinted: boolean;

  // The most recent title rendered, used to suppress re-announcements of the same track.
  lastTitle: Nullable<string>;

  playerKind: PlayerKind;

  // Number of titles recorded to the track log during this session.
  tracks: number;
}

/**
 * Caller-selected behavior for a session.
 */
export interface SessionOptions {

  logEnabled: boolean;
  notifyEnabled: boolean;
  stationHighlight: boolean;
  verbose: boolean;
}

/**
 * Information passed to the track renderer.
 */
export interface TrackDisplay {

  // Whether the station-ID highlight should be applied.
  highlight: boolean;

  stationId: boolean;
  timestamp: Date;
}

/*
 * CATALOG TYPES
 */

/**
 * A playlist (stream URL) offered for a channel.
 */
export interface ChannelPlaylist {

  format: string;
  quality: string;
  url: string;
}

/**
 * A channel entry from the remote catalog.
 */
export interface Channel {

  description: string;
  dj: string;
  genre: string;
  id: string;
  image?: string;
  listeners: number;
  playlists: ChannelPlaylist[];
  title: string;
}

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, environment variables, and CLI flags, in increasing priority.
 */

/**
 * Channel catalog source and caching.
 */
export interface CatalogConfig {

  // Maximum age in milliseconds of the cached channel list before it is fetched again. Environment variable: ICYTUNE_CATALOG_TTL.
  cacheTtl: number;

  // Preferred stream quality when a channel offers several. Environment variable: ICYTUNE_QUALITY.
  quality: string;

  // URL of the channel list. Environment variable: ICYTUNE_CATALOG_URL.
  url: string;
}

/**
 * Log file configuration.
 */
export interface LoggingConfig {

  // Maximum log file size in bytes before it is trimmed. Environment variable: LOG_MAX_SIZE.
  maxSize: number;
}

/**
 * Desktop notification and custom command configuration.
 */
export interface NotificationsConfig {

  // Command run for every new track, with the title and channel name appended as arguments. Environment variable: ICYTUNE_NOTIFY_COMMAND.
  command: Nullable<string>;

  // Whether desktop notifications are shown. Environment variable: ICYTUNE_NOTIFY.
  enabled: boolean;

  // Whether channel icons are downloaded and attached to notifications. Environment variable: ICYTUNE_NOTIFY_ICONS.
  icons: boolean;
}

/**
 * External player selection.
 */
export interface PlayerConfig {

  // Player to use. When null, mpv, mplayer and mpg123 are probed in that order. Environment variable: ICYTUNE_PLAYER.
  kind: Nullable<PlayerKind>;
}

/**
 * Now-playing interpretation settings.
 */
export interface PlaybackConfig {

  // Highlight station identification titles on the console. Environment variable: ICYTUNE_STATION_HIGHLIGHT.
  stationHighlight: boolean;

  // Substrings that mark a title as a station identification. Environment variable: ICYTUNE_STATION_IDS (comma-separated).
  stationIds: string[];

  // Echo unrecognized player output. Environment variable: ICYTUNE_VERBOSE.
  verbose: boolean;
}

/**
 * Now-playing HTTP mirror.
 */
export interface StatusConfig {

  enabled: boolean;
  host: string;
  port: number;
}

/**
 * Track log settings.
 */
export interface TracksConfig {

  // Collapse each channel's titles to unique entries when the log is written. Environment variable: ICYTUNE_DEDUPLICATE.
  deduplicate: boolean;

  // Record titles to the track log. Environment variable: ICYTUNE_TRACK_LOG.
  enabled: boolean;
}

/**
 * The complete application configuration.
 */
export interface Config {

  catalog: CatalogConfig;
  logging: LoggingConfig;
  notifications: NotificationsConfig;
  playback: PlaybackConfig;
  player: PlayerConfig;
  status: StatusConfig;
  tracks: TracksConfig;
}

/**
 * Snapshot served by the now-playing mirror.
 */
export interface NowPlayingSnapshot {

  channel: Nullable<string>;
  header: Partial<Record<HeaderField, string>>;
  history: Array<{ startedAt: string; stationId: boolean; title: string }>;
  player: Nullable<PlayerKind>;
  playing: boolean;
  since: Nullable<string>;
  stationId: boolean;
  title: Nullable<string>;
}
