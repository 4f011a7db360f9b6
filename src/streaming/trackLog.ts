/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * trackLog.ts: Per-channel log of played track titles.
 */
import { LOG, formatError, hasErrorCode } from "../utils/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* The track log remembers every title heard on every channel. It is persisted as a single JSON object mapping channel names to arrays of titles:
 *
 *   {
 *     "Groove Salad": [ "Artist - Track", "Other Artist - Other Track" ],
 *     "Drone Zone": [ "..." ]
 *   }
 *
 * The file is read once before a session starts and overwritten once after it ends; nothing touches it while the player runs. Titles are always appended during the
 * session. Deduplication, when enabled, is applied only when the log is written, collapsing each channel's titles to unique entries in first-seen order.
 */

/**
 * The persisted form of the track log.
 */
export type TrackLogData = Record<string, string[]>;

/**
 * Outcome of writing the track log. Write failures are reported, never thrown.
 */
export type FlushResult = { ok: true; path: string; titles: number } | { error: string; ok: false; path: string };

export class TrackLog {

  private readonly entries: Map<string, string[]>;

  /**
   * Creates a track log, optionally seeded with previously persisted titles.
   * @param initial - Previously persisted titles.
   */
  constructor(initial: TrackLogData = {}) {

    this.entries = new Map();

    for(const [ channel, titles ] of Object.entries(initial)) {

      this.entries.set(channel, [...titles]);
    }
  }

  /**
   * Appends a title to a channel's list.
   * @param channel - The channel name.
   * @param title - The track title.
   */
  public record(channel: string, title: string): void {

    const titles = this.entries.get(channel);

    if(titles) {

      titles.push(title);

      return;
    }

    this.entries.set(channel, [title]);
  }

  /**
   * Returns a copy of the titles recorded for a channel, in append order.
   * @param channel - The channel name.
   * @returns The titles, or an empty array for an unknown channel.
   */
  public titles(channel: string): string[] {

    return [...(this.entries.get(channel) ?? [])];
  }

  /**
   * Returns the channel names present in the log.
   * @returns Channel names in insertion order.
   */
  public channels(): string[] {

    return [...this.entries.keys()];
  }

  /**
   * The total number of titles across all channels.
   */
  public get size(): number {

    let total = 0;

    for(const titles of this.entries.values()) {

      total += titles.length;
    }

    return total;
  }

  /**
   * Produces the persisted form of the log.
   * @param deduplicate - Collapse each channel's titles to unique entries, keeping the first occurrence.
   * @returns A mapping of channel name to titles.
   */
  public toJSON(deduplicate = false): TrackLogData {

    return Object.fromEntries([...this.entries].map(([ channel, titles ]) => [ channel, deduplicate ? [...new Set(titles)] : [...titles] ]));
  }

  /**
   * Writes the whole log to disk, replacing any previous file. The content goes to a temporary file first and is then renamed into place.
   * @param filePath - The track log file.
   * @param deduplicate - Collapse each channel's titles to unique entries.
   * @returns The write outcome.
   */
  public async flush(filePath: string, deduplicate: boolean): Promise<FlushResult> {

    const data = this.toJSON(deduplicate);
    const titles = Object.values(data).reduce((total, list) => total + list.length, 0);
    const tempPath = filePath + ".tmp";

    try {

      await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
      await fsPromises.writeFile(tempPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
      await fsPromises.rename(tempPath, filePath);
    } catch(error) {

      LOG.error("Failed to write track log %s: %s.", filePath, formatError(error));

      return { error: formatError(error), ok: false, path: filePath };
    }

    LOG.debug("tracks", "Wrote %s titles across %s channels to %s.", titles, Object.keys(data).length, filePath);

    return { ok: true, path: filePath, titles };
  }

  /**
   * Validates parsed JSON as track log data. Entries that are not arrays are dropped, as are non-string titles inside them.
   * @param value - The parsed JSON value.
   * @returns The usable track log data, or null if the value is not an object.
   */
  public static parse(value: unknown): TrackLogData | null {

    if((typeof value !== "object") || (value === null) || Array.isArray(value)) {

      return null;
    }

    const entries: Array<[ string, string[] ]> = [];

    for(const [ channel, titles ] of Object.entries(value)) {

      if(!Array.isArray(titles)) {

        continue;
      }

      entries.push([ channel, titles.filter((title): title is string => typeof title === "string") ]);
    }

    return Object.fromEntries(entries);
  }

  /**
   * Loads the track log from disk. A missing file yields an empty log. An unreadable or malformed file also yields an empty log, with a warning.
   * @param filePath - The track log file.
   * @returns The loaded log.
   */
  public static async load(filePath: string): Promise<TrackLog> {

    let content: string;

    try {

      content = await fsPromises.readFile(filePath, "utf-8");
    } catch(error) {

      if(!hasErrorCode(error, "ENOENT")) {

        LOG.warn("Failed to read track log %s: %s. Starting with an empty log.", filePath, formatError(error));
      }

      return new TrackLog();
    }

    try {

      const data = TrackLog.parse(JSON.parse(content));

      if(data) {

        return new TrackLog(data);
      }

      LOG.warn("Track log %s does not contain a channel mapping. Starting with an empty log.", filePath);
    } catch(error) {

      LOG.warn("Invalid JSON in track log %s: %s. Starting with an empty log.", filePath, formatError(error));
    }

    return new TrackLog();
  }
}
