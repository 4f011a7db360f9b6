/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Remote channel catalog retrieval, caching and lookup for icytune.
 */
import type { Channel, ChannelPlaylist } from "../types/index.js";
import { LOG, formatError, hasErrorCode } from "../utils/index.js";
import type { BoundedFetchOptions } from "./fetch.js";
import { boundedFetch } from "./fetch.js";
import { fuzzyMatch, rankByDistance } from "./match.js";
import { CONFIG } from "../config/index.js";
import fs from "node:fs";
import { getCatalogCachePath } from "../config/paths.js";
import path from "node:path";

const { promises: fsPromises } = fs;

export { ensureChannelIcon } from "./icons.js";
export { fuzzyMatch, levenshtein } from "./match.js";

/*
 * CHANNEL CATALOG
 *
 * The catalog is SomaFM's channels.json: { "channels": [ { "id": "groovesalad", "title": "Groove Salad", "playlists": [ { "url", "format", "quality" } ], ... } ] }.
 * The response is stored verbatim in the data directory and reused until it is older than catalog.cacheTtl (judged by the file's modification time). When a
 * refresh fails we fall back to the stale copy, so an offline machine can still play a channel it has seen before. Entries without a string id and title are
 * dropped; every other field is optional.
 */

/**
 * Options for loadCatalog(). Anything left out comes from CONFIG and the data directory.
 */
export interface LoadCatalogOptions extends BoundedFetchOptions {

  cachePath?: string;
  cacheTtl?: number;

  // Ignore a fresh cache and fetch anyway.
  refresh?: boolean;

  url?: string;
}

/**
 * Reads a field as a string.
 * @param record - The source object.
 * @param key - The field name.
 * @returns The string value, or an empty string when absent or not a string.
 */
function stringField(record: object, key: string): string {

  const value: unknown = Reflect.get(record, key);

  return (typeof value === "string") ? value : "";
}

/**
 * Parses the playlists of a catalog entry.
 * @param value - The raw playlists field.
 * @returns The playlists that have a URL.
 */
function parsePlaylists(value: unknown): ChannelPlaylist[] {

  if(!Array.isArray(value)) {

    return [];
  }

  const entries: unknown[] = value;
  const playlists: ChannelPlaylist[] = [];

  for(const entry of entries) {

    if((typeof entry !== "object") || (entry === null)) {

      continue;
    }

    const url = stringField(entry, "url");

    if(url) {

      playlists.push({ format: stringField(entry, "format"), quality: stringField(entry, "quality"), url });
    }
  }

  return playlists;
}

/**
 * Validates catalog JSON and turns it into channels.
 * @param data - Parsed catalog JSON.
 * @returns The channels, in catalog order.
 * @throws If data is not an object with a channels array.
 */
export function parseCatalog(data: unknown): Channel[] {

  const raw: unknown = ((typeof data === "object") && (data !== null)) ? Reflect.get(data, "channels") : undefined;

  if(!Array.isArray(raw)) {

    throw new Error("The channel list does not contain a channels array.");
  }

  const entries: unknown[] = raw;
  const channels: Channel[] = [];

  for(const entry of entries) {

    if((typeof entry !== "object") || (entry === null)) {

      continue;
    }

    const id = stringField(entry, "id");
    const title = stringField(entry, "title");

    if(!id || !title) {

      continue;
    }

    // SomaFM serves listener counts as strings.
    const rawListeners: unknown = Reflect.get(entry, "listeners");
    const listeners = Number(((typeof rawListeners === "number") || (typeof rawListeners === "string")) ? rawListeners : 0);
    const image = stringField(entry, "largeimage") || stringField(entry, "image");
    const channel: Channel = {

      description: stringField(entry, "description"),
      dj: stringField(entry, "dj"),
      genre: stringField(entry, "genre"),
      id,
      listeners: Number.isFinite(listeners) ? listeners : 0,
      playlists: parsePlaylists(Reflect.get(entry, "playlists")),
      title
    };

    if(image) {

      channel.image = image;
    }

    channels.push(channel);
  }

  return channels;
}

/**
 * Reads the cached catalog.
 * @param cachePath - The cache file.
 * @returns The channels and the cache age in milliseconds, or null when there is no usable cache.
 */
async function readCache(cachePath: string): Promise<{ age: number; channels: Channel[] } | null> {

  try {

    const [ stats, content ] = await Promise.all([ fsPromises.stat(cachePath), fsPromises.readFile(cachePath, "utf-8") ]);

    return { age: Date.now() - stats.mtimeMs, channels: parseCatalog(JSON.parse(content)) };
  } catch(error) {

    if(!hasErrorCode(error, "ENOENT")) {

      LOG.warn("Ignoring unreadable channel cache %s: %s.", cachePath, formatError(error));
    }

    return null;
  }
}

/**
 * Loads the channel list, from the cache when it is fresh and from the network otherwise.
 * @param options - Overrides for the source, cache location and freshness.
 * @returns The channels.
 * @throws If the catalog cannot be fetched and no cached copy exists.
 */
export async function loadCatalog(options: LoadCatalogOptions = {}): Promise<Channel[]> {

  const cachePath = options.cachePath ?? getCatalogCachePath();
  const cacheTtl = options.cacheTtl ?? CONFIG.catalog.cacheTtl;
  const url = options.url ?? CONFIG.catalog.url;
  const cached = await readCache(cachePath);

  if(cached && !options.refresh && (cached.age < cacheTtl)) {

    LOG.debug("catalog", "Using cached channel list (%s channels, %s s old).", cached.channels.length, Math.round(cached.age / 1000));

    return cached.channels;
  }

  try {

    LOG.debug("catalog", "Fetching channel list from %s.", url);

    const content = await boundedFetch(url, options, async (response) => response.text());
    const channels = parseCatalog(JSON.parse(content));

    await fsPromises.mkdir(path.dirname(cachePath), { recursive: true });
    await fsPromises.writeFile(cachePath, content, "utf-8");

    LOG.debug("catalog", "Fetched %s channels.", channels.length);

    return channels;
  } catch(error) {

    if(cached) {

      LOG.warn("Unable to refresh the channel list: %s. Using the cached copy.", formatError(error));

      return cached.channels;
    }

    throw new Error([ "Unable to load the channel list: ", formatError(error), "." ].join(""));
  }
}

/**
 * Resolves a user-entered identifier to a channel: exact id, then case-insensitive id or title, then a fuzzy match over titles and ids.
 * @param channels - The catalog.
 * @param query - What the user typed.
 * @returns The channel, or undefined.
 */
export function findChannel(channels: readonly Channel[], query: string): Channel | undefined {

  const trimmed = query.trim();
  const lower = trimmed.toLowerCase();
  const exact = channels.find((channel) => channel.id === trimmed) ??
    channels.find((channel) => (channel.id.toLowerCase() === lower) || (channel.title.toLowerCase() === lower));

  if(exact) {

    return exact;
  }

  const match = fuzzyMatch(trimmed, channels.flatMap((channel) => [ channel.title, channel.id ]));

  return (match === undefined) ? undefined : channels.find((channel) => (channel.title === match) || (channel.id === match));
}

/**
 * Suggests channel titles close to an unknown query.
 * @param channels - The catalog.
 * @param query - What the user typed.
 * @param limit - Maximum number of suggestions.
 * @returns Channel titles, closest first.
 */
export function suggestChannels(channels: readonly Channel[], query: string, limit = 3): string[] {

  return rankByDistance(query, channels.map((channel) => channel.title), limit);
}

/**
 * Picks the stream URL to play.
 * @param channel - The channel.
 * @param quality - The preferred quality ("highest", "high" or "low").
 * @returns The mp3 playlist of that quality, else any playlist of that quality, else the first playlist, else undefined.
 */
export function selectStreamUrl(channel: Channel, quality: string): string | undefined {

  const ofQuality = channel.playlists.filter((playlist) => playlist.quality === quality);

  return (ofQuality.find((playlist) => playlist.format === "mp3") ?? ofQuality[0] ?? channel.playlists[0])?.url;
}
