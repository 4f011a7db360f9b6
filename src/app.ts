/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Command implementations for icytune: play, list and tracks.
 */
import { LOG, acquireLock, createShutdownSignal, formatColumns, formatDuration, formatError, releaseLock } from "./utils/index.js";
import type { Nullable, PlayerKind, SessionOptions } from "./types/index.js";
import { ensureChannelIcon, findChannel, loadCatalog, selectStreamUrl, suggestChannels } from "./catalog/index.js";
import { getLockFilePath, getTrackLogPath } from "./config/paths.js";
import { resolvePlayer, spawnPlayer } from "./player/index.js";
import { startStatusServer, stopStatusServer } from "./server.js";
import { CONFIG } from "./config/index.js";
import { NowPlayingStore } from "./status/nowPlaying.js";
import type { SessionHooks } from "./streaming/session.js";
import type { Server } from "node:http";
import { TrackLog } from "./streaming/trackLog.js";
import { createConsoleRenderer } from "./streaming/render.js";
import { createNotifier } from "./notify/index.js";
import { runSession } from "./streaming/session.js";

/*
 * PLAYBACK
 *
 * play wires the collaborators around the session controller in this order:
 *
 * 1. Take the single-instance lock and install the SIGINT and SIGTERM handlers.
 * 2. Load the catalog, resolve the channel and its stream URL, resolve the player.
 * 3. Load the track log and, when enabled, start the status server.
 * 4. Spawn the player and run the session over its output. A signal aborts the session; the player exiting ends it.
 * 5. Stop the player, flush the track log, stop the status server, release the lock, remove the signal handlers.
 *
 * Step 5 always runs once step 1 succeeded. The handlers stay installed until it is done, and repeated signals in the meantime are ignored. A signal during
 * steps 2 and 3 cancels network requests and skips playback. Errors before the player starts are thrown to the caller, which reports them and exits with
 * status 1.
 */

/**
 * Writes a line to stdout.
 * @param text - The line, without a newline.
 */
function print(text: string): void {

  process.stdout.write([ text, "\n" ].join(""));
}

/**
 * Plays a channel until the user stops it or the player exits.
 * @param query - The channel id or name the user typed.
 * @param options - Catalog refresh flag.
 * @returns The process exit status: 0 normally, 1 when the player failed to start.
 * @throws If the lock is held, the channel is unknown, or no player is available.
 */
export async function playChannel(query: string, options: { refresh?: boolean } = {}): Promise<number> {

  const lockPath = getLockFilePath();

  await acquireLock(lockPath);

  const shutdown = createShutdownSignal();
  let server: Nullable<Server> = null;

  try {

    const channels = await loadCatalog({ refresh: options.refresh, signal: shutdown.signal });
    const channel = findChannel(channels, query);

    if(!channel) {

      const suggestions = suggestChannels(channels, query);

      throw new Error([ "Unknown channel \"", query, "\".", (suggestions.length > 0) ? [ " Did you mean: ", suggestions.join(", "), "?" ].join("") : "" ].join(""));
    }

    const url = selectStreamUrl(channel, CONFIG.catalog.quality);

    if(!url) {

      throw new Error([ "Channel ", channel.title, " has no stream to play." ].join(""));
    }

    const playerKind: PlayerKind = await resolvePlayer(CONFIG.player.kind);
    const trackLogPath = getTrackLogPath();
    const trackLog = CONFIG.tracks.enabled ? await TrackLog.load(trackLogPath) : undefined;
    const store = new NowPlayingStore();

    store.start(channel.title, playerKind);

    if(CONFIG.status.enabled) {

      try {

        server = await startStatusServer({ getTracks: () => (trackLog ?? new TrackLog()).toJSON(CONFIG.tracks.deduplicate), store }, CONFIG.status.host,
          CONFIG.status.port);
      } catch(error) {

        LOG.warn("Unable to start the status server on %s:%s: %s. Continuing without it.", CONFIG.status.host, CONFIG.status.port, formatError(error));
      }
    }

    const iconPath = (CONFIG.notifications.enabled && CONFIG.notifications.icons) ? await ensureChannelIcon(channel, { signal: shutdown.signal }) : undefined;
    const renderer = createConsoleRenderer();
    const hooks: SessionHooks = {

      echo: renderer.echo,
      notify: createNotifier({ command: CONFIG.notifications.command, desktop: CONFIG.notifications.enabled, iconPath }),
      renderHeader: (field, value): void => {

        renderer.renderHeader(field, value);
        store.setHeader(field, value);
      },
      renderTrack: (title, display): void => {

        renderer.renderTrack(title, display);
        store.setTrack(title, display);
      }
    };

    const sessionOptions: SessionOptions = {

      logEnabled: trackLog !== undefined,
      notifyEnabled: CONFIG.notifications.enabled || (CONFIG.notifications.command !== null),
      stationHighlight: CONFIG.playback.stationHighlight,
      verbose: CONFIG.playback.verbose
    };

    if(shutdown.signal.aborted) {

      LOG.info("Cancelled before %s started playing.", channel.title);

      return 0;
    }

    LOG.info("Playing %s (%s) with %s.", channel.title, url, playerKind);

    const startedAt = Date.now();
    const player = spawnPlayer(playerKind, url);
    const result = await runSession({

      channelName: channel.title,
      hooks,
      knownStationIds: CONFIG.playback.stationIds,
      lines: player.lines,
      options: sessionOptions,
      playerKind,
      signal: shutdown.signal,
      trackLog
    });

    const exit = await player.kill();

    store.stop();

    if(trackLog) {

      await trackLog.flush(trackLogPath, CONFIG.tracks.deduplicate);
    }

    LOG.info("Stopped %s after %s (%s, %s lines, %s titles logged).", channel.title, formatDuration(Date.now() - startedAt), result.reason, result.linesRead,
      result.state.tracks);

    return exit.spawnError ? 1 : 0;
  } finally {

    try {

      if(server) {

        await stopStatusServer(server);
      }

      await releaseLock(lockPath);
    } finally {

      shutdown.dispose();
    }
  }
}

/**
 * Prints the channel list.
 * @param options - Catalog refresh flag.
 */
export async function listChannels(options: { refresh?: boolean } = {}): Promise<void> {

  const channels = await loadCatalog({ refresh: options.refresh });
  const rows = [...channels].sort((a, b) => a.title.localeCompare(b.title)).map((channel) => [ channel.id, channel.title, channel.genre, String(channel.listeners) ]);

  for(const line of formatColumns([ [ "ID", "TITLE", "GENRE", "LISTENERS" ], ...rows ])) {

    print(line);
  }
}

/**
 * Prints the logged titles.
 * @param channel - Optional channel name. Matched case-insensitively.
 * @returns The process exit status: 1 when the named channel has no titles.
 */
export async function showTracks(channel?: string): Promise<number> {

  const data = (await TrackLog.load(getTrackLogPath())).toJSON(CONFIG.tracks.deduplicate);
  const wanted = channel?.trim().toLowerCase();
  const names = Object.keys(data).filter((name) => (wanted === undefined) || (name.toLowerCase() === wanted)).sort((a, b) => a.localeCompare(b));

  if(names.length === 0) {

    print(channel ? [ "No titles logged for ", channel, "." ].join("") : "No titles logged yet.");

    return channel ? 1 : 0;
  }

  names.forEach((name, index) => {

    if(index > 0) {

      print("");
    }

    print([ name, ":" ].join(""));

    for(const title of data[name] ?? []) {

      print([ "  ", title ].join(""));
    }
  });

  return 0;
}
