/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: External player detection and process management for icytune.
 */
import { LOG, delay, formatError } from "../utils/index.js";
import { LineQueue, LineSplitter } from "./lines.js";
import type { Nullable, PlayerKind } from "../types/index.js";
import { PLAYER_KINDS } from "../streaming/dialects.js";
import { spawn } from "node:child_process";

/*
 * PLAYER RESOLUTION
 *
 * icytune drives one of three console players. When the user names one, we check that it runs; otherwise we take the first of mpv, mplayer, mpg123 that does.
 * A probe counts as successful when the program starts at all: mplayer has no version flag and exits non-zero when run without a file, so exit codes say nothing
 * useful here. Only a spawn error (typically ENOENT) means the player is missing. Results are cached per kind.
 */

// Arguments used to probe each player. They make the program print something short and exit.
const PROBE_ARGS: Record<PlayerKind, string[]> = {

  mpg123: ["--version"],
  mplayer: [],
  mpv: ["--version"]
};

// Probe results by kind.
const probeCache = new Map<PlayerKind, boolean>();

/**
 * Checks whether a player can be started.
 * @param kind - The player to probe.
 * @returns True if the executable was found and started.
 */
export async function isPlayerAvailable(kind: PlayerKind): Promise<boolean> {

  const cached = probeCache.get(kind);

  if(cached !== undefined) {

    return cached;
  }

  const available = await new Promise<boolean>((resolve) => {

    const probe = spawn(kind, PROBE_ARGS[kind], { stdio: [ "ignore", "ignore", "ignore" ] });

    probe.on("error", () => {

      resolve(false);
    });

    probe.on("exit", () => {

      resolve(true);
    });
  });

  probeCache.set(kind, available);

  LOG.debug("player", "Probed %s: %s.", kind, available ? "available" : "not found");

  return available;
}

/**
 * Resolves the player to launch.
 * @param preferred - The configured player, or null to autodetect.
 * @returns The player kind.
 * @throws If the preferred player, or every known player when autodetecting, is unavailable.
 */
export async function resolvePlayer(preferred: Nullable<PlayerKind>): Promise<PlayerKind> {

  if(preferred) {

    if(await isPlayerAvailable(preferred)) {

      return preferred;
    }

    throw new Error([ "The configured player ", preferred, " was not found. Install it or choose another with --player." ].join(""));
  }

  for(const kind of PLAYER_KINDS) {

    if(await isPlayerAvailable(kind)) {

      return kind;
    }
  }

  throw new Error([ "No supported player found. Install one of: ", PLAYER_KINDS.join(", "), "." ].join(""));
}

/**
 * Builds the command line for a player. Catalog URLs point at playlists (.pls), which mplayer and mpg123 must be told about; mpv detects them itself.
 * @param kind - The player.
 * @param url - The stream or playlist URL.
 * @returns The argument vector, without the program name.
 */
export function buildPlayerArgs(kind: PlayerKind, url: string): string[] {

  switch(kind) {

    case "mpg123": {

      return [ "-@", url ];
    }

    case "mplayer": {

      return [ "-nolirc", "-playlist", url ];
    }

    default: {

      return [ "--no-video", url ];
    }
  }
}

/*
 * PLAYER PROCESS
 *
 * The player runs with stdin ignored and both output pipes captured. Which pipe carries which line differs between players (mpg123 puts everything on stderr, mpv
 * splits status and metadata), so both are merged into one line source. The source ends once both pipes have closed. kill() sends SIGTERM and escalates to SIGKILL
 * if the player has not exited after a grace period.
 */

// Grace period between SIGTERM and SIGKILL.
const KILL_GRACE_MS = 3000;

/**
 * How a player process ended.
 */
export interface PlayerExit {

  code: Nullable<number>;
  signal: Nullable<NodeJS.Signals>;

  // True when the exit was requested through kill().
  requested: boolean;

  // Set when the process could not be started.
  spawnError?: Error;
}

/**
 * A running player.
 */
export interface PlayerProcess {

  // Resolves once the process has exited or failed to start. Never rejects.
  exited: Promise<PlayerExit>;

  kind: PlayerKind;

  // Stops the player. Safe to call more than once. Resolves after the process has exited.
  kill: () => Promise<PlayerExit>;

  // Merged stdout and stderr, one line per item.
  lines: LineQueue;

  pid: number | undefined;
}

/**
 * Launches a player for a stream.
 * @param kind - The player.
 * @param url - The stream or playlist URL.
 * @returns The running player.
 */
export function spawnPlayer(kind: PlayerKind, url: string): PlayerProcess {

  const args = buildPlayerArgs(kind, url);
  const lines = new LineQueue();

  LOG.debug("player", "Spawning %s %s.", kind, args.join(" "));

  const child = spawn(kind, args, { stdio: [ "ignore", "pipe", "pipe" ] });

  // Track whether shutdown was requested. When true, the exit is expected and not worth a warning.
  let shuttingDown = false;
  let openPipes = 2;

  const closePipe = (): void => {

    openPipes--;

    if(openPipes <= 0) {

      lines.end();
    }
  };

  for(const pipe of [ child.stdout, child.stderr ]) {

    const splitter = new LineSplitter((line) => lines.push(line));

    pipe.on("data", (chunk: Buffer) => splitter.push(chunk));
    pipe.on("close", () => {

      splitter.end();
      closePipe();
    });
  }

  const exited = new Promise<PlayerExit>((resolve) => {

    child.on("error", (error) => {

      LOG.error("Unable to start %s: %s.", kind, formatError(error));

      // The pipes may never open, so the line source is ended here too.
      lines.end();
      resolve({ code: null, requested: shuttingDown, signal: null, spawnError: error });
    });

    child.on("exit", (code, signal) => {

      if(!shuttingDown && (code !== 0)) {

        LOG.warn("%s exited with %s.", kind, (code !== null) ? [ "code ", String(code) ].join("") : [ "signal ", String(signal) ].join(""));
      } else {

        LOG.debug("player", "%s exited (code %s, signal %s).", kind, code, signal);
      }

      resolve({ code, requested: shuttingDown, signal });
    });
  });

  const kill = async (): Promise<PlayerExit> => {

    if(!shuttingDown) {

      shuttingDown = true;

      if((child.exitCode === null) && (child.signalCode === null) && (child.pid !== undefined)) {

        child.kill("SIGTERM");

        const escalation = new AbortController();

        void delay(KILL_GRACE_MS, escalation.signal).then(() => {

          if(!escalation.signal.aborted && (child.exitCode === null) && (child.signalCode === null)) {

            LOG.debug("player", "%s ignored SIGTERM, sending SIGKILL.", kind);
            child.kill("SIGKILL");
          }
        });

        void exited.then(() => escalation.abort());
      }
    }

    return exited;
  };

  return { exited, kill, kind, lines, pid: child.pid };
}
