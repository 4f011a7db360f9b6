/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cli.ts: Command-line parsing for icytune.
 */
import type { Config, PlayerKind } from "./types/index.js";
import { isPlayerKind } from "./streaming/dialects.js";
import path from "node:path";

/* icytune [command] [options]. The command is the first positional argument: "play", "list" or "tracks". Anything else in that position is taken as a channel for
 * "play", so "icytune groovesalad" works. Flags may appear anywhere. Values are stored in ParsedArgs rather than written to CONFIG so that they can be applied at
 * the right priority, after config.json and the environment.
 */

export type Command = "list" | "play" | "tracks";

/**
 * Result of parsing command-line arguments.
 */
export interface ParsedArgs {

  // The channel for play and tracks.
  channel?: string;

  command: Command;
  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  help: boolean;
  listEnv: boolean;
  noDedupe: boolean;
  noLog: boolean;
  notify: boolean;
  player?: PlayerKind;
  refresh: boolean;
  status: boolean;
  statusPort?: number;
  verbose: boolean;
  version: boolean;
}

const COMMANDS: readonly Command[] = [ "list", "play", "tracks" ];

/**
 * Checks whether a word names a command.
 * @param value - The word.
 * @returns True for play, list and tracks.
 */
function isCommand(value: string): value is Command {

  return COMMANDS.some((command) => command === value);
}

/**
 * Parses command-line arguments.
 * @param argv - The arguments, without the node executable and script path.
 * @returns The parsed arguments.
 * @throws On unknown options, missing or invalid option values, and missing channels.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {

  const result: ParsedArgs = {

    command: "play",
    consoleLogging: false,
    debugLogging: false,
    help: false,
    listEnv: false,
    noDedupe: false,
    noLog: false,
    notify: false,
    refresh: false,
    status: false,
    verbose: false,
    version: false
  };

  const positional: string[] = [];

  // Returns the value following an option, failing when there is none.
  const valueOf = (flag: string, index: number): string => {

    const value = argv[index];

    if((value === undefined) || value.startsWith("-")) {

      throw new Error([ flag, " requires a value." ].join(""));
    }

    return value;
  };

  for(let i = 0; i < argv.length; i++) {

    const arg = argv[i] ?? "";

    switch(arg) {

      case "-c":
      case "--console": {

        result.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        result.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        result.help = true;

        break;
      }

      case "-n":
      case "--notify": {

        result.notify = true;

        break;
      }

      case "-p":
      case "--player": {

        const value = valueOf(arg, ++i).toLowerCase();

        if(!isPlayerKind(value)) {

          throw new Error([ arg, " must be one of mpv, mplayer, mpg123, got: ", value ].join(""));
        }

        result.player = value;

        break;
      }

      case "-v":
      case "--version": {

        result.version = true;

        break;
      }

      case "--data-dir": {

        const value = valueOf(arg, ++i);

        if(!path.isAbsolute(value)) {

          throw new Error([ "--data-dir requires an absolute path, got: ", value ].join(""));
        }

        result.dataDir = value;

        break;
      }

      case "--list-env": {

        result.listEnv = true;

        break;
      }

      case "--no-dedupe": {

        result.noDedupe = true;

        break;
      }

      case "--no-log": {

        result.noLog = true;

        break;
      }

      case "--refresh": {

        result.refresh = true;

        break;
      }

      case "--status": {

        result.status = true;

        break;
      }

      case "--status-port": {

        const value = valueOf(arg, ++i);
        const port = Number(value);

        if(!/^\d+$/.test(value) || (port < 1) || (port > 65535)) {

          throw new Error([ "--status-port must be a port between 1 and 65535, got: ", value ].join(""));
        }

        result.statusPort = port;

        break;
      }

      case "--verbose": {

        result.verbose = true;

        break;
      }

      default: {

        if(arg.startsWith("-") && (arg.length > 1)) {

          throw new Error([ "Unknown option: ", arg ].join(""));
        }

        positional.push(arg);

        break;
      }
    }
  }

  // Help, version and --list-env need no command.
  if(result.help || result.version || result.listEnv) {

    return result;
  }

  const [ first, ...rest ] = positional;

  if((first !== undefined) && isCommand(first)) {

    result.command = first;
    positional.splice(0, positional.length, ...rest);
  }

  if(positional.length > 1) {

    throw new Error([ "Unexpected argument: ", positional[1] ?? "" ].join(""));
  }

  result.channel = positional[0];

  if((result.command === "play") && !result.channel) {

    throw new Error("No channel given. Run 'icytune list' to see the channels.");
  }

  if((result.command === "list") && result.channel) {

    throw new Error([ "Unexpected argument: ", result.channel ].join(""));
  }

  return result;
}

/**
 * Applies command-line overrides to a merged configuration.
 * @param config - The configuration, modified in place.
 * @param args - The parsed arguments.
 */
export function applyCliOverrides(config: Config, args: ParsedArgs): void {

  if(args.player) {

    config.player.kind = args.player;
  }

  if(args.notify) {

    config.notifications.enabled = true;
  }

  if(args.noLog) {

    config.tracks.enabled = false;
  }

  if(args.noDedupe) {

    config.tracks.deduplicate = false;
  }

  if(args.verbose) {

    config.playback.verbose = true;
  }

  if(args.status || (args.statusPort !== undefined)) {

    config.status.enabled = true;
  }

  if(args.statusPort !== undefined) {

    config.status.port = args.statusPort;
  }
}
