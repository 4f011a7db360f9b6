/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Desktop notifications and the custom per-track command for icytune.
 */
import { LOG, formatError } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import { spawn } from "node:child_process";

/*
 * TRACK NOTIFICATIONS
 *
 * Two independent side effects can follow a new music title:
 *
 * 1. A desktop notification: notify-send on Linux, osascript on macOS. The track is the notification title and the channel name its body. Other platforms have no
 *    notifier and are skipped with a debug message.
 * 2. A user command (notifications.command), split on whitespace, with the track title and channel name appended as two extra arguments. Nothing goes through a
 *    shell, so titles need no quoting.
 *
 * Both are fire-and-forget: the session never waits for them. A failure to start or a non-zero exit is logged as a warning.
 */

/**
 * A program and its arguments.
 */
export interface CommandLine {

  args: string[];
  command: string;
}

/**
 * Escapes text for use inside a double-quoted AppleScript string.
 * @param text - The text.
 * @returns The escaped text.
 */
function appleScriptString(text: string): string {

  return [ "\"", text.replace(/\\/g, "\\\\").replace(/"/g, "\\\""), "\"" ].join("");
}

/**
 * Builds the desktop notification command for a platform.
 * @param platform - The platform, as in process.platform.
 * @param title - The notification title (the track).
 * @param body - The notification body (the channel name).
 * @param iconPath - Optional icon file. Only notify-send supports one.
 * @returns The command line, or null when the platform has no notifier.
 */
export function buildDesktopNotification(platform: NodeJS.Platform, title: string, body: string, iconPath?: string): Nullable<CommandLine> {

  switch(platform) {

    case "darwin": {

      return { args: [ "-e", [ "display notification ", appleScriptString(body), " with title ", appleScriptString(title) ].join("") ], command: "osascript" };
    }

    case "linux":
    case "freebsd":
    case "openbsd": {

      return { args: [ ...(iconPath ? [ "-i", iconPath ] : []), "--", title, body ], command: "notify-send" };
    }

    default: {

      return null;
    }
  }
}

/**
 * Builds the user command for a track.
 * @param command - The configured command, e.g. "scrobble --station".
 * @param title - The track title.
 * @param channelName - The channel name.
 * @returns The command line, or null when the command is blank.
 */
export function buildTrackCommand(command: string, title: string, channelName: string): Nullable<CommandLine> {

  const [ program, ...args ] = command.trim().split(/\s+/).filter((part) => part.length > 0);

  if(!program) {

    return null;
  }

  return { args: [ ...args, title, channelName ], command: program };
}

/**
 * Runs a command without waiting for it. Start failures and non-zero exits are logged.
 * @param commandLine - The command to run.
 * @param purpose - Description used in log messages.
 */
export function runDetached(commandLine: CommandLine, purpose: string): void {

  LOG.debug("notify", "Running %s: %s %s.", purpose, commandLine.command, commandLine.args.join(" "));

  try {

    const child = spawn(commandLine.command, commandLine.args, { stdio: "ignore" });

    child.on("error", (error) => {

      LOG.warn("Unable to run the %s (%s): %s.", purpose, commandLine.command, formatError(error));
    });

    child.on("exit", (code) => {

      if((code !== null) && (code !== 0)) {

        LOG.warn("The %s (%s) exited with code %s.", purpose, commandLine.command, code);
      }
    });

    child.unref();
  } catch(error) {

    LOG.warn("Unable to run the %s (%s): %s.", purpose, commandLine.command, formatError(error));
  }
}

/**
 * Options for createNotifier().
 */
export interface NotifierOptions {

  // User command run for every track, or null.
  command: Nullable<string>;

  // Whether desktop notifications are shown.
  desktop: boolean;

  // Icon for desktop notifications.
  iconPath?: string;

  platform?: NodeJS.Platform;

  // Command runner. Defaults to runDetached().
  run?: (commandLine: CommandLine, purpose: string) => void;
}

/**
 * Creates the notify hook of a session.
 * @param options - Notifier options.
 * @returns A function to call with each new music title.
 */
export function createNotifier(options: NotifierOptions): (title: string, channelName: string) => void {

  const platform = options.platform ?? process.platform;
  const run = options.run ?? runDetached;
  let reportedUnsupported = false;

  return (title: string, channelName: string): void => {

    if(options.desktop) {

      const notification = buildDesktopNotification(platform, title, channelName, options.iconPath);

      if(notification) {

        run(notification, "desktop notification");
      } else if(!reportedUnsupported) {

        reportedUnsupported = true;

        LOG.debug("notify", "Desktop notifications are not supported on %s.", platform);
      }
    }

    const commandLine = options.command ? buildTrackCommand(options.command, title, channelName) : null;

    if(commandLine) {

      run(commandLine, "track command");
    }
  };
}
