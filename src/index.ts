#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for icytune.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, isConsoleLogging, setConsoleLogging, setDebugLogging } from "./utils/index.js";
import { applyCliOverrides, parseArgs } from "./cli.js";
import { getLogFilePath, initializeDataDir } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import { listChannels, playChannel, showTracks } from "./app.js";
import type { ParsedArgs } from "./cli.js";
import consoleStamp from "console-stamp";

/* A failure inside a notification or a status request must not take the radio down, so stray rejections and exceptions are logged and playback carries on.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: icytune [command] [options]");
  console.log("");
  console.log("Commands:");
  console.log("  play <channel>                  Stream a channel (the default when only a channel is given)");
  console.log("  list                            List the channels in the catalog");
  console.log("  tracks [channel]                Show logged titles, optionally for one channel");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log diagnostics to the console instead of the log file");
  console.log("  -d, --debug                     Enable debug logging");
  console.log("  -h, --help                      Show this help message");
  console.log("  -n, --notify                    Show a desktop notification for every new track");
  console.log("  -p, --player <kind>             Use mpv, mplayer or mpg123 (default: first one installed)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.icytune)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --no-dedupe                     Keep repeated titles in the track log");
  console.log("  --no-log                        Do not record titles in the track log");
  console.log("  --refresh                       Fetch the channel list even if the cached copy is fresh");
  console.log("  --status                        Serve now-playing state over HTTP");
  console.log("  --status-port <port>            Status server port (implies --status, default: 5590)");
  console.log("  --verbose                       Echo player output that is neither a header nor a title");
  console.log("");
  console.log("Debug categories (ICYTUNE_DEBUG=category,... or '*'):");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(32) + entry.description);
  }

  console.log("");
  console.log("  Run 'icytune --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints all environment variables organized by category, generated from CONFIG_METADATA.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */
  console.log("icytune Environment Variables");
  console.log("");
  console.log("All settings can also be configured in config.json in the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const [ category, settings ] of Object.entries(CONFIG_METADATA)) {

    console.log("");
    console.log(category.charAt(0).toUpperCase() + category.slice(1) + ":");

    settings.forEach((setting, index) => {

      if(!setting.envVar) {

        return;
      }

      if(index > 0) {

        console.log("");
      }

      const defaultValue = getNestedValue(DEFAULTS, setting.path);
      let defaultStr = Array.isArray(defaultValue) ? defaultValue.join(",") : String(defaultValue ?? "none");

      if((typeof defaultValue === "number") && setting.unit) {

        defaultStr = defaultStr + " (" + setting.unit + ")";
      }

      console.log("  " + setting.envVar);
      console.log("    " + setting.description);
      console.log("    Default: " + defaultStr);
    });
  }

  // Settings resolved before config.json is read, so they cannot live in it.
  console.log("");
  console.log("Special:");
  console.log("  ICYTUNE_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.icytune");
  console.log("");
  console.log("  ICYTUNE_DEBUG");
  console.log("    Debug category filter (e.g., 'session', 'player,catalog', '*,-status').");
  console.log("    Default: (disabled)");
  /* eslint-enable no-console */
}

/**
 * Sets up logging, configuration and the data directory, then runs the requested command.
 * @param args - The parsed arguments.
 * @returns The process exit status.
 */
async function run(args: ParsedArgs): Promise<number> {

  initializeDataDir(args.dataDir);

  // ICYTUNE_DEBUG takes precedence over --debug because it allows category selection.
  const debugEnv = process.env.ICYTUNE_DEBUG;

  if(debugEnv) {

    initDebugFilter(debugEnv);
  } else if(args.debugLogging) {

    setDebugLogging(true);
  }

  setConsoleLogging(args.consoleLogging);

  if(args.consoleLogging) {

    // Rendered titles go straight to stdout, so only diagnostics get these timestamps.
    consoleStamp(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  await initializeConfiguration();

  applyCliOverrides(CONFIG, args);
  validateConfiguration();

  if(!args.consoleLogging) {

    await initializeFileLogger(getLogFilePath(), CONFIG.logging.maxSize);
  }

  switch(args.command) {

    case "list": {

      await listChannels({ refresh: args.refresh });

      return 0;
    }

    case "tracks": {

      return showTracks(args.channel);
    }

    default: {

      displayConfiguration();

      return playChannel(args.channel ?? "", { refresh: args.refresh });
    }
  }
}

let parsedArgs: ParsedArgs;

try {

  parsedArgs = parseArgs(process.argv.slice(2));
} catch(error) {

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error) + ". Run 'icytune --help' for usage.");

  process.exit(1);
}

if(parsedArgs.help) {

  printUsage();

  process.exit(0);
}

if(parsedArgs.version) {

  // eslint-disable-next-line no-console
  console.log("icytune v" + getPackageVersion());

  process.exit(0);
}

if(parsedArgs.listEnv) {

  printEnvironmentVariables();

  process.exit(0);
}

run(parsedArgs).then((exitCode) => {

  shutdownFileLogger();

  process.exit(exitCode);
}).catch((error: unknown): void => {

  LOG.error("Fatal error: %s.", formatError(error));

  // In file logging mode the user is looking at the terminal, not the log file.
  if(!isConsoleLogging()) {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error) + ".");
  }

  shutdownFileLogger();

  process.exit(1);
});
