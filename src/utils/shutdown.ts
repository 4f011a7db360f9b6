/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * shutdown.ts: SIGINT and SIGTERM handling for playback.
 */
import { LOG } from "./logger.js";

/**
 * A shutdown request triggered by SIGINT or SIGTERM.
 */
export interface ShutdownSignal {

  // Removes the signal handlers. Call this only once cleanup has finished, so a repeated signal during cleanup cannot kill the process.
  dispose: () => void;

  // Aborts on the first SIGINT or SIGTERM.
  signal: AbortSignal;
}

/**
 * Installs SIGINT and SIGTERM handlers that abort a signal. The first signal aborts; later ones are logged and ignored while cleanup runs, because with our
 * handlers installed Node does not apply the default action of terminating the process.
 * @returns The abort signal and the function removing the handlers.
 */
export function createShutdownSignal(): ShutdownSignal {

  const controller = new AbortController();
  let shutdownInProgress = false;

  const onSignal = (signal: NodeJS.Signals): void => {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      LOG.debug("session", "Received %s while shutting down, ignoring it.", signal);

      return;
    }

    shutdownInProgress = true;

    LOG.debug("session", "Received %s, stopping playback.", signal);
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {

    dispose: (): void => {

      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
    signal: controller.signal
  };
}
