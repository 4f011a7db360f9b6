/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * server.ts: Now-playing HTTP status server for icytune.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError } from "./utils/index.js";
import type { RouteSources } from "./routes/index.js";
import type { Server } from "node:http";
import express from "express";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * STATUS SERVER
 *
 * When status.enabled is on, playback runs a small read-only HTTP server so another device (a phone, a second terminal, a home dashboard) can follow what is
 * playing. It serves JSON only. Request logs go through morgan into the logger's "status" debug category, never to stdout where the titles are printed.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param sources - Where the routes read their data.
 * @returns The configured Express application.
 */
export function buildStatusApp(sources: RouteSources): Express {

  const app = express();

  app.use(morgan(":method :url from :remote-addr responded :status in :response-time ms.", { stream: createMorganStream() }));

  setupRoutes(app, sources);

  app.use((_req: Request, res: Response): void => {

    res.status(404).json({ error: "Not found." });
  });

  // Express recognizes error handlers by their four parameters, so next stays in the signature.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Status server request failed: %s.", formatError(error));

    res.status(500).json({ error: "Internal error." });
  });

  return app;
}

/**
 * Starts the status server.
 * @param sources - Where the routes read their data.
 * @param host - Address to bind.
 * @param port - TCP port.
 * @returns The listening server.
 * @throws If the server cannot listen (for example, the port is in use).
 */
export async function startStatusServer(sources: RouteSources, host: string, port: number): Promise<Server> {

  const app = buildStatusApp(sources);

  return new Promise<Server>((resolve, reject) => {

    const server = app.listen(port, host, (): void => {

      server.off("error", reject);

      LOG.info("Status server listening on %s:%s.", host, port);

      resolve(server);
    });

    server.once("error", reject);
  });
}

/**
 * Stops the status server. Never throws.
 * @param server - The server to stop.
 */
export async function stopStatusServer(server: Server): Promise<void> {

  return new Promise<void>((resolve) => {

    server.close((error?: Error): void => {

      if(error) {

        LOG.warn("Error closing the status server: %s.", formatError(error));
      } else {

        LOG.debug("status", "Status server closed.");
      }

      resolve();
    });

    // Idle keep-alive connections would otherwise hold close() open.
    server.closeAllConnections();
  });
}
