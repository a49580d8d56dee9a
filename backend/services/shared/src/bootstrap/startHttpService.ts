// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Purpose:
 * - Starting/stopping an HTTP server is a single concern: bind, harden
 *   socket timeouts, log where it landed (port 0 in tests), shut down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this;
 *   this file never loads envs.
 *
 * Notes:
 * - `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - `onShutdown` runs before the server closes (drain background work,
 *   disconnect clients).
 * - headersTimeout > keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Logger;
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    logger.info(
      {
        service: serviceName,
        port: addr && typeof addr === "object" ? addr.port : port,
      },
      "service listening"
    );
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = async (): Promise<void> => {
    if (onShutdown) await onShutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      }
    );
    // Fail-safe in case close hangs
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}
