// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Why:
 * - Starting/stopping an HTTP server is a **single concern**: bind, harden
 *   socket timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this;
 *   this file never loads envs or mutates global state beyond signal handlers.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so multiple calls don't multiply handlers.
 * - Exposes a `stop()` promise for test harnesses and orderly shutdowns.
 * - Keep-alive + header timeout hardening (headersTimeout > keepAliveTimeout).
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  /** Service identity for logs (e.g., "user"). */
  serviceName: string;
  logger: Logger;
  /** Install SIGINT/SIGTERM handlers (default true; tests pass false). */
  handleSignals?: boolean;
}

export interface StartedService {
  server: Server;
  /** Resolves with the bound port once the server is listening. */
  listening: Promise<number>;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger } = opts;

  const server = app.listen(port);

  // Socket hardening (maintain headersTimeout > keepAliveTimeout)
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  const listening = new Promise<number>((resolve, reject) => {
    server.once("listening", () => {
      const addr = server.address();
      const boundPort = typeof addr === "object" && addr ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");
      resolve(boundPort);
    });
    server.once("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      reject(err);
    });
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  if (opts.handleSignals ?? true) {
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
  }

  return { server, listening, stop };
}
