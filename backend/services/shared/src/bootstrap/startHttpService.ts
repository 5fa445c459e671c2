// backend/services/shared/src/bootstrap/startHttpService.ts
/**
 * Purpose:
 * - Starting/stopping an HTTP server is a single concern: bind, harden socket
 *   timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so repeated calls don't multiply handlers.
 * - `onShutdown` runs after the server stops accepting connections; its
 *   failure is logged and the process still exits.
 * - headersTimeout stays above keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { IBoundLogger } from "../logger/Logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  host?: string;
  serviceName: string;
  log: IBoundLogger;
  /** Release service resources (db connections, etc.) on signal. */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(opts: StartHttpServiceOptions): StartedService {
  const { app, port, host, serviceName } = opts;
  const log = opts.log.bind({ component: "http-server" });

  const onListening = () => {
    const addr = server.address();
    const boundPort =
      addr !== null && typeof addr === "object" ? addr.port : port;
    log.info({ service: serviceName, port: boundPort, host }, "service listening");
  };
  const server = host
    ? app.listen(port, host, onListening)
    : app.listen(port, onListening);

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    log.error({ error: log.serializeError(err), service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    log.info({ signal, service: serviceName }, "shutting down service");
    // Fail-safe in case close hangs
    setTimeout(() => process.exit(1), 10_000).unref();
    void stop()
      .then(() => opts.onShutdown?.())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ error: log.serializeError(err) }, "shutdown failed");
          process.exit(1);
        }
      );
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}
