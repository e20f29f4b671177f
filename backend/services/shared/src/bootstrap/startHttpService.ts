// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Starting/stopping an HTTP server is a single concern: bind, harden socket
 * timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so multiple calls don't multiply handlers.
 * - `stop()` resolves once in-flight connections drain.
 * - headersTimeout must stay above keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** 0 binds an ephemeral port. */
  port: number;
  host?: string;
  serviceName: string;
  logger: Pick<Logger, "info" | "error">;
  /** Install SIGINT/SIGTERM handlers that exit the process (default true). */
  handleSignals?: boolean;
}

export interface StartedService {
  server: Server;
  /** Port actually bound. */
  boundPort: number;
  stop: () => Promise<void>;
}

const SHUTDOWN_FAILSAFE_MS = 10_000;

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const {
    app,
    port,
    host = "0.0.0.0",
    serviceName,
    logger,
    handleSignals = true,
  } = opts;

  return new Promise<StartedService>((resolve, reject) => {
    const server = app.listen(port, host);
    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    const stop = () =>
      new Promise<void>((res, rej) => {
        server.close((err) => (err ? rej(err) : res()));
      });

    server.once("error", (err) => {
      logger.error({ err, service: serviceName, port }, "http server error");
      reject(err);
    });

    server.once("listening", () => {
      const addr = server.address();
      const boundPort =
        addr && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, host, port: boundPort }, "service listening");

      if (handleSignals) {
        const shutdown = (signal: NodeJS.Signals) => {
          logger.info({ signal, service: serviceName }, "shutting down service");
          stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err, service: serviceName }, "shutdown failed");
              process.exit(1);
            }
          );
          setTimeout(() => process.exit(1), SHUTDOWN_FAILSAFE_MS).unref();
        };
        process.once("SIGTERM", shutdown);
        process.once("SIGINT", shutdown);
      }

      resolve({ server, boundPort, stop });
    });
  });
}
