// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Structured request logs for every service, keyed by `service` and `reqId`.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is already set
 *   and every line carries the same correlation key as problem+json bodies.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes run every few seconds; they are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";
import { readRequestIdHeader } from "./requestId";

export function makeHttpLogger(
  serviceName: string,
  opts: { ignorePathPrefixes?: string[] } = {}
) {
  const logger = rootLogger.child({ service: serviceName });
  const ignore = ["/favicon.ico", ...(opts.ignorePathPrefixes ?? [])];

  return pinoHttp({
    logger,

    // Reuse req.id from requestIdMiddleware; fall back to headers, then mint.
    genReqId: (req, res) => {
      if (typeof req.id === "string" && req.id) return req.id;
      const id = readRequestIdHeader(req.headers) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url ?? "";
        return ignore.some((p) => url.startsWith(p));
      },
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
