// backend/services/shared/src/middleware/requestId.ts

/**
 * Every inbound request carries one correlation key, used by the request
 * logger, the problem+json formatter and any upstream call.
 *
 * - Must run before the logger and anything that reports errors.
 * - Never overwrites a caller-supplied ID; mints a UUID only when none of
 *   `x-request-id`, `x-correlation-id`, `x-amzn-trace-id` is present.
 * - Echoes the ID back as `x-request-id`.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export const REQUEST_ID_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

/** First non-empty correlation header value, if any. */
export function readRequestIdHeader(
  headers: IncomingHttpHeaders
): string | undefined {
  for (const name of REQUEST_ID_HEADERS) {
    const h = headers[name];
    const v = Array.isArray(h) ? h[0] : h;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = readRequestIdHeader(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
