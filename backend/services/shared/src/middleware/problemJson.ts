// backend/services/shared/src/middleware/problemJson.ts

/**
 * Every error response is RFC 7807 Problem+JSON so clients and tests can rely
 * on one shape across services.
 *
 * Notes:
 * - 404s are only formatted for routes under known prefixes; anything else
 *   gets a bare 404.
 * - Unexpected errors keep their message out of the body unless the service
 *   runs with `exposeInternalErrors` (debug mode).
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import { HttpError, statusTitle } from "../http/errors";
import {
  PROBLEM_CONTENT_TYPE,
  type Problem,
} from "../contracts/problem.contract";
import { extractLogContext, logger } from "../utils/logger";

function instanceOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

/** body-parser raises these with `type` and `status` set. */
function isBodyParserError(
  err: unknown
): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.") &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      const body: Problem = {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
        instance: instanceOf(req),
      };
      res.status(404).type(PROBLEM_CONTENT_TYPE).json(body);
      return;
    }
    res.status(404).end();
  };
}

export function toProblem(
  err: unknown,
  req: Request,
  opts: { exposeInternalErrors?: boolean } = {}
): Problem {
  if (err instanceof HttpError) {
    return {
      type: "about:blank",
      title: err.title,
      status: err.status,
      detail: err.message,
      instance: instanceOf(req),
      code: err.code,
      errors: err.errors,
    };
  }

  if (isBodyParserError(err)) {
    const status = err.status >= 400 && err.status < 500 ? err.status : 400;
    return {
      type: "about:blank",
      title: statusTitle(status),
      status,
      detail:
        err.type === "entity.parse.failed"
          ? "Malformed JSON body"
          : err.message,
      instance: instanceOf(req),
      code:
        err.type === "entity.parse.failed"
          ? "INVALID_JSON"
          : err.type.replace(/^entity\./, "").toUpperCase().replace(/\./g, "_"),
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  return {
    type: "about:blank",
    title: "Internal Server Error",
    status: 500,
    detail: opts.exposeInternalErrors ? message : "Internal Server Error",
    instance: instanceOf(req),
    code: "INTERNAL",
  };
}

export function errorProblemJson(
  opts: { exposeInternalErrors?: boolean } = {}
): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const problem = toProblem(err, req, opts);
    const ctx = extractLogContext(req);

    if (problem.status >= 500) {
      logger.error({ ...ctx, status: problem.status, err }, "request failed");
    } else {
      logger.warn(
        { ...ctx, status: problem.status, code: problem.code },
        problem.detail ?? problem.title
      );
    }

    // Drop undefined keys for a stable wire format.
    const body = Object.fromEntries(
      Object.entries(problem).filter(([, v]) => v !== undefined)
    );
    res.status(problem.status).type(PROBLEM_CONTENT_TYPE).json(body);
  };
}
