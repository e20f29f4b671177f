// backend/services/shared/src/http/errors.ts

/**
 * Typed HTTP failures. Handlers throw these; `errorProblemJson` turns them
 * into RFC 7807 bodies with the status they carry. Anything else thrown is
 * treated as a 500.
 */

import type { ZodError } from "zod";
import type { ProblemFieldError } from "../contracts/problem.contract";

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict",
  422: "Unprocessable Entity",
  429: "Too Many Requests",
  500: "Internal Server Error",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

export function statusTitle(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Request Error");
}

export class HttpError extends Error {
  readonly status: number;
  readonly title: string;
  readonly code?: string;
  readonly errors?: ProblemFieldError[];

  constructor(
    status: number,
    detail: string,
    opts: { code?: string; title?: string; errors?: ProblemFieldError[] } = {}
  ) {
    super(detail);
    this.name = "HttpError";
    this.status = status >= 400 && status < 600 ? status : 500;
    this.title = opts.title ?? statusTitle(this.status);
    this.code = opts.code;
    this.errors = opts.errors;
  }
}

export const badRequest = (detail: string, code = "BAD_REQUEST") =>
  new HttpError(400, detail, { code });

export const unauthorized = (detail: string, code = "UNAUTHORIZED") =>
  new HttpError(401, detail, { code });

export const forbidden = (detail: string, code = "FORBIDDEN") =>
  new HttpError(403, detail, { code });

export const notFound = (detail = "Resource not found") =>
  new HttpError(404, detail, { code: "NOT_FOUND" });

export const badGateway = (detail: string, code = "UPSTREAM_ERROR") =>
  new HttpError(502, detail, { code });

/** 400 with one entry per Zod issue. */
export function fromZodError(error: ZodError, detail = "Validation failed") {
  const errors = error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
  return new HttpError(400, detail, { code: "VALIDATION_ERROR", errors });
}
