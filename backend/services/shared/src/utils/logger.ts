// backend/services/shared/src/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared logger (authoritative)
 *
 * Each service MUST call `initLogger({ service })` at bootstrap BEFORE
 * creating any request loggers (pino-http), so every line carries `service`.
 *
 * Usage:
 *   import { initLogger, logger } from "@shared/utils/logger";
 *   initLogger({ service: SERVICE_NAME, level: config.logLevel });
 */

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

function initialLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").trim();
  return isLogLevel(raw) ? raw : "info";
}

// NOTE: no "service" in base until initLogger() runs; avoids stamping "unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: initialLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie", "headers.apikey"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(opts: {
  service: string;
  level?: LevelWithSilent;
}): Logger {
  SERVICE_NAME = String(opts.service || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires a service name");
  logger = pino({
    ...pinoOptions,
    level: opts.level ?? logger.level,
    base: { service: SERVICE_NAME },
  });
  return logger;
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
}

/** Minimal per-request context for error and audit lines. */
export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: req.id === undefined ? null : String(req.id),
    path: req.originalUrl,
    method: req.method,
    userId: req.auth?.sub ?? null,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
