// backend/services/user-managing/src/config.ts

/**
 * Typed, frozen configuration for the service.
 *
 * - No dotenv loading here (bootstrap.ts loads env files).
 * - Secrets have no defaults; every missing one is reported in a single error.
 * - Literals set by the Deployment (port, mode) have defaults matching it.
 */

import type { LevelWithSilent } from "pino";
import {
  assertEnv,
  optionalEnv,
  requireEnum,
  requireEnv,
  requireNumber,
  requirePort,
  requireUrl,
  type EnvMap,
} from "@shared/env";
import { isLogLevel } from "@shared/utils/logger";

/** Keys the Deployment injects from the `secrets` Secret. */
export const REQUIRED_SECRETS = [
  "SUPABASE_SERVICE_ROLE_KEY",
  "SUPABASE_URL",
  "SUPABASE_KEY",
  "SUPABASE_JWT_SECRET",
  "FRONTEND_URL",
  "BACKEND_URL",
] as const;

export const PORT_ENV = "USER_MANAGING_SERVER_PORT";
export const MODE_ENV = "USER_MANAGING_SERVER_MODE";
export const DEFAULT_PORT = 8080;

export const SERVER_MODES = ["release", "debug"] as const;
export type ServerMode = (typeof SERVER_MODES)[number];

/** Supabase signs user sessions for this audience. */
export const SUPABASE_JWT_AUDIENCE = "authenticated";

export interface ServiceConfig {
  readonly port: number;
  readonly mode: ServerMode;
  readonly logLevel: LevelWithSilent;
  readonly frontendUrl: string;
  readonly backendUrl: string;
  readonly supabase: {
    readonly url: string;
    readonly graphqlUrl: string;
    readonly anonKey: string;
    readonly serviceRoleKey: string;
    readonly jwtSecret: string;
    readonly timeoutMs: number;
  };
  readonly health: {
    readonly cpuMaxPercent: number;
    readonly cpuSampleMs: number;
    readonly diskMaxPercent: number;
    readonly diskPath: string;
  };
}

function logLevelFor(mode: ServerMode, env: EnvMap): LevelWithSilent {
  const raw = optionalEnv("LOG_LEVEL", env);
  if (raw === undefined) return mode === "debug" ? "debug" : "info";
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

function requirePercent(name: string, env: EnvMap, fallback: number): number {
  const n = requireNumber(name, env, fallback);
  if (n <= 0 || n > 100)
    throw new Error(`Env var ${name} must be a percentage in (0, 100], got "${n}"`);
  return n;
}

export function loadConfig(env: EnvMap = process.env): ServiceConfig {
  assertEnv(REQUIRED_SECRETS, env);

  const mode = requireEnum(MODE_ENV, SERVER_MODES, env, "release");
  const supabaseUrl = requireUrl("SUPABASE_URL", env);

  const timeoutMs = requireNumber("SUPABASE_TIMEOUT_MS", env, 5000);
  if (timeoutMs <= 0) throw new Error("Env var SUPABASE_TIMEOUT_MS must be positive");

  const cpuSampleMs = requireNumber("HEALTH_CPU_SAMPLE_MS", env, 1000);
  if (cpuSampleMs < 0) throw new Error("Env var HEALTH_CPU_SAMPLE_MS must not be negative");

  return Object.freeze({
    port: requirePort(PORT_ENV, env, DEFAULT_PORT),
    mode,
    logLevel: logLevelFor(mode, env),
    frontendUrl: requireUrl("FRONTEND_URL", env),
    backendUrl: requireUrl("BACKEND_URL", env),
    supabase: Object.freeze({
      url: supabaseUrl,
      graphqlUrl: `${supabaseUrl}/graphql/v1`,
      anonKey: requireEnv("SUPABASE_KEY", env),
      serviceRoleKey: requireEnv("SUPABASE_SERVICE_ROLE_KEY", env),
      jwtSecret: requireEnv("SUPABASE_JWT_SECRET", env),
      timeoutMs,
    }),
    health: Object.freeze({
      cpuMaxPercent: requirePercent("HEALTH_CPU_MAX_PERCENT", env, 85),
      cpuSampleMs,
      diskMaxPercent: requirePercent("HEALTH_DISK_MAX_PERCENT", env, 90),
      diskPath: optionalEnv("HEALTH_DISK_PATH", env) ?? "/",
    }),
  });
}

/** Loggable view of the config; keys and secrets never leave the process. */
export function describeConfig(cfg: ServiceConfig): Record<string, unknown> {
  return {
    port: cfg.port,
    mode: cfg.mode,
    logLevel: cfg.logLevel,
    frontendUrl: cfg.frontendUrl,
    backendUrl: cfg.backendUrl,
    supabaseUrl: cfg.supabase.url,
    supabaseTimeoutMs: cfg.supabase.timeoutMs,
    health: cfg.health,
  };
}
