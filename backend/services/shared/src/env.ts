// backend/services/shared/src/env.ts

/**
 * Environment loading and validation shared by every service.
 *
 * - Files load in the order given. dotenv never overwrites a key that is
 *   already set, so the orchestrator's variables win over any file and an
 *   earlier file wins over a later one.
 * - Validators fail fast with the offending key in the message. They take an
 *   explicit env map so config parsing stays testable without touching
 *   process.env.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

export type EnvMap = Record<string, string | undefined>;

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error)
    throw new Error(
      `Failed to load env file: ${absPath} (${String(parsed.error)})`
    );
  dotenvExpand.expand(parsed);
  return true;
}

/**
 * Load several files in order (first hit per key wins). Returns the absolute
 * paths that were found.
 * Throws if none loaded and allowMissing is false.
 */
export function loadEnvFiles(
  files: string[],
  opts: { allowMissing?: boolean } = {}
): string[] {
  const loaded: string[] = [];
  for (const f of files) {
    const abs = path.resolve(f);
    if (loadIfExists(abs)) loaded.push(abs);
  }
  if (!loaded.length && !opts.allowMissing)
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  return loaded;
}

/** Collects every missing key at once so ops can fix a deployment in one pass. */
export function assertEnv(keys: readonly string[], env: EnvMap = process.env) {
  const missing = keys.filter((k) => !env[k] || !String(env[k]).trim());
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}

export function requireEnv(name: string, env: EnvMap = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function optionalEnv(
  name: string,
  env: EnvMap = process.env
): string | undefined {
  const v = env[name];
  if (v == null || !v.trim()) return undefined;
  return v.trim();
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvMap = process.env,
  fallback?: T
): T {
  const v = optionalEnv(name, env) ?? fallback;
  if (v === undefined) throw new Error(`Missing required env var: ${name}`);
  const match = allowed.find((a) => a === v);
  if (match === undefined)
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  return match;
}

export function requireNumber(
  name: string,
  env: EnvMap = process.env,
  fallback?: number
): number {
  const v = optionalEnv(name, env);
  if (v === undefined) {
    if (fallback === undefined)
      throw new Error(`Missing required env var: ${name}`);
    return fallback;
  }
  if (!/^-?\d+(\.\d+)?$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

export function requirePort(
  name: string,
  env: EnvMap = process.env,
  fallback?: number
): number {
  const n = requireNumber(name, env, fallback);
  if (!Number.isInteger(n) || n < 0 || n > 65535)
    throw new Error(`Env var ${name} must be a TCP port (0-65535), got "${n}"`);
  return n;
}

export function requireUrl(name: string, env: EnvMap = process.env): string {
  const v = requireEnv(name, env);
  let u: URL;
  try {
    u = new URL(v);
  } catch {
    throw new Error(`Env ${name} must be a valid URL`);
  }
  if (!/^https?:$/.test(u.protocol))
    throw new Error(`Env ${name} must be http or https URL`);
  return v.replace(/\/+$/, "");
}

/** Redact helper for logging maps of envs (never dump real values to logs). */
export function redactEnv(
  obj: Record<string, unknown>
): Record<string, string> {
  return Object.fromEntries(Object.keys(obj).map((k) => [k, "***redacted***"]));
}
