// backend/services/user-managing/src/bootstrap.ts

/**
 * Loads env for local runs. In the cluster every variable is injected by the
 * Deployment (secrets + literals), so missing files are fine; values already
 * present in process.env always win.
 */

import path from "node:path";
import { parseArgs } from "node:util";
import { loadEnvFiles } from "@shared/env";

export const SERVICE_NAME = "user-managing" as const;

const SERVICE_ROOT = path.resolve(__dirname, "..");
const REPO_ROOT = path.resolve(SERVICE_ROOT, "../../..");

/** Service-local .env first, then repo root; dotenv never overwrites, so the first hit wins. */
export function loadServiceEnv(): string[] {
  const explicit = (process.env.ENV_FILE ?? "").trim();
  const files = explicit
    ? [path.resolve(REPO_ROOT, explicit)]
    : [path.join(SERVICE_ROOT, ".env"), path.join(REPO_ROOT, ".env")];
  return loadEnvFiles(files, { allowMissing: !explicit });
}

export interface ListenOverrides {
  host?: string;
  port?: number;
}

/** `--host` / `--port` flags from the container CMD override the env config. */
export function parseListenArgs(argv: string[]): ListenOverrides {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: "string" },
      port: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  });

  const out: ListenOverrides = {};
  if (values.host !== undefined) out.host = values.host;
  if (values.port !== undefined) {
    const port = Number(values.port);
    if (!/^\d+$/.test(values.port) || port > 65535)
      throw new Error(`--port must be a TCP port (0-65535), got "${values.port}"`);
    out.port = port;
  }
  return out;
}
