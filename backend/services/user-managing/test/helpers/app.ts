// backend/services/user-managing/test/helpers/app.ts
import type { Express } from "express";
import type { HealthStatus, IHealthCheck } from "@shared/health/types";
import { createApp, type AppDeps } from "../../src/app";
import { loadConfig } from "../../src/config";
import { TEST_ENV } from "./fixtures";
import { stubSupabase, withPing, type GraphqlCall, type StubHandler } from "./supabaseStub";

export function fixedCheck(name: string, status: HealthStatus, details = `${name} ${status}`): IHealthCheck {
  return { name, check: async () => ({ status, details }) };
}

/**
 * The real app wired to an in-process Supabase stub. Host checks are fixed UP
 * unless overridden; the readiness ping is answered by the stub.
 */
export function buildTestApp(
  handler: StubHandler,
  deps: Omit<AppDeps, "http"> = {},
  env = TEST_ENV
): { app: Express; calls: GraphqlCall[] } {
  const config = loadConfig(env);
  const { http, calls } = stubSupabase(config, withPing(handler));
  const { app } = createApp(config, {
    http,
    cpuCheck: fixedCheck("cpu", "UP"),
    diskCheck: fixedCheck("disk", "UP"),
    ...deps,
  });
  return { app, calls };
}
