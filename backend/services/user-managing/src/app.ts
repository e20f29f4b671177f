// backend/services/user-managing/src/app.ts
/**
 * Purpose:
 * - user-managing service on the shared createServiceApp stack.
 * - Health at /user-managing/health/{general,readiness,cpu,disk}
 *   (the Deployment's liveness and readiness probes).
 * - Users API at /users and /user-managing/users.
 *
 * Collaborators are injectable so tests can swap the Supabase transport and
 * the host samplers without touching module state.
 */

import type { Express } from "express";
import type { AxiosInstance } from "axios";
import { createServiceApp } from "@shared/app/createServiceApp";
import { HealthService } from "@shared/health/HealthService";
import { createHealthRouter } from "@shared/health/mount";
import { CpuHealthCheck } from "@shared/health/checks/CpuHealthCheck";
import { DiskHealthCheck } from "@shared/health/checks/DiskHealthCheck";
import type { IHealthCheck } from "@shared/health/types";
import { verifyBearerJwt } from "@shared/middleware/verifyBearerJwt";
import { SERVICE_NAME } from "./bootstrap";
import { SUPABASE_JWT_AUDIENCE, type ServiceConfig } from "./config";
import { SupabaseGraphqlClient } from "./clients/SupabaseGraphqlClient";
import { SupabaseHealthCheck } from "./health/SupabaseHealthCheck";
import { UserRepo, type IUserRepo } from "./repo/userRepo";
import { userRoutes } from "./routes/userRoutes";
import { HEALTH_BASE, USERS_PREFIXES } from "./routes/paths";

export interface AppDeps {
  /** Transport for Supabase GraphQL (tests pass an axios instance with a stub adapter). */
  http?: AxiosInstance;
  repo?: IUserRepo;
  cpuCheck?: IHealthCheck;
  diskCheck?: IHealthCheck;
  readinessCheck?: IHealthCheck;
}

export interface UserManagingApp {
  app: Express;
  health: HealthService;
}

export const LIVENESS_CHECKS = ["cpu", "disk"] as const;
export const READINESS_CHECKS = ["supabase"] as const;

export function createApp(
  config: ServiceConfig,
  deps: AppDeps = {}
): UserManagingApp {
  const gql = new SupabaseGraphqlClient(config.supabase, deps.http);
  const repo = deps.repo ?? new UserRepo(gql);

  const health = new HealthService(SERVICE_NAME)
    .add(
      deps.cpuCheck ??
        new CpuHealthCheck({
          maxPercent: config.health.cpuMaxPercent,
          sampleMs: config.health.cpuSampleMs,
        })
    )
    .add(
      deps.diskCheck ??
        new DiskHealthCheck({
          maxPercent: config.health.diskMaxPercent,
          path: config.health.diskPath,
        })
    )
    .add(deps.readinessCheck ?? new SupabaseHealthCheck(gql));

  const requireUser = verifyBearerJwt({
    secret: config.supabase.jwtSecret,
    audience: SUPABASE_JWT_AUDIENCE,
    algorithms: ["HS256"],
  });

  const app = createServiceApp({
    serviceName: SERVICE_NAME,
    healthBase: HEALTH_BASE,
    health: createHealthRouter({
      health,
      liveness: LIVENESS_CHECKS,
      readiness: READINESS_CHECKS,
    }),
    apiPrefixes: USERS_PREFIXES,
    mountRoutes: (router) => {
      router.use(userRoutes({ repo, requireUser }));
    },
    corsOrigins: [config.frontendUrl, config.backendUrl],
    exposeInternalErrors: config.mode === "debug",
  });

  return { app, health };
}
