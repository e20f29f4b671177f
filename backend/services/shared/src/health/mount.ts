// backend/services/shared/src/health/mount.ts
/**
 * Purpose:
 * - Health endpoints polled by the orchestrator, mounted under the caller's base
 *   (e.g. "/user-managing/health").
 *
 * Routes (relative to base):
 *   GET /general     -> liveness set; 200 UP / 503 DOWN
 *   GET /readiness   -> readiness set; 200 UP / 503 DOWN
 *   GET /<check>     -> a single registered check (e.g. /cpu, /disk)
 *
 * Health stays public and unauthenticated.
 */

import { Router, type Response } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { logger } from "../utils/logger";
import type { HealthService } from "./HealthService";
import type { HealthStatus } from "./types";

export interface HealthRouterOptions {
  health: HealthService;
  /** Checks that decide liveness (restart). */
  liveness: readonly string[];
  /** Checks that decide readiness (traffic admission). */
  readiness: readonly string[];
}

const statusCode = (s: HealthStatus) => (s === "UP" ? 200 : 503);

function noStore(res: Response): Response {
  return res.setHeader("cache-control", "no-store");
}

export function createHealthRouter(opts: HealthRouterOptions): Router {
  const { health, liveness, readiness } = opts;
  for (const name of [...liveness, ...readiness]) {
    if (!health.has(name)) {
      throw new Error(`createHealthRouter: check "${name}" is not registered`);
    }
  }

  const router = Router();

  router.get(
    "/general",
    asyncHandler(async (_req, res) => {
      const report = await health.run(liveness);
      if (report.status === "DOWN") {
        logger.warn({ route: "general", report }, "liveness check failed");
      }
      noStore(res).status(statusCode(report.status)).json(report);
    })
  );

  router.get(
    "/readiness",
    asyncHandler(async (_req, res) => {
      const report = await health.run(readiness);
      if (report.status === "DOWN") {
        logger.warn({ route: "readiness", report }, "service not ready");
      }
      noStore(res).status(statusCode(report.status)).json(report);
    })
  );

  router.get(
    "/:component",
    asyncHandler(async (req, res, next) => {
      const name = req.params.component;
      if (!health.has(name)) return next();
      const result = await health.runOne(name);
      noStore(res).status(statusCode(result.status)).json(result);
    })
  );

  return router;
}
