// backend/services/shared/src/app/createServiceApp.ts

/**
 * Assembles the standard service stack:
 *   requestId → http logger → cors → health (open) → json parser → routes
 *   → 404 → problem+json error formatter.
 *
 * Notes:
 * - Health is mounted before the body parser and before any auth so probes
 *   never depend on either.
 * - Auth is per-route (mutations only); there is no global gate here.
 */

import express, { type Express, type Router } from "express";
import cors from "cors";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "user-managing"). Used in logs. */
  serviceName: string;
  /** Base path the health router is mounted at (e.g. "/user-managing/health"). */
  healthBase: string;
  health: Router;
  /**
   * API prefixes the routes are mounted at. The same router is mounted once
   * per prefix (e.g. "/users" for direct calls, "/user-managing/users"
   * behind the ingress).
   */
  apiPrefixes: string[];
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: Router) => void;
  /** Browser origins allowed by CORS; empty disables CORS headers. */
  corsOrigins?: string[];
  /** Include unexpected error messages in 500 bodies (debug mode). */
  exposeInternalErrors?: boolean;
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    healthBase,
    health,
    apiPrefixes,
    mountRoutes,
    corsOrigins = [],
    exposeInternalErrors = false,
    jsonLimit = "1mb",
  } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName, { ignorePathPrefixes: [healthBase] }));

  if (corsOrigins.length) {
    app.use(
      cors({
        origin: corsOrigins,
        credentials: true,
        methods: ["GET", "PUT", "OPTIONS"],
        allowedHeaders: ["Content-Type", "Authorization", "Accept", "X-Request-Id"],
        exposedHeaders: ["X-Request-Id"],
      })
    );
  }

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(healthBase, health);

  // ── Body parser ─────────────────────────────────────────────────────────────
  app.use(express.json({ limit: jsonLimit }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  for (const prefix of apiPrefixes) app.use(prefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundProblemJson([...apiPrefixes, healthBase]));
  app.use(errorProblemJson({ exposeInternalErrors }));

  return app;
}
