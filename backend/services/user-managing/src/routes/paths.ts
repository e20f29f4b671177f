// backend/services/user-managing/src/routes/paths.ts

/**
 * Public paths of the service. The Deployment's probes and the ingress route
 * on these; the deploy lint checks the manifest against them.
 */

export const SERVICE_BASE = "/user-managing";
export const HEALTH_BASE = `${SERVICE_BASE}/health`;
export const LIVENESS_PATH = `${HEALTH_BASE}/general`;
export const READINESS_PATH = `${HEALTH_BASE}/readiness`;

/** Users API: direct ("/users") and behind the ingress prefix. */
export const USERS_PREFIXES = ["/users", `${SERVICE_BASE}/users`];
