// backend/services/shared/src/middleware/verifyBearerJwt.ts

/**
 * End-user JWT verification for routes that act on behalf of a user.
 *
 * - Expects `Authorization: Bearer <token>`.
 * - Verifies signature, expiry and audience with a shared secret (Supabase
 *   signs user sessions with HS256 and audience "authenticated").
 * - On success attaches `req.auth`; on failure responds 401 problem+json via
 *   the error formatter (never calls the handler).
 */

import type { Request, RequestHandler } from "express";
import jwt, { type Algorithm, type JwtPayload } from "jsonwebtoken";
import { unauthorized } from "../http/errors";
import type { AuthClaims } from "../types/AuthClaims";

export interface VerifyBearerJwtOptions {
  secret: string;
  audience: string;
  algorithms?: Algorithm[];
  /** Allowed clock skew when checking exp/nbf. */
  clockToleranceSec?: number;
}

export function extractBearer(req: Request): string | undefined {
  const raw = req.headers.authorization;
  if (!raw) return undefined;
  const m = /^Bearer\s+(\S+)\s*$/i.exec(raw.trim());
  return m ? m[1] : undefined;
}

function toAuthClaims(payload: JwtPayload): AuthClaims | undefined {
  if (typeof payload.sub !== "string" || !payload.sub) return undefined;
  const email = payload["email"];
  const role = payload["role"];
  return {
    sub: payload.sub,
    ...(typeof email === "string" ? { email } : {}),
    ...(typeof role === "string" ? { role } : {}),
    claims: payload,
  };
}

export function verifyBearerJwt(opts: VerifyBearerJwtOptions): RequestHandler {
  if (!opts.secret) throw new Error("verifyBearerJwt: secret is required");
  const algorithms = opts.algorithms ?? ["HS256"];

  return (req, _res, next) => {
    const token = extractBearer(req);
    if (!token) {
      next(unauthorized("Not authenticated", "MISSING_BEARER"));
      return;
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, opts.secret, {
        algorithms,
        audience: opts.audience,
        clockTolerance: opts.clockToleranceSec ?? 0,
      });
    } catch {
      next(unauthorized("Invalid or expired token", "INVALID_TOKEN"));
      return;
    }

    const claims =
      typeof decoded === "object" && decoded !== null
        ? toAuthClaims(decoded)
        : undefined;
    if (!claims) {
      next(unauthorized("Invalid or expired token", "INVALID_TOKEN"));
      return;
    }

    req.auth = claims;
    next();
  };
}
