// backend/services/shared/src/types/AuthClaims.ts
import type { JwtPayload } from "jsonwebtoken";

/** Verified end-user identity attached to `req.auth` by verifyBearerJwt. */
export interface AuthClaims {
  /** Supabase auth user id (JWT `sub`). */
  sub: string;
  email?: string;
  role?: string;
  /** Full verified payload, for handlers that need custom claims. */
  claims: JwtPayload;
}
