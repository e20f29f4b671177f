// backend/services/shared/src/types/express.d.ts
import type { AuthClaims } from "./AuthClaims";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthClaims;
    }
  }
}

export {};
