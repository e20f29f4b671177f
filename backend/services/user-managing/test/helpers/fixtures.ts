// backend/services/user-managing/test/helpers/fixtures.ts
import jwt from "jsonwebtoken";
import type { EnvMap } from "@shared/env";
import type { User } from "../../src/contracts/user.contract";

export const TEST_ENV: EnvMap = {
  SUPABASE_URL: "https://supabase.test",
  SUPABASE_KEY: "test-anon-key",
  SUPABASE_SERVICE_ROLE_KEY: "test-service-role-key",
  SUPABASE_JWT_SECRET: "test-secret",
  FRONTEND_URL: "http://frontend.test",
  BACKEND_URL: "http://backend.test",
};

export const USER_ID = "6f1c2a4e-8b3d-4c5e-9a7f-0123456789ab";
export const MISSING_ID = "0b7e4c1d-2f3a-4b5c-8d6e-fedcba987654";

export const sampleUser = (): User => ({
  id: USER_ID,
  email: "ana@example.com",
  first_name: "Ana",
  last_name: "Novak",
  created_at: "2024-05-01T10:00:00+00:00",
  latitude: 46.05,
  longitude: 14.5,
  location: "Ljubljana",
});

export function userToken(sub = USER_ID, secret = "test-secret"): string {
  return jwt.sign({ sub, email: "ana@example.com", role: "authenticated" }, secret, {
    algorithm: "HS256",
    audience: "authenticated",
    expiresIn: "5m",
  });
}
