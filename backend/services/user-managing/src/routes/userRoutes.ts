// backend/services/user-managing/src/routes/userRoutes.ts
import { Router, type RequestHandler } from "express";
import { getUserById } from "../controllers/handlers/getUserById";
import { updateUser } from "../controllers/handlers/updateUser";
import type { IUserRepo } from "../repo/userRepo";

/**
 * Policy:
 * - Reads are public (profiles are shown on listings).
 * - Mutations require a verified end-user JWT (`requireUser`) whose `sub`
 *   is the user being changed.
 * - No create/delete here; Supabase Auth owns account lifecycle.
 */
export function userRoutes(deps: {
  repo: IUserRepo;
  requireUser: RequestHandler;
}): Router {
  const router = Router();

  router.get("/:user_id", getUserById(deps.repo));
  router.put("/:user_id", deps.requireUser, updateUser(deps.repo));

  return router;
}
