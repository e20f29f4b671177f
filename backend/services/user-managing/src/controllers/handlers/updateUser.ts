// backend/services/user-managing/src/controllers/handlers/updateUser.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { forbidden, fromZodError, notFound } from "@shared/http/errors";
import { logger } from "@shared/utils/logger";
import { zUserId, zUserUpdate } from "../../contracts/user.contract";
import type { IUserRepo } from "../../repo/userRepo";

// PUT /users/:user_id (partial update of the caller's own profile)
export function updateUser(repo: IUserRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const id = zUserId.safeParse(req.params.user_id);
    if (!id.success) throw fromZodError(id.error, "Invalid user id");

    // Supabase is called with the service-role key, so RLS does not apply.
    if (req.auth?.sub !== id.data) {
      throw forbidden("You can only update your own profile");
    }

    const patch = zUserUpdate.safeParse(req.body ?? {});
    if (!patch.success) throw fromZodError(patch.error);

    const updated = await repo.updateById(id.data, patch.data, String(req.id));
    if (!updated) throw notFound(`No user found with ID ${id.data}.`);

    logger.info(
      {
        reqId: req.id,
        userId: id.data,
        actor: req.auth?.sub,
        fields: Object.keys(patch.data),
      },
      "user updated"
    );
    res.status(200).json(updated);
  });
}
