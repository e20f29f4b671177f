// backend/services/user-managing/src/controllers/handlers/getUserById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { fromZodError, notFound } from "@shared/http/errors";
import { zUserId } from "../../contracts/user.contract";
import type { IUserRepo } from "../../repo/userRepo";

// GET /users/:user_id
export function getUserById(repo: IUserRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const id = zUserId.safeParse(req.params.user_id);
    if (!id.success) throw fromZodError(id.error, "Invalid user id");

    const user = await repo.findById(id.data, String(req.id));
    if (!user) throw notFound(`No user found with ID ${id.data}.`);

    res.status(200).json(user);
  });
}
