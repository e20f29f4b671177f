// backend/services/user-managing/src/contracts/user.contract.ts
import { z } from "zod";

/**
 * Wire shapes for `users_data` rows as exposed through Supabase GraphQL.
 * Field names stay snake_case: they are the column names clients already use.
 */

/** Supabase primary keys are UUIDs; GraphQL rejects anything else as `UUID!`. */
export const zUserId = z.string().uuid("Expected a UUID user id");

export const zUser = z.object({
  id: zUserId,
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  created_at: z.string(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  location: z.string().nullable(),
});
export type User = z.infer<typeof zUser>;

/**
 * Partial update. Only fields present in the body are sent upstream; an empty
 * body is rejected rather than issuing a no-op mutation. `null` clears the
 * nullable location columns.
 */
export const zUserUpdate = z
  .object({
    first_name: z.string().trim().min(1).max(100),
    last_name: z.string().trim().min(1).max(100),
    email: z.string().trim().email(),
    latitude: z.number().min(-90).max(90).nullable(),
    longitude: z.number().min(-180).max(180).nullable(),
    location: z.string().trim().max(255).nullable(),
  })
  .partial()
  .strict()
  .refine((u) => Object.keys(u).length > 0, {
    message: "At least one field must be provided",
  });
export type UserUpdate = z.infer<typeof zUserUpdate>;

/** Columns returned by the update mutation. */
export const zUpdatedUser = z.object({
  first_name: z.string(),
  last_name: z.string(),
  location: z.string().nullable(),
  longitude: z.number().nullable(),
  latitude: z.number().nullable(),
});
export type UpdatedUser = z.infer<typeof zUpdatedUser>;

/** `users_dataCollection` response envelope. */
export const zUserCollection = z.object({
  users_dataCollection: z.object({
    edges: z.array(z.object({ node: zUser })),
  }),
});

/** `updateusers_dataCollection` response envelope. */
export const zUpdateUserResult = z.object({
  updateusers_dataCollection: z.object({
    records: z.array(zUpdatedUser),
  }),
});
