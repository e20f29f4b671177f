// backend/services/shared/src/contracts/problem.contract.ts
import { z } from "zod";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

/** One validation failure, flattened from a Zod issue. */
export const zProblemFieldError = z.object({
  path: z.string(),
  code: z.string(),
  message: z.string(),
});
export type ProblemFieldError = z.infer<typeof zProblemFieldError>;

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z.array(zProblemFieldError).optional(),
});
export type Problem = z.infer<typeof zProblem>;
