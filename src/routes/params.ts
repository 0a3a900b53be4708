// src/routes/params.ts
import type { Request } from "express";
import { z } from "zod";

const userIdSchema = z.coerce
  .number({ invalid_type_error: "userId must be a number" })
  .int("userId must be an integer")
  .positive("userId must be positive");

/** Throws ZodError (answered as 400) when the path segment is not a user id. */
export function parseUserId(req: Request): number {
  return z.object({ userId: userIdSchema }).parse(req.params).userId;
}
