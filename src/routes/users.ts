// src/routes/users.ts
import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { ACTIVITY_LEVELS, GENDERS } from "../domain/types";
import type { ActivityLevel, Gender } from "../domain/types";
import { asyncHandler, sendNotFound, sendSuccess, sendUnavailable } from "../middleware";
import type { CalorieTrackerService } from "../services/calorieTracker";
import { parseUserId } from "./params";

const genderSchema = z
  .string()
  .toLowerCase()
  .refine((value): value is Gender => GENDERS.some((g) => g === value), {
    message: `gender must be one of: ${GENDERS.join(", ")}`,
  });

const activitySchema = z.string().refine((value): value is ActivityLevel => ACTIVITY_LEVELS.some((a) => a === value), {
  message: `activityLevel must be one of: ${ACTIVITY_LEVELS.join(", ")}`,
});

// Same limits as the registration dialogue.
const profileSchema = z.object({
  username: z.string().trim().max(64).nullable().optional(),
  name: z
    .string()
    .trim()
    .min(2)
    .max(50)
    .regex(/^[\p{L} ]+$/u, "name may contain letters and spaces only"),
  gender: genderSchema,
  age: z.number().int().min(10).max(120),
  height: z.number().min(100).max(250),
  weight: z.number().min(30).max(300),
  activityLevel: activitySchema,
});

export function createUsersRouter(tracker: CalorieTrackerService): Router {
  const router = Router();

  /**
   * GET /api/v1/users/:userId
   */
  router.get(
    "/:userId",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const user = await tracker.getUser(userId);
      if (!user) {
        return sendNotFound(res, "User is not registered");
      }
      return sendSuccess(res, user);
    })
  );

  /**
   * PUT /api/v1/users/:userId
   * Body: { username?, name, gender, age, height, weight, activityLevel }
   * The daily target is recomputed on every write.
   */
  router.put(
    "/:userId",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const body = profileSchema.parse(req.body);

      const saved = await tracker.upsertUser({ userId, ...body, username: body.username ?? null });
      if (!saved) {
        return sendUnavailable(res, "The profile could not be saved. Please try again.");
      }
      return sendSuccess(res, await tracker.getUser(userId));
    })
  );

  /**
   * DELETE /api/v1/users/:userId
   * Irreversible: profile and the whole meal history.
   */
  router.delete(
    "/:userId",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      if (!(await tracker.resetAll(userId))) {
        return sendUnavailable(res, "The data could not be deleted. Please try again later.");
      }
      return sendSuccess(res, { deleted: true });
    })
  );

  /**
   * GET /api/v1/users/:userId/day
   * Today's total against the target plus the meal types still open.
   */
  router.get(
    "/:userId/day",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const status = await tracker.getDayStatus(userId);
      if (!status) {
        return sendNotFound(res, "User is not registered");
      }
      return sendSuccess(res, status);
    })
  );

  return router;
}
