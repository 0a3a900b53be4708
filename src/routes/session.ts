// src/routes/session.ts
import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { mealTypeLabel } from "../domain/calorieText";
import { MEAL_TYPES } from "../domain/types";
import type { MealType } from "../domain/types";
import { asyncHandler, sendError, sendSuccess } from "../middleware";
import type { CalorieTrackerService } from "../services/calorieTracker";
import { parseUserId } from "./params";

const mealTypeSchema = z.object({
  mealType: z.string().refine((value): value is MealType => MEAL_TYPES.some((t) => t === value), {
    message: `mealType must be one of: ${MEAL_TYPES.join(", ")}`,
  }),
});

const quickAnalysisSchema = z.object({
  enabled: z.boolean().default(true),
});

/** Mounted at /api/v1/users/:userId/session */
export function createSessionRouter(tracker: CalorieTrackerService): Router {
  const router = Router({ mergeParams: true });

  router.get(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      return sendSuccess(res, tracker.getSession(userId));
    })
  );

  /**
   * POST /meal-type
   * Body: { mealType }. Breakfast, lunch and dinner once per day; snack any time.
   */
  router.post(
    "/meal-type",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const { mealType } = mealTypeSchema.parse(req.body);

      const result = tracker.selectMealType(userId, mealType);
      if (!result.ok) {
        return sendError(res, `${mealTypeLabel(mealType)} was already added today`, 409, {
          reason: result.reason,
        });
      }
      return sendSuccess(res, tracker.getSession(userId));
    })
  );

  /**
   * POST /quick-analysis
   * Body: { enabled? }. The next analysis is shown but not recorded.
   */
  router.post(
    "/quick-analysis",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const { enabled } = quickAnalysisSchema.parse(req.body ?? {});
      tracker.setQuickAnalysis(userId, enabled);
      return sendSuccess(res, { quickAnalysis: enabled });
    })
  );

  return router;
}
