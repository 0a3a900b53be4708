// src/routes/meals.ts
import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { HISTORY_PERIODS } from "../domain/types";
import type { HistoryPeriod } from "../domain/types";
import { asyncHandler, sendSuccess, sendUnavailable } from "../middleware";
import type { CalorieTrackerService } from "../services/calorieTracker";
import { isDateOnly } from "../utils/date";
import { parseUserId } from "./params";

const dateOnly = z.string().refine(isDateOnly, "must be a YYYY-MM-DD date");

const historyQuerySchema = z
  .object({
    period: z
      .string()
      .refine((value): value is HistoryPeriod => HISTORY_PERIODS.some((p) => p === value), {
        message: `period must be one of: ${HISTORY_PERIODS.join(", ")}`,
      })
      .optional(),
    start: dateOnly.optional(),
    end: dateOnly.optional(),
    limit: z.coerce.number().int().min(1).max(100).default(20),
  })
  .refine((q) => (q.start === undefined) === (q.end === undefined), {
    message: "start and end must be given together",
    path: ["start"],
  })
  .refine((q) => q.start === undefined || q.end === undefined || q.start <= q.end, {
    message: "start must not be after end",
    path: ["start"],
  });

/** Mounted at /api/v1/users/:userId/meals */
export function createMealsRouter(tracker: CalorieTrackerService): Router {
  const router = Router({ mergeParams: true });

  /**
   * GET /?period=today|yesterday|week
   * GET /?start=YYYY-MM-DD&end=YYYY-MM-DD
   * GET /?limit=N   (most recent records)
   */
  router.get(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const query = historyQuerySchema.parse(req.query);

      if (query.period) {
        return sendSuccess(res, { period: query.period, ...(await tracker.getHistory(userId, query.period)) });
      }
      if (query.start !== undefined && query.end !== undefined) {
        return sendSuccess(res, await tracker.getHistoryRange(userId, query.start, query.end));
      }
      return sendSuccess(res, { records: await tracker.getRecentHistory(userId, query.limit) });
    })
  );

  router.get(
    "/weekly",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      return sendSuccess(res, await tracker.getWeeklySummary(userId));
    })
  );

  /**
   * DELETE /today
   * Clears the session's daily state and today's records; reports which parts succeeded.
   */
  router.delete(
    "/today",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const result = await tracker.resetDaily(userId);

      switch (result.status) {
        case "full":
          return sendSuccess(res, result);
        case "partial":
          return sendSuccess(res, result, 207);
        case "failed":
          return sendUnavailable(res, "Daily reset failed. Please try again.");
      }
    })
  );

  return router;
}
