// src/routes/admin.ts
import { Router } from "express";
import type { Request, Response } from "express";
import { asyncHandler, sendSuccess } from "../middleware";
import type { CalorieTrackerService } from "../services/calorieTracker";

/** Mounted at /api/v1/admin */
export function createAdminRouter(tracker: CalorieTrackerService): Router {
  const router = Router();

  router.get(
    "/stats",
    asyncHandler(async (_req: Request, res: Response) => {
      return sendSuccess(res, await tracker.getStats());
    })
  );

  /**
   * POST /cleanup
   * Runs the corrupted-row sweep on demand (it also runs at startup).
   */
  router.post(
    "/cleanup",
    asyncHandler(async (_req: Request, res: Response) => {
      const removed = await tracker.cleanCorruptedData();
      console.log(`[admin] cleanup removed ${removed} records`);
      return sendSuccess(res, { removed });
    })
  );

  return router;
}
