// src/routes/registration.ts
import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { asyncHandler, sendError, sendSuccess, sendUnavailable } from "../middleware";
import type { CalorieTrackerService } from "../services/calorieTracker";
import { parseUserId } from "./params";

const stepSchema = z.object({
  input: z.string().max(200),
  username: z.string().trim().max(64).nullable().optional(),
});

/** Mounted at /api/v1/users/:userId/registration */
export function createRegistrationRouter(tracker: CalorieTrackerService): Router {
  const router = Router({ mergeParams: true });

  /**
   * POST /
   * Starts (or restarts) the dialogue at the first step.
   */
  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      return sendSuccess(res, tracker.beginRegistration(userId), 201);
    })
  );

  /**
   * POST /step
   * Body: { input, username? }
   */
  router.post(
    "/step",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const { input, username } = stepSchema.parse(req.body);

      const outcome = await tracker.submitRegistrationStep(userId, input, username ?? null);
      switch (outcome.status) {
        case "not_started":
          return sendError(res, "Registration has not been started", 409);
        case "invalid":
          return sendError(res, outcome.error, 400, {
            type: "validation",
            step: outcome.step,
            prompt: outcome.prompt,
          });
        case "write_failed":
          return sendUnavailable(res, outcome.message);
        case "complete":
          return sendSuccess(res, outcome, 201);
        case "next":
          return sendSuccess(res, outcome);
      }
    })
  );

  return router;
}
