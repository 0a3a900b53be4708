// src/routes/analysis.ts
import { Router } from "express";
import type { Request, Response } from "express";
import multer from "multer";
import { z } from "zod";
import { asyncHandler, sendError, sendSuccess, sendUnavailable, sendValidationError } from "../middleware";
import type { AnalysisOutcome, CalorieTrackerService } from "../services/calorieTracker";
import { parseUserId } from "./params";

export const MAX_UPLOAD_BYTES = 8 * 1024 * 1024; // 8MB

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

// Accepts either "image" or "photo"
const uploadImageOrPhoto = upload.fields([
  { name: "image", maxCount: 1 },
  { name: "photo", maxCount: 1 },
]);

const textSchema = z.object({
  text: z.string().trim().min(1, "text is required").max(1000),
  source: z.enum(["text", "voice"]).default("text"),
});

function uploadedImage(req: Request): Express.Multer.File | undefined {
  const files = req.files;
  if (!files) return undefined;
  if (Array.isArray(files)) return files[0];
  return files.image?.[0] ?? files.photo?.[0];
}

function sendOutcome(res: Response, outcome: AnalysisOutcome): Response {
  switch (outcome.status) {
    case "not_registered":
      return sendError(res, outcome.message, 404);
    case "write_failed":
      return sendUnavailable(res, outcome.message);
    case "recorded":
      return sendSuccess(res, outcome, 201);
    default:
      // quick, unparseable and failed are answers the user still sees
      return sendSuccess(res, outcome);
  }
}

/** Mounted at /api/v1/users/:userId/analysis */
export function createAnalysisRouter(tracker: CalorieTrackerService): Router {
  const router = Router({ mergeParams: true });

  /**
   * POST /photo
   * multipart/form-data with the picture under "image" or "photo".
   */
  router.post(
    "/photo",
    uploadImageOrPhoto,
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const file = uploadedImage(req);
      if (!file || file.size === 0) {
        return sendValidationError(res, 'Expected an image file under "image" or "photo"');
      }

      console.log(`[analysis] photo from user ${userId}: ${file.size} bytes (${file.mimetype})`);
      return sendOutcome(res, await tracker.analyzeImage(userId, file.buffer));
    })
  );

  /**
   * POST /text
   * Body: { text, source?: "text" | "voice" }. Voice arrives already transcribed.
   */
  router.post(
    "/text",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = parseUserId(req);
      const { text, source } = textSchema.parse(req.body);
      return sendOutcome(res, await tracker.analyzeText(userId, text, source));
    })
  );

  return router;
}
