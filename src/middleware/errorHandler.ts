// src/middleware/errorHandler.ts
import type { NextFunction, Request, Response } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { sendError, sendNotFound, sendValidationError } from "./responseHelper";

export function notFoundHandler(req: Request, res: Response): void {
  sendNotFound(res, `Route not found: ${req.method} ${req.path}`);
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendValidationError(
      res,
      err.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    );
    return;
  }

  if (err instanceof MulterError) {
    sendError(res, err.message, err.code === "LIMIT_FILE_SIZE" ? 413 : 400, { type: "upload" });
    return;
  }

  // body-parser reports malformed JSON as a SyntaxError
  if (err instanceof SyntaxError) {
    sendValidationError(res, "Malformed JSON body");
    return;
  }

  const message =
    err instanceof Error ? err.message : typeof err === "string" ? err : "Server error";
  console.error("❌ SERVER ERROR:", err);
  sendError(res, message, 500);
}
