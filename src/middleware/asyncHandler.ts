// src/middleware/asyncHandler.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Wraps async route handlers so a rejected promise reaches the Express error handler.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
