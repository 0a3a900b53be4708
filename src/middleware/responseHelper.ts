// src/middleware/responseHelper.ts
import type { Response } from "express";

/**
 * Response envelope shared by every endpoint.
 */
export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: Record<string, unknown>;
}

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): Response {
  const body: ApiResponse<T> = { ok: true, data };
  return res.status(statusCode).json(body);
}

export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  meta?: Record<string, unknown>
): Response {
  const response: ApiResponse = {
    ok: false,
    error,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

export function sendNotFound(res: Response, message: string = "Resource not found"): Response {
  return sendError(res, message, 404);
}

export function sendUnauthorized(res: Response, message: string = "Unauthorized"): Response {
  return sendError(res, message, 401);
}

export function sendValidationError(res: Response, errors: string | string[]): Response {
  const errorMessage = Array.isArray(errors) ? errors.join(", ") : errors;
  return sendError(res, errorMessage, 400, { type: "validation" });
}

/** A write the store refused; the caller may retry. */
export function sendUnavailable(res: Response, message: string): Response {
  return sendError(res, message, 503, { retryable: true });
}
