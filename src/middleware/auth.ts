// src/middleware/auth.ts
import crypto from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { sendUnauthorized } from "./responseHelper";

function safeEqual(a: string, b: string): boolean {
  // Compare digests so differing lengths do not short-circuit.
  const da = crypto.createHash("sha256").update(a).digest();
  const db = crypto.createHash("sha256").update(b).digest();
  return crypto.timingSafeEqual(da, db);
}

export function extractBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

/**
 * Only the bot front end calls this API; it presents its bot token as a bearer token.
 */
export function botAuthMiddleware(botToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req);

    if (!token) {
      sendUnauthorized(res, "Missing bearer token");
      return;
    }

    if (!safeEqual(token, botToken)) {
      console.warn(`[auth] Rejected token for ${req.method} ${req.path}`);
      sendUnauthorized(res, "Invalid bearer token");
      return;
    }

    next();
  };
}
