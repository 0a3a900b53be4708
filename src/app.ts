// src/app.ts
import express from "express";
import type { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { botAuthMiddleware, errorHandler, notFoundHandler } from "./middleware";
import { createAdminRouter } from "./routes/admin";
import { createAnalysisRouter } from "./routes/analysis";
import { createMealsRouter } from "./routes/meals";
import { createRegistrationRouter } from "./routes/registration";
import { createSessionRouter } from "./routes/session";
import { createUsersRouter } from "./routes/users";
import type { CalorieTrackerService } from "./services/calorieTracker";

export interface AppOptions {
  tracker: CalorieTrackerService;
  botToken: string;
  /** morgan access log; off in tests */
  logRequests?: boolean;
}

export function createApp(options: AppOptions): Express {
  const { tracker } = options;
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  app.use(
    cors({
      methods: ["GET", "POST", "OPTIONS", "DELETE", "PUT"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept"],
    })
  );

  if (options.logRequests ?? true) {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: "1mb" }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, service: "calorie-tracker-backend" });
  });

  app.use("/api/v1", botAuthMiddleware(options.botToken));

  app.use("/api/v1/users/:userId/registration", createRegistrationRouter(tracker));
  app.use("/api/v1/users/:userId/session", createSessionRouter(tracker));
  app.use("/api/v1/users/:userId/analysis", createAnalysisRouter(tracker));
  app.use("/api/v1/users/:userId/meals", createMealsRouter(tracker));
  app.use("/api/v1/users", createUsersRouter(tracker));
  app.use("/api/v1/admin", createAdminRouter(tracker));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
