// src/index.ts
import "dotenv/config";
import { createApp } from "./app";
import { createMealStore } from "./db/createStore";
import { validateEnvironment } from "./middleware";
import type { Env } from "./middleware";
import { createOpenAiCalorieEstimator } from "./services/calorieEstimator";
import { CalorieTrackerService } from "./services/calorieTracker";
import { DailyStateTracker } from "./services/dailyStateTracker";
import { ResponseCache } from "./services/responseCache";

function loadEnvironment(): Env {
  try {
    return validateEnvironment();
  } catch (err) {
    console.error("❌ Refusing to start:", err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const env = loadEnvironment();

  const store = createMealStore(env);
  await store.initialize();

  const dailyState = new DailyStateTracker({ sessionTtlMinutes: env.SESSION_TTL_MINUTES });
  const tracker = new CalorieTrackerService({
    store,
    estimator: createOpenAiCalorieEstimator(env),
    cache: new ResponseCache(env.CACHE_CAPACITY),
    dailyState,
  });

  const app = createApp({
    tracker,
    botToken: env.BOT_TOKEN,
    logRequests: env.NODE_ENV !== "test",
  });

  const server = app.listen(env.PORT, () => {
    console.log(`Calorie tracker backend listening on port ${env.PORT} (${store.backend})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[shutdown] ${signal} received, closing`);
    server.close(() => {
      dailyState.destroy();
      store
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[shutdown] store close failed:", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("❌ Startup failed:", err);
  process.exit(1);
});
