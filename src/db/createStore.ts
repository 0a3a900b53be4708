// src/db/createStore.ts
import type { Clock } from "../utils/date";
import { createPgExecutor, createPgPool } from "./pool";
import { PostgresMealStore } from "./postgresStore";
import { SqliteMealStore } from "./sqliteStore";
import type { MealStore } from "./store";

export interface StoreConfig {
  DATABASE_URL?: string;
  SQLITE_PATH: string;
}

/** PostgreSQL when a connection string is configured, the embedded file otherwise. */
export function createMealStore(config: StoreConfig, clock?: Clock): MealStore {
  if (config.DATABASE_URL) {
    console.log("[Store] Using PostgreSQL backend");
    return new PostgresMealStore({
      executor: createPgExecutor(createPgPool(config.DATABASE_URL)),
      clock,
    });
  }

  console.log(`[Store] Using SQLite backend at ${config.SQLITE_PATH}`);
  return new SqliteMealStore({ filename: config.SQLITE_PATH, clock });
}
