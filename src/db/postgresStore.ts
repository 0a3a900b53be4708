// src/db/postgresStore.ts
// Networked backend on pg. The server handles concurrency, so no process lock here;
// each call checks a client out of the pool for one statement (or one transaction).
import type { MealRecord, UserProfile, UserProfileInput, WeeklySummary } from "../domain/types";
import { addDays, systemClock, toDateOnly, toSqlTimestamp } from "../utils/date";
import type { Clock } from "../utils/date";
import { migratePostgresSchema } from "./migrations/postgresMigrations";
import type { PgExecutor } from "./pool";
import { mapDailyTotalRow, mapMealRow, mapUserRow, toNumber } from "./rows";
import type { DatabaseStats, MealStore } from "./store";
import {
  WEEK_LENGTH_DAYS,
  buildWeeklySummary,
  isValidCalorieCount,
  normalizeSource,
  truncateFoodName,
} from "./store";

export interface PostgresStoreOptions {
  executor: PgExecutor;
  clock?: Clock;
}

// TIMESTAMP columns are rendered as text so pg does not reinterpret them in the host time zone.
const TS_FORMAT = "'YYYY-MM-DD HH24:MI:SS'";
const MEAL_COLUMNS = `id, user_id, food_name, calories, source, to_char(created_at, ${TS_FORMAT}) AS created_at`;
const USER_COLUMNS = `user_id, username, name, gender, age, height, weight, activity_level, daily_calories,
  to_char(created_at, ${TS_FORMAT}) AS created_at, to_char(updated_at, ${TS_FORMAT}) AS updated_at`;
const DEFAULT_HISTORY_LIMIT = 50;

export class PostgresMealStore implements MealStore {
  readonly backend = "postgres" as const;

  private readonly db: PgExecutor;
  private readonly clock: Clock;

  constructor(options: PostgresStoreOptions) {
    this.db = options.executor;
    this.clock = options.clock ?? systemClock;
  }

  private today(): string {
    return toDateOnly(this.clock());
  }

  async initialize(): Promise<void> {
    await migratePostgresSchema(this.db);
    await this.cleanCorruptedData();
    console.log("[PostgresStore] Database initialized");
  }

  async close(): Promise<void> {
    await this.db.end();
  }

  async upsertUser(profile: UserProfileInput): Promise<boolean> {
    const now = toSqlTimestamp(this.clock());
    try {
      await this.db.query(
        `INSERT INTO users (user_id, username, name, gender, age, height, weight,
                            activity_level, daily_calories, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::timestamp, $10::timestamp)
         ON CONFLICT (user_id) DO UPDATE SET
           username = EXCLUDED.username,
           name = EXCLUDED.name,
           gender = EXCLUDED.gender,
           age = EXCLUDED.age,
           height = EXCLUDED.height,
           weight = EXCLUDED.weight,
           activity_level = EXCLUDED.activity_level,
           daily_calories = EXCLUDED.daily_calories,
           updated_at = EXCLUDED.updated_at`,
        [
          profile.userId,
          profile.username ?? null,
          profile.name,
          profile.gender,
          profile.age,
          profile.height,
          profile.weight,
          profile.activityLevel,
          profile.dailyCalories,
          now,
        ]
      );
      console.log(`[PostgresStore] User ${profile.userId} saved`);
      return true;
    } catch (err) {
      console.error(`[PostgresStore] upsertUser(${profile.userId}) failed:`, err);
      return false;
    }
  }

  async getUser(userId: number): Promise<UserProfile | null> {
    const result = await this.db.query(`SELECT ${USER_COLUMNS} FROM users WHERE user_id = $1`, [userId]);
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }

  async addMealRecord(
    userId: number,
    foodName: string,
    calories: number,
    source: string
  ): Promise<boolean> {
    if (!isValidCalorieCount(calories)) {
      console.error(`[PostgresStore] refusing meal record with calories=${calories} for user ${userId}`);
      return false;
    }
    const label = truncateFoodName(foodName);
    const normalized = normalizeSource(source);

    try {
      await this.db.query(
        `INSERT INTO meal_history (user_id, food_name, calories, source, created_at)
         VALUES ($1, $2, $3, $4, $5::timestamp)`,
        [userId, label, calories, normalized, toSqlTimestamp(this.clock())]
      );
      console.log(`[PostgresStore] Meal record added: user=${userId} calories=${calories} source=${normalized}`);
      return true;
    } catch (err) {
      console.error(`[PostgresStore] addMealRecord(${userId}) failed:`, err);
      return false;
    }
  }

  async getMealHistory(userId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<MealRecord[]> {
    const result = await this.db.query(
      `SELECT ${MEAL_COLUMNS} FROM meal_history
       WHERE user_id = $1
       ORDER BY meal_history.created_at DESC, id DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(mapMealRow);
  }

  async getMealHistoryByPeriod(
    userId: number,
    startDate: string,
    endDate: string
  ): Promise<MealRecord[]> {
    const result = await this.db.query(
      `SELECT ${MEAL_COLUMNS} FROM meal_history
       WHERE user_id = $1
         AND meal_history.created_at::date >= $2::date
         AND meal_history.created_at::date <= $3::date
       ORDER BY meal_history.created_at DESC, id DESC`,
      [userId, startDate, endDate]
    );
    return result.rows.map(mapMealRow);
  }

  async getDailyCalorieSum(userId: number): Promise<number> {
    const result = await this.db.query(
      `SELECT COALESCE(SUM(calories), 0) AS total FROM meal_history
       WHERE user_id = $1 AND created_at::date = $2::date`,
      [userId, this.today()]
    );
    return toNumber(result.rows[0]?.total) ?? 0;
  }

  async getWeeklySummary(userId: number): Promise<WeeklySummary> {
    const today = this.today();
    const start = addDays(today, -(WEEK_LENGTH_DAYS - 1));
    const result = await this.db.query(
      `SELECT to_char(created_at::date, 'YYYY-MM-DD') AS day,
              SUM(calories) AS calories,
              COUNT(*) AS meals
       FROM meal_history
       WHERE user_id = $1 AND created_at::date >= $2::date AND created_at::date <= $3::date
       GROUP BY created_at::date
       ORDER BY created_at::date DESC`,
      [userId, start, today]
    );
    return buildWeeklySummary(result.rows.map(mapDailyTotalRow));
  }

  async resetDailyCalories(userId: number): Promise<boolean> {
    try {
      const result = await this.db.query(
        "DELETE FROM meal_history WHERE user_id = $1 AND created_at::date = $2::date",
        [userId, this.today()]
      );
      console.log(`[PostgresStore] Daily reset for user ${userId}: ${result.rowCount} records removed`);
      return true;
    } catch (err) {
      console.error(`[PostgresStore] resetDailyCalories(${userId}) failed:`, err);
      return false;
    }
  }

  async resetAllUserData(userId: number): Promise<boolean> {
    try {
      await this.db.transaction(async (tx) => {
        await tx.query("DELETE FROM meal_history WHERE user_id = $1", [userId]);
        await tx.query("DELETE FROM users WHERE user_id = $1", [userId]);
      });
      console.log(`[PostgresStore] All data removed for user ${userId}`);
      return true;
    } catch (err) {
      console.error(`[PostgresStore] resetAllUserData(${userId}) failed:`, err);
      return false;
    }
  }

  async cleanCorruptedData(): Promise<number> {
    // Works whether the column is INTEGER or a legacy TEXT column.
    const result = await this.db.query(
      `DELETE FROM meal_history
       WHERE calories IS NULL
          OR calories::text !~ '^[0-9]+$'
          OR calories::text ~ '^0+$'`
    );
    if (result.rowCount > 0) {
      console.log(`[PostgresStore] Cleaned ${result.rowCount} corrupted meal records`);
    }
    return result.rowCount;
  }

  async getDatabaseStats(): Promise<DatabaseStats> {
    const result = await this.db.query(
      `SELECT (SELECT COUNT(*) FROM users) AS users_count,
              (SELECT COUNT(*) FROM meal_history) AS records_count`
    );
    const row = result.rows[0];
    return {
      backend: this.backend,
      usersCount: toNumber(row?.users_count) ?? 0,
      recordsCount: toNumber(row?.records_count) ?? 0,
    };
  }
}
