// src/db/sqliteStore.ts
// Embedded backend on better-sqlite3. The driver is synchronous; every
// operation still goes through the ConnectionLock so one transaction runs at a time.
import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import type { MealRecord, UserProfile, UserProfileInput, WeeklySummary } from "../domain/types";
import { addDays, systemClock, toDateOnly, toSqlTimestamp } from "../utils/date";
import type { Clock } from "../utils/date";
import { ConnectionLock } from "./connectionLock";
import { migrateSqliteSchema } from "./migrations/sqliteMigrations";
import { isRow, mapDailyTotalRow, mapMealRow, mapUserRow, toNumber } from "./rows";
import type { DatabaseStats, MealStore } from "./store";
import {
  WEEK_LENGTH_DAYS,
  buildWeeklySummary,
  isValidCalorieCount,
  normalizeSource,
  truncateFoodName,
} from "./store";

export interface SqliteStoreOptions {
  /** File path, or ":memory:". Ignored when `database` is given. */
  filename?: string;
  database?: SqliteDatabase;
  clock?: Clock;
}

const MEAL_COLUMNS = "id, user_id, food_name, calories, source, created_at";
const DEFAULT_HISTORY_LIMIT = 50;

export class SqliteMealStore implements MealStore {
  readonly backend = "sqlite" as const;

  private readonly db: SqliteDatabase;
  private readonly clock: Clock;
  private readonly lock = new ConnectionLock();

  constructor(options: SqliteStoreOptions = {}) {
    this.db = options.database ?? new Database(options.filename ?? "users.db");
    this.clock = options.clock ?? systemClock;
  }

  /** Runs `work` inside one transaction while holding the lock. */
  private withConnection<T>(work: (db: SqliteDatabase) => T): Promise<T> {
    return this.lock.runExclusive(() => this.db.transaction(() => work(this.db))());
  }

  private today(): string {
    return toDateOnly(this.clock());
  }

  async initialize(): Promise<void> {
    await this.lock.runExclusive(() => migrateSqliteSchema(this.db));
    await this.cleanCorruptedData();
    console.log("[SqliteStore] Database initialized");
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(() => this.db.close());
  }

  async upsertUser(profile: UserProfileInput): Promise<boolean> {
    const now = toSqlTimestamp(this.clock());
    try {
      await this.withConnection((db) =>
        db
          .prepare(
            `INSERT INTO users (user_id, username, name, gender, age, height, weight,
                                activity_level, daily_calories, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT (user_id) DO UPDATE SET
               username = excluded.username,
               name = excluded.name,
               gender = excluded.gender,
               age = excluded.age,
               height = excluded.height,
               weight = excluded.weight,
               activity_level = excluded.activity_level,
               daily_calories = excluded.daily_calories,
               updated_at = excluded.updated_at`
          )
          .run(
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
            now
          )
      );
      console.log(`[SqliteStore] User ${profile.userId} saved`);
      return true;
    } catch (err) {
      console.error(`[SqliteStore] upsertUser(${profile.userId}) failed:`, err);
      return false;
    }
  }

  async getUser(userId: number): Promise<UserProfile | null> {
    const row = await this.withConnection((db) =>
      db.prepare("SELECT * FROM users WHERE user_id = ?").get(userId)
    );
    return isRow(row) ? mapUserRow(row) : null;
  }

  async addMealRecord(
    userId: number,
    foodName: string,
    calories: number,
    source: string
  ): Promise<boolean> {
    if (!isValidCalorieCount(calories)) {
      console.error(`[SqliteStore] refusing meal record with calories=${calories} for user ${userId}`);
      return false;
    }
    const label = truncateFoodName(foodName);
    const normalized = normalizeSource(source);
    const createdAt = toSqlTimestamp(this.clock());

    try {
      await this.withConnection((db) =>
        db
          .prepare(
            "INSERT INTO meal_history (user_id, food_name, calories, source, created_at) VALUES (?, ?, ?, ?, ?)"
          )
          .run(userId, label, calories, normalized, createdAt)
      );
      console.log(`[SqliteStore] Meal record added: user=${userId} calories=${calories} source=${normalized}`);
      return true;
    } catch (err) {
      console.error(`[SqliteStore] addMealRecord(${userId}) failed:`, err);
      return false;
    }
  }

  async getMealHistory(userId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<MealRecord[]> {
    const rows = await this.withConnection((db): unknown[] =>
      db
        .prepare(
          `SELECT ${MEAL_COLUMNS} FROM meal_history
           WHERE user_id = ?
           ORDER BY created_at DESC, id DESC
           LIMIT ?`
        )
        .all(userId, limit)
    );
    return rows.filter(isRow).map(mapMealRow);
  }

  async getMealHistoryByPeriod(
    userId: number,
    startDate: string,
    endDate: string
  ): Promise<MealRecord[]> {
    const rows = await this.withConnection((db): unknown[] =>
      db
        .prepare(
          `SELECT ${MEAL_COLUMNS} FROM meal_history
           WHERE user_id = ?
             AND DATE(created_at) >= ?
             AND DATE(created_at) <= ?
           ORDER BY created_at DESC, id DESC`
        )
        .all(userId, startDate, endDate)
    );
    return rows.filter(isRow).map(mapMealRow);
  }

  async getDailyCalorieSum(userId: number): Promise<number> {
    const row = await this.withConnection((db) =>
      db
        .prepare(
          `SELECT COALESCE(SUM(calories), 0) AS total FROM meal_history
           WHERE user_id = ? AND DATE(created_at) = ?`
        )
        .get(userId, this.today())
    );
    return isRow(row) ? toNumber(row.total) ?? 0 : 0;
  }

  async getWeeklySummary(userId: number): Promise<WeeklySummary> {
    const today = this.today();
    const start = addDays(today, -(WEEK_LENGTH_DAYS - 1));
    const rows = await this.withConnection((db): unknown[] =>
      db
        .prepare(
          `SELECT DATE(created_at) AS day, SUM(calories) AS calories, COUNT(*) AS meals
           FROM meal_history
           WHERE user_id = ? AND DATE(created_at) >= ? AND DATE(created_at) <= ?
           GROUP BY DATE(created_at)
           ORDER BY day DESC`
        )
        .all(userId, start, today)
    );
    return buildWeeklySummary(rows.filter(isRow).map(mapDailyTotalRow));
  }

  async resetDailyCalories(userId: number): Promise<boolean> {
    try {
      const result = await this.withConnection((db) =>
        db
          .prepare("DELETE FROM meal_history WHERE user_id = ? AND DATE(created_at) = ?")
          .run(userId, this.today())
      );
      console.log(`[SqliteStore] Daily reset for user ${userId}: ${result.changes} records removed`);
      return true;
    } catch (err) {
      console.error(`[SqliteStore] resetDailyCalories(${userId}) failed:`, err);
      return false;
    }
  }

  async resetAllUserData(userId: number): Promise<boolean> {
    try {
      await this.withConnection((db) => {
        db.prepare("DELETE FROM meal_history WHERE user_id = ?").run(userId);
        db.prepare("DELETE FROM users WHERE user_id = ?").run(userId);
      });
      console.log(`[SqliteStore] All data removed for user ${userId}`);
      return true;
    } catch (err) {
      console.error(`[SqliteStore] resetAllUserData(${userId}) failed:`, err);
      return false;
    }
  }

  async cleanCorruptedData(): Promise<number> {
    const result = await this.withConnection((db) =>
      db
        .prepare(
          `DELETE FROM meal_history
           WHERE calories IS NULL OR typeof(calories) != 'integer' OR calories <= 0`
        )
        .run()
    );
    if (result.changes > 0) {
      console.log(`[SqliteStore] Cleaned ${result.changes} corrupted meal records`);
    }
    return result.changes;
  }

  async getDatabaseStats(): Promise<DatabaseStats> {
    const [users, records] = await this.withConnection((db) => [
      db.prepare("SELECT COUNT(*) AS count FROM users").get(),
      db.prepare("SELECT COUNT(*) AS count FROM meal_history").get(),
    ]);
    return {
      backend: this.backend,
      usersCount: isRow(users) ? toNumber(users.count) ?? 0 : 0,
      recordsCount: isRow(records) ? toNumber(records.count) ?? 0 : 0,
    };
  }
}
