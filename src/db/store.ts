// src/db/store.ts
import type {
  MealRecord,
  MealSource,
  UserProfile,
  UserProfileInput,
  WeeklySummary,
} from "../domain/types";
import { isMealSource } from "../domain/types";

export const MAX_FOOD_NAME_LENGTH = 50;
const TRUNCATION_MARKER = "...";

export type StoreBackend = "sqlite" | "postgres";

export interface DatabaseStats {
  backend: StoreBackend;
  usersCount: number;
  recordsCount: number;
}

/**
 * Durable storage for profiles and meal history.
 *
 * Writes report failure with `false` (already logged); reads throw.
 * All "today" semantics follow the store's clock, in UTC calendar days.
 */
export interface MealStore {
  readonly backend: StoreBackend;

  /** Migrations, tables, indexes and the corrupted-row sweep. Safe to call on every boot. */
  initialize(): Promise<void>;
  close(): Promise<void>;

  upsertUser(profile: UserProfileInput): Promise<boolean>;
  getUser(userId: number): Promise<UserProfile | null>;

  addMealRecord(
    userId: number,
    foodName: string,
    calories: number,
    source: string
  ): Promise<boolean>;
  getMealHistory(userId: number, limit?: number): Promise<MealRecord[]>;
  /** Inclusive range of YYYY-MM-DD dates, compared on the date part of created_at. */
  getMealHistoryByPeriod(userId: number, startDate: string, endDate: string): Promise<MealRecord[]>;
  getDailyCalorieSum(userId: number): Promise<number>;
  getWeeklySummary(userId: number): Promise<WeeklySummary>;

  resetDailyCalories(userId: number): Promise<boolean>;
  resetAllUserData(userId: number): Promise<boolean>;

  /** Deletes rows whose calories are not a positive integer. Returns the number removed. */
  cleanCorruptedData(): Promise<number>;
  getDatabaseStats(): Promise<DatabaseStats>;
}

export function truncateFoodName(foodName: string): string {
  const trimmed = foodName.trim();
  if (trimmed.length <= MAX_FOOD_NAME_LENGTH) return trimmed;
  console.warn(`[Store] food name truncated to ${MAX_FOOD_NAME_LENGTH} characters`);
  return trimmed.slice(0, MAX_FOOD_NAME_LENGTH - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

export function normalizeSource(source: string): MealSource {
  const value = source.trim().toLowerCase();
  return isMealSource(value) ? value : "other";
}

// meal_history.calories is a 32-bit INTEGER on PostgreSQL.
export const MAX_CALORIES = 2_147_483_647;

export function isValidCalorieCount(calories: number): boolean {
  return Number.isSafeInteger(calories) && calories > 0 && calories <= MAX_CALORIES;
}

export const WEEK_LENGTH_DAYS = 7;

export function buildWeeklySummary(
  rows: Array<{ date: string; calories: number; meals: number }>
): WeeklySummary {
  const days = rows.map((r) => ({ date: r.date, calories: r.calories, meals: r.meals }));
  return {
    days,
    totalCalories: days.reduce((sum, d) => sum + d.calories, 0),
    daysCount: days.length,
  };
}
