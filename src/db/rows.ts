// src/db/rows.ts
// Row → domain mapping shared by both backends. Drivers hand back loosely
// typed values (pg returns BIGINT and SUM() as strings), so everything is coerced here.
import type { DailyTotal, MealRecord, UserProfile } from "../domain/types";
import { resolveActivityLevel, resolveGender } from "../domain/legacyValues";
import { normalizeSource } from "./store";

export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  return null;
}

export function mapUserRow(row: Row): UserProfile {
  return {
    userId: toNumber(row.user_id) ?? 0,
    username: toText(row.username),
    name: toText(row.name),
    gender: resolveGender(toText(row.gender)),
    age: toNumber(row.age),
    height: toNumber(row.height),
    weight: toNumber(row.weight),
    activityLevel: resolveActivityLevel(toText(row.activity_level)),
    dailyCalories: toNumber(row.daily_calories),
    createdAt: toText(row.created_at),
    updatedAt: toText(row.updated_at),
  };
}

export function mapMealRow(row: Row): MealRecord {
  return {
    id: toNumber(row.id) ?? 0,
    userId: toNumber(row.user_id) ?? 0,
    foodName: toText(row.food_name) ?? "",
    calories: toNumber(row.calories) ?? 0,
    source: normalizeSource(toText(row.source) ?? ""),
    createdAt: toText(row.created_at) ?? "",
  };
}

export function mapDailyTotalRow(row: Row): DailyTotal {
  return {
    date: toText(row.day) ?? "",
    calories: toNumber(row.calories) ?? 0,
    meals: toNumber(row.meals) ?? 0,
  };
}
