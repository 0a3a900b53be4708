import type { ActivityLevel } from "./types";
import { resolveActivityLevel, resolveGender } from "./legacyValues";

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  light: 1.375,
  moderate: 1.55,
  high: 1.725,
  very_high: 1.9, // manual labor
};

export const DEFAULT_DAILY_CALORIES = 2000;

function requireFinite(value: number | null | undefined, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${field} must be a finite number`);
  }
  return value;
}

/**
 * Daily calorie budget: Mifflin-St Jeor BMR times the activity multiplier,
 * truncated. Never throws; falls back to DEFAULT_DAILY_CALORIES.
 */
export function computeDailyTarget(
  gender: string | null | undefined,
  age: number | null | undefined,
  heightCm: number | null | undefined,
  weightKg: number | null | undefined,
  activityLevel: string | null | undefined
): number {
  try {
    if (typeof gender !== "string" || !gender.trim()) {
      throw new Error("gender is required");
    }
    const sex = resolveGender(gender);
    const weight = requireFinite(weightKg, "weight");
    const height = requireFinite(heightCm, "height");
    const years = requireFinite(age, "age");

    const sexFactor = sex === "male" ? 5 : -161;
    const bmr = 10 * weight + 6.25 * height - 5 * years + sexFactor;

    const level = resolveActivityLevel(activityLevel);
    const multiplier = level === null ? ACTIVITY_MULTIPLIERS.sedentary : ACTIVITY_MULTIPLIERS[level];

    return Math.trunc(bmr * multiplier);
  } catch (err) {
    console.error("[CalorieTarget] falling back to default target:", err);
    return DEFAULT_DAILY_CALORIES;
  }
}
