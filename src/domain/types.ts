export type MealType = "breakfast" | "lunch" | "dinner" | "snack";

// Snack is unlimited per day, so only these are tracked in the session.
export type TrackedMealType = Exclude<MealType, "snack">;

export type Gender = "male" | "female";

export type ActivityLevel = "sedentary" | "light" | "moderate" | "high" | "very_high";

export type MealSource = "photo" | "text" | "voice" | "other";

export const MEAL_TYPES: readonly MealType[] = ["breakfast", "lunch", "dinner", "snack"];
export const TRACKED_MEAL_TYPES: readonly TrackedMealType[] = ["breakfast", "lunch", "dinner"];
export const GENDERS: readonly Gender[] = ["male", "female"];
export const ACTIVITY_LEVELS: readonly ActivityLevel[] = [
  "sedentary",
  "light",
  "moderate",
  "high",
  "very_high",
];
export const MEAL_SOURCES: readonly MealSource[] = ["photo", "text", "voice", "other"];

export function isTrackedMealType(value: unknown): value is TrackedMealType {
  return typeof value === "string" && TRACKED_MEAL_TYPES.some((t) => t === value);
}

export function isGender(value: unknown): value is Gender {
  return typeof value === "string" && GENDERS.some((g) => g === value);
}

export function isActivityLevel(value: unknown): value is ActivityLevel {
  return typeof value === "string" && ACTIVITY_LEVELS.some((a) => a === value);
}

export function isMealSource(value: unknown): value is MealSource {
  return typeof value === "string" && MEAL_SOURCES.some((s) => s === value);
}

/** What callers write. `dailyCalories` is derived by the tracker before it gets here. */
export interface UserProfileInput {
  userId: number;
  username?: string | null;
  name: string;
  gender: Gender;
  age: number;
  height: number; // cm
  weight: number; // kg
  activityLevel: ActivityLevel;
  dailyCalories: number;
}

/**
 * A stored profile. Rows written by older releases may miss attributes,
 * hence the nullable fields.
 */
export interface UserProfile {
  userId: number;
  username: string | null;
  name: string | null;
  gender: Gender | null;
  age: number | null;
  height: number | null;
  weight: number | null;
  activityLevel: ActivityLevel | null;
  dailyCalories: number | null;
  createdAt: string | null; // YYYY-MM-DD HH:MM:SS (UTC)
  updatedAt: string | null;
}

export interface MealRecord {
  id: number;
  userId: number;
  foodName: string;
  calories: number;
  source: MealSource;
  createdAt: string; // YYYY-MM-DD HH:MM:SS (UTC)
}

export interface DailyTotal {
  date: string; // YYYY-MM-DD
  calories: number;
  meals: number;
}

export interface WeeklySummary {
  days: DailyTotal[];
  totalCalories: number;
  daysCount: number;
}

export type HistoryPeriod = "today" | "yesterday" | "week";

export const HISTORY_PERIODS: readonly HistoryPeriod[] = ["today", "yesterday", "week"];
