import type { MealSource, MealType } from "./types";

/**
 * First contiguous run of decimal digits in the oracle's answer.
 * Returns null when the text has no digits at all.
 */
export function extractCalories(text: string): number | null {
  const match = /\d+/.exec(text);
  if (!match) return null;
  const value = Number.parseInt(match[0], 10);
  return Number.isSafeInteger(value) ? value : null;
}

const MEAL_TYPE_LABELS: Record<MealType, string> = {
  breakfast: "Breakfast",
  lunch: "Lunch",
  dinner: "Dinner",
  snack: "Snack",
};

export function mealTypeLabel(mealType: MealType | null): string {
  return mealType ? MEAL_TYPE_LABELS[mealType] : "Meal";
}

/** Label stored with a meal record, e.g. "Lunch - food photo". */
export function buildFoodLabel(
  mealType: MealType | null,
  source: MealSource,
  description?: string
): string {
  const prefix = mealTypeLabel(mealType);
  if (source === "photo" || !description?.trim()) {
    return `${prefix} - food photo`;
  }
  return `${prefix} - ${description.trim()}`;
}

export function formatCalorieResponse(
  calories: number,
  dailySum: number,
  dailyTarget: number | null
): string {
  const lines = [
    `Estimated calories: ${calories}`,
    "",
    `Total calories today: ${dailySum}`,
  ];

  if (dailyTarget && dailyTarget > 0) {
    const percentage = ((dailySum / dailyTarget) * 100).toFixed(1);
    lines.push("", `That is ${percentage}% of your daily target (${dailyTarget} kcal)`);
  }

  return lines.join("\n");
}
