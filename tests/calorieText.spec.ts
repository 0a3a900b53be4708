import { describe, it, expect } from "vitest";
import {
  buildFoodLabel,
  extractCalories,
  formatCalorieResponse,
  mealTypeLabel,
} from "../src/domain/calorieText";

describe("extractCalories", () => {
  it("takes the first run of digits", () => {
    expect(extractCalories("Estimated calories: 450")).toBe(450);
    expect(extractCalories("about 350-400 kcal")).toBe(350);
    expect(extractCalories("1200")).toBe(1200);
  });

  it("returns null when there are no digits", () => {
    expect(extractCalories("I cannot tell what this is")).toBeNull();
    expect(extractCalories("")).toBeNull();
  });

  it("returns 0 for a zero run so callers can reject it", () => {
    expect(extractCalories("0 kcal")).toBe(0);
  });
});

describe("buildFoodLabel", () => {
  it("labels photos by meal type", () => {
    expect(buildFoodLabel("lunch", "photo")).toBe("Lunch - food photo");
    expect(buildFoodLabel(null, "photo")).toBe("Meal - food photo");
  });

  it("includes the description for text and voice", () => {
    expect(buildFoodLabel("breakfast", "text", "  oatmeal with berries ")).toBe("Breakfast - oatmeal with berries");
    expect(buildFoodLabel("snack", "voice", "apple")).toBe("Snack - apple");
  });

  it("maps meal types to display names", () => {
    expect(mealTypeLabel("dinner")).toBe("Dinner");
    expect(mealTypeLabel(null)).toBe("Meal");
  });
});

describe("formatCalorieResponse", () => {
  it("adds the share of the daily target when there is one", () => {
    expect(formatCalorieResponse(450, 1200, 2000)).toBe(
      "Estimated calories: 450\n\nTotal calories today: 1200\n\nThat is 60.0% of your daily target (2000 kcal)"
    );
  });

  it("omits the percentage without a positive target", () => {
    expect(formatCalorieResponse(450, 450, 0)).toBe("Estimated calories: 450\n\nTotal calories today: 450");
    expect(formatCalorieResponse(450, 450, null)).toBe("Estimated calories: 450\n\nTotal calories today: 450");
  });

  it("rounds the percentage to one decimal", () => {
    // 700 / 2166 = 32.317...
    expect(formatCalorieResponse(700, 700, 2166).split("\n")[4]).toBe(
      "That is 32.3% of your daily target (2166 kcal)"
    );
  });
});
