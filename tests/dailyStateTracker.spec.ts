import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DailyStateTracker } from "../src/services/dailyStateTracker";

describe("DailyStateTracker", () => {
  let now: Date;
  let tracker: DailyStateTracker;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    now = new Date("2024-03-15T10:00:00Z");
    tracker = new DailyStateTracker({ clock: () => now, sessionTtlMinutes: 60 });
  });

  afterEach(() => {
    tracker.destroy();
    vi.restoreAllMocks();
  });

  it("rolls a new session over to today on first contact", () => {
    const result = tracker.reconcile(1);
    expect(result.rolledOver).toBe(true);
    expect(result.state.lastResetDate).toBe("2024-03-15");
  });

  it("is a no-op when reconciled twice on the same day", () => {
    tracker.reconcile(1);
    tracker.selectMealType(1, "breakfast");
    tracker.completePendingMeal(1);
    tracker.recordDailySum(1, 420);
    const before = tracker.snapshot(1);

    now = new Date("2024-03-15T23:59:59Z");
    const second = tracker.reconcile(1);

    expect(second.rolledOver).toBe(false);
    expect(tracker.snapshot(1)).toEqual(before);
  });

  it("clears selected meals and the daily sum after the date advances", () => {
    tracker.selectMealType(1, "lunch");
    tracker.completePendingMeal(1);
    tracker.recordDailySum(1, 800);

    now = new Date("2024-03-16T00:00:01Z");
    const result = tracker.reconcile(1);

    expect(result.rolledOver).toBe(true);
    expect(tracker.snapshot(1)).toMatchObject({
      selectedMealsToday: [],
      dailyCaloriesSum: 0,
      lastResetDate: "2024-03-16",
    });
  });

  it("allows each main meal once per day but snack any number of times", () => {
    expect(tracker.selectMealType(1, "dinner")).toEqual({ ok: true, mealType: "dinner" });
    expect(tracker.completePendingMeal(1)).toBe("dinner");
    expect(tracker.selectMealType(1, "dinner")).toEqual({
      ok: false,
      mealType: "dinner",
      reason: "already_selected",
    });

    expect(tracker.selectMealType(1, "snack").ok).toBe(true);
    tracker.completePendingMeal(1);
    expect(tracker.selectMealType(1, "snack").ok).toBe(true);

    expect(tracker.snapshot(1).selectedMealsToday).toEqual(["dinner"]);
    expect(tracker.availableMealTypes(1)).toEqual(["breakfast", "lunch", "snack"]);
  });

  it("keeps sessions of different users apart", () => {
    tracker.selectMealType(1, "breakfast");
    tracker.completePendingMeal(1);
    expect(tracker.availableMealTypes(2)).toEqual(["breakfast", "lunch", "dinner", "snack"]);
  });

  it("manual clear forces the next reconcile to roll over", () => {
    tracker.selectMealType(1, "breakfast");
    tracker.completePendingMeal(1);
    tracker.recordDailySum(1, 300);

    tracker.clearDailyState(1);
    expect(tracker.snapshot(1)).toMatchObject({ selectedMealsToday: [], dailyCaloriesSum: 0 });

    tracker.clearDailyState(1);
    expect(tracker.reconcile(1).rolledOver).toBe(true);
  });

  it("treats quick analysis as a one-shot flag", () => {
    tracker.setQuickAnalysis(1, true);
    expect(tracker.consumeQuickAnalysis(1)).toBe(true);
    expect(tracker.consumeQuickAnalysis(1)).toBe(false);
  });

  it("discards sessions idle for longer than the TTL", () => {
    tracker.reconcile(1);
    now = new Date("2024-03-15T10:30:00Z");
    tracker.reconcile(2);

    now = new Date("2024-03-15T11:15:00Z");
    expect(tracker.sweepIdleSessions()).toBe(1);
    expect(tracker.hasSession(1)).toBe(false);
    expect(tracker.hasSession(2)).toBe(true);
  });

  it("ends a session on request", () => {
    tracker.reconcile(1);
    expect(tracker.endSession(1)).toBe(true);
    expect(tracker.activeSessions).toBe(0);
  });
});
