import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SqliteMealStore } from "../src/db/sqliteStore";
import { EstimatorTimeoutError, EstimatorTransportError } from "../src/services/calorieEstimator";
import type { CalorieEstimator } from "../src/services/calorieEstimator";
import {
  CalorieTrackerService,
  FALLBACK_MESSAGES,
  NOT_REGISTERED_MESSAGE,
  WRITE_FAILED_MESSAGE,
  fallbackMessageFor,
} from "../src/services/calorieTracker";
import { DailyStateTracker } from "../src/services/dailyStateTracker";
import { ImagePreprocessingError } from "../src/services/imagePreprocessor";
import { ResponseCache } from "../src/services/responseCache";

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

const registeredUser = {
  userId: 1,
  username: "tester",
  name: "Test User",
  gender: "male",
  age: 25,
  height: 180,
  weight: 80,
  activityLevel: "sedentary",
} as const;

describe("CalorieTrackerService", () => {
  let now: Date;
  let store: SqliteMealStore;
  let dailyState: DailyStateTracker;
  let cache: ResponseCache;
  let tracker: CalorieTrackerService;
  const analyzeText = vi.fn(async (text: string) => `Estimated calories: ${text.length > 0 ? 450 : 0}`);
  const analyzeImage = vi.fn(async (bytes: Buffer) => `Estimated calories: ${bytes.length > 0 ? 300 : 0}`);
  const estimator: CalorieEstimator = { analyzeImage, analyzeText };

  const setTime = (iso: string) => {
    now = new Date(iso);
  };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    analyzeText.mockClear();
    analyzeImage.mockClear();

    setTime("2024-03-15T12:00:00Z");
    const clock = () => now;
    store = new SqliteMealStore({ filename: ":memory:", clock });
    await store.initialize();
    dailyState = new DailyStateTracker({ clock });
    cache = new ResponseCache(50);
    tracker = new CalorieTrackerService({ store, estimator, cache, dailyState, clock });
  });

  afterEach(async () => {
    dailyState.destroy();
    await store.close();
    vi.restoreAllMocks();
  });

  describe("estimation", () => {
    it("serves a repeated description from the cache regardless of case", async () => {
      expect(await tracker.estimateFromText("Apple pie")).toEqual({
        ok: true,
        text: "Estimated calories: 450",
        cached: false,
      });
      expect(await tracker.estimateFromText("APPLE PIE")).toEqual({
        ok: true,
        text: "Estimated calories: 450",
        cached: true,
      });
      expect(analyzeText).toHaveBeenCalledTimes(1);
    });

    it("keys images on their bytes", async () => {
      await tracker.estimateFromImage(Buffer.from("plate-one"));
      await tracker.estimateFromImage(Buffer.from("plate-one"));
      await tracker.estimateFromImage(Buffer.from("plate-two"));
      expect(analyzeImage).toHaveBeenCalledTimes(2);
    });

    it("shares one estimator call between identical requests in flight", async () => {
      const gate = deferred<string>();
      analyzeText.mockImplementationOnce(() => gate.promise);

      const first = tracker.estimateFromText("toast");
      const second = tracker.estimateFromText("Toast");
      expect(analyzeText).toHaveBeenCalledTimes(1);
      expect((await tracker.getStats()).inFlightEstimates).toBe(1);

      gate.resolve("Estimated calories: 120");
      const expected = { ok: true, text: "Estimated calories: 120", cached: false };
      expect(await first).toEqual(expected);
      expect(await second).toEqual(expected);
      expect((await tracker.getStats()).inFlightEstimates).toBe(0);
    });

    it("answers failures with a fallback message and does not cache them", async () => {
      analyzeText.mockRejectedValueOnce(new EstimatorTimeoutError());

      expect(await tracker.estimateFromText("soup")).toEqual({
        ok: false,
        text: FALLBACK_MESSAGES.timeout,
        cached: false,
      });
      expect(cache.size).toBe(0);

      expect(await tracker.estimateFromText("soup")).toEqual({
        ok: true,
        text: "Estimated calories: 450",
        cached: false,
      });
      expect(analyzeText).toHaveBeenCalledTimes(2);
    });

    it("maps each failure kind to its fallback message", () => {
      expect(fallbackMessageFor(new EstimatorTimeoutError())).toBe(FALLBACK_MESSAGES.timeout);
      expect(fallbackMessageFor(new EstimatorTransportError())).toBe(FALLBACK_MESSAGES.transport);
      expect(fallbackMessageFor(new ImagePreprocessingError("bad image"))).toBe(FALLBACK_MESSAGES.image);
      expect(fallbackMessageFor(new Error("boom"))).toBe(FALLBACK_MESSAGES.response);
    });
  });

  describe("analysis", () => {
    it("asks unregistered users to register without calling the estimator", async () => {
      expect(await tracker.analyzeText(99, "apple")).toEqual({
        status: "not_registered",
        message: NOT_REGISTERED_MESSAGE,
      });
      expect(analyzeText).not.toHaveBeenCalled();
    });

    it("records a described meal under the selected meal type", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.selectMealType(1, "lunch");

      const outcome = await tracker.analyzeText(1, "grilled chicken");

      expect(outcome).toEqual({
        status: "recorded",
        calories: 450,
        dailySum: 450,
        dailyTarget: 2166,
        mealType: "lunch",
        message:
          "Estimated calories: 450\n\nTotal calories today: 450\n\nThat is 20.8% of your daily target (2166 kcal)",
        cached: false,
      });

      const [record] = await tracker.getRecentHistory(1, 5);
      expect(record).toMatchObject({ foodName: "Lunch - grilled chicken", calories: 450, source: "text" });
      expect(tracker.getSession(1)).toMatchObject({ selectedMealsToday: ["lunch"], pendingMealType: null });
    });

    it("labels photos generically and caches their answer", async () => {
      await tracker.upsertUser(registeredUser);
      const photo = Buffer.from("fake-jpeg-bytes");

      const first = await tracker.analyzeImage(1, photo);
      const second = await tracker.analyzeImage(1, photo);

      expect(first).toMatchObject({ status: "recorded", calories: 300, dailySum: 300, cached: false });
      expect(second).toMatchObject({ status: "recorded", calories: 300, dailySum: 600, cached: true });
      expect(analyzeImage).toHaveBeenCalledTimes(1);

      const records = await tracker.getRecentHistory(1, 5);
      expect(records.map((r) => [r.foodName, r.source])).toEqual([
        ["Meal - food photo", "photo"],
        ["Meal - food photo", "photo"],
      ]);
    });

    it("shows a quick analysis without recording it", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.setQuickAnalysis(1, true);

      expect(await tracker.analyzeText(1, "banana")).toEqual({
        status: "quick",
        message: "Quick calorie analysis\n\nEstimated calories: 450\n\nThe result was not added to today's total",
        cached: false,
      });
      expect(await tracker.getDailySum(1)).toBe(0);
      expect(tracker.getSession(1).quickAnalysis).toBe(false);
    });

    it("returns the raw answer when no calorie count can be read", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.selectMealType(1, "dinner");
      analyzeText.mockResolvedValueOnce("I cannot tell what this is");

      expect(await tracker.analyzeText(1, "mystery")).toEqual({
        status: "unparseable",
        message: "I cannot tell what this is",
        cached: false,
      });
      expect(tracker.getSession(1)).toMatchObject({ selectedMealsToday: [], pendingMealType: "dinner" });
    });

    it("treats a zero estimate as unparseable", async () => {
      await tracker.upsertUser(registeredUser);
      analyzeText.mockResolvedValueOnce("Estimated calories: 0");

      const outcome = await tracker.analyzeText(1, "water");
      expect(outcome.status).toBe("unparseable");
      expect(await tracker.getDailySum(1)).toBe(0);
    });

    it("treats an estimate beyond the storable range as unparseable", async () => {
      await tracker.upsertUser(registeredUser);
      analyzeText.mockResolvedValueOnce("Estimated calories: 3000000000");

      expect(await tracker.analyzeText(1, "a mountain of pasta")).toEqual({
        status: "unparseable",
        message: "Estimated calories: 3000000000",
        cached: false,
      });
      expect(await tracker.getDailySum(1)).toBe(0);
    });

    it("passes the fallback message through when the estimator fails", async () => {
      await tracker.upsertUser(registeredUser);
      analyzeText.mockRejectedValueOnce(new EstimatorTransportError());

      expect(await tracker.analyzeText(1, "rice")).toEqual({
        status: "failed",
        message: FALLBACK_MESSAGES.transport,
      });
    });

    it("keeps the meal type pending when the record cannot be saved", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.selectMealType(1, "breakfast");
      vi.spyOn(store, "addMealRecord").mockResolvedValueOnce(false);

      expect(await tracker.analyzeText(1, "porridge")).toEqual({
        status: "write_failed",
        calories: 450,
        message: WRITE_FAILED_MESSAGE,
      });
      expect(tracker.getSession(1)).toMatchObject({ selectedMealsToday: [], pendingMealType: "breakfast" });
    });

    it("makes every meal type available again after midnight", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.selectMealType(1, "lunch");
      await tracker.analyzeText(1, "pasta");
      expect(tracker.selectMealType(1, "lunch").ok).toBe(false);

      setTime("2024-03-16T00:05:00Z");
      expect(tracker.selectMealType(1, "lunch")).toEqual({ ok: true, mealType: "lunch" });
      expect(await tracker.getDailySum(1)).toBe(0);
    });
  });

  describe("registration", () => {
    it("reports when no registration is in progress", async () => {
      expect(await tracker.submitRegistrationStep(1, "Test User")).toEqual({ status: "not_started" });
    });

    it("walks every step and writes the profile with its daily target", async () => {
      expect(tracker.beginRegistration(1)).toEqual({ step: "name", prompt: "What is your name?" });

      expect(await tracker.submitRegistrationStep(1, "Test User")).toEqual({
        status: "next",
        step: "gender",
        prompt: "What is your gender? (male / female)",
      });
      expect(await tracker.submitRegistrationStep(1, "robot")).toEqual({
        status: "invalid",
        step: "gender",
        error: "Gender must be one of: male, female",
        prompt: "What is your gender? (male / female)",
      });
      for (const answer of ["male", "25", "180", "80"]) {
        expect((await tracker.submitRegistrationStep(1, answer)).status).toBe("next");
      }

      const done = await tracker.submitRegistrationStep(1, "sedentary", "tester");
      expect(done).toEqual({
        status: "complete",
        profile: { ...registeredUser, dailyCalories: 2166 },
      });
      expect(await tracker.getUser(1)).toMatchObject({ name: "Test User", dailyCalories: 2166 });
      expect(tracker.getSession(1).registration).toBeNull();
    });

    it("keeps the last step when the profile cannot be saved", async () => {
      tracker.beginRegistration(1);
      for (const answer of ["Test User", "male", "25", "180", "80"]) {
        await tracker.submitRegistrationStep(1, answer);
      }
      vi.spyOn(store, "upsertUser").mockResolvedValueOnce(false);

      expect(await tracker.submitRegistrationStep(1, "sedentary")).toEqual({
        status: "write_failed",
        step: "activity",
        message: "The profile could not be saved. Please try again.",
      });
      expect(tracker.getSession(1).registration?.step).toBe("activity");

      expect((await tracker.submitRegistrationStep(1, "sedentary")).status).toBe("complete");
    });
  });

  describe("history", () => {
    beforeEach(async () => {
      setTime("2024-03-08T09:00:00Z");
      await tracker.recordMeal(1, { foodName: "Too old", calories: 1000, source: "text" });
      setTime("2024-03-14T13:00:00Z");
      await tracker.recordMeal(1, { foodName: "Yesterday", calories: 500, source: "text" });
      setTime("2024-03-15T08:00:00Z");
      await tracker.recordMeal(1, { foodName: "Today", calories: 300, source: "photo" });
    });

    it("resolves today, yesterday and the trailing week to calendar ranges", async () => {
      const today = await tracker.getHistory(1, "today");
      expect(today).toMatchObject({ startDate: "2024-03-15", endDate: "2024-03-15", totalCalories: 300 });
      expect(today.records.map((r) => r.foodName)).toEqual(["Today"]);

      expect(await tracker.getHistory(1, "yesterday")).toMatchObject({
        startDate: "2024-03-14",
        endDate: "2024-03-14",
        totalCalories: 500,
      });

      const week = await tracker.getHistory(1, "week");
      expect(week).toMatchObject({ startDate: "2024-03-09", endDate: "2024-03-15", totalCalories: 800 });
      expect(week.records.map((r) => r.foodName)).toEqual(["Today", "Yesterday"]);
    });

    it("clears only today's records on a daily reset", async () => {
      expect(await tracker.resetDaily(1)).toEqual({ status: "full", sessionCleared: true, recordsCleared: true });
      expect(await tracker.getDailySum(1)).toBe(0);
      expect((await tracker.getHistory(1, "week")).totalCalories).toBe(500);
    });

    it("reports a partial daily reset when the records stay", async () => {
      vi.spyOn(store, "resetDailyCalories").mockResolvedValueOnce(false);
      expect(await tracker.resetDaily(1)).toEqual({
        status: "partial",
        sessionCleared: true,
        recordsCleared: false,
      });
      expect(await tracker.getDailySum(1)).toBe(300);
    });
  });

  describe("day status and full reset", () => {
    it("summarises progress against the target", async () => {
      await tracker.upsertUser(registeredUser);
      tracker.selectMealType(1, "lunch");
      await tracker.analyzeText(1, "salad");

      expect(await tracker.getDayStatus(1)).toEqual({
        date: "2024-03-15",
        dailySum: 450,
        dailyTarget: 2166,
        remaining: 1716,
        percentage: 20.8,
        selectedMealsToday: ["lunch"],
        availableMealTypes: ["breakfast", "dinner", "snack"],
      });
      expect(await tracker.getDayStatus(99)).toBeNull();
    });

    it("drops the profile, the records and the session", async () => {
      await tracker.upsertUser(registeredUser);
      await tracker.analyzeText(1, "cake");

      expect(await tracker.resetAll(1)).toBe(true);
      expect(dailyState.hasSession(1)).toBe(false);
      expect(await store.getUser(1)).toBeNull();
      expect(await store.getMealHistory(1)).toEqual([]);
    });

    it("collects store, cache and session figures", async () => {
      await tracker.upsertUser(registeredUser);
      await tracker.analyzeText(1, "cake");

      expect(await tracker.getStats()).toEqual({
        database: { backend: "sqlite", usersCount: 1, recordsCount: 1 },
        cache: { hits: 0, misses: 1, evictions: 0, size: 1, capacity: 50 },
        activeSessions: 1,
        inFlightEstimates: 0,
      });
    });
  });
});
