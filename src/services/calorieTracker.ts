// src/services/calorieTracker.ts
// Entry point for the conversation front end. Every user-facing operation
// reconciles the day first, then talks to the store, cache and estimator.
import { computeDailyTarget } from "../domain/calorieTarget";
import { buildFoodLabel, extractCalories, formatCalorieResponse } from "../domain/calorieText";
import type {
  HistoryPeriod,
  MealRecord,
  MealSource,
  MealType,
  UserProfile,
  UserProfileInput,
  WeeklySummary,
} from "../domain/types";
import type { DatabaseStats, MealStore } from "../db/store";
import { isValidCalorieCount, WEEK_LENGTH_DAYS } from "../db/store";
import { addDays, systemClock, todayDateOnly } from "../utils/date";
import type { Clock } from "../utils/date";
import { EstimatorTimeoutError, EstimatorTransportError } from "./calorieEstimator";
import type { CalorieEstimator } from "./calorieEstimator";
import type { DailyStateTracker, MealSelectionResult, SessionSnapshot } from "./dailyStateTracker";
import { imageFingerprint, textFingerprint } from "./fingerprint";
import { ImagePreprocessingError } from "./imagePreprocessor";
import { REGISTRATION_PROMPTS, applyRegistrationInput, startRegistration, toProfileInput } from "./registration";
import type { RegistrationStep } from "./registration";
import type { CacheStats, ResponseCache } from "./responseCache";

export const FALLBACK_MESSAGES = {
  timeout: "The analysis service took too long to answer. Please try again.",
  transport: "Could not reach the analysis service. Please try again.",
  response: "Sorry, the food could not be analyzed. Please try again.",
  image: "The image could not be processed. Please send another photo.",
} as const;

export const NOT_REGISTERED_MESSAGE = "Please complete registration first.";
export const WRITE_FAILED_MESSAGE = "The meal could not be saved. Please try again.";

export interface Estimate {
  ok: boolean;
  text: string;
  cached: boolean;
}

export type AnalysisOutcome =
  | {
      status: "recorded";
      calories: number;
      dailySum: number;
      dailyTarget: number | null;
      mealType: MealType | null;
      message: string;
      cached: boolean;
    }
  | { status: "quick"; message: string; cached: boolean }
  | { status: "unparseable"; message: string; cached: boolean }
  | { status: "write_failed"; calories: number; message: string }
  | { status: "failed"; message: string }
  | { status: "not_registered"; message: string };

export interface MealEntry {
  foodName: string;
  calories: number;
  source: MealSource;
}

export type ProfileFields = Omit<UserProfileInput, "dailyCalories">;

export interface HistoryResult {
  startDate: string;
  endDate: string;
  records: MealRecord[];
  totalCalories: number;
}

export type DailyResetStatus = "full" | "partial" | "failed";

export interface DailyResetResult {
  status: DailyResetStatus;
  sessionCleared: boolean;
  recordsCleared: boolean;
}

export interface DayStatus {
  date: string;
  dailySum: number;
  dailyTarget: number | null;
  remaining: number | null;
  percentage: number | null;
  selectedMealsToday: SessionSnapshot["selectedMealsToday"];
  availableMealTypes: MealType[];
}

export type RegistrationOutcome =
  | { status: "next"; step: RegistrationStep; prompt: string }
  | { status: "invalid"; step: RegistrationStep; error: string; prompt: string }
  | { status: "complete"; profile: UserProfileInput }
  | { status: "write_failed"; step: RegistrationStep; message: string }
  | { status: "not_started" };

export interface TrackerStats {
  database: DatabaseStats;
  cache: CacheStats;
  activeSessions: number;
  inFlightEstimates: number;
}

export interface CalorieTrackerDeps {
  store: MealStore;
  estimator: CalorieEstimator;
  cache: ResponseCache;
  dailyState: DailyStateTracker;
  clock?: Clock;
}

export function fallbackMessageFor(err: unknown): string {
  if (err instanceof ImagePreprocessingError) return FALLBACK_MESSAGES.image;
  if (err instanceof EstimatorTimeoutError) return FALLBACK_MESSAGES.timeout;
  if (err instanceof EstimatorTransportError) return FALLBACK_MESSAGES.transport;
  return FALLBACK_MESSAGES.response;
}

export class CalorieTrackerService {
  private readonly store: MealStore;
  private readonly estimator: CalorieEstimator;
  private readonly cache: ResponseCache;
  private readonly dailyState: DailyStateTracker;
  private readonly clock: Clock;
  private readonly inFlight = new Map<string, Promise<Estimate>>();

  constructor(deps: CalorieTrackerDeps) {
    this.store = deps.store;
    this.estimator = deps.estimator;
    this.cache = deps.cache;
    this.dailyState = deps.dailyState;
    this.clock = deps.clock ?? systemClock;
  }

  // ============================================================
  // ESTIMATION
  // ============================================================

  estimateFromImage(bytes: Buffer): Promise<Estimate> {
    // Keyed on the bytes as received, before any resizing.
    return this.estimate(imageFingerprint(bytes), "image", () => this.estimator.analyzeImage(bytes));
  }

  estimateFromText(text: string): Promise<Estimate> {
    return this.estimate(textFingerprint(text), "text", () => this.estimator.analyzeText(text));
  }

  private estimate(key: string, kind: string, call: () => Promise<string>): Promise<Estimate> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      console.log(`[CalorieTracker] ${kind} estimate served from cache`);
      return Promise.resolve({ ok: true, text: cached, cached: true });
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const run = call()
      .then((text): Estimate => {
        this.cache.put(key, text);
        return { ok: true, text, cached: false };
      })
      .catch((err: unknown): Estimate => {
        console.error(`[CalorieTracker] ${kind} estimate failed:`, err);
        return { ok: false, text: fallbackMessageFor(err), cached: false };
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, run);
    return run;
  }

  // ============================================================
  // ANALYSIS FLOWS
  // ============================================================

  analyzeImage(userId: number, bytes: Buffer): Promise<AnalysisOutcome> {
    return this.analyze(userId, "photo", undefined, () => this.estimateFromImage(bytes));
  }

  analyzeText(userId: number, text: string, source: "text" | "voice" = "text"): Promise<AnalysisOutcome> {
    return this.analyze(userId, source, text, () => this.estimateFromText(text));
  }

  private async analyze(
    userId: number,
    source: MealSource,
    description: string | undefined,
    estimate: () => Promise<Estimate>
  ): Promise<AnalysisOutcome> {
    this.dailyState.reconcile(userId);

    const user = await this.store.getUser(userId);
    if (!user) {
      return { status: "not_registered", message: NOT_REGISTERED_MESSAGE };
    }

    const quick = this.dailyState.consumeQuickAnalysis(userId);
    const result = await estimate();
    if (!result.ok) {
      return { status: "failed", message: result.text };
    }

    if (quick) {
      return {
        status: "quick",
        message: `Quick calorie analysis\n\n${result.text}\n\nThe result was not added to today's total`,
        cached: result.cached,
      };
    }

    const calories = extractCalories(result.text);
    if (calories === null || !isValidCalorieCount(calories)) {
      console.warn(`[CalorieTracker] Could not extract calories for user ${userId}: ${result.text}`);
      return { status: "unparseable", message: result.text, cached: result.cached };
    }

    const mealType = this.dailyState.pendingMealType(userId);
    const saved = await this.recordMeal(userId, {
      foodName: buildFoodLabel(mealType, source, description),
      calories,
      source,
    });
    if (!saved) {
      return { status: "write_failed", calories, message: WRITE_FAILED_MESSAGE };
    }
    this.dailyState.completePendingMeal(userId);

    const dailySum = await this.getDailySum(userId);
    return {
      status: "recorded",
      calories,
      dailySum,
      dailyTarget: user.dailyCalories,
      mealType,
      message: formatCalorieResponse(calories, dailySum, user.dailyCalories),
      cached: result.cached,
    };
  }

  recordMeal(userId: number, entry: MealEntry): Promise<boolean> {
    return this.store.addMealRecord(userId, entry.foodName, entry.calories, entry.source);
  }

  // ============================================================
  // PROFILE
  // ============================================================

  getUser(userId: number): Promise<UserProfile | null> {
    this.dailyState.reconcile(userId);
    return this.store.getUser(userId);
  }

  /** Writes the profile with a freshly derived daily target. */
  upsertUser(profile: ProfileFields): Promise<boolean> {
    return this.store.upsertUser({
      ...profile,
      dailyCalories: this.computeDailyTarget(
        profile.gender,
        profile.age,
        profile.height,
        profile.weight,
        profile.activityLevel
      ),
    });
  }

  computeDailyTarget(
    gender: string | null,
    age: number | null,
    heightCm: number | null,
    weightKg: number | null,
    activityLevel: string | null
  ): number {
    return computeDailyTarget(gender, age, heightCm, weightKg, activityLevel);
  }

  // ============================================================
  // REGISTRATION
  // ============================================================

  beginRegistration(userId: number): { step: RegistrationStep; prompt: string } {
    const progress = startRegistration();
    this.dailyState.setRegistration(userId, progress);
    return { step: progress.step, prompt: REGISTRATION_PROMPTS[progress.step] };
  }

  async submitRegistrationStep(
    userId: number,
    input: string,
    username: string | null = null
  ): Promise<RegistrationOutcome> {
    const progress = this.dailyState.getRegistration(userId);
    if (!progress) {
      return { status: "not_started" };
    }

    const result = applyRegistrationInput(progress, input);
    if (!result.ok) {
      return {
        status: "invalid",
        step: progress.step,
        error: result.error,
        prompt: REGISTRATION_PROMPTS[progress.step],
      };
    }

    const { step, draft } = result.progress;
    if (step !== "complete") {
      this.dailyState.setRegistration(userId, result.progress);
      return { status: "next", step, prompt: REGISTRATION_PROMPTS[step] };
    }

    const profile = toProfileInput(userId, username, draft);
    if (!profile) {
      // Draft lost a field; start over.
      this.dailyState.setRegistration(userId, startRegistration());
      return {
        status: "invalid",
        step: "name",
        error: "Registration data is incomplete",
        prompt: REGISTRATION_PROMPTS.name,
      };
    }

    // Progress stays on the last step until the write succeeds, so the answer can be resent.
    if (!(await this.store.upsertUser(profile))) {
      return {
        status: "write_failed",
        step: progress.step,
        message: "The profile could not be saved. Please try again.",
      };
    }
    this.dailyState.setRegistration(userId, null);
    console.log(`[CalorieTracker] Registration complete for user ${userId} (${profile.dailyCalories} kcal/day)`);
    return { status: "complete", profile };
  }

  // ============================================================
  // SESSION
  // ============================================================

  selectMealType(userId: number, mealType: MealType): MealSelectionResult {
    return this.dailyState.selectMealType(userId, mealType);
  }

  setQuickAnalysis(userId: number, enabled: boolean): void {
    this.dailyState.setQuickAnalysis(userId, enabled);
  }

  getSession(userId: number): SessionSnapshot {
    return this.dailyState.snapshot(userId);
  }

  // ============================================================
  // HISTORY
  // ============================================================

  async getDailySum(userId: number): Promise<number> {
    this.dailyState.reconcile(userId);
    const sum = await this.store.getDailyCalorieSum(userId);
    this.dailyState.recordDailySum(userId, sum);
    return sum;
  }

  getHistory(userId: number, period: HistoryPeriod): Promise<HistoryResult> {
    const today = todayDateOnly(this.clock);
    switch (period) {
      case "today":
        return this.getHistoryRange(userId, today, today);
      case "yesterday": {
        const yesterday = addDays(today, -1);
        return this.getHistoryRange(userId, yesterday, yesterday);
      }
      case "week":
        return this.getHistoryRange(userId, addDays(today, -(WEEK_LENGTH_DAYS - 1)), today);
    }
  }

  async getHistoryRange(userId: number, startDate: string, endDate: string): Promise<HistoryResult> {
    this.dailyState.reconcile(userId);
    const records = await this.store.getMealHistoryByPeriod(userId, startDate, endDate);
    return {
      startDate,
      endDate,
      records,
      totalCalories: records.reduce((sum, r) => sum + r.calories, 0),
    };
  }

  getRecentHistory(userId: number, limit: number): Promise<MealRecord[]> {
    this.dailyState.reconcile(userId);
    return this.store.getMealHistory(userId, limit);
  }

  getWeeklySummary(userId: number): Promise<WeeklySummary> {
    this.dailyState.reconcile(userId);
    return this.store.getWeeklySummary(userId);
  }

  async getDayStatus(userId: number): Promise<DayStatus | null> {
    const user = await this.getUser(userId);
    if (!user) return null;

    const dailySum = await this.getDailySum(userId);
    const target = user.dailyCalories;
    const session = this.dailyState.snapshot(userId);
    return {
      date: session.lastResetDate ?? todayDateOnly(this.clock),
      dailySum,
      dailyTarget: target,
      remaining: target !== null ? target - dailySum : null,
      percentage: target !== null && target > 0 ? Math.round((dailySum / target) * 1000) / 10 : null,
      selectedMealsToday: session.selectedMealsToday,
      availableMealTypes: this.dailyState.availableMealTypes(userId),
    };
  }

  // ============================================================
  // RESETS
  // ============================================================

  /** Two independent effects: the session state and today's stored records. */
  async resetDaily(userId: number): Promise<DailyResetResult> {
    let sessionCleared = false;
    try {
      this.dailyState.clearDailyState(userId);
      sessionCleared = true;
    } catch (err) {
      console.error(`[CalorieTracker] Session reset failed for user ${userId}:`, err);
    }

    const recordsCleared = await this.store.resetDailyCalories(userId);

    const status: DailyResetStatus =
      sessionCleared && recordsCleared ? "full" : sessionCleared || recordsCleared ? "partial" : "failed";
    console.log(`[CalorieTracker] Daily reset for user ${userId}: ${status}`);
    return { status, sessionCleared, recordsCleared };
  }

  async resetAll(userId: number): Promise<boolean> {
    const removed = await this.store.resetAllUserData(userId);
    if (removed) {
      this.dailyState.endSession(userId);
    }
    return removed;
  }

  // ============================================================
  // MAINTENANCE
  // ============================================================

  cleanCorruptedData(): Promise<number> {
    return this.store.cleanCorruptedData();
  }

  async getStats(): Promise<TrackerStats> {
    return {
      database: await this.store.getDatabaseStats(),
      cache: this.cache.stats(),
      activeSessions: this.dailyState.activeSessions,
      inFlightEstimates: this.inFlight.size,
    };
  }
}
