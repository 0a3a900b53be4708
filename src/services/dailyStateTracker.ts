// src/services/dailyStateTracker.ts
import type { MealType, TrackedMealType } from "../domain/types";
import { MEAL_TYPES, TRACKED_MEAL_TYPES, isTrackedMealType } from "../domain/types";
import { systemClock, todayDateOnly } from "../utils/date";
import type { Clock } from "../utils/date";
import { createCleanableMap } from "./memoryCleanup";
import type { CleanableMap } from "./memoryCleanup";
import type { RegistrationProgress } from "./registration";

/** Ephemeral per-user session. Never persisted. */
export interface SessionState {
  selectedMealsToday: Set<TrackedMealType>;
  dailyCaloriesSum: number;
  lastResetDate: string | null; // YYYY-MM-DD
  quickAnalysis: boolean;
  pendingMealType: MealType | null;
  registration: RegistrationProgress | null;
  lastSeenAt: number;
}

export interface SessionSnapshot {
  selectedMealsToday: TrackedMealType[];
  dailyCaloriesSum: number;
  lastResetDate: string | null;
  quickAnalysis: boolean;
  pendingMealType: MealType | null;
  registration: RegistrationProgress | null;
}

export interface ReconcileResult {
  state: SessionState;
  rolledOver: boolean;
}

export type MealSelectionResult =
  | { ok: true; mealType: MealType }
  | { ok: false; mealType: MealType; reason: "already_selected" };

export interface DailyStateTrackerOptions {
  clock?: Clock;
  sessionTtlMinutes?: number;
}

/**
 * Lazy midnight rollover. Every entry point reconciles first; there is no
 * timer, so an idle session is only refreshed on its next interaction.
 */
export class DailyStateTracker {
  private readonly clock: Clock;
  private readonly sessions: CleanableMap<number, SessionState>;

  constructor(options: DailyStateTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    const ttlMinutes = options.sessionTtlMinutes ?? 1440;
    this.sessions = createCleanableMap<number, SessionState>({
      ttlMs: ttlMinutes * 60 * 1000,
      now: () => this.clock().getTime(),
      onCleanup: (removed) => {
        console.log(`[DailyState] Discarded ${removed} idle sessions`);
      },
    });
  }

  private session(userId: number): SessionState {
    const now = this.clock().getTime();
    const existing = this.sessions.get(userId);
    if (existing) {
      existing.lastSeenAt = now;
      return existing;
    }
    const created: SessionState = {
      selectedMealsToday: new Set(),
      dailyCaloriesSum: 0,
      lastResetDate: null,
      quickAnalysis: false,
      pendingMealType: null,
      registration: null,
      lastSeenAt: now,
    };
    this.sessions.set(userId, created);
    return created;
  }

  /** STALE → CURRENT_DAY when the stored date differs from today; no-op otherwise. */
  reconcile(userId: number): ReconcileResult {
    const state = this.session(userId);
    const today = todayDateOnly(this.clock);
    if (state.lastResetDate === today) {
      return { state, rolledOver: false };
    }

    const previous = state.lastResetDate;
    state.selectedMealsToday.clear();
    state.dailyCaloriesSum = 0;
    state.lastResetDate = today;
    if (previous !== null) {
      console.log(`[DailyState] Day rolled over for user ${userId}: ${previous} -> ${today}`);
    }
    return { state, rolledOver: true };
  }

  /** Manual reset: the next reconcile rolls over again. */
  clearDailyState(userId: number): void {
    const state = this.session(userId);
    state.selectedMealsToday.clear();
    state.dailyCaloriesSum = 0;
    state.lastResetDate = null;
  }

  selectMealType(userId: number, mealType: MealType): MealSelectionResult {
    const { state } = this.reconcile(userId);
    if (isTrackedMealType(mealType) && state.selectedMealsToday.has(mealType)) {
      return { ok: false, mealType, reason: "already_selected" };
    }
    state.pendingMealType = mealType;
    return { ok: true, mealType };
  }

  /** Snack is always available. */
  availableMealTypes(userId: number): MealType[] {
    const { state } = this.reconcile(userId);
    return MEAL_TYPES.filter((t) => !isTrackedMealType(t) || !state.selectedMealsToday.has(t));
  }

  /**
   * Marks the pending meal type as eaten today and clears it.
   * Returns the meal type that was pending.
   */
  completePendingMeal(userId: number): MealType | null {
    const { state } = this.reconcile(userId);
    const mealType = state.pendingMealType;
    if (mealType !== null && isTrackedMealType(mealType)) {
      state.selectedMealsToday.add(mealType);
    }
    state.pendingMealType = null;
    return mealType;
  }

  pendingMealType(userId: number): MealType | null {
    return this.reconcile(userId).state.pendingMealType;
  }

  setQuickAnalysis(userId: number, enabled: boolean): void {
    this.reconcile(userId).state.quickAnalysis = enabled;
  }

  /** One-shot: reading the flag clears it. */
  consumeQuickAnalysis(userId: number): boolean {
    const { state } = this.reconcile(userId);
    const enabled = state.quickAnalysis;
    state.quickAnalysis = false;
    return enabled;
  }

  recordDailySum(userId: number, dailySum: number): void {
    this.reconcile(userId).state.dailyCaloriesSum = dailySum;
  }

  getRegistration(userId: number): RegistrationProgress | null {
    return this.session(userId).registration;
  }

  setRegistration(userId: number, progress: RegistrationProgress | null): void {
    this.session(userId).registration = progress;
  }

  snapshot(userId: number): SessionSnapshot {
    const { state } = this.reconcile(userId);
    return {
      selectedMealsToday: TRACKED_MEAL_TYPES.filter((t) => state.selectedMealsToday.has(t)),
      dailyCaloriesSum: state.dailyCaloriesSum,
      lastResetDate: state.lastResetDate,
      quickAnalysis: state.quickAnalysis,
      pendingMealType: state.pendingMealType,
      registration: state.registration,
    };
  }

  hasSession(userId: number): boolean {
    return this.sessions.has(userId);
  }

  endSession(userId: number): boolean {
    return this.sessions.delete(userId);
  }

  sweepIdleSessions(): number {
    return this.sessions.cleanup();
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  destroy(): void {
    this.sessions.destroy();
  }
}
