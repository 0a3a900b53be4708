// src/domain/legacyValues.ts
// Profile values written by earlier releases of the bot: Russian button
// labels and raw callback ids. Reads and migrations map them onto the
// current vocabulary.
import type { ActivityLevel, Gender } from "./types";
import { isActivityLevel, isGender } from "./types";

const LEGACY_GENDERS: Record<string, Gender> = {
  "мужской": "male",
  "женский": "female",
};

const LEGACY_ACTIVITY_LEVELS: Record<string, ActivityLevel> = {
  "сидячая работа": "sedentary",
  "легкая активность": "light",
  "умеренная активность": "moderate",
  "высокая активность": "high",
  "физическая работа": "very_high",
  activity_sedentary: "sedentary",
  activity_light: "light",
  activity_moderate: "moderate",
  activity_high: "high",
  activity_very_high: "very_high",
};

function lookup<T extends string>(
  value: string | null | undefined,
  isCanonical: (key: string) => key is T,
  legacy: Record<string, T>
): T | null {
  if (typeof value !== "string") return null;
  const key = value.trim().toLowerCase().replace(/ё/g, "е");
  if (isCanonical(key)) return key;
  return Object.prototype.hasOwnProperty.call(legacy, key) ? (legacy[key] ?? null) : null;
}

export function resolveGender(value: string | null | undefined): Gender | null {
  return lookup(value, isGender, LEGACY_GENDERS);
}

export function resolveActivityLevel(value: string | null | undefined): ActivityLevel | null {
  return lookup(value, isActivityLevel, LEGACY_ACTIVITY_LEVELS);
}

/** Canonical replacement for a stored gender, or null when it is already canonical or unknown. */
export function legacyGenderReplacement(stored: string): Gender | null {
  const resolved = resolveGender(stored);
  return resolved !== null && resolved !== stored ? resolved : null;
}

export function legacyActivityReplacement(stored: string): ActivityLevel | null {
  const resolved = resolveActivityLevel(stored);
  return resolved !== null && resolved !== stored ? resolved : null;
}
