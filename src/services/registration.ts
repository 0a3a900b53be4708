// src/services/registration.ts
import { z } from "zod";
import { computeDailyTarget } from "../domain/calorieTarget";
import type { ActivityLevel, Gender, UserProfileInput } from "../domain/types";
import { ACTIVITY_LEVELS, GENDERS } from "../domain/types";
import { resolveActivityLevel, resolveGender } from "../domain/legacyValues";

export type RegistrationStep = "name" | "gender" | "age" | "height" | "weight" | "activity" | "complete";

export const REGISTRATION_STEPS: readonly RegistrationStep[] = [
  "name",
  "gender",
  "age",
  "height",
  "weight",
  "activity",
  "complete",
];

export interface RegistrationDraft {
  name?: string;
  gender?: Gender;
  age?: number;
  height?: number;
  weight?: number;
  activityLevel?: ActivityLevel;
}

export interface RegistrationProgress {
  step: RegistrationStep;
  draft: RegistrationDraft;
}

export type RegistrationStepResult =
  | { ok: true; progress: RegistrationProgress }
  | { ok: false; progress: RegistrationProgress; error: string };

const nameSchema = z
  .string()
  .trim()
  .min(2, "Name must be between 2 and 50 characters")
  .max(50, "Name must be between 2 and 50 characters")
  .regex(/^[\p{L} ]+$/u, "Name may contain letters and spaces only");

const genderSchema = z
  .string()
  .transform((value) => resolveGender(value))
  .refine((value): value is Gender => value !== null, {
    message: `Gender must be one of: ${GENDERS.join(", ")}`,
  });

// Inputs arrive as chat text, so numbers are parsed from strings first.
const numberFromText = (message: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+([.,]\d+)?$/, message)
    .transform((value) => Number(value.replace(",", ".")));

const ageSchema = numberFromText("Age must be a whole number between 10 and 120").pipe(
  z
    .number()
    .int("Age must be a whole number between 10 and 120")
    .min(10, "Age must be a whole number between 10 and 120")
    .max(120, "Age must be a whole number between 10 and 120")
);

const heightSchema = numberFromText("Height must be a number between 100 and 250 cm").pipe(
  z
    .number()
    .min(100, "Height must be a number between 100 and 250 cm")
    .max(250, "Height must be a number between 100 and 250 cm")
);

const weightSchema = numberFromText("Weight must be a number between 30 and 300 kg").pipe(
  z
    .number()
    .min(30, "Weight must be a number between 30 and 300 kg")
    .max(300, "Weight must be a number between 30 and 300 kg")
);

const activitySchema = z
  .string()
  .transform((value) => resolveActivityLevel(value))
  .refine((value): value is ActivityLevel => value !== null, {
    message: `Activity level must be one of: ${ACTIVITY_LEVELS.join(", ")}`,
  });

export const REGISTRATION_PROMPTS: Record<RegistrationStep, string> = {
  name: "What is your name?",
  gender: "What is your gender? (male / female)",
  age: "How old are you?",
  height: "What is your height in cm?",
  weight: "What is your weight in kg?",
  activity: `What is your activity level? (${ACTIVITY_LEVELS.join(", ")})`,
  complete: "Registration is complete.",
};

export function startRegistration(): RegistrationProgress {
  return { step: "name", draft: {} };
}

function nextStep(step: RegistrationStep): RegistrationStep {
  const index = REGISTRATION_STEPS.indexOf(step);
  return REGISTRATION_STEPS[Math.min(index + 1, REGISTRATION_STEPS.length - 1)];
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid input";
}

/**
 * Applies one answer to the current step. Invalid input leaves the progress
 * untouched and reports the validation message.
 */
export function applyRegistrationInput(
  progress: RegistrationProgress,
  input: string
): RegistrationStepResult {
  const advance = (draft: RegistrationDraft): RegistrationStepResult => ({
    ok: true,
    progress: { step: nextStep(progress.step), draft },
  });
  const reject = (error: z.ZodError): RegistrationStepResult => ({
    ok: false,
    progress,
    error: firstIssue(error),
  });

  switch (progress.step) {
    case "name": {
      const parsed = nameSchema.safeParse(input);
      return parsed.success ? advance({ ...progress.draft, name: parsed.data }) : reject(parsed.error);
    }
    case "gender": {
      const parsed = genderSchema.safeParse(input);
      return parsed.success ? advance({ ...progress.draft, gender: parsed.data }) : reject(parsed.error);
    }
    case "age": {
      const parsed = ageSchema.safeParse(input);
      return parsed.success ? advance({ ...progress.draft, age: parsed.data }) : reject(parsed.error);
    }
    case "height": {
      const parsed = heightSchema.safeParse(input);
      return parsed.success ? advance({ ...progress.draft, height: parsed.data }) : reject(parsed.error);
    }
    case "weight": {
      const parsed = weightSchema.safeParse(input);
      return parsed.success ? advance({ ...progress.draft, weight: parsed.data }) : reject(parsed.error);
    }
    case "activity": {
      const parsed = activitySchema.safeParse(input);
      return parsed.success
        ? advance({ ...progress.draft, activityLevel: parsed.data })
        : reject(parsed.error);
    }
    case "complete":
      return { ok: false, progress, error: "Registration is already complete" };
  }
}

/** The profile to write once every step is answered, with its derived target. */
export function toProfileInput(
  userId: number,
  username: string | null,
  draft: RegistrationDraft
): UserProfileInput | null {
  const { name, gender, age, height, weight, activityLevel } = draft;
  if (
    name === undefined ||
    gender === undefined ||
    age === undefined ||
    height === undefined ||
    weight === undefined ||
    activityLevel === undefined
  ) {
    return null;
  }
  return {
    userId,
    username,
    name,
    gender,
    age,
    height,
    weight,
    activityLevel,
    dailyCalories: computeDailyTarget(gender, age, height, weight, activityLevel),
  };
}
