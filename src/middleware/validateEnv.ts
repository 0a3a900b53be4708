// src/middleware/validateEnv.ts
import { z } from "zod";

const optionalUrl = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

/**
 * Environment variable validation schema.
 * Missing credentials stop the process at startup.
 */
const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Bot front end (bearer token on every API call)
  BOT_TOKEN: z.string().min(1, "BOT_TOKEN is required"),

  // Database: PostgreSQL when set, SQLite file otherwise
  DATABASE_URL: optionalUrl,
  SQLITE_PATH: z.string().min(1).default("users.db"),

  // Calorie estimator (OpenAI-compatible endpoint)
  ESTIMATOR_API_KEY: z.string().min(1, "ESTIMATOR_API_KEY is required"),
  ESTIMATOR_BASE_URL: z.string().url().default("https://api.studio.nebius.com/v1/"),
  ESTIMATOR_MODEL: z.string().min(1).default("Qwen/Qwen2.5-VL-72B-Instruct"),
  ESTIMATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Tuning
  CACHE_CAPACITY: z.coerce.number().int().positive().default(50),
  IMAGE_MAX_DIMENSION: z.coerce.number().int().positive().default(800),
  IMAGE_QUALITY: z.coerce.number().int().min(1).max(100).default(75),
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().max(43_200).default(1440), // 30 days
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/** Parses without caching or logging. */
export function parseEnvironment(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

/**
 * Validates environment variables at startup.
 * Throws an error if required variables are missing or invalid.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) return validatedEnv;

  const result = parseEnvironment(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  validatedEnv = result.data;

  if (!validatedEnv.DATABASE_URL) {
    console.warn(`\nEnvironment warnings:\n  - DATABASE_URL is not set - using SQLite at ${validatedEnv.SQLITE_PATH}\n`);
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

export function resetEnvironmentCache(): void {
  validatedEnv = null;
}
