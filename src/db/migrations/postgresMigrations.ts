// src/db/migrations/postgresMigrations.ts
import { computeDailyTarget } from "../../domain/calorieTarget";
import type { SqlExecutor } from "../pool";
import { toNumber, toText } from "../rows";
import { legacyActivityReplacement, legacyGenderReplacement } from "../../domain/legacyValues";
import type { MigrationStep } from "./runner";
import { runMigrationSteps } from "./runner";

export const POSTGRES_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS users (
    user_id BIGINT PRIMARY KEY,
    username TEXT,
    name TEXT,
    gender TEXT,
    age INTEGER,
    height REAL,
    weight REAL,
    activity_level TEXT,
    daily_calories INTEGER,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS meal_history (
    id SERIAL PRIMARY KEY,
    user_id BIGINT,
    food_name TEXT,
    calories INTEGER,
    source TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`,
  "CREATE INDEX IF NOT EXISTS idx_meal_history_user_id ON meal_history (user_id)",
  "CREATE INDEX IF NOT EXISTS idx_meal_history_created_at ON meal_history (created_at)",
  "CREATE INDEX IF NOT EXISTS idx_meal_history_user_date ON meal_history (user_id, (created_at::date))",
];

async function tableExists(db: SqlExecutor, table: string): Promise<boolean> {
  const result = await db.query(
    `SELECT EXISTS (
       SELECT FROM information_schema.tables WHERE table_name = $1
     ) AS exists`,
    [table]
  );
  return result.rows[0]?.exists === true;
}

async function hasColumn(db: SqlExecutor, table: string, column: string): Promise<boolean> {
  const result = await db.query(
    `SELECT EXISTS (
       SELECT FROM information_schema.columns WHERE table_name = $1 AND column_name = $2
     ) AS exists`,
    [table, column]
  );
  return result.rows[0]?.exists === true;
}

async function narrowTextColumns(db: SqlExecutor): Promise<string[]> {
  const result = await db.query(
    `SELECT column_name FROM information_schema.columns
     WHERE table_name = 'meal_history'
       AND column_name IN ('food_name', 'source')
       AND data_type IN ('character varying', 'character')`
  );
  return result.rows.map((r) => toText(r.column_name)).filter((c): c is string => c !== null);
}

async function userForeignKeys(db: SqlExecutor): Promise<string[]> {
  const result = await db.query(
    `SELECT constraint_name FROM information_schema.table_constraints
     WHERE table_name = 'meal_history' AND constraint_type = 'FOREIGN KEY'`
  );
  return result.rows.map((r) => toText(r.constraint_name)).filter((c): c is string => c !== null);
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

type ProfileField = "gender" | "activity_level";

interface LegacyProfileRow {
  userId: number;
  replacement: string;
  dailyCalories: number;
}

const REPLACEMENTS: Record<ProfileField, (stored: string) => string | null> = {
  gender: legacyGenderReplacement,
  activity_level: legacyActivityReplacement,
};

async function legacyProfileRows(db: SqlExecutor, field: ProfileField): Promise<LegacyProfileRow[]> {
  if (!(await tableExists(db, "users"))) return [];
  const result = await db.query(
    `SELECT user_id, gender, age, height, weight, activity_level FROM users WHERE ${field} IS NOT NULL`
  );

  const rows: LegacyProfileRow[] = [];
  for (const row of result.rows) {
    const stored = toText(row[field]);
    const replacement = stored === null ? null : REPLACEMENTS[field](stored);
    const userId = toNumber(row.user_id);
    if (replacement === null || userId === null) continue;
    rows.push({
      userId,
      replacement,
      dailyCalories: computeDailyTarget(
        toText(row.gender),
        toNumber(row.age),
        toNumber(row.height),
        toNumber(row.weight),
        toText(row.activity_level)
      ),
    });
  }
  return rows;
}

async function normalizeProfileField(db: SqlExecutor, field: ProfileField): Promise<void> {
  for (const row of await legacyProfileRows(db, field)) {
    await db.query(`UPDATE users SET ${field} = $1, daily_calories = $2 WHERE user_id = $3`, [
      row.replacement,
      row.dailyCalories,
      row.userId,
    ]);
  }
}

const preSchemaSteps: MigrationStep<SqlExecutor>[] = [
  {
    name: "rename-legacy-history-table",
    isNeeded: async (db) =>
      (await tableExists(db, "calorie_history")) && !(await tableExists(db, "meal_history")),
    apply: async (db) => {
      await db.query("ALTER TABLE calorie_history RENAME TO meal_history");
    },
  },
  {
    name: "rename-legacy-meal-columns",
    isNeeded: async (db) =>
      ((await hasColumn(db, "meal_history", "meal_type")) &&
        !(await hasColumn(db, "meal_history", "food_name"))) ||
      ((await hasColumn(db, "meal_history", "description")) &&
        !(await hasColumn(db, "meal_history", "source"))),
    apply: async (db) => {
      if (
        (await hasColumn(db, "meal_history", "meal_type")) &&
        !(await hasColumn(db, "meal_history", "food_name"))
      ) {
        await db.query("ALTER TABLE meal_history RENAME COLUMN meal_type TO food_name");
      }
      if (
        (await hasColumn(db, "meal_history", "description")) &&
        !(await hasColumn(db, "meal_history", "source"))
      ) {
        await db.query("ALTER TABLE meal_history RENAME COLUMN description TO source");
      }
    },
  },
  {
    name: "widen-text-columns",
    isNeeded: async (db) => (await narrowTextColumns(db)).length > 0,
    apply: async (db) => {
      for (const column of await narrowTextColumns(db)) {
        // column comes from information_schema filtered to two known names
        await db.query(`ALTER TABLE meal_history ALTER COLUMN ${column} TYPE TEXT`);
      }
    },
  },
  {
    name: "drop-user-foreign-key",
    isNeeded: async (db) => (await userForeignKeys(db)).length > 0,
    apply: async (db) => {
      for (const constraint of await userForeignKeys(db)) {
        await db.query(`ALTER TABLE meal_history DROP CONSTRAINT IF EXISTS ${quoteIdentifier(constraint)}`);
      }
    },
  },
];

const postSchemaSteps: MigrationStep<SqlExecutor>[] = [
  {
    name: "drop-workouts-per-week",
    isNeeded: (db) => hasColumn(db, "users", "workouts_per_week"),
    apply: async (db) => {
      await db.query("ALTER TABLE users DROP COLUMN workouts_per_week");
    },
  },
  {
    name: "add-username-column",
    isNeeded: async (db) => !(await hasColumn(db, "users", "username")),
    apply: async (db) => {
      await db.query("ALTER TABLE users ADD COLUMN IF NOT EXISTS username TEXT");
    },
  },
  {
    name: "normalize-gender",
    isNeeded: async (db) => (await legacyProfileRows(db, "gender")).length > 0,
    apply: (db) => normalizeProfileField(db, "gender"),
  },
  {
    name: "normalize-activity-levels",
    isNeeded: async (db) => (await legacyProfileRows(db, "activity_level")).length > 0,
    apply: (db) => normalizeProfileField(db, "activity_level"),
  },
];

export async function migratePostgresSchema(db: SqlExecutor): Promise<string[]> {
  const applied = await runMigrationSteps("postgres", db, preSchemaSteps);
  for (const statement of POSTGRES_SCHEMA) {
    await db.query(statement);
  }
  applied.push(...(await runMigrationSteps("postgres", db, postSchemaSteps)));
  return applied;
}
