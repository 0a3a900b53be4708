// src/db/migrations/sqliteMigrations.ts
import type { Database } from "better-sqlite3";
import { computeDailyTarget } from "../../domain/calorieTarget";
import { isRow, toNumber, toText } from "../rows";
import { legacyActivityReplacement, legacyGenderReplacement } from "../../domain/legacyValues";
import type { MigrationStep } from "./runner";
import { runMigrationSteps } from "./runner";

const MEAL_HISTORY_COLUMNS = `
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER,
  food_name TEXT,
  calories INTEGER,
  source TEXT,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
`;

export const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
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
  );

  CREATE TABLE IF NOT EXISTS meal_history (${MEAL_HISTORY_COLUMNS});

  CREATE INDEX IF NOT EXISTS idx_meal_history_user_id ON meal_history (user_id);
  CREATE INDEX IF NOT EXISTS idx_meal_history_created_at ON meal_history (created_at);
  CREATE INDEX IF NOT EXISTS idx_meal_history_user_date ON meal_history (user_id, DATE(created_at));
`;

interface ColumnInfo {
  name: string;
  type: string;
}

function tableExists(db: Database, table: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

function columns(db: Database, table: string): ColumnInfo[] {
  if (!tableExists(db, table)) return [];
  // PRAGMA does not accept bound parameters; table names here are constants.
  const rows: unknown[] = db.prepare(`PRAGMA table_info(${table})`).all();
  return rows.filter(isRow).map((r) => ({
    name: toText(r.name) ?? "",
    type: toText(r.type) ?? "",
  }));
}

function hasColumn(db: Database, table: string, column: string): boolean {
  return columns(db, table).some((c) => c.name === column);
}

const FIXED_WIDTH_TEXT = /^(VAR)?CHAR(ACTER)?(\s+VARYING)?\s*\(\d+\)$/i;

function narrowTextColumns(db: Database): string[] {
  return columns(db, "meal_history")
    .filter((c) => (c.name === "food_name" || c.name === "source") && FIXED_WIDTH_TEXT.test(c.type))
    .map((c) => c.name);
}

function foreignKeyCount(db: Database): number {
  if (!tableExists(db, "meal_history")) return 0;
  return db.prepare("PRAGMA foreign_key_list(meal_history)").all().length;
}

function rebuildMealHistory(db: Database): void {
  db.transaction(() => {
    db.exec(`CREATE TABLE meal_history_rebuild (${MEAL_HISTORY_COLUMNS})`);
    db.exec(`
      INSERT INTO meal_history_rebuild (id, user_id, food_name, calories, source, created_at)
      SELECT id, user_id, food_name, calories, source, created_at FROM meal_history
    `);
    db.exec("DROP TABLE meal_history");
    db.exec("ALTER TABLE meal_history_rebuild RENAME TO meal_history");
  })();
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

// The daily target is recomputed from the row as stored; computeDailyTarget
// resolves old labels in either field.
function legacyProfileRows(db: Database, field: ProfileField): LegacyProfileRow[] {
  if (!tableExists(db, "users")) return [];
  const rows: unknown[] = db
    .prepare(`SELECT user_id, gender, age, height, weight, activity_level FROM users WHERE ${field} IS NOT NULL`)
    .all();

  const result: LegacyProfileRow[] = [];
  for (const row of rows.filter(isRow)) {
    const stored = toText(row[field]);
    const replacement = stored === null ? null : REPLACEMENTS[field](stored);
    const userId = toNumber(row.user_id);
    if (replacement === null || userId === null) continue;
    result.push({
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
  return result;
}

function normalizeProfileField(db: Database, field: ProfileField): void {
  const update = db.prepare(`UPDATE users SET ${field} = ?, daily_calories = ? WHERE user_id = ?`);
  db.transaction(() => {
    for (const row of legacyProfileRows(db, field)) {
      update.run(row.replacement, row.dailyCalories, row.userId);
    }
  })();
}

/** Steps that must run before the canonical tables are created. */
const preSchemaSteps: MigrationStep<Database>[] = [
  {
    name: "rename-legacy-history-table",
    isNeeded: async (db) => tableExists(db, "calorie_history") && !tableExists(db, "meal_history"),
    apply: async (db) => {
      db.exec("ALTER TABLE calorie_history RENAME TO meal_history");
    },
  },
  {
    name: "rename-legacy-meal-columns",
    isNeeded: async (db) =>
      (hasColumn(db, "meal_history", "meal_type") && !hasColumn(db, "meal_history", "food_name")) ||
      (hasColumn(db, "meal_history", "description") && !hasColumn(db, "meal_history", "source")),
    apply: async (db) => {
      db.transaction(() => {
        if (hasColumn(db, "meal_history", "meal_type") && !hasColumn(db, "meal_history", "food_name")) {
          db.exec("ALTER TABLE meal_history RENAME COLUMN meal_type TO food_name");
        }
        if (hasColumn(db, "meal_history", "description") && !hasColumn(db, "meal_history", "source")) {
          db.exec("ALTER TABLE meal_history RENAME COLUMN description TO source");
        }
      })();
    },
  },
  {
    // SQLite cannot alter a column type or drop a constraint in place: rebuild and copy.
    name: "widen-text-columns",
    isNeeded: async (db) => narrowTextColumns(db).length > 0,
    apply: async (db) => rebuildMealHistory(db),
  },
  {
    // Meals may outlive their profile, so meal_history carries no reference to users.
    name: "drop-user-foreign-key",
    isNeeded: async (db) => foreignKeyCount(db) > 0,
    apply: async (db) => rebuildMealHistory(db),
  },
];

/** Steps that assume the canonical tables exist. */
const postSchemaSteps: MigrationStep<Database>[] = [
  {
    name: "drop-workouts-per-week",
    isNeeded: async (db) => hasColumn(db, "users", "workouts_per_week"),
    apply: async (db) => {
      db.exec("ALTER TABLE users DROP COLUMN workouts_per_week");
    },
  },
  {
    name: "add-username-column",
    isNeeded: async (db) => tableExists(db, "users") && !hasColumn(db, "users", "username"),
    apply: async (db) => {
      db.exec("ALTER TABLE users ADD COLUMN username TEXT");
    },
  },
  {
    name: "normalize-gender",
    isNeeded: async (db) => legacyProfileRows(db, "gender").length > 0,
    apply: async (db) => normalizeProfileField(db, "gender"),
  },
  {
    name: "normalize-activity-levels",
    isNeeded: async (db) => legacyProfileRows(db, "activity_level").length > 0,
    apply: async (db) => normalizeProfileField(db, "activity_level"),
  },
];

export async function migrateSqliteSchema(db: Database): Promise<string[]> {
  const applied = await runMigrationSteps("sqlite", db, preSchemaSteps);
  db.exec(SQLITE_SCHEMA);
  applied.push(...(await runMigrationSteps("sqlite", db, postSchemaSteps)));
  return applied;
}
