// src/db/migrations/runner.ts
// Guarded, re-runnable schema migrations. Every step inspects the current
// schema before acting, so running the whole list on each boot is a no-op once applied.

export interface MigrationStep<Db> {
  name: string;
  isNeeded(db: Db): Promise<boolean>;
  apply(db: Db): Promise<void>;
}

export async function runMigrationSteps<Db>(
  label: string,
  db: Db,
  steps: ReadonlyArray<MigrationStep<Db>>
): Promise<string[]> {
  const applied: string[] = [];

  for (const step of steps) {
    try {
      if (!(await step.isNeeded(db))) {
        continue;
      }
      console.log(`[Migrations][${label}] Applying ${step.name}...`);
      await step.apply(db);
      applied.push(step.name);
      console.log(`[Migrations][${label}] ✅ ${step.name} applied`);
    } catch (error) {
      console.error(`[Migrations][${label}] ❌ ${step.name} failed:`, error);
      throw error;
    }
  }

  if (applied.length === 0) {
    console.log(`[Migrations][${label}] Schema is up to date`);
  }
  return applied;
}
