import { Pool } from "pg";

export interface QueryOutcome {
  rows: Array<Record<string, unknown>>;
  rowCount: number;
}

/** The slice of pg the store needs; tests substitute a recording fake. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

export interface PgExecutor extends SqlExecutor {
  /** BEGIN … COMMIT on one pooled client, ROLLBACK when `work` throws. */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export function createPgPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    ssl: connectionString.includes("railway") ? { rejectUnauthorized: false } : undefined,
  });
}

export function createPgExecutor(pool: Pool): PgExecutor {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },

    async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const value = await work({
          async query(text, values) {
            const result = await client.query(text, values);
            return { rows: result.rows, rowCount: result.rowCount ?? 0 };
          },
        });
        await client.query("COMMIT");
        return value;
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      } finally {
        client.release();
      }
    },

    async end() {
      await pool.end();
    },
  };
}
