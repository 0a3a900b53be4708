// src/db/connectionLock.ts

/**
 * Process-wide mutual exclusion for the embedded engine.
 * Held for one connection scope only (execute → commit/rollback), never across
 * several logical operations.
 */
export class ConnectionLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The next holder waits for this one whether it succeeded or not.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
