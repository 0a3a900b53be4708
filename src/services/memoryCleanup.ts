// src/services/memoryCleanup.ts

/**
 * TTL-cleaned Map for in-memory per-user state.
 * Entries untouched for longer than ttlMs are dropped on the next sweep.
 */

export interface CleanupOptions {
  ttlMs: number;
  intervalMs?: number; // default: ttlMs / 2, capped at MAX_TIMER_DELAY_MS
  maxEntries?: number;
  now?: () => number;
  onCleanup?: (removed: number) => void;
}

// setInterval treats longer delays as 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface CleanableEntry {
  lastSeenAt: number;
}

export type CleanableMap<K, V> = Map<K, V> & {
  cleanup: () => number;
  destroy: () => void;
};

export function createCleanableMap<K, V extends CleanableEntry>(
  options: CleanupOptions
): CleanableMap<K, V> {
  const { ttlMs, intervalMs = ttlMs / 2, maxEntries = 10000, now = Date.now, onCleanup } = options;

  const map = new Map<K, V>();
  let cleanupInterval: NodeJS.Timeout | null = null;

  const cleanup = (): number => {
    const current = now();
    let removed = 0;

    for (const [key, value] of map.entries()) {
      if (current - value.lastSeenAt > ttlMs) {
        map.delete(key);
        removed++;
      }
    }

    // Over capacity: drop the least recently seen
    if (map.size > maxEntries) {
      const oldest = [...map.entries()]
        .sort((a, b) => a[1].lastSeenAt - b[1].lastSeenAt)
        .slice(0, map.size - maxEntries);
      for (const [key] of oldest) {
        map.delete(key);
        removed++;
      }
    }

    if (removed > 0 && onCleanup) {
      onCleanup(removed);
    }
    return removed;
  };

  const destroy = (): void => {
    if (cleanupInterval) {
      clearInterval(cleanupInterval);
      cleanupInterval = null;
    }
    map.clear();
  };

  cleanupInterval = setInterval(cleanup, Math.min(intervalMs, MAX_TIMER_DELAY_MS));
  // The sweep alone never keeps the process alive.
  cleanupInterval.unref();

  return Object.assign(map, { cleanup, destroy });
}
