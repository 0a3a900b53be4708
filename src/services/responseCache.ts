// src/services/responseCache.ts

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
}

/**
 * Bounded least-recently-used cache for analysis answers.
 * Map iteration order is insertion order, so the first key is always the
 * least recently used one; a hit re-inserts the entry at the end.
 */
export class ResponseCache {
  private readonly entries = new Map<string, string>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(readonly capacity: number = 50) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`ResponseCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    this.hits++;
    return value;
  }

  put(key: string, value: string): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    console.log("[ResponseCache] Cleared");
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
    };
  }
}
