import { describe, it, expect, vi } from "vitest";
import { createCleanableMap, MAX_TIMER_DELAY_MS } from "../src/services/memoryCleanup";

describe("createCleanableMap", () => {
  it("drops expired entries and then the least recently seen beyond capacity", () => {
    let now = 10_000;
    const onCleanup = vi.fn();
    const map = createCleanableMap<string, { lastSeenAt: number }>({
      ttlMs: 1_000,
      maxEntries: 2,
      now: () => now,
      onCleanup,
    });

    map.set("expired", { lastSeenAt: 8_000 });
    map.set("older", { lastSeenAt: 9_500 });
    map.set("newer", { lastSeenAt: 9_800 });
    map.set("newest", { lastSeenAt: 9_900 });

    now = 10_100;
    expect(map.cleanup()).toBe(2);
    expect([...map.keys()]).toEqual(["newer", "newest"]);
    expect(onCleanup).toHaveBeenCalledWith(2);

    map.destroy();
    expect(map.size).toBe(0);
  });

  it("does not report a sweep that removed nothing", () => {
    const onCleanup = vi.fn();
    const map = createCleanableMap<number, { lastSeenAt: number }>({ ttlMs: 1_000, now: () => 0, onCleanup });
    map.set(1, { lastSeenAt: 0 });

    expect(map.cleanup()).toBe(0);
    expect(onCleanup).not.toHaveBeenCalled();
    map.destroy();
  });

  it("caps the sweep interval at the largest timer delay", () => {
    const setIntervalSpy = vi.spyOn(globalThis, "setInterval");
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;

    const map = createCleanableMap<number, { lastSeenAt: number }>({ ttlMs: thirtyDays * 2 });
    expect(setIntervalSpy).toHaveBeenLastCalledWith(expect.any(Function), MAX_TIMER_DELAY_MS);
    map.destroy();

    const short = createCleanableMap<number, { lastSeenAt: number }>({ ttlMs: 60_000 });
    expect(setIntervalSpy).toHaveBeenLastCalledWith(expect.any(Function), 30_000);
    short.destroy();
    setIntervalSpy.mockRestore();
  });
});
