import { describe, expect, it, vi } from "vitest";

import { TtlCache, analysisCacheKey, searchCacheKey } from "../src/harvester/ttl_cache.js";
import { resolveAnalysisOptions } from "../src/harvester/video_analyzer.js";

function fakeClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("TtlCache", () => {
  it("serves entries until their time to live runs out", () => {
    const clock = fakeClock();
    const cache = new TtlCache<string>(5_000, clock.now);

    cache.set("a", "first");
    clock.advance(4_999);
    expect(cache.get("a")).toBe("first");

    clock.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("counts only live entries", () => {
    const clock = fakeClock();
    const cache = new TtlCache<number>(1_000, clock.now);

    cache.set("old", 1);
    clock.advance(600);
    cache.set("new", 2);
    clock.advance(600);

    expect(cache.size).toBe(1);
    expect(cache.get("new")).toBe(2);
  });

  it("drops expired entries on every write", () => {
    const clock = fakeClock();
    const cache = new TtlCache<number>(1_000, clock.now);

    for (let index = 0; index < 1_000; index += 1) {
      cache.set(`video-${index}`, index);
      clock.advance(1_001);
    }

    expect(cache.purgeExpired()).toBe(1);
    expect(cache.get("video-0")).toBeUndefined();
  });

  it("stores nothing when the ttl is zero", () => {
    const cache = new TtlCache<string>(0);

    cache.set("a", "value");

    expect(cache.get("a")).toBeUndefined();
  });

  it("loads once and then reports hits", async () => {
    const cache = new TtlCache<string>(60_000);
    const load = vi.fn(async () => "loaded");

    const first = await cache.getOrLoad("key", load);
    const second = await cache.getOrLoad("key", load);

    expect(first).toEqual({ value: "loaded", hit: false });
    expect(second).toEqual({ value: "loaded", hit: true });
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("skips caching values the predicate rejects", async () => {
    const cache = new TtlCache<string>(60_000);
    const load = vi.fn(async () => "transient");

    await cache.getOrLoad("key", load, (value) => value !== "transient");
    await cache.getOrLoad("key", load, (value) => value !== "transient");

    expect(load).toHaveBeenCalledTimes(2);
  });

  it("empties on clear", () => {
    const cache = new TtlCache<string>(60_000);
    cache.set("a", "1");
    cache.set("b", "2");

    cache.clear();

    expect(cache.size).toBe(0);
  });
});

describe("cache keys", () => {
  it("distinguishes analyses by every option", () => {
    const base = resolveAnalysisOptions();

    expect(analysisCacheKey("abcDEF12345", base)).toBe(analysisCacheKey("abcDEF12345", resolveAnalysisOptions({})));
    expect(analysisCacheKey("abcDEF12345", base)).not.toBe(
      analysisCacheKey("abcDEF12345", { ...base, startDate: "2024-01-01" }),
    );
    expect(analysisCacheKey("abcDEF12345", base)).not.toBe(
      analysisCacheKey("abcDEF12345", { ...base, fetchLikes: false }),
    );
  });

  it("ignores case and surrounding space in search queries", () => {
    expect(searchCacheKey("  Launch Trailer ", 10)).toBe(searchCacheKey("launch trailer", 10));
    expect(searchCacheKey("launch trailer", 10)).not.toBe(searchCacheKey("launch trailer", 5));
  });
});
