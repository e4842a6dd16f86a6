import type { AnalysisOptions } from "./types.js";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheLookup<V> {
  value: V;
  hit: boolean;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    this.purgeExpired();
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.purgeExpired();
    if (this.ttlMs <= 0) return;
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  async getOrLoad(
    key: string,
    load: () => Promise<V>,
    shouldCache: (value: V) => boolean = () => true,
  ): Promise<CacheLookup<V>> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, hit: true };
    }

    const value = await load();
    if (shouldCache(value)) {
      this.set(key, value);
    }
    return { value, hit: false };
  }

  /** Drops expired entries and returns how many were removed. */
  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}

export function analysisCacheKey(videoId: string, options: AnalysisOptions): string {
  return JSON.stringify([
    videoId,
    options.fetchViews,
    options.fetchLikes,
    options.fetchComments,
    options.startDate,
    options.endDate,
  ]);
}

export function searchCacheKey(query: string, maxResults: number): string {
  return JSON.stringify([query.trim().toLowerCase(), maxResults]);
}
