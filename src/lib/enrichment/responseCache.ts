/**
 * Time-bounded memo of source lookups keyed by (source, normalized query,
 * registry hint). The hint is part of the key because a source may fall back
 * to it when the name finds nothing.
 *
 * A null record is a cached negative ("source has nothing"). Expired entries
 * are misses and are removed on that lookup; there is no background sweep.
 * Reads and writes are synchronous Map operations, so no locking is needed on
 * the event loop.
 */

import type {
  IngredientQuery,
  PartialRecord,
  SourceId,
} from './enrichment.types';

export type CacheEntry = {
  record: PartialRecord | null;
  cachedAt: number;
  ttlMs: number;
};

export type CacheLookup =
  | { hit: true; record: PartialRecord | null }
  | { hit: false };

export type ResponseCacheOptions = {
  defaultTtlMs: number;
  now?: () => number;
};

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(options: ResponseCacheOptions) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.now = options.now ?? Date.now;
  }

  static key(query: IngredientQuery, source: SourceId): string {
    return `${source}:${query.normalized}|${query.casHint ?? ''}`;
  }

  get(query: IngredientQuery, source: SourceId): CacheLookup {
    const key = ResponseCache.key(query, source);
    const entry = this.entries.get(key);
    if (!entry) return { hit: false };
    if (this.now() - entry.cachedAt > entry.ttlMs) {
      this.entries.delete(key);
      return { hit: false };
    }
    return { hit: true, record: entry.record };
  }

  put(
    query: IngredientQuery,
    source: SourceId,
    record: PartialRecord | null,
    ttlMs = this.defaultTtlMs,
  ): void {
    this.entries.set(ResponseCache.key(query, source), {
      record,
      cachedAt: this.now(),
      ttlMs,
    });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
