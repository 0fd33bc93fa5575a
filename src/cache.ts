/**
 * @fileoverview Repository Cache
 *
 * In-memory TTL cache shared by the repositories of one planner. Each
 * repository owns the keys under its own `<table>:<tenantId>:` prefix and
 * is the only writer of them; the prefix also scopes every entry to one
 * tenant, so a read for tenant B never sees tenant A's collection.
 *
 * Values are stored and returned as structured clones. A caller mutating
 * a collection it got from the cache cannot corrupt the cached copy.
 *
 * Hit/miss counters are kept per key for {@link RepositoryCache.statistics}.
 *
 * Every invalidation is recorded as a generation bump for the invalidated
 * key or prefix, whether or not an entry was present. A reader captures
 * {@link RepositoryCache.generation} before a remote read and only stores
 * the result if it is unchanged afterwards, so a read that raced a
 * mutation cannot put pre-mutation rows back.
 */

import { debugLog } from './debug';

interface CacheEntry {
  value: unknown;
  storedAt: number;
  ttlMs: number;
}

export interface CacheStatistics {
  totalHits: number;
  totalMisses: number;
  /** 0..1; 0 when nothing was read yet. */
  overallHitRate: number;
  activeEntries: number;
}

export interface RepositoryCacheOptions {
  /** Millisecond clock. Default: `Date.now`. */
  clock?: () => number;
}

export class RepositoryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly hits = new Map<string, number>();
  private readonly misses = new Map<string, number>();
  private readonly clock: () => number;
  /** Generation at which each key or prefix was last invalidated. */
  private readonly invalidated = new Map<string, number>();
  private version = 0;
  private clearedAt = 0;

  constructor(options: RepositoryCacheOptions = {}) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Read a value if present and fresh.
   *
   * An entry is fresh while `now - storedAt < ttl`. `maxAge`, when given,
   * replaces the stored TTL for this read only (used to serve an older
   * entry as an offline fallback). Expired entries are removed, unless a
   * `maxAge` read keeps them alive for a later fallback.
   */
  get<T>(key: string, maxAge?: number): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.record(this.misses, key);
      return undefined;
    }

    const age = this.clock() - entry.storedAt;
    if (age >= (maxAge ?? entry.ttlMs)) {
      if (maxAge === undefined) this.entries.delete(key);
      this.record(this.misses, key);
      return undefined;
    }

    this.record(this.hits, key);
    return structuredClone(entry.value) as T;
  }

  /** Store a value with a time-to-live in milliseconds. */
  set<T>(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value: structuredClone(value), storedAt: this.clock(), ttlMs });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  invalidate(key: string): void {
    this.entries.delete(key);
    this.invalidated.set(key, ++this.version);
  }

  /**
   * Remove every entry whose key starts with `prefix`.
   *
   * @returns The number of entries removed.
   */
  invalidatePrefix(prefix: string): number {
    this.invalidated.set(prefix, ++this.version);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) debugLog(`[Cache] Invalidated ${removed} entries under ${prefix}`);
    return removed;
  }

  /** Remove all entries and counters. */
  clear(): void {
    this.clearedAt = ++this.version;
    this.invalidated.clear();
    this.entries.clear();
    this.hits.clear();
    this.misses.clear();
    debugLog('[Cache] Cleared');
  }

  /**
   * Latest invalidation that touched `prefix`: an invalidated key or prefix
   * that overlaps it, or a full {@link clear}. Compare two readings to tell
   * whether anything under `prefix` was invalidated in between.
   */
  generation(prefix: string): number {
    let latest = this.clearedAt;
    for (const [invalidated, version] of this.invalidated) {
      if (version > latest && (invalidated.startsWith(prefix) || prefix.startsWith(invalidated))) {
        latest = version;
      }
    }
    return latest;
  }

  /**
   * Remove entries past their TTL.
   *
   * @returns The number of entries removed.
   */
  cleanupExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (now - entry.storedAt >= entry.ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Hit rate for one key, 0..1. */
  hitRate(key: string): number {
    const hits = this.hits.get(key) ?? 0;
    const total = hits + (this.misses.get(key) ?? 0);
    return total === 0 ? 0 : hits / total;
  }

  statistics(): CacheStatistics {
    const totalHits = sum(this.hits);
    const totalMisses = sum(this.misses);
    const total = totalHits + totalMisses;
    return {
      totalHits,
      totalMisses,
      overallHitRate: total === 0 ? 0 : totalHits / total,
      activeEntries: this.entries.size
    };
  }

  private record(counter: Map<string, number>, key: string): void {
    counter.set(key, (counter.get(key) ?? 0) + 1);
  }
}

function sum(counter: Map<string, number>): number {
  let total = 0;
  for (const n of counter.values()) total += n;
  return total;
}
