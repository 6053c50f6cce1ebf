// ═══════════════════════════════════════════════════════════════════════════════
// RANKING CACHE — Observable In-Memory TTL Cache
// ═══════════════════════════════════════════════════════════════════════════════
//
// Holds the latest ranking run per domain for the HTTP API.
//
// KEY DESIGN:
//   Key = `latest:${domain}`
//   TTL = 1 hour by default (RANKING_CACHE_TTL_MS)
//   Auto-invalidation on read (expired entries return null)
//   Manual clear via clearAll()
//
// OBSERVABILITY:
//   getStatus() returns per-entry metadata (cachedAt, expiresAt, age, etc.)
//   and is exposed by GET /health.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Domain } from '../types/ranking';

const DEFAULT_TTL_MS = 60 * 60 * 1000; // 1 hour

export interface CacheEntryMeta {
  key: string;
  cachedAt: number;       // Unix timestamp when entry was cached
  expiresAt: number;      // Unix timestamp when TTL expires
  ageMs: number;
  remainingMs: number;
  isExpired: boolean;
}

export interface CacheStatus {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  entries: CacheEntryMeta[];
  lastClearedAt: number | null;
}

interface InternalEntry<T> {
  data: T;
  cachedAt: number;
  ttlMs: number;
}

/**
 * In-memory TTL cache for one value type.
 * `now` is injectable so expiry can be tested without timers.
 */
export class RankingCache<T> {
  private store = new Map<string, InternalEntry<T>>();
  private ttlMs: number;
  private now: () => number;
  private _lastClearedAt: number | null = null;

  constructor(ttlMs: number = DEFAULT_TTL_MS, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  // ─── CORE OPERATIONS ──────────────────────────────────────────────────────

  /**
   * Returns null if the key doesn't exist or its TTL has elapsed.
   * Expired entries are evicted on read.
   */
  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() - entry.cachedAt > entry.ttlMs) {
      this.store.delete(key);
      return null;
    }

    return entry.data;
  }

  set(key: string, data: T, customTtlMs?: number): void {
    this.store.set(key, {
      data,
      cachedAt: this.now(),
      ttlMs: customTtlMs ?? this.ttlMs,
    });
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  /**
   * Clear ALL entries. Returns the count of entries that were cleared.
   */
  clearAll(): number {
    const count = this.store.size;
    this.store.clear();
    this._lastClearedAt = this.now();
    return count;
  }

  // ─── OBSERVABILITY ─────────────────────────────────────────────────────────

  private describe(key: string, entry: InternalEntry<T>, now: number): CacheEntryMeta {
    const ageMs = now - entry.cachedAt;
    return {
      key,
      cachedAt: entry.cachedAt,
      expiresAt: entry.cachedAt + entry.ttlMs,
      ageMs,
      remainingMs: Math.max(0, entry.ttlMs - ageMs),
      isExpired: ageMs > entry.ttlMs,
    };
  }

  getEntryMeta(key: string): CacheEntryMeta | null {
    const entry = this.store.get(key);
    return entry ? this.describe(key, entry, this.now()) : null;
  }

  getStatus(): CacheStatus {
    const now = this.now();
    const entries = Array.from(this.store.entries(), ([key, entry]) => this.describe(key, entry, now));

    // Newest first
    entries.sort((a, b) => b.cachedAt - a.cachedAt);

    const expiredEntries = entries.filter(e => e.isExpired).length;
    return {
      totalEntries: entries.length,
      validEntries: entries.length - expiredEntries,
      expiredEntries,
      entries,
      lastClearedAt: this._lastClearedAt,
    };
  }
}


// ═══════════════════════════════════════════════════════════════════════════════
// KEY BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Format: `latest:${domain}` */
export function buildLatestRunKey(domain: Domain): string {
  return `latest:${domain}`;
}
