/**
 * Template Cache Store
 *
 * Maps `projectType:templateName` to a resolved template with a TTL.
 * Expiry is evaluated lazily on read; there is no background eviction.
 */

import type { CacheEntry } from '../types/template.js';
import { deepFreeze } from '../utils/json-utils.js';

export type Clock = () => number;

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  expirations: number;
  ttlSeconds: number;
}

export function cacheKey(projectType: string, templateName: string): string {
  return `${projectType}:${templateName}`;
}

export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private hits = 0;
  private misses = 0;
  private expirations = 0;

  /**
   * @param ttlSeconds Maximum age of an entry
   * @param clock Epoch-millisecond clock (default: Date.now)
   */
  constructor(
    private readonly ttlSeconds: number,
    private readonly clock: Clock = Date.now
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Get an entry if it exists and has not expired. Expired entries are dropped.
   */
  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry;
  }

  /**
   * Store a deeply frozen copy of `entry`, replacing whatever was there.
   * Returns the stored copy so callers hand out the same immutable value.
   */
  put(key: string, entry: CacheEntry): CacheEntry {
    const stored = deepFreeze(
      structuredClone({
        metadata: entry.metadata,
        resolvedPath: entry.resolvedPath,
        source: entry.source,
        cachedAt: entry.cachedAt,
      })
    );
    this.entries.set(key, stored);
    return stored;
  }

  /**
   * An entry is expired once its age exceeds the TTL. A clock reading
   * earlier than `cachedAt` (clock regression) or a non-finite reading also
   * counts as expired.
   */
  isExpired(entry: CacheEntry): boolean {
    const now = this.clock();
    if (!Number.isFinite(now) || !Number.isFinite(entry.cachedAt)) {
      return true;
    }

    const elapsed = now - entry.cachedAt;
    if (elapsed < 0) {
      return true;
    }
    return elapsed > this.ttlMs;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      expirations: this.expirations,
      ttlSeconds: this.ttlSeconds,
    };
  }
}
