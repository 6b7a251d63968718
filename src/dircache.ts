/**
 * @module dircache
 *
 * Directory-listing cache.
 *
 * Filesystems keep listings here to avoid repeating `ls` round-trips. Each
 * entry records when it was stored; with `listingsExpiryMs` set, an entry
 * older than that is stale. A lookup of a stale entry raises
 * {@link StaleKeyError} internally and reports a miss. Stale entries are
 * skipped by `size` and iteration, and are removed only when overwritten,
 * deleted or pushed out by `maxPaths`.
 *
 * With `maxPaths` set, the cache behaves as an LRU of that many listings:
 * `Map` insertion order is the recency order, and both reads and writes
 * move a key to the most-recent end.
 *
 * @example
 * ```typescript
 * const cache = new DirCache({ listingsExpiryMs: 30_000, maxPaths: 1000 });
 * cache.set('bucket/data', entries);
 * cache.get('bucket/data'); // → entries, for the next 30 s
 * ```
 */

import { StaleKeyError } from './errors.js';
import { log } from './logger.js';
import type { ListingCacheOptions } from './config.js';
import type { DirEntry } from './types.js';

export interface DirCacheOptions extends ListingCacheOptions {
  /** Clock in milliseconds. @defaultValue Date.now */
  now?: () => number;
}

interface Stamped {
  time: number;
  listing: DirEntry[];
}

export class DirCache implements Iterable<string> {
  readonly useListingsCache: boolean;
  readonly listingsExpiryMs: number | null;
  readonly maxPaths: number | null;

  private readonly entries = new Map<string, Stamped>();
  private readonly now: () => number;

  constructor(options?: DirCacheOptions) {
    this.useListingsCache = options?.useListingsCache ?? true;
    this.listingsExpiryMs = options?.listingsExpiryMs ?? null;
    this.maxPaths = options?.maxPaths ?? null;
    this.now = options?.now ?? Date.now;
  }

  /**
   * The listing stored under `key`, or `undefined` when absent or stale.
   */
  get(key: string): DirEntry[] | undefined {
    try {
      return this.lookup(key);
    } catch (err) {
      if (err instanceof StaleKeyError) {
        log('debug', 'listing_stale', { key });
        return undefined;
      }
      throw err;
    }
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Store a listing. Has no effect when `useListingsCache` is off.
   */
  set(key: string, listing: DirEntry[]): void {
    if (!this.useListingsCache) return;
    this.entries.delete(key);
    this.entries.set(key, { time: this.now(), listing });

    if (this.maxPaths !== null) {
      while (this.entries.size > this.maxPaths) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop `path` and every listing below it, stale ones included. */
  invalidate(path: string): void {
    const prefix = path.endsWith('/') ? path : `${path}/`;
    for (const key of [...this.entries.keys()]) {
      if (key === path || key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  /** Number of fresh listings. */
  get size(): number {
    let count = 0;
    for (const key of this.entries.keys()) {
      if (!this.isStale(key)) count++;
    }
    return count;
  }

  /** Fresh keys, least recently used first. */
  *keys(): IterableIterator<string> {
    for (const key of [...this.entries.keys()]) {
      if (!this.isStale(key)) yield key;
    }
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.keys();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * @throws {StaleKeyError} If the entry exists but has expired.
   */
  private lookup(key: string): DirEntry[] | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isStale(key)) throw new StaleKeyError(key);
    if (this.maxPaths !== null) {
      // Move to end (most recently used)
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry.listing;
  }

  private isStale(key: string): boolean {
    if (this.listingsExpiryMs === null) return false;
    const entry = this.entries.get(key);
    if (!entry) return true;
    return this.now() - entry.time > this.listingsExpiryMs;
  }
}
