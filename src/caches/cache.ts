/**
 * @module caches/cache
 *
 * Base class of the byte-range cache strategies.
 *
 * A cache sits between a random-access file and a backend {@link Fetcher}.
 * Callers ask for `[start, end)` through {@link BaseCache.fetch}; the
 * strategy decides what it already holds and which ranges it still has to
 * request. The base class owns everything the strategies share:
 *
 * - **Normalisation**: an omitted `start` means 0, an omitted `end` means
 *   the file size, and `end` is clamped to the size. A negative `start`
 *   is clamped to 0, so a read lying wholly before the file
 *   (`end <= 0`) is empty. A request with `start >= size` or
 *   `start >= end` yields an empty array without touching the fetcher,
 *   in every strategy.
 * - **Accounting**: every backend call goes through
 *   {@link BaseCache.fetchRange}, which counts misses and requested bytes.
 *   Strategies count their own hits.
 *
 * `BaseCache` itself is the pass-through strategy (`none`): every request
 * goes straight to the fetcher.
 */

import { EMPTY } from '../bytes.js';
import { InvalidRangeError } from '../errors.js';
import { log } from '../logger.js';
import type { Fetcher } from '../types.js';

/**
 * Names of the built-in strategies, as accepted by `open(…, { cacheType })`.
 */
export type CacheType =
  | 'none'
  | 'all'
  | 'first'
  | 'readahead'
  | 'block'
  | 'background'
  | 'bytes'
  | 'mmap'
  | 'parts';

/**
 * Counters describing how well a cache served its reads.
 */
export interface CacheStats {
  /** Strategy name. */
  name: CacheType;
  /** Reads (or, for block strategies, block lookups) answered from buffered data. */
  hits: number;
  /** Backend calls issued. */
  misses: number;
  /** Sum of the lengths of every range requested from the backend. */
  totalRequestedBytes: number;
  /** Read-ahead / block granularity in bytes. */
  blocksize: number;
  /** Number of blocks the file spans (0 for strategies without blocks). */
  nblocks: number;
  /** Logical file size in bytes. */
  size: number;
}

export class BaseCache {
  readonly name: CacheType = 'none';
  readonly blocksize: number;
  readonly size: number;
  nblocks = 0;

  protected readonly fetcher: Fetcher;
  protected hits = 0;
  protected misses = 0;
  protected totalRequestedBytes = 0;

  /**
   * @param blocksize - Read-ahead or block granularity in bytes.
   * @param fetcher - Backend byte-range primitive.
   * @param size - Total logical file length in bytes.
   */
  constructor(blocksize: number, fetcher: Fetcher, size: number) {
    this.blocksize = blocksize;
    this.fetcher = fetcher;
    this.size = size;
  }

  /**
   * Return the bytes in `[start, end)`.
   *
   * @param start - First offset; `null`/omitted means 0.
   * @param end - End offset (exclusive); `null`/omitted means EOF.
   * @returns The requested bytes, shorter than asked only at EOF.
   * @throws {InvalidRangeError} For non-integer offsets.
   */
  async fetch(start?: number | null, end?: number | null): Promise<Uint8Array> {
    const e = Math.min(end ?? this.size, this.size);
    if (!Number.isInteger(start ?? 0) || !Number.isInteger(e)) {
      throw new InvalidRangeError(`Invalid byte range [${start}, ${end}) for ${this.name} cache`);
    }
    const s = Math.max(0, start ?? 0);
    if (s >= this.size || s >= e) return EMPTY;
    return this.fetchWithin(s, e);
  }

  /**
   * Serve a normalised request: `0 <= start < end <= size`.
   *
   * Strategies override this; the pass-through strategy fetches directly.
   */
  protected fetchWithin(start: number, end: number): Promise<Uint8Array> {
    return this.fetchRange(start, end);
  }

  /**
   * Issue one backend request and account for it.
   */
  protected async fetchRange(start: number, end: number): Promise<Uint8Array> {
    this.misses++;
    this.totalRequestedBytes += end - start;
    log('debug', 'cache_fetch', { cache: this.name, start, end });
    return this.fetcher(start, end);
  }

  stats(): CacheStats {
    return {
      name: this.name,
      hits: this.hits,
      misses: this.misses,
      totalRequestedBytes: this.totalRequestedBytes,
      blocksize: this.blocksize,
      nblocks: this.nblocks,
      size: this.size,
    };
  }

  /** Zero the counters, e.g. to report per-file statistics. */
  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.totalRequestedBytes = 0;
  }

  /**
   * Release whatever the strategy holds. The cache must not be used
   * afterwards.
   */
  async close(): Promise<void> {
    // Nothing held by the pass-through strategy.
  }
}
