/**
 * @module caches/all
 *
 * Whole-file strategy (`all`).
 *
 * Holds the complete file in memory. When the bytes are already in hand
 * they are passed as `data` and the fetcher is never called; otherwise the
 * whole file is fetched once, on the first non-empty read, and every later
 * read is an in-memory slice.
 */

import { BaseCache, type CacheType } from './cache.js';
import type { Fetcher } from '../types.js';

export interface AllBytesOptions {
  /** The full file content, when already known. */
  data?: Uint8Array;
}

export class AllBytesCache extends BaseCache {
  readonly name: CacheType = 'all';

  private data: Uint8Array | null;
  private pending: Promise<Uint8Array> | null = null;

  constructor(blocksize: number, fetcher: Fetcher, size: number, options?: AllBytesOptions) {
    super(blocksize, fetcher, size);
    this.data = options?.data ?? null;
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    const data = await this.load();
    return data.slice(start, end);
  }

  /**
   * Resolve the whole-file buffer, fetching it on first use. Concurrent
   * first reads share one request.
   */
  private async load(): Promise<Uint8Array> {
    if (this.data) {
      this.hits++;
      return this.data;
    }
    if (!this.pending) {
      this.pending = this.fetchRange(0, this.size);
    }
    try {
      this.data = await this.pending;
      return this.data;
    } finally {
      this.pending = null;
    }
  }

  /** Whether the file content is held in memory. */
  get loaded(): boolean {
    return this.data !== null;
  }
}
