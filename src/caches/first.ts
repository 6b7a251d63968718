/**
 * @module caches/first
 *
 * First-block strategy (`first`).
 *
 * Caches the first `blocksize` bytes of the file and nothing else. Useful
 * for formats whose metadata sits in a header that is consulted again and
 * again while the body is read at random.
 */

import { BaseCache, type CacheType } from './cache.js';
import { concatBytes } from '../bytes.js';
import type { Fetcher } from '../types.js';

export class FirstChunkCache extends BaseCache {
  readonly name: CacheType = 'first';

  private cache: Uint8Array | null = null;

  constructor(blocksize: number, fetcher: Fetcher, size: number) {
    // A block larger than the file buffers the whole file.
    super(Math.min(blocksize, size), fetcher, size);
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    if (start >= this.blocksize) {
      // Entirely past the first block: bypass.
      return this.fetchRange(start, end);
    }

    if (this.cache === null) {
      if (end > this.blocksize) {
        // One request covers the header and the remainder.
        const data = await this.fetchRange(0, end);
        this.cache = data.slice(0, this.blocksize);
        return data.slice(start);
      }
      this.cache = await this.fetchRange(0, this.blocksize);
    } else {
      this.hits++;
    }

    const part = this.cache.slice(start, end);
    if (end <= this.blocksize) return part;
    return concatBytes([part, await this.fetchRange(this.blocksize, end)]);
  }

  /** The cached first block, or `null` before it has been read. */
  get cached(): Uint8Array | null {
    return this.cache;
  }
}
