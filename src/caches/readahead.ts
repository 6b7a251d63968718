/**
 * @module caches/readahead
 *
 * Single-buffer read-ahead strategy (`readahead`).
 *
 * Keeps one contiguous buffer. A miss replaces it with the requested range
 * plus `blocksize` bytes of look-ahead; a request that starts inside the
 * buffer but runs past its end returns the cached tail and refills from
 * the old buffer end. Nothing is kept from earlier buffers, so memory stays
 * at roughly one request plus one block. Best suited to many small reads
 * progressing through a file, such as reading lines.
 */

import { BaseCache, type CacheType } from './cache.js';
import { EMPTY, concatBytes } from '../bytes.js';

export class ReadAheadCache extends BaseCache {
  readonly name: CacheType = 'readahead';

  private cache: Uint8Array = EMPTY;
  private start = 0;
  private end = 0;

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    if (start >= this.start && end <= this.end) {
      this.hits++;
      return this.cache.slice(start - this.start, end - this.start);
    }

    let part = EMPTY;
    let want = end - start;
    if (this.start <= start && start < this.end) {
      // Partial hit: keep the tail, top up from the old buffer end.
      part = this.cache.slice(start - this.start);
      want -= part.length;
      start = this.end;
    }

    const bend = Math.min(this.size, end + this.blocksize);
    this.cache = await this.fetchRange(start, bend);
    this.start = start;
    this.end = start + this.cache.length;
    return concatBytes([part, this.cache.slice(0, want)]);
  }

  /** Number of bytes currently buffered. */
  get length(): number {
    return this.cache.length;
  }
}
