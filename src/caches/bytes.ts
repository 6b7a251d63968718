/**
 * @module caches/bytes
 *
 * Adaptive two-sided byte buffer (`bytes`).
 *
 * Like {@link ReadAheadCache} this keeps one contiguous buffer, but it can
 * grow the buffer on either side instead of always replacing it. The rule
 * is: never refetch bytes already held, and never issue a small top-up when
 * a fresh bulk fetch would cost about the same.
 *
 * | Request vs. buffer | Action |
 * |--------------------|--------|
 * | inside | slice, no fetch |
 * | no buffer yet, or past both ends | replace with `[start, end + blocksize)` |
 * | only before the start | prepend `[start, bufStart)`, or replace if the buffer runs more than a block past `end` |
 * | only after the end | append `[bufEnd, end + blocksize)`, or replace if the gap exceeds a block |
 *
 * With `trim` enabled (the default), whole blocks ending more than one block
 * before the start of the last read are dropped. The bytes just served
 * stay buffered, along with at least one block in front of them.
 */

import { BaseCache, type CacheType } from './cache.js';
import { EMPTY, concatBytes } from '../bytes.js';
import type { Fetcher } from '../types.js';

export interface BytesCacheOptions {
  /**
   * Discard the front of the buffer once it runs more than a block behind.
   *
   * @defaultValue true
   */
  trim?: boolean;
}

export class BytesCache extends BaseCache {
  readonly name: CacheType = 'bytes';

  private cache: Uint8Array = EMPTY;
  private start: number | null = null;
  private end: number | null = null;
  private readonly trim: boolean;

  constructor(blocksize: number, fetcher: Fetcher, size: number, options?: BytesCacheOptions) {
    super(blocksize, fetcher, size);
    this.trim = options?.trim ?? true;
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    if (this.start !== null && this.end !== null && start >= this.start && end <= this.end) {
      this.hits++;
      const offset = start - this.start;
      return this.cache.slice(offset, offset + end - start);
    }

    const bend = Math.min(this.size, end + this.blocksize);

    if (this.start === null || this.end === null || (start < this.start && end > this.end)) {
      this.cache = await this.fetchRange(start, bend);
      this.start = start;
    } else if (start < this.start) {
      if (this.end - end > this.blocksize) {
        this.cache = await this.fetchRange(start, bend);
      } else {
        const head = await this.fetchRange(start, this.start);
        this.cache = concatBytes([head, this.cache]);
      }
      this.start = start;
    } else if (this.end < this.size) {
      if (end - this.end > this.blocksize) {
        this.cache = await this.fetchRange(start, bend);
        this.start = start;
      } else {
        const tail = await this.fetchRange(this.end, bend);
        this.cache = concatBytes([this.cache, tail]);
      }
    }

    this.end = this.start + this.cache.length;
    const offset = start - this.start;
    const out = this.cache.slice(offset, offset + end - start);

    if (this.trim) {
      // Keep the bytes just served plus one block behind them.
      const blocks = Math.floor((start - this.blocksize - this.start) / this.blocksize);
      if (blocks > 0) {
        this.start += this.blocksize * blocks;
        this.cache = this.cache.subarray(this.blocksize * blocks);
      }
    }
    return out;
  }

  /** Number of bytes currently buffered. */
  get length(): number {
    return this.cache.length;
  }

  /** Buffered interval, or `null` before the first fetch. */
  get span(): { start: number; end: number } | null {
    if (this.start === null || this.end === null) return null;
    return { start: this.start, end: this.end };
  }
}
