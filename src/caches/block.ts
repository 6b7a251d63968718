/**
 * @module caches/block
 *
 * Fixed-size LRU block strategy (`block`).
 *
 * The file is partitioned into `blocksize` blocks numbered
 * `0..nblocks - 1`. Each block is fetched on its own the first time any
 * byte of it is read and kept in a per-instance {@link LRUCache} holding at
 * most `maxBlocks` blocks; when the memo is full the least recently used
 * block is evicted. A read spanning several blocks concatenates them,
 * slicing the first and last to the exact offsets.
 *
 * This is the only built-in strategy with a hard memory bound
 * (`maxBlocks * blocksize` bytes).
 */

import { LRUCache } from 'lru-cache';
import { BaseCache, type CacheType } from './cache.js';
import { concatBytes } from '../bytes.js';
import { InvalidRangeError } from '../errors.js';
import { log } from '../logger.js';
import type { Fetcher } from '../types.js';

export interface BlockCacheOptions {
  /**
   * Maximum number of blocks held in memory.
   *
   * @defaultValue 32
   */
  maxBlocks?: number;
}

/** Snapshot of the block memo, in the shape of a memoizer's cache info. */
export interface BlockCacheInfo {
  hits: number;
  misses: number;
  maxsize: number;
  currsize: number;
}

export class BlockCache extends BaseCache {
  readonly name: CacheType = 'block';
  readonly maxBlocks: number;

  protected readonly blocks: LRUCache<number, Uint8Array>;

  constructor(blocksize: number, fetcher: Fetcher, size: number, options?: BlockCacheOptions) {
    super(blocksize, fetcher, size);
    if (!Number.isInteger(blocksize) || blocksize <= 0) {
      throw new InvalidRangeError(`Block size must be a positive integer, got ${blocksize}`);
    }
    this.nblocks = Math.ceil(size / blocksize);
    this.maxBlocks = options?.maxBlocks ?? 32;
    this.blocks = new LRUCache<number, Uint8Array>({
      max: this.maxBlocks,
      dispose: (_data, block, reason) => {
        if (reason === 'evict') log('debug', 'cache_evict', { cache: this.name, block });
      },
    });
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    const startBlock = Math.floor(start / this.blocksize);
    const endBlock = Math.floor((end - 1) / this.blocksize);
    const startPos = start - startBlock * this.blocksize;
    const endPos = end - endBlock * this.blocksize;

    if (startBlock === endBlock) {
      const block = await this.getBlock(startBlock);
      return block.slice(startPos, endPos);
    }

    const chunks = [(await this.getBlock(startBlock)).subarray(startPos)];
    for (let n = startBlock + 1; n < endBlock; n++) {
      chunks.push(await this.getBlock(n));
    }
    chunks.push((await this.getBlock(endBlock)).subarray(0, endPos));
    return concatBytes(chunks);
  }

  /**
   * Return block `n` from the memo, fetching it on a miss.
   */
  protected async getBlock(n: number): Promise<Uint8Array> {
    const cached = this.blocks.get(n);
    if (cached) {
      this.hits++;
      return cached;
    }
    const data = await this.fetchBlock(n);
    this.blocks.set(n, data);
    return data;
  }

  /**
   * Fetch block `n` from the backend, bypassing the memo.
   *
   * @throws {InvalidRangeError} If `n` lies beyond the last block.
   */
  protected async fetchBlock(n: number): Promise<Uint8Array> {
    if (n > this.nblocks) {
      throw new InvalidRangeError(
        `Block number ${n} is greater than the number of blocks (${this.nblocks})`,
      );
    }
    const start = n * this.blocksize;
    const end = Math.min(start + this.blocksize, this.size);
    return this.fetchRange(start, end);
  }

  /** Whether block `n` is currently held, without touching its recency. */
  hasBlock(n: number): boolean {
    return this.blocks.has(n);
  }

  cacheInfo(): BlockCacheInfo {
    return {
      hits: this.hits,
      misses: this.misses,
      maxsize: this.maxBlocks,
      currsize: this.blocks.size,
    };
  }

  async close(): Promise<void> {
    this.blocks.clear();
  }
}
