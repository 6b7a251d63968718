/**
 * @module caches
 *
 * The cache strategy family and its single construction point.
 *
 * | Name | Class | Holds |
 * |------|-------|-------|
 * | `none` | {@link BaseCache} | nothing |
 * | `all` | {@link AllBytesCache} | the whole file |
 * | `first` | {@link FirstChunkCache} | the first block |
 * | `readahead` | {@link ReadAheadCache} | one request plus one block |
 * | `block` | {@link BlockCache} | up to `maxBlocks` blocks, LRU |
 * | `background` | {@link BackgroundBlockCache} | as `block`, plus the next block in flight |
 * | `bytes` | {@link BytesCache} | one buffer grown on either side |
 * | `mmap` | {@link MMapCache} | fetched blocks, on local disk |
 * | `parts` | {@link KnownPartsCache} | caller-supplied byte ranges |
 */

import { AllBytesCache, type AllBytesOptions } from './all.js';
import { BackgroundBlockCache } from './background.js';
import { BlockCache, type BlockCacheOptions } from './block.js';
import { BytesCache, type BytesCacheOptions } from './bytes.js';
import { BaseCache, type CacheType } from './cache.js';
import { FirstChunkCache } from './first.js';
import { MMapCache, type MMapCacheOptions } from './mmap.js';
import { KnownPartsCache, type KnownPartsOptions } from './parts.js';
import { ReadAheadCache } from './readahead.js';
import { UnsupportedOperationError } from '../errors.js';
import type { Fetcher } from '../types.js';

/**
 * Strategy-specific options. Each strategy reads only its own fields and
 * ignores the rest.
 */
export interface CacheOptions
  extends AllBytesOptions,
    BlockCacheOptions,
    BytesCacheOptions,
    KnownPartsOptions,
    MMapCacheOptions {}

export const CACHE_TYPES: ReadonlyArray<CacheType> = [
  'none',
  'all',
  'first',
  'readahead',
  'block',
  'background',
  'bytes',
  'mmap',
  'parts',
];

export function isCacheType(value: string): value is CacheType {
  return CACHE_TYPES.some(type => type === value);
}

/**
 * Build the strategy named `type`.
 *
 * @param type - Strategy name.
 * @param blocksize - Read-ahead / block granularity in bytes.
 * @param fetcher - Backend byte-range primitive.
 * @param size - Logical file length in bytes.
 * @param options - Strategy-specific options.
 *
 * @example
 * ```typescript
 * const cache = createCache('block', 1 << 20, (s, e) => fs.fetchRange(path, s, e), size, {
 *   maxBlocks: 16,
 * });
 * const header = await cache.fetch(0, 100);
 * ```
 */
export function createCache(
  type: CacheType,
  blocksize: number,
  fetcher: Fetcher,
  size: number,
  options: CacheOptions = {},
): BaseCache {
  switch (type) {
    case 'none':
      return new BaseCache(blocksize, fetcher, size);
    case 'all':
      return new AllBytesCache(blocksize, fetcher, size, options);
    case 'first':
      return new FirstChunkCache(blocksize, fetcher, size);
    case 'readahead':
      return new ReadAheadCache(blocksize, fetcher, size);
    case 'block':
      return new BlockCache(blocksize, fetcher, size, options);
    case 'background':
      return new BackgroundBlockCache(blocksize, fetcher, size, options);
    case 'bytes':
      return new BytesCache(blocksize, fetcher, size, options);
    case 'mmap':
      return new MMapCache(blocksize, fetcher, size, options);
    case 'parts':
      return new KnownPartsCache(blocksize, fetcher, size, options);
    default: {
      const unknown: never = type;
      throw new UnsupportedOperationError(`Unknown cache type: ${String(unknown)}`);
    }
  }
}

export { BaseCache } from './cache.js';
export type { CacheType, CacheStats } from './cache.js';
export { AllBytesCache } from './all.js';
export type { AllBytesOptions } from './all.js';
export { BackgroundBlockCache } from './background.js';
export { BlockCache } from './block.js';
export type { BlockCacheOptions, BlockCacheInfo } from './block.js';
export { BytesCache } from './bytes.js';
export type { BytesCacheOptions } from './bytes.js';
export { FirstChunkCache } from './first.js';
export { MMapCache, coalesceBlocks } from './mmap.js';
export type { MMapCacheOptions, MMapSnapshot } from './mmap.js';
export { KnownPartsCache, mergeParts } from './parts.js';
export type { KnownPart, KnownPartsOptions } from './parts.js';
export { ReadAheadCache } from './readahead.js';
