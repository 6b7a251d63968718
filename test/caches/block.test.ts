import { describe, it, expect } from 'vitest';
import { BlockCache } from '../../src/caches/block.js';
import { InvalidRangeError } from '../../src/errors.js';
import { LETTERS, countingFetcher, text } from '../helpers/letters.js';

/** Exposes the raw block fetch for bounds checks. */
class InspectableBlockCache extends BlockCache {
  fetchBlockAt(n: number): Promise<Uint8Array> {
    return this.fetchBlock(n);
  }
}

describe('BlockCache', () => {
  it('should partition the file into blocks', () => {
    const cache = new BlockCache(10, countingFetcher(), 52);

    expect(cache.nblocks).toBe(6);
    expect(cache.maxBlocks).toBe(32);
  });

  it('should fetch each block on its own', async () => {
    const fetcher = countingFetcher();
    const cache = new BlockCache(10, fetcher, 52);

    expect(text(await cache.fetch(8, 23))).toBe('ijklmnopqrstuvw');
    expect(fetcher.mock.calls).toEqual([
      [0, 10],
      [10, 20],
      [20, 30],
    ]);
  });

  it('should evict the least recently used block', async () => {
    const fetcher = countingFetcher();
    const cache = new BlockCache(4, fetcher, 52, { maxBlocks: 2 });

    await cache.fetch(0, 1);
    await cache.fetch(4, 5);
    await cache.fetch(8, 9);
    await cache.fetch(0, 1);

    expect(fetcher).toHaveBeenCalledTimes(4);
  });

  it('should count misses per new block and drop block 0 once full', async () => {
    const cache = new BlockCache(4, countingFetcher(), 52, { maxBlocks: 2 });

    await cache.fetch(0, 2);
    expect(cache.cacheInfo().misses).toBe(1);
    await cache.fetch(4, 6);
    expect(cache.cacheInfo().misses).toBe(2);
    await cache.fetch(12, 13);
    expect(cache.cacheInfo().misses).toBe(3);

    expect(cache.hasBlock(0)).toBe(false);
    expect(cache.hasBlock(1)).toBe(true);
    expect(cache.hasBlock(3)).toBe(true);
    expect(cache.cacheInfo()).toEqual({ hits: 0, misses: 3, maxsize: 2, currsize: 2 });
  });

  it('should refresh recency on a hit', async () => {
    const fetcher = countingFetcher();
    const cache = new BlockCache(4, fetcher, 52, { maxBlocks: 2 });

    await cache.fetch(0, 1); // block 0
    await cache.fetch(4, 5); // block 1
    await cache.fetch(1, 2); // block 0 again, now most recent
    await cache.fetch(8, 9); // block 2 evicts block 1

    expect(cache.hasBlock(0)).toBe(true);
    expect(cache.hasBlock(1)).toBe(false);
    expect(cache.stats().hits).toBe(1);
    expect(fetcher).toHaveBeenCalledTimes(3);
  });

  it('should clip the last block to the file size', async () => {
    const fetcher = countingFetcher();
    const cache = new BlockCache(10, fetcher, 52);

    expect(text(await cache.fetch(50, 52))).toBe('YZ');
    expect(fetcher).toHaveBeenCalledWith(50, 52);
  });

  it('should reject a block index beyond the file', async () => {
    const cache = new InspectableBlockCache(10, countingFetcher(), 52);

    await expect(cache.fetchBlockAt(7)).rejects.toThrow(
      'Block number 7 is greater than the number of blocks (6)',
    );
  });

  it('should reject a non-positive block size', () => {
    expect(() => new BlockCache(0, countingFetcher(), 52)).toThrow(InvalidRangeError);
  });

  it('should drop every block on close', async () => {
    const cache = new BlockCache(10, countingFetcher(), 52);
    await cache.fetch(0, 52);
    expect(cache.cacheInfo().currsize).toBe(6);

    await cache.close();
    expect(cache.cacheInfo().currsize).toBe(0);
  });

  it('should return the letters across every block', async () => {
    const cache = new BlockCache(7, countingFetcher(), 52, { maxBlocks: 3 });

    expect(text(await cache.fetch())).toBe(text(LETTERS));
  });
});
