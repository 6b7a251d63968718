import { describe, it, expect, vi } from 'vitest';
import { BackgroundBlockCache } from '../../src/caches/background.js';
import { LETTERS, countingFetcher, text } from '../helpers/letters.js';

describe('BackgroundBlockCache', () => {
  it('should start fetching the next block after a read', async () => {
    const fetcher = countingFetcher();
    const cache = new BackgroundBlockCache(4, fetcher, 52);

    await cache.fetch(0, 2);

    expect(fetcher.mock.calls).toEqual([
      [0, 4],
      [4, 8],
    ]);
    expect(cache.pendingBlock).toBe(1);
  });

  it('should serve the prefetched block without a new request', async () => {
    const fetcher = countingFetcher();
    const cache = new BackgroundBlockCache(4, fetcher, 52);

    await cache.fetch(0, 4);
    expect(text(await cache.fetch(4, 8))).toBe('efgh');

    // block 0, prefetched block 1, then the prefetch of block 2
    expect(fetcher.mock.calls).toEqual([
      [0, 4],
      [4, 8],
      [8, 12],
    ]);
    expect(cache.hasBlock(1)).toBe(true);
  });

  it('should not prefetch past the last block', async () => {
    const fetcher = countingFetcher();
    const cache = new BackgroundBlockCache(10, fetcher, 52);

    await cache.fetch(50, 52);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(cache.pendingBlock).toBeNull();
  });

  it('should surface a failed prefetch only when its block is read', async () => {
    const fetcher = vi.fn(async (start: number, end: number) => {
      if (start === 10) throw new Error('backend down');
      return LETTERS.slice(start, end);
    });
    const cache = new BackgroundBlockCache(10, fetcher, 52);

    expect(text(await cache.fetch(0, 3))).toBe('abc');
    await expect(cache.fetch(12, 14)).rejects.toThrow('backend down');
  });

  it('should read sequentially with one request per block', async () => {
    const fetcher = countingFetcher();
    const cache = new BackgroundBlockCache(8, fetcher, 52);

    const out: string[] = [];
    for (let start = 0; start < 52; start += 4) {
      out.push(text(await cache.fetch(start, start + 4)));
    }

    expect(out.join('')).toBe(text(LETTERS));
    expect(fetcher).toHaveBeenCalledTimes(7);
    await cache.close();
    expect(cache.pendingBlock).toBeNull();
  });
});
