import { describe, it, expect, vi } from 'vitest';
import { AllBytesCache } from '../../src/caches/all.js';
import { LETTERS, countingFetcher, text } from '../helpers/letters.js';

describe('AllBytesCache', () => {
  it('should never fetch when the data is supplied', async () => {
    const fetcher = countingFetcher();
    const cache = new AllBytesCache(10, fetcher, 52, { data: LETTERS });

    expect(text(await cache.fetch(10, 13))).toBe('klm');
    expect(text(await cache.fetch())).toBe(text(LETTERS));

    expect(fetcher).not.toHaveBeenCalled();
    expect(cache.stats().hits).toBe(2);
  });

  it('should load the whole file once on first use', async () => {
    const fetcher = countingFetcher();
    const cache = new AllBytesCache(10, fetcher, 52);
    expect(cache.loaded).toBe(false);

    await cache.fetch(3, 4);
    await cache.fetch(40, 52);

    expect(fetcher.mock.calls).toEqual([[0, 52]]);
    expect(cache.loaded).toBe(true);
  });

  it('should share one request between concurrent first reads', async () => {
    const fetcher = countingFetcher();
    const cache = new AllBytesCache(10, fetcher, 52);

    const [a, b] = await Promise.all([cache.fetch(0, 5), cache.fetch(10, 20)]);

    expect(text(a)).toBe('abcde');
    expect(text(b)).toBe('klmnopqrst');
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('should retry the load after a failure', async () => {
    const fetcher = vi
      .fn(async (start: number, end: number) => LETTERS.slice(start, end))
      .mockRejectedValueOnce(new Error('connection reset'));
    const cache = new AllBytesCache(10, fetcher, 52);

    await expect(cache.fetch(0, 5)).rejects.toThrow('connection reset');
    expect(text(await cache.fetch(0, 5))).toBe('abcde');
    expect(fetcher).toHaveBeenCalledTimes(2);
  });
});
