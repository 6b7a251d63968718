import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MMapCache, coalesceBlocks } from '../../src/caches/mmap.js';
import { LETTERS, countingFetcher, countingMultiFetcher, text } from '../helpers/letters.js';

describe('MMapCache', () => {
  const caches: MMapCache[] = [];
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(caches.splice(0).map(c => c.close()));
    await Promise.all(dirs.splice(0).map(d => rm(d, { recursive: true, force: true })));
  });

  function track(cache: MMapCache): MMapCache {
    caches.push(cache);
    return cache;
  }

  it('should fetch only missing blocks, one request per run', async () => {
    const fetcher = countingFetcher();
    const cache = track(new MMapCache(5, fetcher, 52));

    expect(text(await cache.fetch(6, 8))).toBe('gh');
    expect(fetcher).toHaveBeenCalledTimes(1);

    expect(text(await cache.fetch(17, 22))).toBe('rstuv');
    expect(fetcher).toHaveBeenCalledTimes(2);

    expect(text(await cache.fetch(1, 38))).toBe(text(LETTERS.slice(1, 38)));
    expect(fetcher).toHaveBeenCalledTimes(5);
    expect(fetcher.mock.calls.slice(2)).toEqual([
      [0, 5],
      [10, 15],
      [25, 40],
    ]);
  });

  it('should batch every missing run through the multi-range fetcher', async () => {
    const fetcher = countingFetcher();
    const multiFetcher = countingMultiFetcher();
    const cache = track(new MMapCache(5, fetcher, 52, { multiFetcher }));

    await cache.fetch(6, 8);
    expect(multiFetcher).toHaveBeenCalledTimes(1);
    await cache.fetch(17, 22);
    expect(multiFetcher).toHaveBeenCalledTimes(2);
    expect(text(await cache.fetch(1, 38))).toBe(text(LETTERS.slice(1, 38)));
    expect(multiFetcher).toHaveBeenCalledTimes(3);

    expect(multiFetcher).toHaveBeenLastCalledWith([
      { start: 0, end: 5 },
      { start: 10, end: 15 },
      { start: 25, end: 40 },
    ]);
    expect(fetcher).not.toHaveBeenCalled();
    expect(cache.stats().misses).toBe(3);
  });

  it('should count a read of present blocks as a hit', async () => {
    const fetcher = countingFetcher();
    const cache = track(new MMapCache(5, fetcher, 52));

    await cache.fetch(0, 10);
    expect(text(await cache.fetch(2, 9))).toBe('cdefghi');

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(cache.stats().hits).toBe(1);
    expect(cache.hasBlock(1)).toBe(true);
    expect(cache.hasBlock(2)).toBe(false);
  });

  it('should restore a snapshot without refetching', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'rangefs-test-'));
    dirs.push(dir);
    const location = join(dir, 'letters.cache');

    const first = new MMapCache(5, countingFetcher(), 52, { location });
    await first.fetch(6, 8);
    await first.fetch(17, 22);
    const snapshot = first.snapshot();
    await first.close();

    expect(snapshot).toEqual({ location, size: 52, blocksize: 5, blocks: [1, 3, 4] });

    const fetcher = countingFetcher();
    const restored = track(MMapCache.restore(JSON.parse(JSON.stringify(snapshot)), fetcher));

    expect(text(await restored.fetch(5, 10))).toBe('fghij');
    expect(text(await restored.fetch(15, 25))).toBe('pqrstuvwxy');
    expect(fetcher).not.toHaveBeenCalled();

    expect(text(await restored.fetch(40, 45))).toBe('OPQRS');
    expect(fetcher).toHaveBeenCalledWith(40, 45);
  });

  it('should remove a temporary backing file on close', async () => {
    const cache = new MMapCache(5, countingFetcher(), 52);
    await cache.fetch(0, 3);
    const { location } = cache.snapshot();

    expect(location).not.toBeNull();
    await cache.close();

    await expect(stat(location ?? '')).rejects.toThrow();
    expect(cache.snapshot()).toEqual({ location: null, size: 52, blocksize: 5, blocks: [] });
  });
});

describe('coalesceBlocks', () => {
  it('should merge consecutive blocks and clip to the size', () => {
    expect(coalesceBlocks([0, 1, 2, 5, 7], 5, 37)).toEqual([
      { start: 0, end: 15 },
      { start: 25, end: 30 },
      { start: 35, end: 37 },
    ]);
  });

  it('should return nothing for no blocks', () => {
    expect(coalesceBlocks([], 5, 37)).toEqual([]);
  });
});
