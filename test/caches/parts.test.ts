import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { KnownPartsCache, mergeParts } from '../../src/caches/parts.js';
import { InvalidRangeError } from '../../src/errors.js';
import { getLogLevel, setLogLevel, type LogLevel } from '../../src/logger.js';
import { LETTERS, countingFetcher, text } from '../helpers/letters.js';

const head = { start: 0, end: 10, data: LETTERS.slice(0, 10) };

describe('mergeParts', () => {
  it('should merge adjacent parts and sort by offset', () => {
    const merged = mergeParts([
      { start: 20, end: 25, data: LETTERS.slice(20, 25) },
      { start: 5, end: 10, data: LETTERS.slice(5, 10) },
      { start: 0, end: 5, data: LETTERS.slice(0, 5) },
    ]);

    expect(merged.map(p => [p.start, p.end, text(p.data)])).toEqual([
      [0, 10, 'abcdefghij'],
      [20, 25, 'uvwxy'],
    ]);
  });
});

describe('KnownPartsCache', () => {
  let level: LogLevel;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    level = getLogLevel();
    setLogLevel('warn');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    setLogLevel(level);
  });

  it('should serve reads inside a part without fetching', async () => {
    const fetcher = countingFetcher();
    const cache = new KnownPartsCache(10, fetcher, 52, { parts: [head] });

    expect(text(await cache.fetch(2, 8))).toBe('cdefgh');
    expect(fetcher).not.toHaveBeenCalled();
    expect(cache.stats().hits).toBe(1);
    expect(cache.nblocks).toBe(1);
  });

  it('should fetch the overrun of a strict read and warn', async () => {
    const fetcher = countingFetcher();
    const cache = new KnownPartsCache(10, fetcher, 52, { parts: [head] });

    expect(text(await cache.fetch(5, 15))).toBe('fghijklmno');
    expect(fetcher.mock.calls).toEqual([[10, 15]]);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      event: 'parts_fallback',
      start: 10,
      end: 15,
    });
  });

  it('should fetch a read outside every part', async () => {
    const fetcher = countingFetcher();
    const cache = new KnownPartsCache(10, fetcher, 52, { parts: [head] });

    expect(text(await cache.fetch(30, 33))).toBe('EFG');
    expect(fetcher).toHaveBeenCalledWith(30, 33);
  });

  it('should zero-pad an overrun when not strict', async () => {
    const fetcher = countingFetcher();
    const cache = new KnownPartsCache(10, fetcher, 52, { parts: [head], strict: false });

    const out = await cache.fetch(5, 15);

    expect([...out]).toEqual([...LETTERS.slice(5, 10), 0, 0, 0, 0, 0]);
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should reject reads outside the parts without a fetcher', async () => {
    const cache = new KnownPartsCache(10, null, 52, { parts: [head] });

    expect(text(await cache.fetch(0, 10))).toBe('abcdefghij');
    await expect(cache.fetch(20, 30)).rejects.toThrow(InvalidRangeError);
    await expect(cache.fetch(20, 30)).rejects.toThrow(
      'Read is outside the known file parts: [20, 30)',
    );
    expect(logSpy).not.toHaveBeenCalled();
  });
});
