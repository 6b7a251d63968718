import { describe, it, expect } from 'vitest';
import { DirCache } from '../src/dircache.js';
import type { DirEntry } from '../src/types.js';

function listing(...names: string[]): DirEntry[] {
  return names.map(name => ({ name, size: 1, type: 'file' }));
}

describe('DirCache', () => {
  it('should store and return listings', () => {
    const cache = new DirCache();
    cache.set('/data', listing('/data/a'));

    expect(cache.get('/data')).toEqual(listing('/data/a'));
    expect(cache.has('/data')).toBe(true);
    expect(cache.get('/other')).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it('should treat listings older than the expiry as missing', () => {
    let now = 0;
    const cache = new DirCache({ listingsExpiryMs: 1000, now: () => now });
    cache.set('/data', listing('/data/a'));

    now = 1000;
    expect(cache.get('/data')).toEqual(listing('/data/a'));

    now = 1001;
    expect(cache.get('/data')).toBeUndefined();
    expect(cache.has('/data')).toBe(false);
    expect(cache.size).toBe(0);
    expect([...cache]).toEqual([]);
  });

  it('should skip stale entries while keeping fresh ones', () => {
    let now = 0;
    const cache = new DirCache({ listingsExpiryMs: 100, now: () => now });
    cache.set('/old', listing());
    now = 80;
    cache.set('/new', listing());
    now = 150;

    expect([...cache.keys()]).toEqual(['/new']);
    expect(cache.size).toBe(1);
  });

  it('should refresh a stale entry when it is set again', () => {
    let now = 0;
    const cache = new DirCache({ listingsExpiryMs: 10, now: () => now });
    cache.set('/data', listing('/data/a'));
    now = 50;
    cache.set('/data', listing('/data/b'));

    expect(cache.get('/data')).toEqual(listing('/data/b'));
  });

  it('should keep at most maxPaths listings, dropping the least recently used', () => {
    const cache = new DirCache({ maxPaths: 2 });
    cache.set('/a', listing());
    cache.set('/b', listing());
    cache.get('/a');
    cache.set('/c', listing());

    expect([...cache.keys()]).toEqual(['/a', '/c']);
    expect(cache.get('/b')).toBeUndefined();
  });

  it('should store nothing when disabled', () => {
    const cache = new DirCache({ useListingsCache: false });
    cache.set('/data', listing('/data/a'));

    expect(cache.get('/data')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should invalidate a path and everything below it', () => {
    const cache = new DirCache();
    cache.set('/a', listing());
    cache.set('/a/b', listing());
    cache.set('/ab', listing());

    cache.invalidate('/a');

    expect([...cache.keys()]).toEqual(['/ab']);
  });

  it('should delete and clear', () => {
    const cache = new DirCache();
    cache.set('/a', listing());
    cache.set('/b', listing());

    expect(cache.delete('/a')).toBe(true);
    expect(cache.delete('/a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
