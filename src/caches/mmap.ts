/**
 * @module caches/mmap
 *
 * Sparse local backing-file strategy (`mmap`).
 *
 * Fetched blocks are written into a sparse file of the same length as the
 * remote file, and the set of block indices already present is tracked in
 * memory. A read determines which of its blocks are missing, coalesces
 * consecutive missing blocks into single ranges, fetches those ranges
 * (all at once through the multi-range fetcher when one is supplied, or
 * one request per range otherwise), writes them into the backing file and
 * then reads the answer back from disk.
 *
 * Memory use is independent of file size; disk use grows up to the file
 * size. The backing file lives at `location` when given, otherwise in a
 * fresh temporary directory that {@link MMapCache.close} removes.
 *
 * The durable state (backing-file location plus the block set) can be
 * captured with {@link MMapCache.snapshot} and turned back into a working
 * cache with {@link MMapCache.restore}; the file handle is always opened
 * fresh, never carried over.
 */

import { mkdtemp, open, rm, type FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BaseCache, type CacheType } from './cache.js';
import { InvalidRangeError } from '../errors.js';
import { log } from '../logger.js';
import type { ByteRange, Fetcher, MultiFetcher } from '../types.js';

export interface MMapCacheOptions {
  /**
   * Path of the backing file. Created (or truncated) on first use unless
   * `blocks` says it already holds data.
   */
  location?: string;
  /** Batch fetcher used to request every missing range in one call. */
  multiFetcher?: MultiFetcher;
  /** Block indices already present in the file at `location`. */
  blocks?: Iterable<number>;
}

/**
 * JSON-serialisable durable state of an {@link MMapCache}.
 */
export interface MMapSnapshot {
  /** Backing-file path, or `null` if the cache never touched disk. */
  location: string | null;
  size: number;
  blocksize: number;
  /** Sorted indices of the blocks present in the backing file. */
  blocks: number[];
}

/**
 * Group sorted block indices into maximal runs of consecutive blocks and
 * express each run as a byte range clamped to `size`.
 */
export function coalesceBlocks(blocks: ReadonlyArray<number>, blocksize: number, size: number): ByteRange[] {
  const ranges: ByteRange[] = [];
  let runStart = -1;
  let runEnd = -1;
  for (const n of blocks) {
    if (runStart >= 0 && n === runEnd + 1) {
      runEnd = n;
      continue;
    }
    if (runStart >= 0) {
      ranges.push({ start: runStart * blocksize, end: Math.min((runEnd + 1) * blocksize, size) });
    }
    runStart = n;
    runEnd = n;
  }
  if (runStart >= 0) {
    ranges.push({ start: runStart * blocksize, end: Math.min((runEnd + 1) * blocksize, size) });
  }
  return ranges;
}

export class MMapCache extends BaseCache {
  readonly name: CacheType = 'mmap';

  private readonly blocks: Set<number>;
  private readonly multiFetcher: MultiFetcher | null;
  private location: string | null;
  private tempDir: string | null = null;
  private handle: FileHandle | null = null;
  private handlePromise: Promise<FileHandle> | null = null;

  constructor(blocksize: number, fetcher: Fetcher, size: number, options?: MMapCacheOptions) {
    super(blocksize, fetcher, size);
    if (!Number.isInteger(blocksize) || blocksize <= 0) {
      throw new InvalidRangeError(`Block size must be a positive integer, got ${blocksize}`);
    }
    this.nblocks = Math.ceil(size / blocksize);
    this.location = options?.location ?? null;
    this.multiFetcher = options?.multiFetcher ?? null;
    this.blocks = new Set(options?.blocks ?? []);
  }

  /**
   * Rebuild a cache from a {@link MMapSnapshot}. The backing file must
   * still exist.
   */
  static restore(
    snapshot: MMapSnapshot,
    fetcher: Fetcher,
    options?: Pick<MMapCacheOptions, 'multiFetcher'>,
  ): MMapCache {
    return new MMapCache(snapshot.blocksize, fetcher, snapshot.size, {
      location: snapshot.location ?? undefined,
      multiFetcher: options?.multiFetcher,
      blocks: snapshot.location ? snapshot.blocks : [],
    });
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    const startBlock = Math.floor(start / this.blocksize);
    const endBlock = Math.floor((end - 1) / this.blocksize);

    const missing: number[] = [];
    for (let n = startBlock; n <= endBlock; n++) {
      if (!this.blocks.has(n)) missing.push(n);
    }

    const handle = await this.getHandle();
    if (missing.length === 0) {
      this.hits++;
    } else {
      const ranges = coalesceBlocks(missing, this.blocksize, this.size);
      const chunks = await this.fetchRanges(ranges);
      for (let i = 0; i < ranges.length; i++) {
        const range = ranges[i];
        const data = chunks[i];
        await handle.write(data, 0, data.length, range.start);
        const first = range.start / this.blocksize;
        const last = Math.ceil(range.end / this.blocksize);
        for (let n = first; n < last; n++) this.blocks.add(n);
      }
    }

    const buf = Buffer.alloc(end - start);
    const { bytesRead } = await handle.read(buf, 0, end - start, start);
    return new Uint8Array(buf.buffer, buf.byteOffset, bytesRead);
  }

  /**
   * Request every range, in one batch call when possible.
   */
  private async fetchRanges(ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    if (this.multiFetcher) {
      this.misses++;
      this.totalRequestedBytes += ranges.reduce((sum, r) => sum + r.end - r.start, 0);
      log('debug', 'cache_fetch', { cache: this.name, ranges: ranges.length });
      return this.multiFetcher(ranges);
    }
    const chunks: Uint8Array[] = [];
    for (const range of ranges) {
      chunks.push(await this.fetchRange(range.start, range.end));
    }
    return chunks;
  }

  /**
   * Capture the durable state. Take it before {@link MMapCache.close} when
   * the backing file is temporary, since closing removes it.
   */
  snapshot(): MMapSnapshot {
    return {
      location: this.location,
      size: this.size,
      blocksize: this.blocksize,
      blocks: [...this.blocks].sort((a, b) => a - b),
    };
  }

  /** Whether block `n` is present in the backing file. */
  hasBlock(n: number): boolean {
    return this.blocks.has(n);
  }

  /**
   * Close the backing file, and delete it if it was temporary.
   */
  async close(): Promise<void> {
    const pending = this.handlePromise;
    this.handlePromise = null;
    const handle = this.handle ?? (pending ? await pending : null);
    this.handle = null;
    if (handle) await handle.close();
    if (this.tempDir) {
      await rm(this.tempDir, { recursive: true, force: true });
      this.tempDir = null;
      this.location = null;
      this.blocks.clear();
    }
  }

  // ─── Backing file ──────────────────────────────────────────────────────

  /**
   * Open the backing file on first use. Concurrent callers share one open.
   */
  private getHandle(): Promise<FileHandle> {
    if (this.handle) return Promise.resolve(this.handle);
    if (!this.handlePromise) {
      this.handlePromise = this.openHandle();
    }
    return this.handlePromise;
  }

  private async openHandle(): Promise<FileHandle> {
    try {
      let location = this.location;
      if (location === null) {
        this.tempDir = await mkdtemp(join(tmpdir(), 'rangefs-mmap-'));
        location = join(this.tempDir, 'cache');
        this.location = location;
      }
      const reuse = this.blocks.size > 0;
      const handle = await open(location, reuse ? 'r+' : 'w+');
      if (!reuse) await handle.truncate(this.size);
      this.handle = handle;
      return handle;
    } catch (err) {
      this.handlePromise = null; // allow retry on failure
      throw err;
    }
  }
}
