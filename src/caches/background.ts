/**
 * @module caches/background
 *
 * LRU block strategy with background read-ahead (`background`).
 *
 * Behaves like {@link BlockCache}, and additionally starts fetching the
 * block following the last one read as soon as a read completes, without
 * awaiting it. A sequential reader that reaches that block awaits the
 * in-flight request instead of issuing a new one. At most one prefetch is
 * pending; starting a new one drops the reference to the previous one.
 *
 * A failed prefetch is logged at `debug` level and its error surfaces only
 * if the block is actually read.
 */

import { BlockCache } from './block.js';
import type { CacheType } from './cache.js';
import { formatError, log } from '../logger.js';

export class BackgroundBlockCache extends BlockCache {
  readonly name: CacheType = 'background';

  private pending: { block: number; promise: Promise<Uint8Array> } | null = null;

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    const out = await super.fetchWithin(start, end);
    this.prefetch(Math.floor((end - 1) / this.blocksize) + 1);
    return out;
  }

  protected async getBlock(n: number): Promise<Uint8Array> {
    if (this.pending && this.pending.block === n && !this.blocks.has(n)) {
      const { promise } = this.pending;
      this.pending = null;
      const data = await promise;
      this.blocks.set(n, data);
      return data;
    }
    return super.getBlock(n);
  }

  private prefetch(n: number): void {
    if (n >= this.nblocks || this.blocks.has(n)) return;
    if (this.pending && this.pending.block === n) return;

    const promise = this.fetchBlock(n);
    void promise.catch((err: unknown) => {
      log('debug', 'prefetch_failed', { cache: this.name, block: n, error: formatError(err) });
    });
    this.pending = { block: n, promise };
  }

  /** Block index currently being prefetched, if any. */
  get pendingBlock(): number | null {
    return this.pending ? this.pending.block : null;
  }

  async close(): Promise<void> {
    this.pending = null;
    await super.close();
  }
}
