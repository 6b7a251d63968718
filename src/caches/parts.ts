/**
 * @module caches/parts
 *
 * Known-parts strategy (`parts`).
 *
 * Used when the caller knows in advance exactly which sparse byte ranges of
 * a file it will need (the footer and a few column chunks of a columnar
 * file, say) and has already fetched them. The parts are sorted and
 * adjacent parts (`end_i === start_{i+1}`) merged into one at construction,
 * so a read spanning what were originally separate fetches is answered by a
 * single slice.
 *
 * A read that starts inside a known part but runs past its end is handled
 * according to `strict`:
 *
 * - `strict: true` (default): the missing tail is requested from the
 *   fetcher. This is logged at `warn` level, because it usually means the
 *   caller computed its ranges wrongly. Without a fetcher the read fails
 *   with {@link InvalidRangeError}.
 * - `strict: false`: the tail is zero-padded.
 *
 * A read that starts outside every known part always goes to the fetcher
 * (or fails without one).
 */

import { BaseCache, type CacheType } from './cache.js';
import { concatBytes } from '../bytes.js';
import { InvalidRangeError } from '../errors.js';
import { log } from '../logger.js';
import type { Fetcher } from '../types.js';

/**
 * One pre-fetched byte range.
 */
export interface KnownPart {
  /** First file offset covered by `data`. */
  start: number;
  /** End file offset (exclusive). */
  end: number;
  /** The bytes of `[start, end)`. */
  data: Uint8Array;
}

export interface KnownPartsOptions {
  /** The known ranges. Order does not matter. */
  parts?: ReadonlyArray<KnownPart>;
  /**
   * Fetch (`true`) or zero-pad (`false`) reads running past a known part.
   *
   * @defaultValue true
   */
  strict?: boolean;
}

const rejectOutsideParts: Fetcher = async (start, end) => {
  throw new InvalidRangeError(`Read is outside the known file parts: [${start}, ${end})`);
};

/**
 * Sort parts by offset and merge contiguous neighbours.
 */
export function mergeParts(parts: ReadonlyArray<KnownPart>): KnownPart[] {
  const sorted = [...parts].sort((a, b) => a.start - b.start);
  const merged: KnownPart[] = [];
  let run: { start: number; end: number; chunks: Uint8Array[] } | null = null;

  for (const part of sorted) {
    if (run && part.start === run.end) {
      run.end = part.end;
      run.chunks.push(part.data);
      continue;
    }
    if (run) merged.push({ start: run.start, end: run.end, data: concatBytes(run.chunks) });
    run = { start: part.start, end: part.end, chunks: [part.data] };
  }
  if (run) merged.push({ start: run.start, end: run.end, data: concatBytes(run.chunks) });
  return merged;
}

export class KnownPartsCache extends BaseCache {
  readonly name: CacheType = 'parts';

  readonly parts: ReadonlyArray<KnownPart>;
  private readonly strict: boolean;
  private readonly canFetch: boolean;

  /**
   * @param fetcher - Fallback for reads outside the known parts, or `null`
   *   to make such reads fail.
   */
  constructor(blocksize: number, fetcher: Fetcher | null, size: number, options?: KnownPartsOptions) {
    super(blocksize, fetcher ?? rejectOutsideParts, size);
    this.canFetch = fetcher !== null;
    this.strict = options?.strict ?? true;
    this.parts = mergeParts(options?.parts ?? []);
    this.nblocks = this.parts.length;
  }

  protected async fetchWithin(start: number, end: number): Promise<Uint8Array> {
    let head: Uint8Array | null = null;

    for (const part of this.parts) {
      if (start < part.start || start >= part.end) continue;

      const offset = start - part.start;
      const out = part.data.slice(offset, offset + end - start);
      if (!this.strict || end <= part.end) {
        this.hits++;
        if (out.length === end - start) return out;
        const padded = new Uint8Array(end - start);
        padded.set(out);
        return padded;
      }
      head = out;
      start = part.end;
      break;
    }

    if (this.canFetch) {
      log('warn', 'parts_fallback', { start, end });
    }
    const rest = await this.fetchRange(start, end);
    return head ? concatBytes([head, rest]) : rest;
  }
}
