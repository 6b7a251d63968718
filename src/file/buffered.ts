/**
 * @module file/buffered
 *
 * Buffered random-access file over a byte-range backend.
 *
 * A {@link BufferedFile} is what a filesystem's `open()` returns. It is
 * single-consumer: await each operation before starting the next.
 *
 * ## Read mode (`rb`)
 *
 * The file keeps a cursor (`loc`) and delegates every read to one cache
 * strategy built by {@link createCache} from the resolved `cacheType`,
 * `blockSize` and `cacheOptions`. The strategy calls back into
 * {@link BufferedFile.fetchRange} (and {@link BufferedFile.fetchRanges} for
 * batched reads) whenever it needs bytes it does not hold.
 *
 * ## Write modes (`wb`, `ab`)
 *
 * Written bytes accumulate in memory. Once `blockSize` bytes are pending
 * they are handed to the backend through {@link BufferedFile.uploadChunk};
 * the first hand-off is preceded by {@link BufferedFile.initiateUpload}.
 * Closing forces a final chunk and, with `autocommit`, publishes the file.
 *
 * ```
 * idle ──flush──▶ uploading ──commit──▶ committed
 *                     │
 *                     └────discard───▶ discarded
 * ```
 *
 * Backends subclass this and implement the hooks; errors raised by the
 * hooks propagate unchanged.
 */

import { createHash, randomUUID } from 'node:crypto';
import { EMPTY, concatBytes, indexOfBytes } from '../bytes.js';
import { createCache, type BaseCache } from '../caches/index.js';
import { resolveFileOptions, type FileOptions } from '../config.js';
import {
  ClosedFileError,
  FileNotFoundError,
  InvalidRangeError,
  UnsupportedOperationError,
  UploadStateError,
} from '../errors.js';
import { log } from '../logger.js';
import type { AbstractFileSystem } from '../fs/filesystem.js';
import type {
  ByteRange,
  FileInfo,
  OpenMode,
  Readable,
  Seekable,
  SeekWhence,
  Sized,
  Writable,
} from '../types.js';

/** Line delimiter used by {@link BufferedFile.readline}. */
const NEWLINE = new Uint8Array([0x0a]);

export type UploadState = 'idle' | 'uploading' | 'committed' | 'discarded';

export abstract class BufferedFile
  implements Readable, Writable, Seekable, Sized, AsyncIterable<Uint8Array>
{
  readonly path: string;
  readonly mode: OpenMode;
  readonly blocksize: number;
  readonly autocommit: boolean;
  /** Backend metadata (read and append modes). */
  readonly details: FileInfo | null;
  /** File length in read mode, existing length in append mode, else 0. */
  readonly size: number;

  /** Read-mode cache strategy; released on close. */
  cache: BaseCache | null = null;

  loc = 0;
  closed = false;
  /** Whether the final chunk has been handed over. */
  forced = false;
  /** Bytes already handed to the backend; `null` before the first upload. */
  offset: number | null = null;

  protected readonly fs: AbstractFileSystem;
  protected buffer: Uint8Array[] = [];
  protected bufferLength = 0;

  private state: UploadState = 'idle';
  private readonly writeToken: string | null;

  /**
   * @param fs - Owning filesystem; its listing cache is invalidated on close.
   * @param path - Backend path of the file.
   * @param mode - Open mode.
   * @param options - File options, resolved against the built-in defaults.
   * @param details - Backend metadata; required in read mode.
   * @throws {FileNotFoundError} In read mode without `details`.
   */
  constructor(
    fs: AbstractFileSystem,
    path: string,
    mode: OpenMode = 'rb',
    options: FileOptions = {},
    details: FileInfo | null = null,
  ) {
    const resolved = resolveFileOptions(options);
    this.fs = fs;
    this.path = path;
    this.mode = mode;
    this.blocksize = resolved.blockSize;
    this.autocommit = resolved.autocommit;
    this.details = details;

    if (mode === 'rb') {
      if (!details) throw new FileNotFoundError(path);
      this.size = details.size;
      this.writeToken = null;
      this.cache = createCache(
        resolved.cacheType,
        this.blocksize,
        (start, end) => this.fetchRange(start, end),
        this.size,
        { multiFetcher: ranges => this.fetchRanges(ranges), ...resolved.cacheOptions },
      );
    } else {
      this.size = mode === 'ab' && details ? details.size : 0;
      this.loc = this.size;
      this.writeToken = randomUUID();
    }

    log('debug', 'file_open', { path, mode, cacheType: this.cache?.name ?? null });
  }

  // ─── Backend hooks ─────────────────────────────────────────────────────

  /**
   * Return the bytes in `[start, end)` from the backend. May return fewer
   * bytes at end of file.
   */
  protected abstract fetchRange(start: number, end: number): Promise<Uint8Array>;

  /**
   * Return several ranges in one call. Backends that can batch or
   * parallelise override this; the default requests them one by one.
   */
  protected async fetchRanges(ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    const out: Uint8Array[] = [];
    for (const { start, end } of ranges) {
      out.push(await this.fetchRange(start, end));
    }
    return out;
  }

  /** Prepare the backend to receive chunks. */
  protected async initiateUpload(): Promise<void> {
    // Nothing to prepare by default.
  }

  /**
   * Hand the pending bytes ({@link BufferedFile.pendingBytes}) to the
   * backend. Returning `false` keeps them buffered for the next flush.
   *
   * @param final - Whether this is the last chunk.
   */
  protected abstract uploadChunk(final: boolean): Promise<boolean>;

  /** Publish the uploaded data at `path`. */
  protected async commitUpload(): Promise<void> {
    // Backends that publish on the final chunk need nothing here.
  }

  /** Drop any uploaded-but-unpublished data. */
  protected async discardUpload(): Promise<void> {
    // Nothing staged by default.
  }

  /** The bytes written since the last successful upload. */
  protected pendingBytes(): Uint8Array {
    return concatBytes(this.buffer);
  }

  // ─── Cursor ────────────────────────────────────────────────────────────

  /**
   * Move the cursor.
   *
   * @returns The new location.
   * @throws {UnsupportedOperationError} Outside read mode.
   * @throws {InvalidRangeError} If the result would be negative.
   */
  seek(loc: number, whence: SeekWhence = 'start'): number {
    if (this.closed) throw new ClosedFileError(this.path);
    if (this.mode !== 'rb') {
      throw new UnsupportedOperationError('Seek only available in read mode');
    }

    const nloc = whence === 'current' ? this.loc + loc : whence === 'end' ? this.size + loc : loc;
    if (!Number.isInteger(nloc) || nloc < 0) {
      throw new InvalidRangeError(`Seek before start of file: ${nloc}`);
    }
    this.loc = nloc;
    return this.loc;
  }

  tell(): number {
    return this.loc;
  }

  // ─── Reading ───────────────────────────────────────────────────────────

  /**
   * Read up to `length` bytes from the cursor and advance it.
   *
   * @param length - Byte count; negative reads to end of file.
   */
  async read(length = -1): Promise<Uint8Array> {
    const cache = this.readCache();
    const n = length < 0 ? Math.max(0, this.size - this.loc) : length;
    if (n === 0) return EMPTY;

    const out = await cache.fetch(this.loc, this.loc + n);
    this.loc += out.length;
    return out;
  }

  /**
   * Read until `delimiter` (included in the result) or end of file. The
   * cursor ends right after the delimiter.
   *
   * @param chunkSize - Bytes read per step. @defaultValue blocksize
   */
  async readuntil(delimiter: Uint8Array = NEWLINE, chunkSize = this.blocksize): Promise<Uint8Array> {
    if (delimiter.length === 0) {
      throw new UnsupportedOperationError('Delimiter must not be empty');
    }
    const begin = this.loc;
    const chunks: Uint8Array[] = [];
    let consumed = 0;
    // Trailing bytes of the previous chunk, so a delimiter may straddle chunks.
    let carry = EMPTY;

    for (;;) {
      const part = await this.read(chunkSize);
      if (part.length === 0) break;

      const window = carry.length > 0 ? concatBytes([carry, part]) : part;
      const found = indexOfBytes(window, delimiter);
      if (found >= 0) {
        const end = consumed - carry.length + found + delimiter.length;
        chunks.push(part);
        this.loc = begin + end;
        return concatBytes(chunks).slice(0, end);
      }

      chunks.push(part);
      consumed += part.length;
      carry = window.slice(Math.max(0, window.length - (delimiter.length - 1)));
    }

    return concatBytes(chunks);
  }

  /** Read one line, newline included. Empty at end of file. */
  readline(): Promise<Uint8Array> {
    return this.readuntil(NEWLINE);
  }

  /** Read every remaining line. */
  async readlines(): Promise<Uint8Array[]> {
    const lines: Uint8Array[] = [];
    for await (const line of this) lines.push(line);
    return lines;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (;;) {
      const line = await this.readline();
      if (line.length === 0) return;
      yield line;
    }
  }

  // ─── Writing ───────────────────────────────────────────────────────────

  /**
   * Buffer `data`, flushing once `blocksize` bytes are pending.
   *
   * @returns The number of bytes accepted.
   * @throws {UploadStateError} After a forced flush.
   */
  async write(data: Uint8Array): Promise<number> {
    if (this.closed) throw new ClosedFileError(this.path);
    if (this.mode === 'rb') throw new UnsupportedOperationError('File not in write mode');
    if (this.forced) throw new UploadStateError('This file has been force-flushed, can only close');

    this.buffer.push(data);
    this.bufferLength += data.length;
    this.loc += data.length;
    if (this.bufferLength >= this.blocksize) await this.flush();
    return data.length;
  }

  /**
   * Upload the pending bytes if at least `blocksize` of them are buffered,
   * or unconditionally with `force`. A forced flush is the final one.
   */
  async flush(force = false): Promise<void> {
    if (this.closed) throw new ClosedFileError(this.path);
    if (this.mode === 'rb') return;
    if (this.forced) throw new UploadStateError('Force flush cannot be called more than once');
    if (force) this.forced = true;
    if (!force && this.bufferLength < this.blocksize) return;

    if (this.offset === null) {
      this.offset = 0;
      try {
        await this.initiateUpload();
      } catch (err) {
        this.closed = true;
        throw err;
      }
      this.state = 'uploading';
      log('debug', 'upload_start', { path: this.path, mode: this.mode });
    }

    const length = this.bufferLength;
    if ((await this.uploadChunk(force)) !== false) {
      this.offset = (this.offset ?? 0) + length;
      this.buffer = [];
      this.bufferLength = 0;
    }
    log('debug', 'upload_chunk', { path: this.path, bytes: length, final: force });
  }

  /** Publish a pending upload. */
  async commit(): Promise<void> {
    if (this.state !== 'uploading') {
      throw new UploadStateError(`Cannot commit ${this.path}: upload is ${this.state}`);
    }
    await this.commitUpload();
    this.state = 'committed';
    log('info', 'upload_commit', { path: this.path, bytes: this.offset });
  }

  /** Throw away a pending upload. */
  async discard(): Promise<void> {
    if (this.state !== 'uploading') {
      throw new UploadStateError(`Cannot discard ${this.path}: upload is ${this.state}`);
    }
    await this.discardUpload();
    this.state = 'discarded';
    log('info', 'upload_discard', { path: this.path });
  }

  get uploadState(): UploadState {
    return this.state;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Drop the strategy and its buffered bytes (read mode) or finish the
   * upload (write modes).
   * A second call is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    try {
      if (this.mode === 'rb') {
        const cache = this.cache;
        this.cache = null;
        if (cache) {
          log('info', 'cache_stats', { path: this.path, ...cache.stats() });
          await cache.close();
        }
      } else {
        if (!this.forced) await this.flush(true);
        if (this.autocommit) await this.commit();
      }
    } finally {
      this.fs.dircache.delete(this.path);
      this.fs.dircache.delete(this.fs.parent(this.path));
      this.closed = true;
    }
    log('debug', 'file_close', { path: this.path, mode: this.mode });
  }

  isReadable(): boolean {
    return this.mode === 'rb';
  }

  isWritable(): boolean {
    return this.mode !== 'rb';
  }

  isSeekable(): boolean {
    return this.mode === 'rb';
  }

  // ─── Identity ──────────────────────────────────────────────────────────

  /**
   * Deterministic identity. Read-mode files over identical metadata share a
   * token; every write-mode file has its own.
   */
  token(): string {
    if (this.writeToken !== null) return this.writeToken;
    const details: FileInfo = this.details ?? { name: this.path, size: this.size, type: 'file' };
    const canonical = Object.keys(details)
      .sort()
      .map(key => [key, details[key]]);
    return createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
  }

  equals(other: BufferedFile): boolean {
    if (this === other) return true;
    return this.mode === 'rb' && other.mode === 'rb' && this.token() === other.token();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private readCache(): BaseCache {
    if (this.closed) throw new ClosedFileError(this.path);
    if (!this.cache) throw new UnsupportedOperationError('File not in read mode');
    return this.cache;
  }
}
