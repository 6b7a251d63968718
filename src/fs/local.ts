/**
 * @module fs/local
 *
 * Local disk filesystem (`file://`).
 *
 * Reads go through Node.js `FileHandle`s kept in an LRU pool, which bounds
 * the number of open descriptors while letting repeated opens of the same
 * file reuse one handle. Reads within a single
 * {@link LocalFileSystem.readRanges} call run in parallel.
 *
 * Writes go to a temporary sibling of the target (`.<name>.<uuid>.tmp`);
 * committing renames it over the target, discarding deletes it. Append
 * mode seeds the temporary file with the current content.
 */

import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, open, readdir, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { AbstractFileSystem } from './filesystem.js';
import type { FileSystemOptions, ResolvedFileOptions } from '../config.js';
import { FileNotFoundError } from '../errors.js';
import { BufferedFile } from '../file/buffered.js';
import type { ByteRange, DirEntry, FileInfo, OpenMode } from '../types.js';

/**
 * Maximum number of bytes per individual `FileHandle.read()` call.
 *
 * Node's `fs.read` binding requires `length` to fit in an Int32. Larger
 * ranges are split into sequential chunks and reassembled.
 */
const MAX_READ_CHUNK = 1024 * 1024 * 1024; // 1 GiB

export interface LocalFileSystemOptions extends FileSystemOptions {
  /**
   * Maximum number of read handles kept open in the LRU pool.
   *
   * @defaultValue 64
   */
  maxOpenFiles?: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** A pooled read handle and the number of reads currently using it. */
interface PooledHandle {
  readonly handle: Promise<FileHandle>;
  active: number;
  evicted: boolean;
}

async function closePooled(entry: PooledHandle): Promise<void> {
  const handle = await entry.handle;
  await handle.close();
}

async function readChunked(handle: FileHandle, start: number, length: number): Promise<Uint8Array> {
  const buf = Buffer.alloc(Math.max(0, length));

  if (length <= MAX_READ_CHUNK) {
    const { bytesRead } = await handle.read(buf, 0, buf.length, start);
    return new Uint8Array(buf.buffer, buf.byteOffset, bytesRead);
  }

  let totalRead = 0;
  let remaining = length;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_READ_CHUNK);
    const { bytesRead } = await handle.read(buf, totalRead, chunk, start + totalRead);
    totalRead += bytesRead;
    if (bytesRead < chunk) break; // EOF
    remaining -= bytesRead;
  }

  return new Uint8Array(buf.buffer, buf.byteOffset, totalRead);
}

export class LocalFileSystem extends AbstractFileSystem {
  private readonly maxOpenFiles: number;
  /** LRU pool: Map preserves insertion order; most recently used is moved to end */
  private readonly handles = new Map<string, PooledHandle>();

  constructor(options?: LocalFileSystemOptions, env?: Readonly<Record<string, string | undefined>>) {
    super('file', options, env);
    this.maxOpenFiles = options?.maxOpenFiles ?? 64;
  }

  /** Strip the protocol and resolve to an absolute path. */
  stripProtocol(path: string): string {
    return resolve(super.stripProtocol(path));
  }

  async info(path: string): Promise<FileInfo> {
    const target = this.stripProtocol(path);
    try {
      const st = await stat(target);
      return {
        name: target,
        size: st.isDirectory() ? 0 : st.size,
        type: st.isDirectory() ? 'directory' : 'file',
        mtime: st.mtimeMs,
      };
    } catch (err) {
      if (isNotFound(err)) throw new FileNotFoundError(target);
      throw err;
    }
  }

  async rm(path: string): Promise<void> {
    const target = this.stripProtocol(path);
    await this.release(target);
    try {
      await rm(target, { recursive: true });
    } catch (err) {
      if (isNotFound(err)) throw new FileNotFoundError(target);
      throw err;
    }
    this.invalidateCache(this.parent(target));
  }

  protected async listDirectory(path: string): Promise<DirEntry[]> {
    const details = await this.info(path);
    if (details.type === 'file') return [details];
    const names = (await readdir(path)).sort();
    return Promise.all(names.map(name => this.info(join(path, name))));
  }

  protected createFile(
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ): BufferedFile {
    return new LocalFile(this, path, mode, options, details);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  /**
   * Read `[start, end)` from a local file. The result is shorter than
   * requested when the file ends first.
   */
  readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    return this.withHandle(path, handle => readChunked(handle, start, end - start));
  }

  /** Read several ranges of the same file in parallel. */
  async readRanges(path: string, ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    return Promise.all(ranges.map(({ start, end }) => this.readRange(path, start, end)));
  }

  /**
   * Close every pooled handle. The filesystem can still be used; handles
   * are reopened on demand. Handles still serving a read close when it
   * finishes.
   */
  async close(): Promise<void> {
    const entries = [...this.handles.values()];
    this.handles.clear();
    await Promise.all(entries.map(entry => this.retire(entry)));
  }

  /** Drop the pooled handle for `path`, if any. */
  async release(path: string): Promise<void> {
    const entry = this.handles.get(path);
    if (!entry) return;
    this.handles.delete(path);
    await this.retire(entry);
  }

  /** Number of handles currently pooled. */
  get openHandles(): number {
    return this.handles.size;
  }

  // ─── Handle pool ───────────────────────────────────────────────────────

  /**
   * Run `fn` with the pooled handle for `path`. Concurrent callers share
   * one pending open.
   */
  private async withHandle<T>(path: string, fn: (handle: FileHandle) => Promise<T>): Promise<T> {
    const { entry, retired } = this.acquire(path);
    try {
      await Promise.all(retired.map(closePooled));
      return await fn(await entry.handle);
    } finally {
      entry.active--;
      if (entry.evicted && entry.active === 0) await closePooled(entry);
    }
  }

  /**
   * Take a reference on the pooled entry for `path`, opening it if needed.
   * Returns the idle entries evicted to make room; entries still in use
   * close when their last read finishes.
   */
  private acquire(path: string): { entry: PooledHandle; retired: PooledHandle[] } {
    const existing = this.handles.get(path);
    if (existing) {
      // Move to end (most recently used)
      this.handles.delete(path);
      this.handles.set(path, existing);
      existing.active++;
      return { entry: existing, retired: [] };
    }

    const handle = open(path, 'r').catch((err: unknown) => {
      if (this.handles.get(path) === entry) this.handles.delete(path);
      throw isNotFound(err) ? new FileNotFoundError(path) : err;
    });
    const entry: PooledHandle = { handle, active: 1, evicted: false };
    this.handles.set(path, entry);

    // Evict LRU if over capacity
    const retired: PooledHandle[] = [];
    while (this.handles.size > this.maxOpenFiles) {
      const oldest = this.handles.entries().next();
      if (oldest.done) break;
      const [oldestPath, oldestEntry] = oldest.value;
      this.handles.delete(oldestPath);
      oldestEntry.evicted = true;
      if (oldestEntry.active === 0) retired.push(oldestEntry);
    }
    return { entry, retired };
  }

  /** Close an entry now if idle, otherwise once its last read finishes. */
  private async retire(entry: PooledHandle): Promise<void> {
    entry.evicted = true;
    if (entry.active === 0) await closePooled(entry);
  }
}

/**
 * Buffered file over a local path.
 */
export class LocalFile extends BufferedFile {
  private readonly local: LocalFileSystem;
  private tempPath: string | null = null;
  private writer: FileHandle | null = null;

  constructor(
    fs: LocalFileSystem,
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ) {
    super(fs, path, mode, options, details);
    this.local = fs;
  }

  protected fetchRange(start: number, end: number): Promise<Uint8Array> {
    return this.local.readRange(this.path, start, end);
  }

  protected fetchRanges(ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    return this.local.readRanges(this.path, ranges);
  }

  protected async initiateUpload(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const temp = join(dirname(this.path), `.${basename(this.path)}.${randomUUID()}.tmp`);
    if (this.mode === 'ab' && this.details) {
      await copyFile(this.path, temp);
      this.writer = await open(temp, 'a');
    } else {
      this.writer = await open(temp, 'w');
    }
    this.tempPath = temp;
  }

  protected async uploadChunk(final: boolean): Promise<boolean> {
    const writer = this.writer;
    if (!writer) return false;
    const data = this.pendingBytes();
    if (data.length > 0) await writer.write(data);
    if (final) await this.closeWriter();
    return true;
  }

  protected async commitUpload(): Promise<void> {
    await this.closeWriter();
    if (this.tempPath === null) return;
    await this.local.release(this.path);
    await rename(this.tempPath, this.path);
    this.tempPath = null;
  }

  protected async discardUpload(): Promise<void> {
    await this.closeWriter();
    if (this.tempPath === null) return;
    await rm(this.tempPath, { force: true });
    this.tempPath = null;
  }

  private async closeWriter(): Promise<void> {
    const writer = this.writer;
    this.writer = null;
    if (writer) await writer.close();
  }
}
