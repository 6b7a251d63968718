/**
 * @module fs/filesystem
 *
 * Base class of the filesystems.
 *
 * A filesystem turns paths into {@link BufferedFile}s and answers a few
 * whole-file conveniences on top of them (`cat`, `head`, `tail`, `pipe`,
 * `readBlock`). Backends implement four hooks:
 *
 * - `info(path)`: metadata, or {@link FileNotFoundError}
 * - `listDirectory(path)`: the uncached listing behind {@link AbstractFileSystem.ls}
 * - `rm(path)`: delete a file
 * - `createFile(path, mode, options, details)`: build the backend's file
 *
 * Settings come from the constructor options, then from the
 * `RANGEFS_<PROTOCOL>_<KEY>` environment variables for the backend's
 * protocol; see {@link applyEnvConfig}.
 *
 * Listings are kept in a {@link DirCache}. Closing a file drops the
 * listings of its path and its parent.
 */

import { DirCache } from '../dircache.js';
import {
  applyEnvConfig,
  resolveFileOptions,
  type FileOptions,
  type FileSystemOptions,
  type ResolvedFileOptions,
} from '../config.js';
import { FileNotFoundError, UnsupportedOperationError } from '../errors.js';
import { readDelimitedBlock } from '../file/delimiter.js';
import type { BufferedFile } from '../file/buffered.js';
import type { DirEntry, FileInfo, OpenMode } from '../types.js';

const OPEN_MODES: ReadonlyArray<OpenMode> = ['rb', 'wb', 'ab'];

export function isOpenMode(mode: string): mode is OpenMode {
  return OPEN_MODES.some(m => m === mode);
}

export interface LsOptions {
  /** Bypass the listing cache. */
  refresh?: boolean;
}

export abstract class AbstractFileSystem {
  readonly protocol: string;
  /** Constructor options completed from the environment. */
  readonly options: FileSystemOptions;
  readonly dircache: DirCache;

  /**
   * @param protocol - Name used for `<protocol>://` paths and for the
   *   environment variable prefix.
   * @param options - Filesystem-level defaults.
   * @param env - Environment to read defaults from.
   */
  constructor(
    protocol: string,
    options?: FileSystemOptions,
    env: Readonly<Record<string, string | undefined>> = process.env,
  ) {
    this.protocol = protocol;
    this.options = applyEnvConfig(protocol, options, env);
    this.dircache = new DirCache({
      useListingsCache: this.options.useListingsCache,
      listingsExpiryMs: this.options.listingsExpiryMs,
      maxPaths: this.options.maxPaths,
    });
  }

  // ─── Backend hooks ─────────────────────────────────────────────────────

  /**
   * @throws {FileNotFoundError} If nothing exists at `path`.
   */
  abstract info(path: string): Promise<FileInfo>;

  /** Delete the file at `path`. */
  abstract rm(path: string): Promise<void>;

  protected abstract listDirectory(path: string): Promise<DirEntry[]>;

  protected abstract createFile(
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ): BufferedFile;

  /** Release backend resources. */
  async close(): Promise<void> {
    // Nothing held by default.
  }

  // ─── Paths ─────────────────────────────────────────────────────────────

  /** Remove a leading `<protocol>://` from `path`. */
  stripProtocol(path: string): string {
    const prefix = `${this.protocol}://`;
    return path.startsWith(prefix) ? path.slice(prefix.length) : path;
  }

  /**
   * The directory containing `path`.
   *
   * @example
   * ```typescript
   * fs.parent('/data/parts/0.bin'); // → '/data/parts'
   * fs.parent('/data');             // → '/'
   * ```
   */
  parent(path: string): string {
    const trimmed = this.stripProtocol(path).replace(/\/+$/, '');
    const i = trimmed.lastIndexOf('/');
    if (i < 0) return '';
    if (i === 0) return '/';
    return trimmed.slice(0, i);
  }

  // ─── Files ─────────────────────────────────────────────────────────────

  /**
   * Open a buffered file.
   *
   * @param mode - `rb`, `wb` or `ab`.
   * @param options - Per-file overrides of the filesystem defaults.
   * @throws {UnsupportedOperationError} For any other mode.
   * @throws {FileNotFoundError} In read mode, if the file does not exist.
   */
  async open(path: string, mode: string = 'rb', options?: FileOptions): Promise<BufferedFile> {
    if (!isOpenMode(mode)) {
      throw new UnsupportedOperationError(`Invalid mode: ${mode}`);
    }
    const target = this.stripProtocol(path);

    let details: FileInfo | null = null;
    if (mode === 'rb') {
      details = await this.info(target);
    } else if (mode === 'ab') {
      details = await this.infoOrNull(target);
    }

    return this.createFile(target, mode, resolveFileOptions(options, this.options), details);
  }

  async exists(path: string): Promise<boolean> {
    return (await this.infoOrNull(this.stripProtocol(path))) !== null;
  }

  /**
   * Contents of a file, optionally limited to `[start, end)`. Negative
   * offsets count from the end.
   */
  async cat(path: string, start?: number, end?: number): Promise<Uint8Array> {
    return this.withFile(path, async file => {
      if (start !== undefined) {
        file.seek(start >= 0 ? start : Math.max(0, file.size + start));
      }
      if (end === undefined) return file.read();
      const stop = end >= 0 ? end : file.size + end;
      return file.read(Math.max(0, stop - file.tell()));
    });
  }

  /** First `size` bytes of a file. */
  head(path: string, size = 1024): Promise<Uint8Array> {
    return this.withFile(path, file => file.read(size));
  }

  /** Last `size` bytes of a file. */
  tail(path: string, size = 1024): Promise<Uint8Array> {
    return this.withFile(path, file => {
      file.seek(-Math.min(size, file.size), 'end');
      return file.read();
    });
  }

  /** Write `data` as the whole content of `path`. */
  async pipe(path: string, data: Uint8Array): Promise<void> {
    const file = await this.open(path, 'wb');
    try {
      await file.write(data);
    } finally {
      await file.close();
    }
  }

  /** Create an empty file. */
  touch(path: string): Promise<void> {
    return this.pipe(path, new Uint8Array(0));
  }

  /**
   * Read `length` bytes (or to end of file when `null`) starting at
   * `offset`, aligned to `delimiter` boundaries when one is given.
   */
  readBlock(
    path: string,
    offset: number,
    length: number | null,
    delimiter?: Uint8Array,
  ): Promise<Uint8Array> {
    return this.withFile(path, file => {
      const count = length === null ? file.size : length;
      return readDelimitedBlock(file, offset, Math.min(count, file.size - offset), delimiter);
    });
  }

  // ─── Listings ──────────────────────────────────────────────────────────

  /**
   * Entries of the directory at `path`, served from the listing cache when
   * a fresh listing is held.
   */
  async ls(path: string, options?: LsOptions): Promise<DirEntry[]> {
    const target = this.stripProtocol(path);
    if (!options?.refresh) {
      const cached = this.dircache.get(target);
      if (cached) return cached;
    }
    const listing = await this.listDirectory(target);
    this.dircache.set(target, listing);
    return listing;
  }

  /**
   * Forget cached listings for `path` and everything below it, or every
   * listing when called without a path.
   */
  invalidateCache(path?: string): void {
    if (path === undefined) {
      this.dircache.clear();
      return;
    }
    this.dircache.invalidate(this.stripProtocol(path));
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  protected async infoOrNull(path: string): Promise<FileInfo | null> {
    try {
      return await this.info(path);
    } catch (err) {
      if (err instanceof FileNotFoundError) return null;
      throw err;
    }
  }

  private async withFile<T>(path: string, fn: (file: BufferedFile) => Promise<T>): Promise<T> {
    const file = await this.open(path, 'rb');
    try {
      return await fn(file);
    } finally {
      await file.close();
    }
  }
}
