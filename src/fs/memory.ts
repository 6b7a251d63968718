/**
 * @module fs/memory
 *
 * In-process filesystem (`memory://`).
 *
 * Files live in a `Map` from absolute path to bytes. Directories are
 * implied by the paths beneath them. A file being written stages its
 * chunks privately and replaces the stored bytes only on commit, so
 * readers never observe a partial write. Every commit stamps the entry
 * with a strictly increasing `created` time, so rewriting a file with
 * bytes of the same length still changes its token.
 *
 * @example
 * ```typescript
 * const fs = new MemoryFileSystem();
 * await fs.pipe('/data/hello.txt', toBytes('hello world'));
 * await fs.cat('/data/hello.txt', 6); // → "world"
 * ```
 */

import { AbstractFileSystem } from './filesystem.js';
import { concatBytes } from '../bytes.js';
import type { FileSystemOptions, ResolvedFileOptions } from '../config.js';
import { FileNotFoundError } from '../errors.js';
import { BufferedFile } from '../file/buffered.js';
import type { DirEntry, FileInfo, OpenMode } from '../types.js';

export class MemoryFileSystem extends AbstractFileSystem {
  /** Stored files by absolute path. */
  readonly store = new Map<string, Uint8Array>();
  /** Commit time of each stored file, in milliseconds. */
  private readonly created = new Map<string, number>();
  private lastStamp = 0;

  constructor(options?: FileSystemOptions, env?: Readonly<Record<string, string | undefined>>) {
    super('memory', options, env);
  }

  /** Strip the protocol and normalise to a single leading slash. */
  stripProtocol(path: string): string {
    const bare = super.stripProtocol(path).replace(/\/+$/, '');
    return bare.startsWith('/') ? bare : `/${bare}`;
  }

  async info(path: string): Promise<FileInfo> {
    const target = this.stripProtocol(path);
    const data = this.store.get(target);
    if (data) return this.fileEntry(target, data);

    const prefix = target === '/' ? '/' : `${target}/`;
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) return { name: target, size: 0, type: 'directory' };
    }
    throw new FileNotFoundError(target);
  }

  async rm(path: string): Promise<void> {
    const target = this.stripProtocol(path);
    if (!this.store.delete(target)) throw new FileNotFoundError(target);
    this.created.delete(target);
    this.invalidateCache(this.parent(target));
  }

  protected async listDirectory(path: string): Promise<DirEntry[]> {
    const file = this.store.get(path);
    if (file) return [this.fileEntry(path, file)];

    const prefix = path === '/' ? '/' : `${path}/`;
    const children = new Map<string, DirEntry>();
    for (const [key, data] of this.store) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash < 0) {
        children.set(key, this.fileEntry(key, data));
      } else {
        const name = prefix + rest.slice(0, slash);
        if (!children.has(name)) children.set(name, { name, size: 0, type: 'directory' });
      }
    }
    if (children.size === 0) throw new FileNotFoundError(path);
    return [...children.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /** Store `data` at an absolute path and stamp its commit time. */
  put(path: string, data: Uint8Array): void {
    this.store.set(path, data);
    this.lastStamp = Math.max(Date.now(), this.lastStamp + 1);
    this.created.set(path, this.lastStamp);
  }

  private fileEntry(name: string, data: Uint8Array): FileInfo {
    const created = this.created.get(name);
    return created === undefined
      ? { name, size: data.length, type: 'file' }
      : { name, size: data.length, type: 'file', created };
  }

  protected createFile(
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ): BufferedFile {
    return new MemoryFile(this, path, mode, options, details);
  }
}

/**
 * Buffered file over a {@link MemoryFileSystem} entry.
 */
export class MemoryFile extends BufferedFile {
  private readonly memory: MemoryFileSystem;
  private staged: Uint8Array[] = [];

  constructor(
    fs: MemoryFileSystem,
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ) {
    super(fs, path, mode, options, details);
    this.memory = fs;
  }

  protected async fetchRange(start: number, end: number): Promise<Uint8Array> {
    const data = this.memory.store.get(this.path);
    if (!data) throw new FileNotFoundError(this.path);
    return data.slice(start, end);
  }

  protected async initiateUpload(): Promise<void> {
    const existing = this.mode === 'ab' ? this.memory.store.get(this.path) : undefined;
    this.staged = existing ? [existing.slice()] : [];
  }

  protected async uploadChunk(): Promise<boolean> {
    this.staged.push(this.pendingBytes().slice());
    return true;
  }

  protected async commitUpload(): Promise<void> {
    this.memory.put(this.path, concatBytes(this.staged).slice());
    this.staged = [];
  }

  protected async discardUpload(): Promise<void> {
    this.staged = [];
  }
}
