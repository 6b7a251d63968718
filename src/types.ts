/**
 * @module types
 *
 * Shared type definitions for rangefs.
 *
 * This module defines the data structures that flow between the layers:
 *
 * - **Fetchers**: the byte-range primitives a backend hands to a cache
 * - **ByteRange**: a half-open `[start, end)` interval
 * - **FileInfo / DirEntry**: backend metadata for files and listings
 * - **OpenMode / SeekWhence**: the buffered file's mode and seek anchors
 * - **Capability interfaces**: `Readable`, `Writable`, `Seekable`, `Sized`
 *
 * All byte payloads are plain `Uint8Array`s. Offsets are zero-based byte
 * positions; every interval is half-open.
 */

// ─── Byte ranges ────────────────────────────────────────────────────────────

/**
 * A half-open byte interval `[start, end)`.
 */
export interface ByteRange {
  /** First byte offset (inclusive). */
  start: number;
  /** Last byte offset (exclusive). */
  end: number;
}

/**
 * Backend-supplied primitive returning the bytes in `[start, end)`.
 *
 * The returned array may be shorter than `end - start` when the resource
 * ends before `end`. Caches never retry a rejected fetch.
 */
export type Fetcher = (start: number, end: number) => Promise<Uint8Array>;

/**
 * Backend-supplied primitive returning several ranges in one call.
 *
 * The result corresponds positionally to `ranges`.
 */
export type MultiFetcher = (ranges: ReadonlyArray<ByteRange>) => Promise<Uint8Array[]>;

// ─── Backend metadata ───────────────────────────────────────────────────────

/** Kind of a filesystem entry. */
export type EntryType = 'file' | 'directory';

/**
 * Metadata for a single filesystem entry, as returned by `info()`.
 *
 * Backends may attach extra JSON-compatible fields (an ETag, a
 * modification time, a checksum). Those fields take part in file
 * tokenization, so two handles over an unchanged file compare equal.
 */
export interface FileInfo {
  /** Full path of the entry. */
  name: string;
  /** Size in bytes (0 for directories). */
  size: number;
  /** Entry kind. */
  type: EntryType;
  /** Backend-specific extra fields. */
  [extra: string]: string | number | boolean | null;
}

/** A directory listing: the `info()` record of every child. */
export type DirEntry = FileInfo;

// ─── Files ──────────────────────────────────────────────────────────────────

/**
 * Buffered file modes.
 *
 * | Mode | Meaning |
 * |------|---------|
 * | `rb` | read through a cache strategy |
 * | `wb` | write sequentially, replacing the target |
 * | `ab` | write sequentially after the existing content |
 */
export type OpenMode = 'rb' | 'wb' | 'ab';

/** Anchor for {@link Seekable.seek}. */
export type SeekWhence = 'start' | 'current' | 'end';

/** Something whose total length is known. */
export interface Sized {
  readonly size: number;
}

/** A cursor that can be moved. */
export interface Seekable {
  seek(loc: number, whence?: SeekWhence): number;
  tell(): number;
}

/** A source of bytes read sequentially from a cursor. */
export interface Readable {
  read(length?: number): Promise<Uint8Array>;
}

/** A sink of bytes written sequentially. */
export interface Writable {
  write(data: Uint8Array): Promise<number>;
  flush(force?: boolean): Promise<void>;
}
