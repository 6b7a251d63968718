/**
 * @module rangefs
 *
 * Public API surface for the rangefs library.
 *
 * rangefs gives random-access, buffered file objects over storage backends
 * that can only return byte ranges, and a family of pluggable caching
 * strategies that decide how much to fetch per read. The library is
 * organized in three layers:
 *
 * ---
 *
 * ### Caches
 *
 * A cache strategy sits between a file and a backend range fetcher. Pick one
 * per `open()` through `cacheType`, or build one directly with
 * {@link createCache}:
 *
 * | Strategy | Suits |
 * |----------|-------|
 * | `readahead` (default) | sequential reads |
 * | `block` / `background` | scattered reads with a hard memory bound |
 * | `bytes` | reads that move both ways around a region |
 * | `first` | files whose header is re-read often |
 * | `all` | small files read in full |
 * | `mmap` | large files re-read across sessions, kept on local disk |
 * | `parts` | byte ranges already known in advance |
 * | `none` | one-shot reads |
 *
 * ---
 *
 * ### Files
 *
 * {@link BufferedFile} implements seek/read/readline over a strategy in
 * read mode, and chunked uploads with commit/discard in write modes.
 *
 * ---
 *
 * ### Filesystems
 *
 * | Filesystem | Backend |
 * |------------|---------|
 * | {@link MemoryFileSystem} | in-process `Map` |
 * | {@link LocalFileSystem} | local disk (Node.js `FileHandle`) |
 * | {@link HttpFileSystem} | HTTP/HTTPS with Range Requests |
 */

// ─── Caches ─────────────────────────────────────────────────────────────────

export {
  createCache,
  isCacheType,
  CACHE_TYPES,
  BaseCache,
  AllBytesCache,
  BackgroundBlockCache,
  BlockCache,
  BytesCache,
  FirstChunkCache,
  KnownPartsCache,
  MMapCache,
  ReadAheadCache,
  coalesceBlocks,
  mergeParts,
} from './caches/index.js';

// ─── Files ──────────────────────────────────────────────────────────────────

export { BufferedFile } from './file/buffered.js';
export { readDelimitedBlock, seekDelimiter } from './file/delimiter.js';

// ─── Filesystems ────────────────────────────────────────────────────────────

export {
  AbstractFileSystem,
  HttpFileSystem,
  LocalFileSystem,
  MemoryFileSystem,
} from './fs/index.js';
export { DirCache } from './dircache.js';

// ─── Configuration, errors, logging ─────────────────────────────────────────

export {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_FILE_OPTIONS,
  applyEnvConfig,
  loadEnvConfig,
  resolveFileOptions,
} from './config.js';
export {
  RangeFsError,
  ClosedFileError,
  FileNotFoundError,
  InvalidRangeError,
  StaleKeyError,
  UnsupportedOperationError,
  UploadStateError,
} from './errors.js';
export { formatError, getLogLevel, log, setLogLevel } from './logger.js';
export { concatBytes, fromBytes, toBytes } from './bytes.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type {
  CacheOptions,
  CacheStats,
  CacheType,
  AllBytesOptions,
  BlockCacheInfo,
  BlockCacheOptions,
  BytesCacheOptions,
  KnownPart,
  KnownPartsOptions,
  MMapCacheOptions,
  MMapSnapshot,
} from './caches/index.js';
export type { UploadState } from './file/buffered.js';
export type { HttpFileSystemOptions, LocalFileSystemOptions, LsOptions } from './fs/index.js';
export type { DirCacheOptions } from './dircache.js';
export type {
  FileOptions,
  FileSystemOptions,
  ListingCacheOptions,
  ResolvedFileOptions,
} from './config.js';
export type { RangeFsErrorCode } from './errors.js';
export type { LogEvent, LogLevel } from './logger.js';
export type {
  ByteRange,
  DirEntry,
  EntryType,
  Fetcher,
  FileInfo,
  MultiFetcher,
  OpenMode,
  Readable,
  Seekable,
  SeekWhence,
  Sized,
  Writable,
} from './types.js';
