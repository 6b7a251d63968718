/**
 * @module config
 *
 * File and filesystem option resolution.
 *
 * Option values cascade through three levels:
 *
 * 1. {@link FileOptions} passed to `open()`: per-file overrides (highest priority)
 * 2. {@link FileSystemOptions} given to the filesystem constructor, on top of
 *    any `RANGEFS_<PROTOCOL>_<KEY>` environment defaults for its protocol
 * 3. {@link DEFAULT_FILE_OPTIONS}: built-in fallbacks
 *
 * @example
 * ```typescript
 * // RANGEFS_MEMORY_BLOCK_SIZE=1024 in the environment
 * const fs = new MemoryFileSystem({ cacheType: 'block' });
 * const f = await fs.open('/data.bin', 'rb', { cacheOptions: { maxBlocks: 4 } });
 * // → blockSize 1024 (env), cacheType 'block' (constructor), maxBlocks 4 (open)
 * ```
 */

import { isCacheType, type CacheOptions } from './caches/index.js';
import type { CacheType } from './caches/cache.js';

/** Default read-ahead / upload chunk size: 5 MiB. */
export const DEFAULT_BLOCK_SIZE = 5 * 2 ** 20;

/**
 * Per-file options accepted by `open()`.
 *
 * Any field left `undefined` falls through to the filesystem-level default
 * and then to the built-in default via {@link resolveFileOptions}.
 */
export interface FileOptions {
  /** Read-ahead size in read mode, upload chunk size in write mode. @defaultValue 5 MiB */
  blockSize?: number;
  /** Read cache strategy. @defaultValue 'readahead' */
  cacheType?: CacheType;
  /** Strategy-specific options, merged over the filesystem-level ones. */
  cacheOptions?: CacheOptions;
  /** Commit written files on close. @defaultValue true */
  autocommit?: boolean;
}

/**
 * Directory-listing cache options.
 */
export interface ListingCacheOptions {
  /** When `false` the listing cache never stores anything. @defaultValue true */
  useListingsCache?: boolean;
  /** Age in milliseconds after which a listing is stale. Unset: never. */
  listingsExpiryMs?: number;
  /** Keep at most this many listings, least recently used dropped first. */
  maxPaths?: number;
}

/**
 * Options accepted by a filesystem constructor: file defaults plus
 * listing-cache settings.
 */
export interface FileSystemOptions extends FileOptions, ListingCacheOptions {}

export type ResolvedFileOptions = Required<FileOptions>;

/**
 * Built-in fallbacks for every file option.
 */
export const DEFAULT_FILE_OPTIONS: ResolvedFileOptions = {
  blockSize: DEFAULT_BLOCK_SIZE,
  cacheType: 'readahead',
  cacheOptions: {},
  autocommit: true,
};

/**
 * Resolve effective file options: open options → filesystem options →
 * built-in defaults. `cacheOptions` objects are merged shallowly.
 *
 * @param open - Per-file overrides (highest priority).
 * @param fs - Filesystem-level defaults (middle priority).
 * @returns Fully resolved options with no `undefined` fields.
 */
export function resolveFileOptions(open?: FileOptions, fs?: FileOptions): ResolvedFileOptions {
  return {
    blockSize: open?.blockSize ?? fs?.blockSize ?? DEFAULT_FILE_OPTIONS.blockSize,
    cacheType: open?.cacheType ?? fs?.cacheType ?? DEFAULT_FILE_OPTIONS.cacheType,
    cacheOptions: { ...fs?.cacheOptions, ...open?.cacheOptions },
    autocommit: open?.autocommit ?? fs?.autocommit ?? DEFAULT_FILE_OPTIONS.autocommit,
  };
}

// ─── Environment ──────────────────────────────────────────────────────────

const ENV_PREFIX = 'RANGEFS_';

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  throw new TypeError(`${name} must be a boolean, got "${raw}"`);
}

/**
 * Collect per-protocol filesystem defaults from `RANGEFS_<PROTOCOL>_<KEY>`
 * variables.
 *
 * Recognised keys: `BLOCK_SIZE`, `CACHE_TYPE`, `AUTOCOMMIT`,
 * `USE_LISTINGS_CACHE`, `LISTINGS_EXPIRY_MS`, `MAX_PATHS`. Other keys are
 * ignored. When `only` names a protocol, variables for other protocols
 * are skipped unparsed.
 *
 * @throws {TypeError} If a recognised variable holds a malformed value.
 */
export function loadEnvConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  only?: string,
): Record<string, FileSystemOptions> {
  const conf: Record<string, FileSystemOptions> = {};

  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || raw === undefined) continue;
    const rest = name.slice(ENV_PREFIX.length);
    const sep = rest.indexOf('_');
    if (sep <= 0) continue;

    const protocol = rest.slice(0, sep).toLowerCase();
    if (only !== undefined && protocol !== only) continue;
    const key = rest.slice(sep + 1);
    const target: FileSystemOptions = conf[protocol] ?? {};

    switch (key) {
      case 'BLOCK_SIZE':
        target.blockSize = parsePositiveInt(name, raw);
        break;
      case 'CACHE_TYPE':
        if (!isCacheType(raw)) throw new TypeError(`${name} is not a cache type: "${raw}"`);
        target.cacheType = raw;
        break;
      case 'AUTOCOMMIT':
        target.autocommit = parseBoolean(name, raw);
        break;
      case 'USE_LISTINGS_CACHE':
        target.useListingsCache = parseBoolean(name, raw);
        break;
      case 'LISTINGS_EXPIRY_MS':
        target.listingsExpiryMs = parsePositiveInt(name, raw);
        break;
      case 'MAX_PATHS':
        target.maxPaths = parsePositiveInt(name, raw);
        break;
      default:
        continue;
    }
    conf[protocol] = target;
  }

  return conf;
}

/**
 * Fill the fields `options` leaves unset from the environment defaults
 * for `protocol`. Explicit options always win.
 *
 * @throws {TypeError} If a variable for `protocol` holds a malformed value.
 */
export function applyEnvConfig(
  protocol: string,
  options: FileSystemOptions = {},
  env: Readonly<Record<string, string | undefined>> = process.env,
): FileSystemOptions {
  const defaults = loadEnvConfig(env, protocol)[protocol] ?? {};
  return {
    blockSize: options.blockSize ?? defaults.blockSize,
    cacheType: options.cacheType ?? defaults.cacheType,
    cacheOptions: options.cacheOptions,
    autocommit: options.autocommit ?? defaults.autocommit,
    useListingsCache: options.useListingsCache ?? defaults.useListingsCache,
    listingsExpiryMs: options.listingsExpiryMs ?? defaults.listingsExpiryMs,
    maxPaths: options.maxPaths ?? defaults.maxPaths,
  };
}
