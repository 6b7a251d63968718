/**
 * @module fs/http
 *
 * Read-only HTTP(S) filesystem using Range Requests.
 *
 * Paths are full URLs. File metadata comes from a `HEAD` request
 * (`Content-Length`, plus `ETag` and `Last-Modified` when present, so that
 * two opens of an unchanged resource tokenize equally). Byte ranges are
 * fetched with `Range: bytes=a-b` through the Node.js built-in `fetch`,
 * with per-request timeouts via `AbortController`, exponential-backoff
 * retry on transient failures, and a bounded worker pool for multi-range
 * reads.
 *
 * Directory listing and every write mode raise
 * {@link UnsupportedOperationError}.
 *
 * @example
 * ```typescript
 * const fs = new HttpFileSystem({
 *   headers: { Authorization: 'Bearer test-token' },
 *   timeout: 15_000,
 *   retry: { attempts: 5, backoff: 300 },
 *   cacheType: 'block',
 * });
 * const f = await fs.open('https://cdn.example.com/data/archive.bin');
 * const header = await f.read(1024);
 * ```
 */

import { AbstractFileSystem } from './filesystem.js';
import type { FileOptions, FileSystemOptions, ResolvedFileOptions } from '../config.js';
import { FileNotFoundError, UnsupportedOperationError } from '../errors.js';
import { BufferedFile } from '../file/buffered.js';
import type { ByteRange, DirEntry, FileInfo, OpenMode } from '../types.js';

export interface HttpFileSystemOptions extends FileSystemOptions {
  /**
   * Default headers sent with every request, e.g. an authorization token.
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds. A request that exceeds it is
   * aborted and, if attempts remain, retried.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Maximum number of concurrent requests issued by one
   * {@link HttpFileSystem.readRanges} call.
   *
   * @defaultValue 6
   */
  maxConcurrency?: number;
  /**
   * Retry configuration for HTTP 5xx, HTTP 429, network errors and
   * timeouts. The delay before retry `n` is `backoff * 2^n` ms.
   *
   * @defaultValue \{ attempts: 3, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts (including the initial request). */
    attempts: number;
    /** Base backoff delay in milliseconds before the first retry. */
    backoff: number;
  };
}

/** `bytes 0-0/1234` → 1234 */
function parseContentRangeTotal(header: string | null): number | null {
  const match = header ? /\/(\d+)\s*$/.exec(header) : null;
  return match ? Number(match[1]) : null;
}

export class HttpFileSystem extends AbstractFileSystem {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly maxConcurrency: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;

  constructor(options?: HttpFileSystemOptions, env?: Readonly<Record<string, string | undefined>>) {
    super('http', options, env);
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30_000;
    this.maxConcurrency = options?.maxConcurrency ?? 6;
    this.retryAttempts = options?.retry?.attempts ?? 3;
    this.retryBackoff = options?.retry?.backoff ?? 200;
  }

  /** URLs are used as given. */
  stripProtocol(path: string): string {
    return path;
  }

  /**
   * @throws {UnsupportedOperationError} For any mode other than `rb`.
   */
  async open(path: string, mode: string = 'rb', options?: FileOptions): Promise<BufferedFile> {
    if (mode !== 'rb') {
      throw new UnsupportedOperationError(`HTTP filesystem is read-only, cannot open in mode ${mode}`);
    }
    return super.open(path, mode, options);
  }

  /**
   * Metadata from a `HEAD` request. When the server omits
   * `Content-Length`, the size is taken from the `Content-Range` of a
   * one-byte `GET`.
   */
  async info(url: string): Promise<FileInfo> {
    const head = await this.fetchWithRetry(url, { method: 'HEAD', headers: this.headers });
    if (head.status === 404) throw new FileNotFoundError(url);
    if (!head.ok) throw new Error(`HTTP ${head.status} reading info of ${url}`);

    const length = head.headers.get('content-length');
    let size = length === null ? Number.NaN : Number(length);
    if (!Number.isInteger(size) || size < 0) {
      const firstByte = await this.fetchWithRetry(url, {
        headers: { ...this.headers, Range: 'bytes=0-0' },
      });
      await firstByte.arrayBuffer();
      const total = parseContentRangeTotal(firstByte.headers.get('content-range'));
      if (total === null) throw new UnsupportedOperationError(`Cannot determine the size of ${url}`);
      size = total;
    }

    return {
      name: url,
      size,
      type: 'file',
      etag: head.headers.get('etag'),
      lastModified: head.headers.get('last-modified'),
    };
  }

  async rm(_path: string): Promise<void> {
    throw new UnsupportedOperationError('HTTP filesystem is read-only');
  }

  protected async listDirectory(): Promise<DirEntry[]> {
    throw new UnsupportedOperationError('Directory listing is not supported over HTTP');
  }

  protected createFile(
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ): BufferedFile {
    return new HttpFile(this, path, mode, options, details);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  /**
   * Fetch `[start, end)` with a single Range Request.
   *
   * A `206` body is returned as-is. A server that ignores `Range` and
   * answers `200` with the full body gets sliced locally.
   *
   * @throws {Error} On a non-success status after retries, naming the
   *   status, URL and range.
   */
  async readRange(url: string, start: number, end: number): Promise<Uint8Array> {
    const last = end - 1;
    const response = await this.fetchWithRetry(url, {
      headers: { ...this.headers, Range: `bytes=${start}-${last}` },
    });

    if (response.status === 404) throw new FileNotFoundError(url);
    if (response.status === 416) {
      await response.arrayBuffer();
      return new Uint8Array(0);
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} reading ${url} [${start}-${last}]`);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    if (response.status === 200) return body.slice(start, end);
    return body;
  }

  /**
   * Fetch several ranges of one URL, at most `maxConcurrency` at a time.
   * Results are in input order.
   */
  async readRanges(url: string, ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    if (ranges.length === 0) return [];
    if (ranges.length === 1) {
      const r = ranges[0];
      return [await this.readRange(url, r.start, r.end)];
    }

    // Throttled parallel fetches
    const results = new Array<Uint8Array>(ranges.length);
    let cursor = 0;

    const worker = async () => {
      while (cursor < ranges.length) {
        const idx = cursor++;
        const { start, end } = ranges[idx];
        results[idx] = await this.readRange(url, start, end);
      }
    };

    const workers = Array.from({ length: Math.min(this.maxConcurrency, ranges.length) }, () =>
      worker(),
    );

    await Promise.all(workers);
    return results;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * `fetch` with timeout and exponential-backoff retry.
   *
   * @throws {Error} The last encountered error once attempts run out.
   */
  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeout);
      try {
        const response = await fetch(url, { ...init, signal: controller.signal });

        // Retry on 5xx or 429
        if (response.status >= 500 || response.status === 429) {
          lastError = new Error(`HTTP ${response.status}`);
          if (attempt < this.retryAttempts - 1) {
            await response.arrayBuffer();
            await sleep(this.retryBackoff * Math.pow(2, attempt));
            continue;
          }
        }

        return response;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.retryAttempts - 1) {
          await sleep(this.retryBackoff * Math.pow(2, attempt));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw lastError ?? new Error(`Failed to fetch ${url}`);
  }
}

/**
 * Read-only buffered file over an HTTP resource.
 */
export class HttpFile extends BufferedFile {
  private readonly http: HttpFileSystem;

  constructor(
    fs: HttpFileSystem,
    path: string,
    mode: OpenMode,
    options: ResolvedFileOptions,
    details: FileInfo | null,
  ) {
    super(fs, path, mode, options, details);
    this.http = fs;
  }

  protected fetchRange(start: number, end: number): Promise<Uint8Array> {
    return this.http.readRange(this.path, start, end);
  }

  protected fetchRanges(ranges: ReadonlyArray<ByteRange>): Promise<Uint8Array[]> {
    return this.http.readRanges(this.path, ranges);
  }

  protected async uploadChunk(): Promise<boolean> {
    throw new UnsupportedOperationError('HTTP filesystem is read-only');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
