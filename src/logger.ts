/**
 * @module logger
 *
 * JSON-lines event logging.
 *
 * Each event is one JSON object on its own line (`ts`, `level`, `event`,
 * then the event fields) written through `console.log`. Events below the
 * active threshold are dropped before any formatting happens, so debug
 * events on hot cache paths cost a single comparison when disabled.
 *
 * The threshold is read once from `RANGEFS_LOG_LEVEL` (default `warn`)
 * and can be changed at runtime with {@link setLogLevel}.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEvent =
  | 'cache_fetch'
  | 'cache_evict'
  | 'cache_stats'
  | 'prefetch_failed'
  | 'parts_fallback'
  | 'file_open'
  | 'file_close'
  | 'upload_start'
  | 'upload_chunk'
  | 'upload_commit'
  | 'upload_discard'
  | 'listing_stale';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_LOG_ERROR_MESSAGE_LENGTH = 512;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.RANGEFS_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export function log(level: LogLevel, event: LogEvent, fields: Record<string, unknown> = {}): void {
  if (!isLogEnabled(level)) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields,
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(entry));
}

/** Collapse whitespace and control characters so a message fits on one line. */
function oneLine(input: unknown, maxLength: number): string {
  const flat = String(input ?? '')
    .replace(/[\u0000-\u001f\u007f\u0085\u2028\u2029\s]+/gu, ' ')
    .trim();
  return flat.length > maxLength ? flat.slice(0, maxLength) : flat;
}

export function formatError(err: unknown): { message: string; name?: string; code?: unknown } {
  if (err instanceof Error) {
    // `code` is non-standard (NodeJS.ErrnoException, RangeFsError) but worth keeping.
    const code = 'code' in err ? err.code : undefined;
    return {
      name: oneLine(err.name, 128) || 'Error',
      message: oneLine(err.message, MAX_LOG_ERROR_MESSAGE_LENGTH),
      code,
    };
  }
  return { message: oneLine(err, MAX_LOG_ERROR_MESSAGE_LENGTH) };
}
