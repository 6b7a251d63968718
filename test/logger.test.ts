import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ClosedFileError } from '../src/errors.js';
import {
  formatError,
  getLogLevel,
  isLogEnabled,
  log,
  setLogLevel,
  type LogLevel,
} from '../src/logger.js';

describe('logger', () => {
  let level: LogLevel;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    level = getLogLevel();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    setLogLevel(level);
  });

  it('should write one JSON object per event', () => {
    setLogLevel('info');
    log('info', 'file_open', { path: '/data/a.bin', mode: 'rb' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'info', event: 'file_open', path: '/data/a.bin', mode: 'rb' });
    expect(typeof entry.ts).toBe('string');
  });

  it('should drop events below the threshold', () => {
    setLogLevel('warn');
    log('debug', 'cache_fetch', { start: 0, end: 10 });
    log('info', 'cache_stats');

    expect(logSpy).not.toHaveBeenCalled();
    expect(isLogEnabled('error')).toBe(true);
    expect(isLogEnabled('info')).toBe(false);
  });
});

describe('formatError', () => {
  it('should keep the name, message and code of package errors', () => {
    expect(formatError(new ClosedFileError('/a.bin'))).toEqual({
      name: 'ClosedFileError',
      message: 'I/O operation on closed file: /a.bin',
      code: 'ERR_FILE_CLOSED',
    });
  });

  it('should flatten multi-line messages', () => {
    expect(formatError(new Error('first\nsecond'))).toEqual({
      name: 'Error',
      message: 'first second',
      code: undefined,
    });
  });

  it('should render non-errors', () => {
    expect(formatError('plain\tvalue')).toEqual({ message: 'plain value' });
  });
});
