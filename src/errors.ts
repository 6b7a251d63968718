/**
 * @module errors
 *
 * Error classes raised by rangefs.
 *
 * Every error thrown by the package itself extends {@link RangeFsError} and
 * carries a stable `code`. Errors raised by a backend's fetch or upload
 * hooks are never wrapped: they reach the caller unchanged.
 *
 * | Class | Code | Meaning |
 * |-------|------|---------|
 * | {@link ClosedFileError} | `ERR_FILE_CLOSED` | I/O on a closed file |
 * | {@link UnsupportedOperationError} | `ERR_UNSUPPORTED` | operation not valid in this mode or backend |
 * | {@link InvalidRangeError} | `ERR_INVALID_RANGE` | offset or block index outside the file |
 * | {@link UploadStateError} | `ERR_UPLOAD_STATE` | write protocol used out of order |
 * | {@link FileNotFoundError} | `ENOENT` | missing path |
 * | {@link StaleKeyError} | `ERR_STALE_KEY` | expired directory listing |
 */

export type RangeFsErrorCode =
  | 'ERR_FILE_CLOSED'
  | 'ERR_UNSUPPORTED'
  | 'ERR_INVALID_RANGE'
  | 'ERR_UPLOAD_STATE'
  | 'ENOENT'
  | 'ERR_STALE_KEY';

export class RangeFsError extends Error {
  readonly code: RangeFsErrorCode;

  constructor(code: RangeFsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ClosedFileError extends RangeFsError {
  constructor(path: string) {
    super('ERR_FILE_CLOSED', `I/O operation on closed file: ${path}`);
  }
}

export class UnsupportedOperationError extends RangeFsError {
  constructor(message: string) {
    super('ERR_UNSUPPORTED', message);
  }
}

export class InvalidRangeError extends RangeFsError {
  constructor(message: string) {
    super('ERR_INVALID_RANGE', message);
  }
}

export class UploadStateError extends RangeFsError {
  constructor(message: string) {
    super('ERR_UPLOAD_STATE', message);
  }
}

export class FileNotFoundError extends RangeFsError {
  readonly path: string;

  constructor(path: string) {
    super('ENOENT', `No such file or directory: ${path}`);
    this.path = path;
  }
}

/** Raised inside {@link DirCache} for an expired listing; callers see a miss. */
export class StaleKeyError extends RangeFsError {
  constructor(key: string) {
    super('ERR_STALE_KEY', `Listing expired: ${key}`);
  }
}
