/**
 * @module file/delimiter
 *
 * Delimiter-aligned block reads, used to split a file into records for
 * parallel processing.
 */

import { EMPTY, concatBytes, indexOfBytes } from '../bytes.js';
import type { Readable, Seekable } from '../types.js';

type SeekableReader = Readable & Seekable;

/**
 * Advance `file` to just past the next `delimiter`.
 *
 * Offset 0 already counts as a record boundary, so nothing is read there.
 *
 * @returns `true` if a delimiter was found, `false` at start or end of file.
 */
export async function seekDelimiter(
  file: SeekableReader,
  delimiter: Uint8Array,
  blocksize = 2 ** 16,
): Promise<boolean> {
  if (file.tell() === 0) return false;

  let last = EMPTY;
  for (;;) {
    const current = await file.read(blocksize);
    if (current.length === 0) return false;

    const full = last.length > 0 ? concatBytes([last, current]) : current;
    const i = indexOfBytes(full, delimiter);
    if (i >= 0) {
      file.seek(file.tell() - (full.length - i) + delimiter.length);
      return true;
    }
    if (current.length < blocksize) return false;
    last = full.slice(Math.max(0, full.length - delimiter.length));
  }
}

/**
 * Read `length` bytes from `offset`. With a delimiter, both ends move
 * forward to the next delimiter boundary (unless the start is 0) and the
 * result includes the terminating delimiter.
 *
 * @example
 * ```typescript
 * // file: "Alice, 100\nBob, 200\nCharlie, 300"
 * await readDelimitedBlock(f, 0, 13);             // "Alice, 100\nBo"
 * await readDelimitedBlock(f, 0, 13, toBytes('\n')); // "Alice, 100\nBob, 200\n"
 * ```
 */
export async function readDelimitedBlock(
  file: SeekableReader,
  offset: number,
  length: number,
  delimiter?: Uint8Array,
): Promise<Uint8Array> {
  let start = offset;
  let count = length;

  if (delimiter && delimiter.length > 0) {
    file.seek(offset);
    await seekDelimiter(file, delimiter);
    start = file.tell();
    count -= start - offset;

    file.seek(start + count);
    await seekDelimiter(file, delimiter);
    count = file.tell() - start;
  }

  file.seek(start);
  return file.read(count);
}
