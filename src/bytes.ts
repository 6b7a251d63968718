/**
 * @module bytes
 *
 * Small `Uint8Array` helpers shared by the caches and the buffered file.
 */

export const EMPTY = new Uint8Array(0);

/**
 * Concatenate byte chunks into a single contiguous `Uint8Array`.
 *
 * A single chunk is returned as-is; no copy is made.
 */
export function concatBytes(chunks: ReadonlyArray<Uint8Array>): Uint8Array {
  if (chunks.length === 0) return EMPTY;
  if (chunks.length === 1) return chunks[0];

  const totalLength = chunks.reduce((sum, c) => sum + c.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Position of `needle` in `haystack` at or after `from`, or -1.
 */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from = 0): number {
  if (needle.length === 0) return Math.min(from, haystack.length);
  return Buffer.from(haystack.buffer, haystack.byteOffset, haystack.byteLength).indexOf(
    needle,
    from,
  );
}

/** Encode a string as UTF-8 bytes. */
export function toBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Decode UTF-8 bytes to a string. */
export function fromBytes(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
