/**
 * Shared TextEncoder/TextDecoder singletons and UTF-8 width helpers.
 *
 * Buffers hold well-formed UTF-8 (TextEncoder output), so a lead byte
 * alone tells how many bytes its character occupies.
 */

export const textEncoder = new TextEncoder();
export const textDecoder = new TextDecoder();

/**
 * Byte width of the UTF-8 sequence starting with `lead`.
 */
export function utf8Width(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead < 0xe0) return 2;
  if (lead < 0xf0) return 3;
  return 4;
}

/**
 * Whether `byte` continues a multi-byte sequence (10xxxxxx).
 */
export function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Count characters in `bytes[start, end)`.
 */
export function countChars(bytes: Uint8Array, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (!isContinuationByte(bytes[i])) count++;
  }
  return count;
}

/**
 * Byte index of the `charIndex`-th character of the run starting at
 * `start`. Returns `start` for `charIndex` 0.
 */
export function charIndexToByte(bytes: Uint8Array, start: number, charIndex: number): number {
  let position = start;
  for (let i = 0; i < charIndex; i++) {
    position += utf8Width(bytes[position]);
  }
  return position;
}
