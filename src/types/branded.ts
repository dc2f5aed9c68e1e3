/**
 * Branded position types.
 *
 * The buffers store UTF-8 bytes while callers address text by character
 * (Unicode code point). Both are plain numbers at runtime, so the brands
 * keep a byte position from being passed where a character position is
 * expected:
 *
 * ```typescript
 * const at = charOffset(3);
 * const start = byteOffset(7);
 *
 * // Type error: ByteOffset is not a CharOffset
 * const wrong: CharOffset = start;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Phantom symbol; never exists at runtime.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Position inside the original or add buffer, in UTF-8 bytes.
 * Piece ranges are expressed in this unit.
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Size of a byte range. An offset is a position, a length is a count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

/**
 * Position in the projected text, counted in characters (code points).
 * Every caller-facing offset uses this unit.
 */
export type CharOffset = Branded<number, 'CharOffset'>;

// =============================================================================
// Constructor Functions
// =============================================================================

export function byteOffset(value: number): ByteOffset {
  return value as ByteOffset;
}

export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

export function charOffset(value: number): CharOffset {
  return value as CharOffset;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid offset (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

export function addByteOffset(offset: ByteOffset, delta: number): ByteOffset {
  return (offset + delta) as ByteOffset;
}

/**
 * Byte count between two offsets (`end - start`).
 */
export function diffByteOffset(end: ByteOffset, start: ByteOffset): ByteLength {
  return (end - start) as ByteLength;
}

export function addCharOffset(offset: CharOffset, delta: number): CharOffset {
  return (offset + delta) as CharOffset;
}

export function diffCharOffset(a: CharOffset, b: CharOffset): number {
  return a - b;
}

/**
 * Clamp a CharOffset to `[min, max]`.
 */
export function clampCharOffset(
  offset: CharOffset,
  min: CharOffset,
  max: CharOffset
): CharOffset {
  return Math.max(min, Math.min(max, offset)) as CharOffset;
}

// =============================================================================
// Zero Constants
// =============================================================================

export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;

export const ZERO_BYTE_LENGTH: ByteLength = 0 as ByteLength;

export const ZERO_CHAR_OFFSET: CharOffset = 0 as CharOffset;
