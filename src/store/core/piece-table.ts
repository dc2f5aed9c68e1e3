/**
 * Piece table operations over an immutable piece list.
 * Every edit returns a new PieceTableState plus the patches that turn the
 * old piece list into the new one; buffers are never copied.
 */

import type {
  DropPatch,
  InsertPatch,
  NarrowPatch,
  Piece,
  PieceLocation,
  PiecePatch,
  PieceTableState,
  SplitPatch,
} from '../../types/state.ts';
import {
  byteOffset,
  diffByteOffset,
  isValidOffset,
  type ByteLength,
  type CharOffset,
} from '../../types/branded.ts';
import { createPiece, withPieceTable } from './state.ts';
import { charIndexToByte, countChars, textDecoder, textEncoder, utf8Width } from './encoding.ts';
import { OutOfRangeError } from './errors.ts';
import { getLogger } from './logger.ts';

const log = getLogger('piece-table');

// =============================================================================
// Buffer Access Helpers
// =============================================================================

/**
 * Zero-copy view of the bytes a piece references.
 */
export function getPieceBuffer(state: PieceTableState, piece: Piece): Uint8Array {
  return piece.source === 'original'
    ? state.original.subarray(piece.start, piece.end)
    : state.add.subarray(piece.start, piece.end);
}

/**
 * Decoded text of a single piece.
 */
export function getPieceText(state: PieceTableState, piece: Piece): string {
  return textDecoder.decode(getPieceBuffer(state, piece));
}

export function getPieceByteLength(piece: Piece): ByteLength {
  return diffByteOffset(piece.end, piece.start);
}

// =============================================================================
// Patches
// =============================================================================

export function insertPatch(index: number, pieces: readonly Piece[]): InsertPatch {
  return Object.freeze({ kind: 'insert', index, pieces: Object.freeze([...pieces]) });
}

export function splitPatch(index: number, original: Piece, parts: readonly Piece[]): SplitPatch {
  return Object.freeze({ kind: 'split', index, original, parts: Object.freeze([...parts]) });
}

export function narrowPatch(index: number, before: Piece, after: Piece): NarrowPatch {
  return Object.freeze({ kind: 'narrow', index, before, after });
}

export function dropPatch(index: number, piece: Piece): DropPatch {
  return Object.freeze({ kind: 'drop', index, piece });
}

/**
 * Pieces a patch takes out of the list and puts into it, both at
 * `patch.index`.
 */
export function getPatchPieces(patch: PiecePatch): {
  removed: readonly Piece[];
  inserted: readonly Piece[];
} {
  switch (patch.kind) {
    case 'insert':
      return { removed: [], inserted: patch.pieces };
    case 'split':
      return { removed: [patch.original], inserted: patch.parts };
    case 'narrow':
      return { removed: [patch.before], inserted: [patch.after] };
    case 'drop':
      return { removed: [patch.piece], inserted: [] };
    default: {
      const exhaustiveCheck: never = patch;
      return exhaustiveCheck;
    }
  }
}

function sumChars(pieces: readonly Piece[]): number {
  let total = 0;
  for (const piece of pieces) total += piece.charLength;
  return total;
}

function sumBytes(pieces: readonly Piece[]): number {
  let total = 0;
  for (const piece of pieces) total += getPieceByteLength(piece);
  return total;
}

/**
 * Replace `outgoing.length` pieces at `index` with `incoming`,
 * keeping the cached lengths in step.
 */
function replacePieces(
  state: PieceTableState,
  index: number,
  outgoing: readonly Piece[],
  incoming: readonly Piece[]
): PieceTableState {
  const pieces = state.pieces.slice();
  pieces.splice(index, outgoing.length, ...incoming);

  return withPieceTable(state, {
    pieces: Object.freeze(pieces),
    length: state.length - sumChars(outgoing) + sumChars(incoming),
    byteLength: state.byteLength - sumBytes(outgoing) + sumBytes(incoming),
  });
}

export function applyPatch(state: PieceTableState, patch: PiecePatch): PieceTableState {
  const { removed, inserted } = getPatchPieces(patch);
  return replacePieces(state, patch.index, removed, inserted);
}

export function revertPatch(state: PieceTableState, patch: PiecePatch): PieceTableState {
  const { removed, inserted } = getPatchPieces(patch);
  return replacePieces(state, patch.index, inserted, removed);
}

/**
 * Apply patches in the order they were recorded.
 */
export function applyPatches(
  state: PieceTableState,
  patches: readonly PiecePatch[]
): PieceTableState {
  let result = state;
  for (const patch of patches) {
    result = applyPatch(result, patch);
  }
  return result;
}

/**
 * Undo patches, newest first.
 */
export function revertPatches(
  state: PieceTableState,
  patches: readonly PiecePatch[]
): PieceTableState {
  let result = state;
  for (let i = patches.length - 1; i >= 0; i--) {
    result = revertPatch(result, patches[i]);
  }
  return result;
}

// =============================================================================
// Cursor Resolution
// =============================================================================

/**
 * Find the piece holding the character at `position`.
 * Returns null when the position is not in `[0, length)`; empty pieces
 * never match.
 */
export function findPieceAtPosition(
  state: PieceTableState,
  position: CharOffset
): PieceLocation | null {
  if (!isValidOffset(position)) return null;

  let accumulated = 0;
  for (let index = 0; index < state.pieces.length; index++) {
    const piece = state.pieces[index];
    if (position < accumulated + piece.charLength) {
      return {
        index,
        piece,
        offsetInPiece: position - accumulated,
        pieceStartOffset: accumulated,
      };
    }
    accumulated += piece.charLength;
  }

  return null;
}

/**
 * Like findPieceAtPosition, but throws OutOfRangeError instead of
 * returning null.
 */
export function resolveOffset(
  state: PieceTableState,
  position: CharOffset,
  operation: string = 'resolve'
): PieceLocation {
  const location = findPieceAtPosition(state, position);
  if (location === null) {
    throw new OutOfRangeError(operation, position, state.length);
  }
  return location;
}

/**
 * All pieces in document order.
 */
export function collectPieces(state: PieceTableState): readonly Piece[] {
  return state.pieces;
}

// =============================================================================
// Piece Splitting
// =============================================================================

/**
 * Byte index, relative to the piece start, of its `offsetInPiece`-th
 * character. Pieces with as many bytes as characters are single-byte text.
 */
function pieceByteIndex(bytes: Uint8Array, piece: Piece, offsetInPiece: number): number {
  return bytes.length === piece.charLength
    ? offsetInPiece
    : charIndexToByte(bytes, 0, offsetInPiece);
}

/**
 * Split a piece before its `offsetInPiece`-th character.
 * Either side may come out empty when the offset is on a boundary.
 */
export function splitPiece(
  state: PieceTableState,
  piece: Piece,
  offsetInPiece: number
): [Piece, Piece] {
  const bytes = getPieceBuffer(state, piece);
  const split = byteOffset(piece.start + pieceByteIndex(bytes, piece, offsetInPiece));

  return [
    createPiece(piece.source, piece.start, split, offsetInPiece),
    createPiece(piece.source, split, piece.end, piece.charLength - offsetInPiece),
  ];
}

/**
 * Patch taking characters `[from, to)` (bytes `[fromByte, toByte)`) out of
 * the piece at `index`: a split when both ends survive, a narrow when one
 * does, a drop when nothing is left.
 */
function removalPatch(
  state: PieceTableState,
  index: number,
  piece: Piece,
  from: number,
  to: number,
  fromByte: number,
  toByte: number
): PiecePatch {
  const head = createPiece(piece.source, piece.start, byteOffset(piece.start + fromByte), from);
  const tail = createPiece(
    piece.source,
    byteOffset(piece.start + toByte),
    piece.end,
    piece.charLength - to
  );

  if (head.charLength > 0 && tail.charLength > 0) {
    log.trace(`splitting piece ${index} around [${from}, ${to})`);
    return splitPatch(index, piece, [head, tail]);
  }
  if (head.charLength > 0) {
    log.trace(`narrowing piece ${index} to its head`);
    return narrowPatch(index, piece, head);
  }

  // the list is never emptied: an empty list stands for the untouched original
  if (tail.charLength === 0 && state.pruneEmptyPieces && state.pieces.length > 1) {
    log.trace(`dropping emptied piece ${index}`);
    return dropPatch(index, piece);
  }
  log.trace(`narrowing piece ${index} to its tail`);
  return narrowPatch(index, piece, tail);
}

// =============================================================================
// Piece Table Operations
// =============================================================================

/**
 * New state and the patches that produced it.
 */
export interface PieceTableEditResult {
  readonly state: PieceTableState;
  readonly patches: readonly PiecePatch[];
}

/**
 * Edit result carrying the text that was taken out.
 */
export interface PieceTableRemoveResult extends PieceTableEditResult {
  readonly removed: string;
}

/**
 * Insert `text` so that it starts at character `position`.
 * Throws OutOfRangeError unless `0 <= position <= length`.
 */
export function pieceTableInsert(
  state: PieceTableState,
  position: CharOffset,
  text: string
): PieceTableEditResult {
  if (!isValidOffset(position) || position > state.length) {
    throw new OutOfRangeError('insert', position, state.length);
  }
  if (text.length === 0) return { state, patches: [] };

  const bytes = textEncoder.encode(text);
  const addStart = state.add.length;
  const add = state.add.append(bytes);
  const newPiece = createPiece(
    'add',
    byteOffset(addStart),
    byteOffset(add.length),
    countChars(bytes, 0, bytes.length)
  );

  let patch: PiecePatch;
  if (position === state.length) {
    log.trace('text empty or appending at the end');
    patch = insertPatch(state.pieces.length, [newPiece]);
  } else {
    const location = resolveOffset(state, position, 'insert');

    if (location.offsetInPiece === 0) {
      log.trace(`inserting before piece ${location.index}`);
      patch = insertPatch(location.index, [newPiece]);
    } else {
      log.trace(`splitting piece ${location.index} at ${location.offsetInPiece}`);
      const [left, right] = splitPiece(state, location.piece, location.offsetInPiece);
      patch = splitPatch(location.index, location.piece, [left, newPiece, right]);
    }
  }

  return {
    state: applyPatch(withPieceTable(state, { add }), patch),
    patches: [patch],
  };
}

/**
 * Remove the character at `position` and return it.
 * Only piece ranges change; the character's bytes stay in their buffer.
 * Throws OutOfRangeError unless `0 <= position < length`.
 */
export function pieceTableRemoveChar(
  state: PieceTableState,
  position: CharOffset
): PieceTableRemoveResult {
  const { index, piece, offsetInPiece } = resolveOffset(state, position, 'removeChar');

  const bytes = getPieceBuffer(state, piece);
  const fromByte = pieceByteIndex(bytes, piece, offsetInPiece);
  const toByte = fromByte + utf8Width(bytes[fromByte]);
  const removed = textDecoder.decode(bytes.subarray(fromByte, toByte));
  const patch = removalPatch(state, index, piece, offsetInPiece, offsetInPiece + 1, fromByte, toByte);

  return { state: applyPatch(state, patch), patches: [patch], removed };
}

/**
 * Remove the characters in `[start, end)` and return them in document order.
 *
 * The whole range is checked before anything changes. Each piece the range
 * touches gets one patch, highest piece first so the indices of the pieces
 * still to be patched stay where they were.
 */
export function pieceTableRemove(
  state: PieceTableState,
  start: CharOffset,
  end: CharOffset
): PieceTableRemoveResult {
  if (!isValidOffset(start) || start > state.length) {
    throw new OutOfRangeError('remove', start, state.length);
  }
  if (!isValidOffset(end) || end > state.length) {
    throw new OutOfRangeError('remove', end, state.length);
  }
  if (start > end) {
    throw new OutOfRangeError(
      'remove',
      start,
      state.length,
      `remove: range start ${start} is after range end ${end}`
    );
  }
  if (start === end) return { state, patches: [], removed: '' };

  const touched: PieceLocation[] = [];
  let accumulated = 0;
  for (let index = 0; index < state.pieces.length && accumulated < end; index++) {
    const piece = state.pieces[index];
    const pieceEnd = accumulated + piece.charLength;
    if (pieceEnd > start && piece.charLength > 0) {
      touched.push({
        index,
        piece,
        offsetInPiece: Math.max(0, start - accumulated),
        pieceStartOffset: accumulated,
      });
    }
    accumulated = pieceEnd;
  }

  let current = state;
  const patches: PiecePatch[] = [];
  const removed: string[] = [];

  for (let i = touched.length - 1; i >= 0; i--) {
    const { index, piece, offsetInPiece: from, pieceStartOffset } = touched[i];
    const to = Math.min(piece.charLength, end - pieceStartOffset);

    const bytes = getPieceBuffer(state, piece);
    const fromByte = pieceByteIndex(bytes, piece, from);
    const toByte = bytes.length === piece.charLength
      ? to
      : charIndexToByte(bytes, fromByte, to - from);
    removed.push(textDecoder.decode(bytes.subarray(fromByte, toByte)));

    const patch = removalPatch(current, index, piece, from, to, fromByte, toByte);
    current = applyPatch(current, patch);
    patches.push(patch);
  }

  return { state: current, patches, removed: removed.reverse().join('') };
}

// =============================================================================
// Read Operations
// =============================================================================

/**
 * Project the current text.
 * Allocates one buffer of the final byte length and decodes it once.
 * An empty piece list projects the original buffer verbatim.
 */
export function getValue(state: PieceTableState): string {
  if (state.pieces.length === 0) return textDecoder.decode(state.original);

  const result = new Uint8Array(state.byteLength);
  let offset = 0;

  for (const piece of state.pieces) {
    const bytes = getPieceBuffer(state, piece);
    result.set(bytes, offset);
    offset += bytes.length;
  }

  return textDecoder.decode(result);
}

/**
 * Get the text of characters `[start, end)`, clamped to the document.
 * Returns '' for empty, inverted or non-integer ranges.
 */
export function getText(state: PieceTableState, start: CharOffset, end: CharOffset): string {
  if (!Number.isInteger(start) || !Number.isInteger(end)) return '';

  const from = Math.max(0, start);
  const to = Math.min(end, state.length);
  if (from >= to) return '';

  const parts: Uint8Array[] = [];
  let size = 0;
  let accumulated = 0;

  for (const piece of state.pieces) {
    const pieceEnd = accumulated + piece.charLength;
    if (accumulated >= to) break;

    if (pieceEnd > from) {
      const bytes = getPieceBuffer(state, piece);
      const sliceStart = charIndexToByte(bytes, 0, Math.max(0, from - accumulated));
      const sliceEnd = charIndexToByte(bytes, 0, Math.min(piece.charLength, to - accumulated));
      const slice = bytes.subarray(sliceStart, sliceEnd);
      parts.push(slice);
      size += slice.length;
    }
    accumulated = pieceEnd;
  }

  const result = new Uint8Array(size);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }

  return textDecoder.decode(result);
}

/**
 * The character at `position`.
 * Throws OutOfRangeError unless `0 <= position < length`.
 */
export function charAt(state: PieceTableState, position: CharOffset): string {
  const { piece, offsetInPiece } = resolveOffset(state, position, 'charAt');
  const bytes = getPieceBuffer(state, piece);
  const start = pieceByteIndex(bytes, piece, offsetInPiece);
  return textDecoder.decode(bytes.subarray(start, start + utf8Width(bytes[start])));
}

/**
 * Length of the text in characters.
 */
export function getLength(state: PieceTableState): number {
  return state.length;
}

/**
 * Length of the text in UTF-8 bytes.
 */
export function getByteLength(state: PieceTableState): number {
  return state.byteLength;
}

export function isEmpty(state: PieceTableState): boolean {
  return state.length === 0;
}

// =============================================================================
// Buffer Statistics
// =============================================================================

/**
 * Statistics about add buffer usage.
 */
export interface BufferStats {
  /** Total bytes appended to the add buffer */
  addBufferSize: number;
  /** Bytes still referenced by pieces */
  addBufferUsed: number;
  /** Bytes no piece references any more */
  addBufferWaste: number;
  /** Waste ratio (0-1) */
  wasteRatio: number;
}

export function getBufferStats(state: PieceTableState): BufferStats {
  let addBufferUsed = 0;
  for (const piece of state.pieces) {
    if (piece.source === 'add') {
      addBufferUsed += getPieceByteLength(piece);
    }
  }

  const addBufferSize = state.add.length;
  const addBufferWaste = addBufferSize - addBufferUsed;
  const wasteRatio = addBufferSize > 0 ? addBufferWaste / addBufferSize : 0;

  return {
    addBufferSize,
    addBufferUsed,
    addBufferWaste,
    wasteRatio,
  };
}
