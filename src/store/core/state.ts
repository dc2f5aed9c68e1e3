/**
 * State factory functions for piecework.
 * Creates initial immutable state structures.
 */

import type {
  Piece,
  PieceSource,
  PieceTableState,
  HistoryState,
  TextBufferConfig,
  TextBufferState,
} from '../../types/state.ts';
import { byteOffset, type ByteOffset } from '../../types/branded.ts';
import { GrowableBuffer } from './growable-buffer.ts';
import { countChars, textEncoder } from './encoding.ts';
import { DEFAULT_HISTORY_LIMIT, resolveConfig } from './config.ts';

/**
 * Create a piece. All pieces flow through here so they are always frozen.
 */
export function createPiece(
  source: PieceSource,
  start: ByteOffset,
  end: ByteOffset,
  charLength: number
): Piece {
  return Object.freeze({ source, start, end, charLength });
}

/**
 * Create a piece table from initial content.
 * The piece list starts as one `original` piece spanning the whole text,
 * even when the text is empty.
 */
export function createPieceTableState(
  content: string,
  pruneEmptyPieces: boolean = true
): PieceTableState {
  const original = textEncoder.encode(content);
  const charLength = countChars(original, 0, original.length);

  return Object.freeze({
    original,
    add: GrowableBuffer.empty(),
    pieces: Object.freeze([
      createPiece('original', byteOffset(0), byteOffset(original.length), charLength),
    ]),
    length: charLength,
    byteLength: original.length,
    pruneEmptyPieces,
  });
}

/**
 * Create an empty piece table.
 */
export function createEmptyPieceTableState(): PieceTableState {
  return createPieceTableState('');
}

/**
 * Create an empty history.
 */
export function createInitialHistoryState(limit: number = DEFAULT_HISTORY_LIMIT): HistoryState {
  return Object.freeze({
    undoStack: Object.freeze([]),
    redoStack: Object.freeze([]),
    limit,
  });
}

/**
 * Create the initial text buffer state from (validated) configuration.
 */
export function createInitialState(config: TextBufferConfig = {}): TextBufferState {
  const resolved = resolveConfig(config);

  return Object.freeze({
    version: 0,
    pieceTable: createPieceTableState(resolved.content, resolved.pruneEmptyPieces),
    history: createInitialHistoryState(resolved.historyLimit),
  });
}

/**
 * Copy-on-write helper for TextBufferState.
 */
export function withState(
  state: TextBufferState,
  changes: Partial<TextBufferState>
): TextBufferState {
  return Object.freeze({ ...state, ...changes });
}

/**
 * Copy-on-write helper for PieceTableState.
 */
export function withPieceTable(
  state: PieceTableState,
  changes: Partial<PieceTableState>
): PieceTableState {
  return Object.freeze({ ...state, ...changes });
}
