/**
 * Core immutable state types for piecework.
 * Every structure is read-only; edits produce new snapshots that share
 * the buffers and untouched pieces with the previous one.
 */

import type { ByteOffset } from './branded.ts';
import type { GrowableBuffer } from '../store/core/growable-buffer.ts';

// =============================================================================
// Piece Table Types
// =============================================================================

/**
 * Which buffer a piece slices.
 */
export type PieceSource = 'original' | 'add';

/**
 * A contiguous run of visible text backed by a single buffer.
 * `[start, end)` is a half-open byte range with `start <= end`.
 */
export interface Piece {
  readonly source: PieceSource;
  readonly start: ByteOffset;
  readonly end: ByteOffset;
  /** Number of characters (code points) in the range */
  readonly charLength: number;
}

/**
 * Immutable piece table snapshot.
 */
export interface PieceTableState {
  /** UTF-8 bytes of the text the table was created from */
  readonly original: Uint8Array;
  /** Append-only buffer holding every inserted byte */
  readonly add: GrowableBuffer;
  /** Pieces in document order; their slices concatenate to the text */
  readonly pieces: readonly Piece[];
  /** Text length in characters (cached) */
  readonly length: number;
  /** Text length in bytes (cached) */
  readonly byteLength: number;
  /** Whether pieces narrowed to nothing are removed from the list */
  readonly pruneEmptyPieces: boolean;
}

/**
 * Result of resolving a character offset to the piece that holds it.
 */
export interface PieceLocation {
  /** Index of the piece in the piece list */
  readonly index: number;
  readonly piece: Piece;
  /** Character offset inside the piece */
  readonly offsetInPiece: number;
  /** Character offset in the document where the piece starts */
  readonly pieceStartOffset: number;
}

// =============================================================================
// History Types
// =============================================================================

/**
 * Pieces inserted at `index`; nothing removed.
 */
export interface InsertPatch {
  readonly kind: 'insert';
  readonly index: number;
  readonly pieces: readonly Piece[];
}

/**
 * The piece at `index` replaced by `parts`.
 */
export interface SplitPatch {
  readonly kind: 'split';
  readonly index: number;
  readonly original: Piece;
  readonly parts: readonly Piece[];
}

/**
 * The piece at `index` replaced by a narrower copy of itself.
 */
export interface NarrowPatch {
  readonly kind: 'narrow';
  readonly index: number;
  readonly before: Piece;
  readonly after: Piece;
}

/**
 * The piece at `index` removed from the list.
 */
export interface DropPatch {
  readonly kind: 'drop';
  readonly index: number;
  readonly piece: Piece;
}

/**
 * One reversible change to the piece list.
 */
export type PiecePatch = InsertPatch | SplitPatch | NarrowPatch | DropPatch;

/**
 * Kind of edit that produced a history entry.
 */
export type EditKind = 'insert' | 'remove' | 'batch';

/**
 * Patches of one caller-visible edit, undone and redone as a unit.
 * Patches are stored in the order they were applied.
 */
export interface HistoryEntry {
  readonly kind: EditKind;
  readonly patches: readonly PiecePatch[];
  readonly timestamp: number;
}

/**
 * Linear undo/redo history.
 */
export interface HistoryState {
  readonly undoStack: readonly HistoryEntry[];
  readonly redoStack: readonly HistoryEntry[];
  /** Maximum number of undo entries kept */
  readonly limit: number;
}

// =============================================================================
// Text Buffer State
// =============================================================================

/**
 * Complete snapshot held by a text buffer store.
 */
export interface TextBufferState {
  /** Monotonically increasing version number for change detection */
  readonly version: number;
  readonly pieceTable: PieceTableState;
  readonly history: HistoryState;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Options accepted when creating a text buffer.
 */
export interface TextBufferConfig {
  /** Initial content (default: '') */
  content?: string;
  /** Maximum undo entries (default: 1000) */
  historyLimit?: number;
  /** Drop pieces narrowed to zero length (default: true) */
  pruneEmptyPieces?: boolean;
}
