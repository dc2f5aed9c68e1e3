/**
 * Store exports for piecework.
 */

// Store factory
export { createTextBuffer, fromText, isTextBuffer } from './features/store.ts';

// Action creators
export { TextBufferActions, serializeAction, deserializeAction } from './features/actions.ts';

// Reducer
export { applyAction, textBufferReducer } from './features/reducer.ts';
export type { ActionOutcome } from './features/reducer.ts';

// State factories
export {
  createPiece,
  createPieceTableState,
  createEmptyPieceTableState,
  createInitialHistoryState,
  createInitialState,
  withState,
  withPieceTable,
} from './core/state.ts';

// Piece table operations
export {
  pieceTableInsert,
  pieceTableRemoveChar,
  pieceTableRemove,
  getValue,
  getText,
  charAt,
  getLength,
  getByteLength,
  isEmpty,
  findPieceAtPosition,
  resolveOffset,
  collectPieces,
  splitPiece,
  getBufferStats,
  // Patches
  applyPatch,
  revertPatch,
  applyPatches,
  revertPatches,
  // Buffer access helpers
  getPieceBuffer,
  getPieceText,
  getPieceByteLength,
} from './core/piece-table.ts';
export type {
  PieceTableEditResult,
  PieceTableRemoveResult,
  BufferStats,
} from './core/piece-table.ts';

export { GrowableBuffer } from './core/growable-buffer.ts';

// Errors
export {
  PieceTableError,
  OutOfRangeError,
  NoHistoryError,
  isPieceTableError,
} from './core/errors.ts';
export type { PieceTableErrorCode } from './core/errors.ts';

// Configuration and logging
export { DEFAULT_HISTORY_LIMIT, resolveConfig, textBufferConfigSchema } from './core/config.ts';
export type { ResolvedTextBufferConfig } from './core/config.ts';
export { logger, getLogger } from './core/logger.ts';
export type { LoggerScope } from './core/logger.ts';

// Event system
export {
  createEventEmitter,
  createContentChangeEvent,
  createHistoryChangeEvent,
} from './features/events.ts';
export type {
  TextBufferEvent,
  ContentChangeEvent,
  HistoryChangeEvent,
  AnyTextBufferEvent,
  TextBufferEventMap,
  EventHandler,
  TextBufferEventEmitter,
} from './features/events.ts';

// History helpers
export {
  createHistoryEntry,
  historyPush,
  historyUndo,
  historyRedo,
  historyClear,
  mergeLatestEntries,
  canUndo,
  canRedo,
  getUndoCount,
  getRedoCount,
  isHistoryEmpty,
} from './features/history.ts';
