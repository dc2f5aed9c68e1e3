/**
 * piecework - an immutable piece table text buffer with patch-based undo.
 *
 * Main entry point exporting core types, store, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  PieceSource,
  Piece,
  PieceTableState,
  PieceLocation,
  InsertPatch,
  SplitPatch,
  NarrowPatch,
  DropPatch,
  PiecePatch,
  EditKind,
  HistoryEntry,
  HistoryState,
  TextBufferState,
  TextBufferConfig,
  InsertAction,
  RemoveCharAction,
  RemoveAction,
  UndoAction,
  RedoAction,
  HistoryClearAction,
  TextEditAction,
  HistoryAction,
  TextBufferAction,
  TextBufferActionType,
  ActionValidationResult,
  StoreListener,
  Unsubscribe,
  ReadonlyTextBufferStore,
  TextBufferReducer,
  TextBufferStore,
  ByteOffset,
  ByteLength,
  CharOffset,
} from './types/index.ts';

export {
  byteOffset,
  byteLength,
  charOffset,
  isValidOffset,
  addByteOffset,
  diffByteOffset,
  addCharOffset,
  diffCharOffset,
  clampCharOffset,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
  ZERO_CHAR_OFFSET,
} from './types/index.ts';

// =============================================================================
// Type Guards
// =============================================================================

export {
  textBufferActionSchema,
  isTextEditAction,
  isHistoryAction,
  isTextBufferAction,
  validateAction,
} from './types/index.ts';

// =============================================================================
// Store
// =============================================================================

export {
  createTextBuffer,
  fromText,
  isTextBuffer,
  TextBufferActions,
  serializeAction,
  deserializeAction,
  applyAction,
  textBufferReducer,
} from './store/index.ts';
export type { ActionOutcome } from './store/index.ts';

// =============================================================================
// State Factories
// =============================================================================

export {
  createPiece,
  createPieceTableState,
  createEmptyPieceTableState,
  createInitialHistoryState,
  createInitialState,
  withState,
  withPieceTable,
} from './store/index.ts';

// =============================================================================
// Piece Table Operations
// =============================================================================

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
  applyPatch,
  revertPatch,
  applyPatches,
  revertPatches,
  getPieceBuffer,
  getPieceText,
  getPieceByteLength,
  GrowableBuffer,
} from './store/index.ts';
export type {
  PieceTableEditResult,
  PieceTableRemoveResult,
  BufferStats,
} from './store/index.ts';

// =============================================================================
// Errors, Configuration and Logging
// =============================================================================

export {
  PieceTableError,
  OutOfRangeError,
  NoHistoryError,
  isPieceTableError,
  DEFAULT_HISTORY_LIMIT,
  resolveConfig,
  textBufferConfigSchema,
  logger,
  getLogger,
} from './store/index.ts';
export type {
  PieceTableErrorCode,
  ResolvedTextBufferConfig,
  LoggerScope,
} from './store/index.ts';

// =============================================================================
// Event System
// =============================================================================

export {
  createEventEmitter,
  createContentChangeEvent,
  createHistoryChangeEvent,
} from './store/index.ts';
export type {
  TextBufferEvent,
  ContentChangeEvent,
  HistoryChangeEvent,
  AnyTextBufferEvent,
  TextBufferEventMap,
  EventHandler,
  TextBufferEventEmitter,
} from './store/index.ts';

// =============================================================================
// History Helpers
// =============================================================================

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
} from './store/index.ts';

// =============================================================================
// Complexity-Stratified API Namespaces
// =============================================================================

export { query, scan } from './api/index.ts';
