/**
 * Type exports for piecework.
 */

// State types
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
} from './state.ts';

// Action types
export type {
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
} from './actions.ts';

export {
  textBufferActionSchema,
  isTextEditAction,
  isHistoryAction,
  isTextBufferAction,
  validateAction,
} from './actions.ts';

// Store types
export type {
  StoreListener,
  Unsubscribe,
  ReadonlyTextBufferStore,
  TextBufferReducer,
  TextBufferStore,
} from './store.ts';

// Branded position types
export type { ByteOffset, ByteLength, CharOffset } from './branded.ts';

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
} from './branded.ts';
