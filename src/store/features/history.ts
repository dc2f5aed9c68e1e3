/**
 * Patch-based undo/redo history.
 *
 * Each entry holds the piece list patches of one edit. Undo reverts them
 * newest first, redo re-applies them in order, so any edit is reversed
 * exactly wherever in the list it happened.
 */

import type {
  EditKind,
  HistoryEntry,
  HistoryState,
  PiecePatch,
  TextBufferState,
} from '../../types/state.ts';
import { applyPatches, revertPatches } from '../core/piece-table.ts';
import { withState } from '../core/state.ts';
import { NoHistoryError } from '../core/errors.ts';
import { getLogger } from '../core/logger.ts';

const log = getLogger('history');

// =============================================================================
// Entries
// =============================================================================

export function createHistoryEntry(
  kind: EditKind,
  patches: readonly PiecePatch[],
  timestamp: number = Date.now()
): HistoryEntry {
  return Object.freeze({ kind, patches: Object.freeze([...patches]), timestamp });
}

/**
 * Push an entry, dropping the oldest ones beyond the limit.
 * A new edit invalidates the redo stack: its patch indices were taken
 * against a piece list that no longer exists.
 */
export function historyPush(history: HistoryState, entry: HistoryEntry): HistoryState {
  let undoStack = [...history.undoStack, entry];
  if (undoStack.length > history.limit) {
    undoStack = undoStack.slice(undoStack.length - history.limit);
  }

  return Object.freeze({
    ...history,
    undoStack: Object.freeze(undoStack),
    redoStack: Object.freeze([]),
  });
}

/**
 * Collapse the newest `count` undo entries into one, keeping patch order.
 */
export function mergeLatestEntries(
  history: HistoryState,
  count: number,
  kind: EditKind = 'batch'
): HistoryState {
  const take = Math.min(count, history.undoStack.length);
  if (take <= 1) return history;

  const kept = history.undoStack.slice(0, history.undoStack.length - take);
  const merged = history.undoStack.slice(history.undoStack.length - take);
  const entry = createHistoryEntry(
    kind,
    merged.flatMap((e) => e.patches),
    merged[merged.length - 1].timestamp
  );

  return Object.freeze({
    ...history,
    undoStack: Object.freeze([...kept, entry]),
  });
}

/**
 * Empty both stacks, keeping the limit.
 */
export function historyClear(history: HistoryState): HistoryState {
  return Object.freeze({
    undoStack: Object.freeze([]),
    redoStack: Object.freeze([]),
    limit: history.limit,
  });
}

// =============================================================================
// Undo / Redo
// =============================================================================

/**
 * Revert the newest undo entry and move it to the redo stack.
 * Throws NoHistoryError when there is nothing to undo.
 */
export function historyUndo(state: TextBufferState): TextBufferState {
  const history = state.history;
  if (history.undoStack.length === 0) throw new NoHistoryError('undo');

  const entry = history.undoStack[history.undoStack.length - 1];
  log.debug(`undo ${entry.kind} (${entry.patches.length} patches)`);

  return withState(state, {
    pieceTable: revertPatches(state.pieceTable, entry.patches),
    history: Object.freeze({
      ...history,
      undoStack: Object.freeze(history.undoStack.slice(0, -1)),
      redoStack: Object.freeze([...history.redoStack, entry]),
    }),
  });
}

/**
 * Re-apply the newest redo entry and move it back to the undo stack.
 * Throws NoHistoryError when there is nothing to redo.
 */
export function historyRedo(state: TextBufferState): TextBufferState {
  const history = state.history;
  if (history.redoStack.length === 0) throw new NoHistoryError('redo');

  const entry = history.redoStack[history.redoStack.length - 1];
  log.debug(`redo ${entry.kind} (${entry.patches.length} patches)`);

  return withState(state, {
    pieceTable: applyPatches(state.pieceTable, entry.patches),
    history: Object.freeze({
      ...history,
      undoStack: Object.freeze([...history.undoStack, entry]),
      redoStack: Object.freeze(history.redoStack.slice(0, -1)),
    }),
  });
}

// =============================================================================
// Queries
// =============================================================================

function historyOf(state: TextBufferState | HistoryState): HistoryState {
  return 'history' in state ? state.history : state;
}

/**
 * Check if undo is available.
 */
export function canUndo(state: TextBufferState | HistoryState): boolean {
  return historyOf(state).undoStack.length > 0;
}

/**
 * Check if redo is available.
 */
export function canRedo(state: TextBufferState | HistoryState): boolean {
  return historyOf(state).redoStack.length > 0;
}

export function getUndoCount(state: TextBufferState | HistoryState): number {
  return historyOf(state).undoStack.length;
}

export function getRedoCount(state: TextBufferState | HistoryState): number {
  return historyOf(state).redoStack.length;
}

/**
 * Check if history is empty (no undo or redo available).
 */
export function isHistoryEmpty(state: TextBufferState | HistoryState): boolean {
  const history = historyOf(state);
  return history.undoStack.length === 0 && history.redoStack.length === 0;
}
