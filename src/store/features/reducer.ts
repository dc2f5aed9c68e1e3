/**
 * Text buffer reducer.
 * Pure state transitions: new state from old state + action, no side
 * effects. Invalid actions throw a PieceTableError and produce no state.
 */

import type { PiecePatch, TextBufferState } from '../../types/state.ts';
import type { TextBufferAction } from '../../types/actions.ts';
import { withState } from '../core/state.ts';
import {
  pieceTableInsert,
  pieceTableRemove,
  pieceTableRemoveChar,
  type PieceTableEditResult,
} from '../core/piece-table.ts';
import {
  createHistoryEntry,
  historyClear,
  historyPush,
  historyRedo,
  historyUndo,
} from './history.ts';

/**
 * New state plus what the action took out of the text.
 */
export interface ActionOutcome {
  readonly state: TextBufferState;
  /** Removed text for REMOVE_CHAR and REMOVE, '' otherwise */
  readonly removed: string;
  /** Whether the action pushed a history entry */
  readonly recorded: boolean;
  /** Piece list patches of a text edit, empty otherwise */
  readonly patches: readonly PiecePatch[];
}

/**
 * Commit a piece table edit: record its patches as one history entry
 * and bump the version. Edits without patches leave the state as is.
 */
function commitEdit(
  state: TextBufferState,
  kind: 'insert' | 'remove',
  result: PieceTableEditResult,
  removed: string
): ActionOutcome {
  if (result.patches.length === 0) {
    return { state, removed, recorded: false, patches: [] };
  }

  return {
    state: withState(state, {
      version: state.version + 1,
      pieceTable: result.state,
      history: historyPush(state.history, createHistoryEntry(kind, result.patches)),
    }),
    removed,
    recorded: true,
    patches: result.patches,
  };
}

/**
 * Apply an action and report what it removed.
 */
export function applyAction(state: TextBufferState, action: TextBufferAction): ActionOutcome {
  switch (action.type) {
    case 'INSERT': {
      const result = pieceTableInsert(state.pieceTable, action.at, action.text);
      return commitEdit(state, 'insert', result, '');
    }

    case 'REMOVE_CHAR': {
      const result = pieceTableRemoveChar(state.pieceTable, action.at);
      return commitEdit(state, 'remove', result, result.removed);
    }

    case 'REMOVE': {
      const result = pieceTableRemove(state.pieceTable, action.start, action.end);
      return commitEdit(state, 'remove', result, result.removed);
    }

    case 'UNDO': {
      const undone = historyUndo(state);
      return {
        state: withState(undone, { version: state.version + 1 }),
        removed: '',
        recorded: false,
        patches: [],
      };
    }

    case 'REDO': {
      const redone = historyRedo(state);
      return {
        state: withState(redone, { version: state.version + 1 }),
        removed: '',
        recorded: false,
        patches: [],
      };
    }

    case 'HISTORY_CLEAR': {
      return {
        state: withState(state, {
          version: state.version + 1,
          history: historyClear(state.history),
        }),
        removed: '',
        recorded: false,
        patches: [],
      };
    }

    default: {
      // Exhaustive check - TypeScript will error if we miss an action type
      const exhaustiveCheck: never = action;
      return exhaustiveCheck;
    }
  }
}

/**
 * Reducer form of applyAction.
 */
export function textBufferReducer(
  state: TextBufferState,
  action: TextBufferAction
): TextBufferState {
  return applyAction(state, action).state;
}
