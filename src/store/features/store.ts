/**
 * Text buffer store.
 * Factory function that creates a TextBufferStore with encapsulated state.
 */

import type { PiecePatch, TextBufferConfig, TextBufferState } from '../../types/state.ts';
import type { TextBufferAction, TextEditAction } from '../../types/actions.ts';
import type { StoreListener, TextBufferStore, Unsubscribe } from '../../types/store.ts';
import { charOffset } from '../../types/branded.ts';
import { isTextEditAction } from '../../types/actions.ts';
import { createInitialState, withState } from '../core/state.ts';
import { charAt, getLength, getText, getValue, isEmpty } from '../core/piece-table.ts';
import { getLogger } from '../core/logger.ts';
import { applyAction, type ActionOutcome } from './reducer.ts';
import { TextBufferActions } from './actions.ts';
import { canRedo, canUndo, createHistoryEntry, historyPush } from './history.ts';
import {
  createContentChangeEvent,
  createEventEmitter,
  createHistoryChangeEvent,
} from './events.ts';

const log = getLogger('store');

/**
 * One applied action, kept so events can be emitted after commit.
 */
interface AppliedStep {
  readonly action: TextBufferAction;
  readonly prevState: TextBufferState;
  readonly nextState: TextBufferState;
  readonly removed: string;
}

/**
 * Create a text buffer.
 * Encapsulates the current snapshot, listeners and event emitter; every
 * change goes through the pure reducer and replaces the snapshot only on
 * success.
 *
 * @example
 * ```typescript
 * const buffer = createTextBuffer({ content: 'some text' });
 * buffer.insert(' more', 9);
 * buffer.removeChar(0); // 's'
 * buffer.project(); // 'ome text more'
 * buffer.undo();
 * ```
 */
export function createTextBuffer(config: TextBufferConfig = {}): TextBufferStore {
  let state = createInitialState(config);
  const listeners = new Set<StoreListener>();
  const emitter = createEventEmitter();

  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        log.error('Store listener threw an error:', error);
      }
    }
  }

  function emitEvents(step: AppliedStep): void {
    const { action, prevState, nextState, removed } = step;

    if (isTextEditAction(action)) {
      emitter.emit('content-change', createContentChangeEvent(action, prevState, nextState, removed));
    } else if (action.type === 'UNDO' || action.type === 'REDO') {
      emitter.emit(
        'history-change',
        createHistoryChangeEvent(action.type === 'UNDO' ? 'undo' : 'redo', prevState, nextState)
      );
    }
  }

  function subscribe(listener: StoreListener): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function getSnapshot(): TextBufferState {
    return state;
  }

  /**
   * Apply one action and publish the result.
   * The reducer throws before any state is replaced.
   */
  function run(action: TextBufferAction): ActionOutcome {
    const prevState = state;
    const outcome = applyAction(prevState, action);

    if (outcome.state !== prevState) {
      state = outcome.state;
      notifyListeners();
      emitEvents({ action, prevState, nextState: state, removed: outcome.removed });
    }

    return outcome;
  }

  function dispatch(action: TextBufferAction): TextBufferState {
    run(action);
    return state;
  }

  function batch(actions: readonly TextEditAction[]): TextBufferState {
    if (actions.length === 0) return state;

    const rejected = actions.find((action): boolean => !isTextEditAction(action));
    if (rejected !== undefined) {
      throw new TypeError(`batch: only text edits can be batched, got ${rejected.type}`);
    }

    // work on a local snapshot; the store only sees the final state
    let working = state;
    const patches: PiecePatch[] = [];
    const steps: AppliedStep[] = [];

    try {
      for (const action of actions) {
        const outcome = applyAction(working, action);
        steps.push({ action, prevState: working, nextState: outcome.state, removed: outcome.removed });
        patches.push(...outcome.patches);
        working = outcome.state;
      }
    } catch (error) {
      log.debug(`batch rolled back after ${steps.length} of ${actions.length} actions`);
      throw error;
    }

    // one entry on top of the pre-batch history, so the limit never splits a batch
    if (patches.length > 0) {
      working = withState(working, {
        history: historyPush(state.history, createHistoryEntry('batch', patches)),
      });
    }

    if (working !== state) {
      state = working;
      notifyListeners();
      for (const step of steps) {
        emitEvents(step);
      }
    }

    return state;
  }

  function insert(text: string, at: number): void {
    run(TextBufferActions.insert(charOffset(at), text));
  }

  function insertChar(char: string, at: number): void {
    if ([...char].length !== 1) {
      throw new TypeError(`insertChar: expected a single character, got ${JSON.stringify(char)}`);
    }
    insert(char, at);
  }

  function removeChar(at: number): string {
    return run(TextBufferActions.removeChar(charOffset(at))).removed;
  }

  function remove(start: number, end: number): string {
    return run(TextBufferActions.remove(charOffset(start), charOffset(end))).removed;
  }

  return {
    subscribe,
    getSnapshot,
    dispatch,
    batch,
    insert,
    insertChar,
    removeChar,
    remove,
    undo: () => {
      run(TextBufferActions.undo());
    },
    redo: () => {
      run(TextBufferActions.redo());
    },
    clearHistory: () => {
      run(TextBufferActions.historyClear());
    },
    project: () => getValue(state.pieceTable),
    getText: (start, end) => getText(state.pieceTable, charOffset(start), charOffset(end)),
    charAt: (at) => charAt(state.pieceTable, charOffset(at)),
    length: () => getLength(state.pieceTable),
    isEmpty: () => isEmpty(state.pieceTable),
    canUndo: () => canUndo(state),
    canRedo: () => canRedo(state),
    addEventListener: emitter.addEventListener,
    removeEventListener: emitter.removeEventListener,
    events: emitter,
  };
}

/**
 * Create a text buffer holding `text`.
 */
export function fromText(text: string): TextBufferStore {
  return createTextBuffer({ content: text });
}

/**
 * Check if a value is a TextBufferStore.
 */
export function isTextBuffer(value: unknown): value is TextBufferStore {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'subscribe' in value &&
    typeof value.subscribe === 'function' &&
    'getSnapshot' in value &&
    typeof value.getSnapshot === 'function' &&
    'dispatch' in value &&
    typeof value.dispatch === 'function' &&
    'project' in value &&
    typeof value.project === 'function'
  );
}
