/**
 * TextBufferStore interface.
 * Framework-agnostic store shape (subscribe/getSnapshot/dispatch) with the
 * engine's convenience operations layered on top.
 */

import type { TextBufferState } from './state.ts';
import type { TextBufferAction, TextEditAction } from './actions.ts';
import type {
  EventHandler,
  TextBufferEventEmitter,
  TextBufferEventMap,
} from '../store/features/events.ts';

/**
 * Listener function type for store subscriptions.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

/**
 * Read-only subset of TextBufferStore for consumers that only need to read state.
 */
export interface ReadonlyTextBufferStore {
  subscribe(listener: StoreListener): Unsubscribe;
  /**
   * Current immutable snapshot.
   * Returns the same reference until the state changes.
   */
  getSnapshot(): TextBufferState;
}

/**
 * Type for the text buffer reducer function.
 */
export type TextBufferReducer = (
  state: TextBufferState,
  action: TextBufferAction
) => TextBufferState;

export interface TextBufferStore extends ReadonlyTextBufferStore {
  /**
   * Apply an action. Throws a PieceTableError when the action is out of
   * range or has no history to act on; the state is unchanged then.
   * @returns New state after applying the action
   */
  dispatch(action: TextBufferAction): TextBufferState;

  /**
   * Apply several text edits as one undo unit.
   * Listeners are notified once. If any action throws, the store is
   * restored to where it was before the batch and the error is rethrown.
   */
  batch(actions: readonly TextEditAction[]): TextBufferState;

  /**
   * Insert `text` so that it starts at character `at`.
   */
  insert(text: string, at: number): void;

  /**
   * Insert a single character (one code point) at `at`.
   */
  insertChar(char: string, at: number): void;

  /**
   * Remove the character at `at` and return it.
   */
  removeChar(at: number): string;

  /**
   * Remove the characters in `[start, end)` and return them.
   */
  remove(start: number, end: number): string;

  undo(): void;

  redo(): void;

  /**
   * Drop all undo and redo entries.
   */
  clearHistory(): void;

  /**
   * The current text.
   */
  project(): string;

  /**
   * Text of the characters in `[start, end)`, clamped to the document.
   */
  getText(start: number, end: number): string;

  charAt(at: number): string;

  /**
   * Length in characters.
   */
  length(): number;

  isEmpty(): boolean;

  canUndo(): boolean;

  canRedo(): boolean;

  /**
   * Subscribe to typed change events.
   *
   * @example
   * ```typescript
   * buffer.addEventListener('content-change', (event) => {
   *   console.log(event.action.type, event.removed);
   * });
   * ```
   */
  addEventListener<K extends keyof TextBufferEventMap>(
    type: K,
    handler: EventHandler<TextBufferEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof TextBufferEventMap>(
    type: K,
    handler: EventHandler<TextBufferEventMap[K]>
  ): void;

  /**
   * The underlying event emitter.
   */
  readonly events: TextBufferEventEmitter;
}
