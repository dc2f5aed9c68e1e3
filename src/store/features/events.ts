/**
 * Event system for text buffers.
 * Pub/sub for content and history changes, typed per event name.
 */

import type { TextBufferState } from '../../types/state.ts';
import type { TextEditAction } from '../../types/actions.ts';
import { getLogger } from '../core/logger.ts';

const log = getLogger('events');

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface TextBufferEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after an insert or removal changed the text.
 */
export interface ContentChangeEvent extends TextBufferEvent {
  readonly type: 'content-change';
  /** The action that caused the change */
  readonly action: TextEditAction;
  readonly prevState: TextBufferState;
  readonly nextState: TextBufferState;
  /** Text taken out by the action ('' for inserts) */
  readonly removed: string;
}

/**
 * Fired after undo or redo.
 */
export interface HistoryChangeEvent extends TextBufferEvent {
  readonly type: 'history-change';
  readonly direction: 'undo' | 'redo';
  readonly prevState: TextBufferState;
  readonly nextState: TextBufferState;
}

export type AnyTextBufferEvent = ContentChangeEvent | HistoryChangeEvent;

/**
 * Event name to event type mapping.
 */
export interface TextBufferEventMap {
  'content-change': ContentChangeEvent;
  'history-change': HistoryChangeEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

export type EventHandler<T extends AnyTextBufferEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

type HandlerSets = {
  [K in keyof TextBufferEventMap]: Set<EventHandler<TextBufferEventMap[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

export interface TextBufferEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
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
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof TextBufferEventMap>(type: K, event: TextBufferEventMap[K]): void;

  /**
   * Number of handlers registered for `type`.
   */
  listenerCount(type: keyof TextBufferEventMap): number;

  removeAllListeners(): void;
}

/**
 * Create a new event emitter.
 */
export function createEventEmitter(): TextBufferEventEmitter {
  const handlers: HandlerSets = {
    'content-change': new Set(),
    'history-change': new Set(),
  };

  return {
    addEventListener(type, handler) {
      handlers[type].add(handler);
      return () => {
        handlers[type].delete(handler);
      };
    },

    removeEventListener(type, handler) {
      handlers[type].delete(handler);
    },

    emit(type, event) {
      for (const handler of handlers[type]) {
        try {
          handler(event);
        } catch (error) {
          log.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    listenerCount(type) {
      return handlers[type].size;
    },

    removeAllListeners() {
      handlers['content-change'].clear();
      handlers['history-change'].clear();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createContentChangeEvent(
  action: TextEditAction,
  prevState: TextBufferState,
  nextState: TextBufferState,
  removed: string
): ContentChangeEvent {
  return Object.freeze({
    type: 'content-change' as const,
    timestamp: Date.now(),
    action,
    prevState,
    nextState,
    removed,
  });
}

export function createHistoryChangeEvent(
  direction: 'undo' | 'redo',
  prevState: TextBufferState,
  nextState: TextBufferState
): HistoryChangeEvent {
  return Object.freeze({
    type: 'history-change' as const,
    timestamp: Date.now(),
    direction,
    prevState,
    nextState,
  });
}
