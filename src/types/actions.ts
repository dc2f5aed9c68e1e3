/**
 * Text buffer action types.
 * Every mutation can be expressed as a serializable action, which makes
 * edits loggable and replayable.
 */

import { z } from 'zod';
import type { CharOffset } from './branded.ts';

// =============================================================================
// Text Editing Actions
// =============================================================================

/**
 * Insert text so that it starts at a character offset.
 */
export interface InsertAction {
  readonly type: 'INSERT';
  readonly at: CharOffset;
  readonly text: string;
}

/**
 * Remove the single character at an offset.
 */
export interface RemoveCharAction {
  readonly type: 'REMOVE_CHAR';
  readonly at: CharOffset;
}

/**
 * Remove the characters in `[start, end)`.
 */
export interface RemoveAction {
  readonly type: 'REMOVE';
  readonly start: CharOffset;
  readonly end: CharOffset;
}

// =============================================================================
// History Actions
// =============================================================================

export interface UndoAction {
  readonly type: 'UNDO';
}

export interface RedoAction {
  readonly type: 'REDO';
}

/**
 * Clear both undo and redo stacks.
 */
export interface HistoryClearAction {
  readonly type: 'HISTORY_CLEAR';
}

// =============================================================================
// Union Types
// =============================================================================

export type TextEditAction = InsertAction | RemoveCharAction | RemoveAction;

export type HistoryAction = UndoAction | RedoAction | HistoryClearAction;

export type TextBufferAction = TextEditAction | HistoryAction;

export type TextBufferActionType = TextBufferAction['type'];

// =============================================================================
// Schemas
// =============================================================================

const offsetSchema = z.number().int().nonnegative();

export const textBufferActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('INSERT'), at: offsetSchema, text: z.string() }),
  z.object({ type: z.literal('REMOVE_CHAR'), at: offsetSchema }),
  z.object({ type: z.literal('REMOVE'), start: offsetSchema, end: offsetSchema }),
  z.object({ type: z.literal('UNDO') }),
  z.object({ type: z.literal('REDO') }),
  z.object({ type: z.literal('HISTORY_CLEAR') }),
]);

// =============================================================================
// Type Guards
// =============================================================================

export function isTextEditAction(action: TextBufferAction): action is TextEditAction {
  return action.type === 'INSERT' || action.type === 'REMOVE_CHAR' || action.type === 'REMOVE';
}

export function isHistoryAction(action: TextBufferAction): action is HistoryAction {
  return action.type === 'UNDO' || action.type === 'REDO' || action.type === 'HISTORY_CLEAR';
}

/**
 * Check that an unknown value is a well-formed action.
 */
export function isTextBufferAction(value: unknown): value is TextBufferAction {
  return textBufferActionSchema.safeParse(value).success;
}

// =============================================================================
// Validation
// =============================================================================

export interface ActionValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

/**
 * Validate an action's shape and, when `documentLength` is given, its
 * offsets against the document.
 *
 * @example
 * ```typescript
 * const result = validateAction({ type: 'INSERT', at: 200, text: 'x' }, 100);
 * // { valid: false, errors: ['INSERT at 200 exceeds document length 100'] }
 * ```
 */
export function validateAction(value: unknown, documentLength?: number): ActionValidationResult {
  const parsed = textBufferActionSchema.safeParse(value);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
    };
  }

  const errors: string[] = [];
  const action = parsed.data;

  if (documentLength !== undefined) {
    switch (action.type) {
      case 'INSERT':
        if (action.at > documentLength) {
          errors.push(`INSERT at ${action.at} exceeds document length ${documentLength}`);
        }
        break;
      case 'REMOVE_CHAR':
        if (action.at >= documentLength) {
          errors.push(`REMOVE_CHAR at ${action.at} is not before document length ${documentLength}`);
        }
        break;
      case 'REMOVE':
        if (action.end > documentLength) {
          errors.push(`REMOVE end ${action.end} exceeds document length ${documentLength}`);
        }
        break;
      default:
        break;
    }
  }

  if (action.type === 'REMOVE' && action.start > action.end) {
    errors.push(`REMOVE start ${action.start} is after end ${action.end}`);
  }

  return { valid: errors.length === 0, errors };
}
