/**
 * Action creator functions.
 * Type-safe factories for text buffer actions.
 */

import { z } from 'zod';
import { charOffset, type CharOffset } from '../../types/branded.ts';
import type {
  TextBufferAction,
  InsertAction,
  RemoveCharAction,
  RemoveAction,
  UndoAction,
  RedoAction,
  HistoryClearAction,
} from '../../types/actions.ts';
import { textBufferActionSchema } from '../../types/actions.ts';

/**
 * Action creators. All return frozen, serializable objects.
 */
export const TextBufferActions = {
  /**
   * @param at - Character offset the text will start at
   * @param text - Text to insert
   */
  insert(at: CharOffset, text: string): InsertAction {
    return Object.freeze({ type: 'INSERT', at, text });
  },

  /**
   * @param at - Offset of the character to remove
   */
  removeChar(at: CharOffset): RemoveCharAction {
    return Object.freeze({ type: 'REMOVE_CHAR', at });
  },

  /**
   * @param start - Start of the range (inclusive)
   * @param end - End of the range (exclusive)
   */
  remove(start: CharOffset, end: CharOffset): RemoveAction {
    return Object.freeze({ type: 'REMOVE', start, end });
  },

  undo(): UndoAction {
    return Object.freeze({ type: 'UNDO' });
  },

  redo(): RedoAction {
    return Object.freeze({ type: 'REDO' });
  },

  historyClear(): HistoryClearAction {
    return Object.freeze({ type: 'HISTORY_CLEAR' });
  },
};

/**
 * Serialize an action to a JSON string.
 */
export function serializeAction(action: TextBufferAction): string {
  return JSON.stringify(action);
}

/**
 * Parse an action from a JSON string, e.g. when replaying an edit log.
 * Throws on malformed JSON or on anything that is not a valid action.
 */
export function deserializeAction(json: string): TextBufferAction {
  const parsed: unknown = JSON.parse(json);
  const result = textBufferActionSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid deserialized action:\n${z.prettifyError(result.error)}`);
  }
  return toAction(result.data);
}

/**
 * Rebuild a typed action from its validated plain form.
 */
function toAction(data: z.infer<typeof textBufferActionSchema>): TextBufferAction {
  switch (data.type) {
    case 'INSERT':
      return TextBufferActions.insert(charOffset(data.at), data.text);
    case 'REMOVE_CHAR':
      return TextBufferActions.removeChar(charOffset(data.at));
    case 'REMOVE':
      return TextBufferActions.remove(charOffset(data.start), charOffset(data.end));
    case 'UNDO':
      return TextBufferActions.undo();
    case 'REDO':
      return TextBufferActions.redo();
    case 'HISTORY_CLEAR':
      return TextBufferActions.historyClear();
    default: {
      const exhaustiveCheck: never = data;
      return exhaustiveCheck;
    }
  }
}
