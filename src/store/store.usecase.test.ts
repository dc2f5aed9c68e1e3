/**
 * Editing use case tests for the text buffer store.
 * Tests drive the caller-facing API the way an editor would.
 */

import { describe, it, expect, vi } from 'vitest';
import { createTextBuffer, fromText } from './features/store.ts';
import { TextBufferActions } from './features/actions.ts';
import { NoHistoryError, OutOfRangeError } from './core/errors.ts';
import { charOffset } from '../types/branded.ts';
import type { ContentChangeEvent, HistoryChangeEvent } from './features/events.ts';

describe('Editing Use Cases', () => {
  describe('Basic scenarios', () => {
    it('should remove a single character', () => {
      const buffer = fromText('initial text');
      expect(buffer.removeChar(7)).toBe(' ');
      expect(buffer.project()).toBe('initialtext');
    });

    it('should remove a half-open range', () => {
      const buffer = fromText('initial text');
      expect(buffer.remove(7, 12)).toBe(' text');
      expect(buffer.project()).toBe('initial');
    });

    it('should insert before text inserted earlier at the same offset', () => {
      const buffer = fromText('a');
      buffer.insert('b', 1);
      buffer.insert('c', 1);
      expect(buffer.project()).toBe('acb');
    });

    it('should insert into an empty buffer', () => {
      const buffer = fromText('');
      buffer.insert('s', 0);
      expect(buffer.project()).toBe('s');
      expect(buffer.length()).toBe(1);
      expect(buffer.isEmpty()).toBe(false);
    });

    it('should reject an insert past the end and keep the text', () => {
      const buffer = fromText('initial text');
      expect(() => buffer.insert('s', 1000)).toThrow(OutOfRangeError);
      expect(buffer.project()).toBe('initial text');
    });
  });

  describe('Typing', () => {
    it('should handle typing a sentence character by character', () => {
      const buffer = createTextBuffer();
      const text = 'Hello World';

      for (let i = 0; i < text.length; i++) {
        buffer.insertChar(text[i], i);
      }

      expect(buffer.project()).toBe(text);
      expect(buffer.length()).toBe(text.length);
      expect(buffer.getSnapshot().version).toBe(text.length);
    });

    it('should handle backspace from the end', () => {
      const buffer = fromText('Hello World');
      expect(buffer.removeChar(10)).toBe('d');
      expect(buffer.removeChar(9)).toBe('l');
      expect(buffer.removeChar(8)).toBe('r');
      expect(buffer.project()).toBe('Hello Wo');
    });

    it('should handle inserts at the start, middle and end', () => {
      const buffer = fromText('Hello');
      buffer.insert(' World', 5);
      buffer.insert('Say ', 0);
      buffer.insert(',', 9);
      expect(buffer.project()).toBe('Say Hello, World');
      expect(buffer.length()).toBe(16);
    });

    it('should accept a single astral character', () => {
      const buffer = fromText('ab');
      buffer.insertChar('😀', 1);
      expect(buffer.project()).toBe('a😀b');
      expect(buffer.length()).toBe(3);
      expect(buffer.charAt(1)).toBe('😀');
    });

    it('should reject anything but one character in insertChar', () => {
      const buffer = fromText('ab');
      expect(() => buffer.insertChar('', 0)).toThrow(TypeError);
      expect(() => buffer.insertChar('xy', 0)).toThrow('insertChar: expected a single character, got "xy"');
      expect(buffer.project()).toBe('ab');
    });
  });

  describe('Bounds', () => {
    it('should reject every out of range offset without changing anything', () => {
      const buffer = fromText('abc');
      const before = buffer.getSnapshot();

      expect(() => buffer.insert('x', 4)).toThrow(OutOfRangeError);
      expect(() => buffer.removeChar(3)).toThrow(OutOfRangeError);
      expect(() => buffer.remove(1, 4)).toThrow(OutOfRangeError);
      expect(() => buffer.remove(2, 1)).toThrow(OutOfRangeError);

      expect(buffer.getSnapshot()).toBe(before);
      expect(buffer.project()).toBe('abc');
      expect(buffer.canUndo()).toBe(false);
    });
  });

  describe('Multi-byte text', () => {
    it('should address text by character', () => {
      const buffer = fromText('naïve café');
      expect(buffer.length()).toBe(10);
      expect(buffer.removeChar(2)).toBe('ï');
      expect(buffer.remove(8, 9)).toBe('é');
      expect(buffer.project()).toBe('nave caf');
      expect(buffer.getSnapshot().pieceTable.byteLength).toBe(8);
    });

    it('should keep length equal to the projected character count', () => {
      const buffer = fromText('日本');
      buffer.insert('語', 2);
      buffer.insert('🎉', 0);
      buffer.removeChar(1);

      const projected = buffer.project();
      expect(projected).toBe('🎉本語');
      expect(buffer.length()).toBe([...projected].length);
    });
  });

  describe('Undo/Redo Workflows', () => {
    it('should undo and redo a single insert', () => {
      const buffer = fromText('some text');
      buffer.insert(' more', 4);

      buffer.undo();
      expect(buffer.project()).toBe('some text');

      buffer.redo();
      expect(buffer.project()).toBe('some more text');
    });

    it('should undo an edit in the middle of the list, not the last piece', () => {
      const buffer = fromText('abcdef');
      buffer.insert('X', 3);
      buffer.removeChar(0);
      expect(buffer.project()).toBe('bcXdef');

      buffer.undo();
      expect(buffer.project()).toBe('abcXdef');
      buffer.undo();
      expect(buffer.project()).toBe('abcdef');
    });

    it('should restore the exact piece list', () => {
      const buffer = fromText('initial text');
      const before = buffer.getSnapshot().pieceTable.pieces;

      buffer.remove(3, 9);
      buffer.undo();

      expect(buffer.getSnapshot().pieceTable.pieces).toEqual(before);
      expect(buffer.length()).toBe(12);
    });

    it('should throw NoHistoryError when there is nothing to undo or redo', () => {
      const buffer = fromText('abc');
      expect(() => buffer.undo()).toThrow(NoHistoryError);
      expect(() => buffer.redo()).toThrow(NoHistoryError);
      expect(buffer.project()).toBe('abc');
    });

    it('should drop redo history after a new edit', () => {
      const buffer = fromText('abc');
      buffer.insert('d', 3);
      buffer.undo();
      buffer.insert('e', 3);

      expect(buffer.canRedo()).toBe(false);
      expect(buffer.project()).toBe('abce');
    });

    it('should forget history on clearHistory', () => {
      const buffer = fromText('abc');
      buffer.insert('d', 3);
      buffer.clearHistory();

      expect(buffer.canUndo()).toBe(false);
      expect(() => buffer.undo()).toThrow(NoHistoryError);
      expect(buffer.project()).toBe('abcd');
    });

    it('should respect the history limit', () => {
      const buffer = createTextBuffer({ historyLimit: 1 });
      buffer.insert('a', 0);
      buffer.insert('b', 1);

      buffer.undo();
      expect(buffer.project()).toBe('a');
      expect(buffer.canUndo()).toBe(false);
    });
  });

  describe('Batch', () => {
    it('should apply several edits as one undo unit', () => {
      const buffer = fromText('Hello World');
      const listener = vi.fn();
      buffer.subscribe(listener);

      buffer.batch([
        TextBufferActions.remove(charOffset(6), charOffset(11)),
        TextBufferActions.insert(charOffset(6), 'There'),
      ]);

      expect(buffer.project()).toBe('Hello There');
      expect(listener).toHaveBeenCalledTimes(1);

      buffer.undo();
      expect(buffer.project()).toBe('Hello World');
      expect(buffer.canUndo()).toBe(false);
    });

    it('should keep a batch longer than the history limit as one undo unit', () => {
      const buffer = createTextBuffer({ content: 'abc', historyLimit: 1 });

      buffer.batch([
        TextBufferActions.insert(charOffset(3), 'X'),
        TextBufferActions.insert(charOffset(4), 'Y'),
        TextBufferActions.insert(charOffset(5), 'Z'),
      ]);
      expect(buffer.project()).toBe('abcXYZ');
      expect(buffer.getSnapshot().history.undoStack).toHaveLength(1);
      expect(buffer.getSnapshot().history.undoStack[0].kind).toBe('batch');

      buffer.undo();
      expect(buffer.project()).toBe('abc');
      expect(buffer.canUndo()).toBe(false);

      buffer.redo();
      expect(buffer.project()).toBe('abcXYZ');
    });

    it('should clear redo history when a batch commits', () => {
      const buffer = fromText('abc');
      buffer.insert('d', 3);
      buffer.undo();

      buffer.batch([TextBufferActions.insert(charOffset(0), '>')]);

      expect(buffer.canRedo()).toBe(false);
      expect(buffer.project()).toBe('>abc');
    });

    it('should roll back the whole batch when an action fails', () => {
      const buffer = fromText('abc');
      const listener = vi.fn();
      buffer.subscribe(listener);
      const before = buffer.getSnapshot();

      expect(() =>
        buffer.batch([
          TextBufferActions.insert(charOffset(3), 'd'),
          TextBufferActions.removeChar(charOffset(10)),
        ])
      ).toThrow(OutOfRangeError);

      expect(buffer.getSnapshot()).toBe(before);
      expect(buffer.project()).toBe('abc');
      expect(listener).not.toHaveBeenCalled();
    });

    it('should return the current state for an empty batch', () => {
      const buffer = fromText('abc');
      expect(buffer.batch([])).toBe(buffer.getSnapshot());
    });
  });

  describe('Subscriptions and events', () => {
    it('should notify subscribers until they unsubscribe', () => {
      const buffer = fromText('abc');
      const listener = vi.fn();
      const unsubscribe = buffer.subscribe(listener);

      buffer.insert('d', 3);
      unsubscribe();
      buffer.insert('e', 4);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should keep notifying after a listener throws', () => {
      const buffer = fromText('abc');
      const after = vi.fn();
      buffer.subscribe(() => {
        throw new Error('listener failed');
      });
      buffer.subscribe(after);

      buffer.insert('d', 3);

      expect(after).toHaveBeenCalledTimes(1);
      expect(buffer.project()).toBe('abcd');
    });

    it('should emit content changes with the removed text', () => {
      const buffer = fromText('initial text');
      const events: ContentChangeEvent[] = [];
      buffer.addEventListener('content-change', (event) => events.push(event));

      buffer.remove(7, 12);

      expect(events).toHaveLength(1);
      expect(events[0].action).toEqual({ type: 'REMOVE', start: 7, end: 12 });
      expect(events[0].removed).toBe(' text');
      expect(events[0].nextState).toBe(buffer.getSnapshot());
    });

    it('should emit one content change per batched action', () => {
      const buffer = fromText('ab');
      const handler = vi.fn();
      buffer.addEventListener('content-change', handler);

      buffer.batch([
        TextBufferActions.insert(charOffset(2), 'c'),
        TextBufferActions.insert(charOffset(3), 'd'),
      ]);

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should emit history changes on undo and redo', () => {
      const buffer = fromText('abc');
      const directions: HistoryChangeEvent['direction'][] = [];
      buffer.addEventListener('history-change', (event) => directions.push(event.direction));

      buffer.insert('d', 3);
      buffer.undo();
      buffer.redo();

      expect(directions).toEqual(['undo', 'redo']);
    });

    it('should stop emitting after removeEventListener', () => {
      const buffer = fromText('abc');
      const handler = vi.fn();
      buffer.addEventListener('content-change', handler);
      buffer.removeEventListener('content-change', handler);

      buffer.insert('d', 3);

      expect(handler).not.toHaveBeenCalled();
    });
  });
});
