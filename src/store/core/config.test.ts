/**
 * Tests for configuration, environment parsing and error types.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_HISTORY_LIMIT, resolveConfig } from './config.ts';
import { parseEnv } from './env.ts';
import { NoHistoryError, OutOfRangeError, PieceTableError, isPieceTableError } from './errors.ts';
import { createInitialState } from './state.ts';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig()).toEqual({
      content: '',
      historyLimit: DEFAULT_HISTORY_LIMIT,
      pruneEmptyPieces: true,
    });
  });

  it('should keep provided values', () => {
    expect(resolveConfig({ content: 'abc', historyLimit: 5, pruneEmptyPieces: false })).toEqual({
      content: 'abc',
      historyLimit: 5,
      pruneEmptyPieces: false,
    });
  });

  it('should reject invalid history limits', () => {
    expect(() => resolveConfig({ historyLimit: -1 })).toThrow(/Invalid text buffer config/);
    expect(() => resolveConfig({ historyLimit: 2.5 })).toThrow(/historyLimit/);
  });

  it('should feed the initial state', () => {
    const state = createInitialState({ content: 'abc', historyLimit: 3, pruneEmptyPieces: false });
    expect(state.version).toBe(0);
    expect(state.pieceTable.length).toBe(3);
    expect(state.pieceTable.pruneEmptyPieces).toBe(false);
    expect(state.history.limit).toBe(3);
    expect(state.history.undoStack).toEqual([]);
  });
});

describe('parseEnv', () => {
  it('should accept an empty environment', () => {
    expect(parseEnv({})).toEqual({});
  });

  it('should parse the log level', () => {
    expect(parseEnv({ PIECEWORK_LOG_LEVEL: ' 5 ' }).PIECEWORK_LOG_LEVEL).toBe(5);
    expect(parseEnv({ PIECEWORK_LOG_LEVEL: '0' }).PIECEWORK_LOG_LEVEL).toBe(0);
  });

  it('should reject levels consola does not have', () => {
    expect(() => parseEnv({ PIECEWORK_LOG_LEVEL: '9' })).toThrow(/expected a consola level from 0 to 5/);
    expect(() => parseEnv({ PIECEWORK_LOG_LEVEL: 'verbose' })).toThrow(/PIECEWORK_LOG_LEVEL/);
  });

  it('should ignore unknown NODE_ENV values', () => {
    expect(parseEnv({ NODE_ENV: 'staging' }).NODE_ENV).toBeUndefined();
    expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
  });
});

describe('errors', () => {
  it('should tag out of range errors', () => {
    const error = new OutOfRangeError('insert', 9, 4);
    expect(error).toBeInstanceOf(PieceTableError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('OutOfRangeError');
    expect(error.code).toBe('OUT_OF_RANGE');
    expect(error.message).toBe('insert: offset 9 is out of range for length 4');
  });

  it('should tag empty history errors', () => {
    const error = new NoHistoryError('redo');
    expect(error.code).toBe('NO_HISTORY');
    expect(error.direction).toBe('redo');
    expect(error.message).toBe('nothing to redo');
  });

  it('should narrow unknown values', () => {
    expect(isPieceTableError(new NoHistoryError('undo'))).toBe(true);
    expect(isPieceTableError(new Error('plain'))).toBe(false);
    expect(isPieceTableError('nothing to undo')).toBe(false);
  });
});
