/**
 * Typed failures raised by piece table and history operations.
 * A thrown error always leaves the buffer it came from unchanged.
 */

export type PieceTableErrorCode = 'OUT_OF_RANGE' | 'NO_HISTORY';

export class PieceTableError extends Error {
  readonly code: PieceTableErrorCode;

  constructor(code: PieceTableErrorCode, message: string) {
    super(message);
    this.name = 'PieceTableError';
    this.code = code;
  }
}

/**
 * An offset or range fell outside the current text.
 */
export class OutOfRangeError extends PieceTableError {
  readonly offset: number;
  /** Text length (characters) at the time of the call */
  readonly length: number;

  constructor(operation: string, offset: number, length: number, message?: string) {
    super(
      'OUT_OF_RANGE',
      message ?? `${operation}: offset ${offset} is out of range for length ${length}`
    );
    this.name = 'OutOfRangeError';
    this.offset = offset;
    this.length = length;
  }
}

/**
 * Undo or redo was requested with nothing on the matching stack.
 */
export class NoHistoryError extends PieceTableError {
  readonly direction: 'undo' | 'redo';

  constructor(direction: 'undo' | 'redo') {
    super('NO_HISTORY', `nothing to ${direction}`);
    this.name = 'NoHistoryError';
    this.direction = direction;
  }
}

export function isPieceTableError(value: unknown): value is PieceTableError {
  return value instanceof PieceTableError;
}
