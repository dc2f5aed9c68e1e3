/**
 * Query namespace: cached reads and piece lookups.
 * Functions here are read-only selectors over immutable piece table state.
 */

import {
  getText,
  charAt,
  getLength,
  getByteLength,
  isEmpty,
  findPieceAtPosition,
  getBufferStats,
} from '../store/core/piece-table.ts';

export const query = {
  /** @complexity O(p + m), p pieces walked, m bytes copied */
  getText,
  /** @complexity O(p + k), k bytes scanned inside the piece */
  charAt,
  /** @complexity O(1), cached on piece table state */
  getLength,
  /** @complexity O(1), cached on piece table state */
  getByteLength,
  /** @complexity O(1) */
  isEmpty,
  /** @complexity O(p) */
  findPieceAtPosition,
  /** @complexity O(p) */
  getBufferStats,
} as const;
