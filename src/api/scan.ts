/**
 * Scan namespace: O(n) operations.
 * Use `query.*` when only part of the text is needed.
 */

import { getValue, collectPieces } from '../store/core/piece-table.ts';

export const scan = {
  /** @complexity O(n), decodes the whole text once */
  getValue,
  /** @complexity O(1), but callers typically walk all p pieces */
  collectPieces,
} as const;
