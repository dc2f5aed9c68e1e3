/**
 * Tests for the complexity-stratified namespaces.
 */

import { describe, it, expect } from 'vitest';
import { query, scan } from './index.ts';
import { createPieceTableState } from '../store/core/state.ts';
import { pieceTableInsert } from '../store/core/piece-table.ts';
import { charOffset } from '../types/branded.ts';

describe('query / scan namespaces', () => {
  const state = pieceTableInsert(createPieceTableState('some text'), charOffset(5), 'new ').state;

  it('should expose reads over the piece table', () => {
    expect(query.getLength(state)).toBe(13);
    expect(query.getByteLength(state)).toBe(13);
    expect(query.isEmpty(state)).toBe(false);
    expect(query.getText(state, charOffset(5), charOffset(8))).toBe('new');
    expect(query.charAt(state, charOffset(0))).toBe('s');
    expect(query.findPieceAtPosition(state, charOffset(5))?.piece.source).toBe('add');
    expect(query.getBufferStats(state).addBufferUsed).toBe(4);
  });

  it('should expose whole-text operations', () => {
    expect(scan.getValue(state)).toBe('some new text');
    expect(scan.collectPieces(state)).toHaveLength(3);
  });
});
