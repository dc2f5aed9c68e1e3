/**
 * Tests for the append-only add buffer.
 */

import { describe, it, expect } from 'vitest';
import { GrowableBuffer } from './growable-buffer.ts';

const bytes = (...values: number[]) => new Uint8Array(values);

describe('GrowableBuffer', () => {
  it('should start empty', () => {
    const buffer = GrowableBuffer.empty();
    expect(buffer.length).toBe(0);
    expect(buffer.capacity).toBe(0);
    expect(buffer.subarray(0, 10)).toEqual(bytes());
  });

  it('should return the same handle for an empty append', () => {
    const buffer = GrowableBuffer.empty(4);
    expect(buffer.append(bytes())).toBe(buffer);
  });

  it('should grow to fit and then double', () => {
    const first = GrowableBuffer.empty().append(bytes(1, 2, 3));
    expect(first.length).toBe(3);
    expect(first.capacity).toBe(3);

    const second = first.append(bytes(4));
    expect(second.length).toBe(4);
    expect(second.capacity).toBe(6);
    expect(second.subarray(0, 4)).toEqual(bytes(1, 2, 3, 4));
  });

  it('should share the backing array while appending from the newest handle', () => {
    const base = GrowableBuffer.empty(8);
    const a = base.append(bytes(1, 2));
    const b = a.append(bytes(3));

    expect(b.capacity).toBe(8);
    expect(a.subarray(0, 8)).toEqual(bytes(1, 2));
    expect(b.subarray(0, 8)).toEqual(bytes(1, 2, 3));
  });

  it('should not let an older handle overwrite bytes a newer one owns', () => {
    const a = GrowableBuffer.empty(8).append(bytes(1, 2));
    const b = a.append(bytes(3));
    const branch = a.append(bytes(9));

    expect(b.subarray(0, 3)).toEqual(bytes(1, 2, 3));
    expect(branch.subarray(0, 3)).toEqual(bytes(1, 2, 9));
  });

  it('should clamp subarray to the valid length', () => {
    const buffer = GrowableBuffer.empty(16).append(bytes(5, 6, 7));
    expect(buffer.subarray(1, 100)).toEqual(bytes(6, 7));
  });
});
