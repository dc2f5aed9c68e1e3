/**
 * Append-only growable byte buffer backing the piece table's add buffer.
 *
 * Handles are immutable: `append` returns a new handle and bytes in
 * [0, length) never change. Handles share one backing array; only the
 * handle at the array's high-water mark may write into it in place, any
 * other handle copies its valid prefix first. The array doubles when
 * capacity is exceeded.
 */

interface Backing {
  bytes: Uint8Array;
  /** Highest length any handle over `bytes` has written */
  used: number;
}

export class GrowableBuffer {
  private readonly backing: Backing;
  /** Number of valid bytes in this handle */
  readonly length: number;

  private constructor(backing: Backing, length: number) {
    this.backing = backing;
    this.length = length;
  }

  /**
   * Create an empty GrowableBuffer with the given initial capacity.
   */
  static empty(capacity: number = 0): GrowableBuffer {
    return new GrowableBuffer({ bytes: new Uint8Array(capacity), used: 0 }, 0);
  }

  /**
   * Bytes the backing array can hold before the next reallocation.
   */
  get capacity(): number {
    return this.backing.bytes.length;
  }

  /**
   * Append data and return a handle covering it.
   */
  append(data: Uint8Array): GrowableBuffer {
    if (data.length === 0) return this;

    const length = this.length + data.length;
    const { bytes, used } = this.backing;

    if (used === this.length && length <= bytes.length) {
      bytes.set(data, this.length);
      this.backing.used = length;
      return new GrowableBuffer(this.backing, length);
    }

    const grown = new Uint8Array(Math.max(bytes.length * 2, length));
    grown.set(bytes.subarray(0, this.length));
    grown.set(data, this.length);
    return new GrowableBuffer({ bytes: grown, used: length }, length);
  }

  /**
   * Zero-copy view of `[start, end)`, clamped to the valid portion.
   */
  subarray(start: number, end: number): Uint8Array {
    return this.backing.bytes.subarray(start, Math.min(end, this.length));
  }
}
