/**
 * Fixed-capacity rolling sample window.
 *
 * Holds the most recent `capacity` samples in arrival order. Appending a
 * batch costs O(batch) regardless of capacity: samples are written at a
 * moving head into a preallocated Float64Array, and only a batch longer
 * than the capacity is trimmed to its tail first.
 */
export class RingBuffer {
  readonly capacity: number;

  private data: Float64Array;
  /** Index of the slot the next sample goes into */
  private head = 0;
  private filled = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.data = new Float64Array(capacity);
  }

  /**
   * Number of valid samples (grows to capacity, then stays there).
   */
  get length(): number {
    return this.filled;
  }

  get full(): boolean {
    return this.filled === this.capacity;
  }

  push(values: ArrayLike<number>): void {
    const count = values.length;
    const start = count > this.capacity ? count - this.capacity : 0;

    for (let i = start; i < count; i++) {
      this.data[this.head] = values[i];
      this.head = (this.head + 1) % this.capacity;
    }
    this.filled = Math.min(this.capacity, this.filled + (count - start));
  }

  /**
   * Copy of the window, oldest first.
   */
  toArray(): Float64Array {
    const out = new Float64Array(this.filled);
    const oldest = (this.head - this.filled + this.capacity) % this.capacity;
    for (let i = 0; i < this.filled; i++) {
      out[i] = this.data[(oldest + i) % this.capacity];
    }
    return out;
  }

  /**
   * The newest `count` samples, oldest first.
   */
  tail(count: number): Float64Array {
    const n = Math.max(0, Math.min(count, this.filled));
    const out = new Float64Array(n);
    const first = (this.head - n + this.capacity) % this.capacity;
    for (let i = 0; i < n; i++) {
      out[i] = this.data[(first + i) % this.capacity];
    }
    return out;
  }

  clear(): void {
    this.data.fill(0);
    this.head = 0;
    this.filled = 0;
  }
}
