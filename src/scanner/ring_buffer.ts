/**
 * Fixed-capacity ring buffer. Pushing onto a full buffer overwrites the oldest
 * entry, so memory per symbol stays bounded regardless of feed volume.
 */
export class RingBuffer<T> {
  private readonly entries: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.entries = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /** Returns the evicted entry, if the buffer was full. */
  push(value: T): T | undefined {
    const tail = (this.head + this.count) % this.capacity;
    if (this.count < this.capacity) {
      this.entries[tail] = value;
      this.count += 1;
      return undefined;
    }
    const evicted = this.entries[this.head];
    this.entries[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.entries[(this.head + this.count - 1) % this.capacity];
  }

  /** Copy of the contents, oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const value = this.entries[(this.head + i) % this.capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }

  clear(): void {
    this.entries.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
