/**
 * Fixed-capacity circular buffer.
 * When full, a push overwrites the oldest entry. Iteration runs oldest first.
 */
export class RingBuffer<T> implements Iterable<T> {
  private buffer: (T | undefined)[];
  private head = 0; // next write position
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("RingBuffer capacity must be a positive integer");
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /** Append an item; returns the evicted item when the buffer was full. */
  push(item: T): T | undefined {
    const evicted = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
    return evicted;
  }

  /** Most recently pushed item. */
  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  *[Symbol.iterator](): Iterator<T> {
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      yield this.buffer[(start + i) % this.capacity] as T;
    }
  }

  /** Items in insertion order (oldest first). */
  toArray(): T[] {
    return [...this];
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
