/**
 * Fixed-capacity circular buffer with drop-oldest overflow.
 *
 * Used for the reliable channels' retention window and for the critic's
 * input buffer. Pushing never blocks and never grows memory: when full, the
 * oldest item is evicted and counted.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private length = 0;
  private evictedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /**
   * Appends an item. Returns the evicted oldest item when the buffer was full.
   */
  push(item: T): T | undefined {
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = item;
      this.length++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    this.evictedCount++;
    return evicted;
  }

  /**
   * Removes and returns the oldest item.
   */
  shift(): T | undefined {
    if (this.length === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length--;
    return item;
  }

  /**
   * Removes up to `max` oldest items, in order.
   */
  drain(max: number = this.length): T[] {
    const out: T[] = [];
    while (out.length < max && this.length > 0) {
      const item = this.shift();
      if (item !== undefined) {
        out.push(item);
      }
    }
    return out;
  }

  peekOldest(): T | undefined {
    return this.length === 0 ? undefined : this.slots[this.head];
  }

  peekNewest(): T | undefined {
    return this.length === 0
      ? undefined
      : this.slots[(this.head + this.length - 1) % this.capacity];
  }

  /**
   * Snapshot of the contents, oldest first.
   */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        out.push(item);
      }
    }
    return out;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  get size(): number {
    return this.length;
  }

  isFull(): boolean {
    return this.length === this.capacity;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /** Items lost to overflow since construction. */
  get evicted(): number {
    return this.evictedCount;
  }
}
