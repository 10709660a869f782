/**
 * Monotonic counters for identifiers and sequence numbers.
 */

/**
 * Generates unique string identifiers in the form `{prefix}-{base36}`.
 * Uses bigint so long-running sessions never wrap.
 */
export class AtomicCounter {
  private counter: bigint;
  private readonly prefix: string;

  /**
   * @param prefix - Identifier prefix (default: 'id')
   * @param initial - First value handed out (default: 0n)
   */
  constructor(prefix = 'id', initial: bigint = 0n) {
    this.prefix = prefix;
    this.counter = initial;
  }

  /**
   * Returns the next identifier, e.g. 'ins-0', 'ins-1', ..., 'ins-a'.
   */
  next(): string {
    const id = this.counter;
    this.counter += 1n;
    return `${this.prefix}-${id.toString(36)}`;
  }

  /**
   * Current value without incrementing.
   */
  current(): bigint {
    return this.counter;
  }

  reset(value: bigint = 0n): void {
    this.counter = value;
  }
}

/**
 * Hands out strictly increasing integer sequence numbers for trace events.
 */
export class SequenceCounter {
  private nextValue: number;

  /**
   * @param start - First sequence to hand out (default: 1)
   */
  constructor(start = 1) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`Sequence start must be a non-negative safe integer, got ${start}`);
    }
    this.nextValue = start;
  }

  next(): number {
    const value = this.nextValue;
    this.nextValue += 1;
    return value;
  }

  /** The value the next call to next() returns. */
  peek(): number {
    return this.nextValue;
  }

  /**
   * Move the counter forward so the next value is at least `value`.
   * Never moves it backwards.
   */
  advanceTo(value: number): void {
    if (value > this.nextValue) {
      this.nextValue = value;
    }
  }
}
