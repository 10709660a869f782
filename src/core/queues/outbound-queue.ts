/**
 * Bounded per-subscriber queue between a channel and its transport.
 *
 * The channel side never waits: `offer()` either queues the item or reports
 * that the subscriber is full. The transport side pulls with `take()` or an
 * async iterator and may suspend while it waits for transport capacity.
 */

/**
 * Why a queue stopped delivering.
 */
export type CloseReason = 'unsubscribed' | 'overflow' | 'channel_closed';

/**
 * Configuration for an OutboundQueue.
 */
export interface OutboundQueueConfig {
  /** Maximum number of live items waiting for the consumer (default: 256) */
  maxPending?: number;
}

interface Waiter<T> {
  resolve: (value: T) => void;
}

/**
 * Result of offering an item to the queue.
 */
export type OfferResult = 'queued' | 'full' | 'closed';

/**
 * A bounded FIFO that never blocks its producer.
 *
 * Features:
 * - Live items are capped at `maxPending`; a replayed backlog is granted on top
 * - Pull consumption via take()/tryTake() or `for await`
 * - Immediate close that releases waiting consumers with `null`
 */
export class OutboundQueue<T> {
  readonly maxPending: number;
  private readonly items: T[] = [];
  private readonly consumerWaiters: Waiter<T | null>[] = [];
  private readonly closeListeners: Array<(reason: CloseReason) => void> = [];
  private backlogOutstanding = 0;
  private reason: CloseReason | null = null;

  constructor(config?: OutboundQueueConfig) {
    this.maxPending = config?.maxPending ?? 256;
    if (!Number.isInteger(this.maxPending) || this.maxPending < 1) {
      throw new RangeError(`maxPending must be a positive integer, got ${this.maxPending}`);
    }
  }

  /**
   * Queues a replayed backlog ahead of live items. Backlog items do not
   * count against `maxPending`.
   */
  offerBacklog(items: readonly T[]): void {
    if (this.reason !== null) {
      return;
    }
    for (const item of items) {
      this.backlogOutstanding++;
      this.deliver(item);
    }
  }

  /**
   * Queues a live item without waiting.
   */
  offer(item: T): OfferResult {
    if (this.reason !== null) {
      return 'closed';
    }

    if (this.items.length - this.backlogOutstanding >= this.maxPending) {
      return 'full';
    }

    this.deliver(item);
    return 'queued';
  }

  /**
   * Takes the next item, waiting if none is queued.
   * @returns The next item, or null once the queue is closed and empty
   */
  take(): Promise<T | null> {
    const item = this.tryTake();
    if (item !== null) {
      return Promise.resolve(item);
    }

    if (this.reason !== null) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.consumerWaiters.push({ resolve });
    });
  }

  /**
   * Non-blocking take.
   * @returns The next item, or null if none is queued
   */
  tryTake(): T | null {
    if (this.items.length === 0) {
      return null;
    }
    const item = this.items.shift();
    if (item === undefined) {
      return null;
    }
    if (this.backlogOutstanding > 0) {
      this.backlogOutstanding--;
    }
    return item;
  }

  /**
   * Stops delivery. Pending items are discarded and waiting consumers get null.
   * Idempotent: the first reason wins.
   */
  close(reason: CloseReason): void {
    if (this.reason !== null) {
      return;
    }

    this.reason = reason;
    this.items.length = 0;
    this.backlogOutstanding = 0;

    for (const waiter of this.consumerWaiters) {
      waiter.resolve(null);
    }
    this.consumerWaiters.length = 0;

    for (const listener of this.closeListeners) {
      listener(reason);
    }
    this.closeListeners.length = 0;
  }

  /**
   * Registers a callback for when the queue closes. Runs immediately if
   * it is already closed.
   */
  onClose(listener: (reason: CloseReason) => void): void {
    if (this.reason !== null) {
      listener(this.reason);
      return;
    }
    this.closeListeners.push(listener);
  }

  get closeReason(): CloseReason | null {
    return this.reason;
  }

  isClosed(): boolean {
    return this.reason !== null;
  }

  size(): number {
    return this.items.length;
  }

  /**
   * Yields items until the queue closes.
   */
  async *[Symbol.asyncIterator](): AsyncIterableIterator<T> {
    while (true) {
      const item = await this.take();
      if (item === null) {
        return;
      }
      yield item;
    }
  }

  private deliver(item: T): void {
    const waiter = this.consumerWaiters.shift();
    if (waiter) {
      // Handed straight to a waiting consumer, so it never occupies a slot
      if (this.backlogOutstanding > 0) {
        this.backlogOutstanding--;
      }
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }
}
