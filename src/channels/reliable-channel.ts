/**
 * Reliable Channel
 *
 * Ordered, at-least-once delivery to UI subscribers with backlog replay on
 * reconnect. Items carry a numeric key (a trace event's `sequence`, an
 * insight envelope's `ordinal`) that only ever increases.
 *
 * The publisher is never blocked. Each subscriber has a bounded outbound
 * queue; a subscriber that falls further behind than `maxPending` is
 * disconnected and is expected to reconnect with its last acked key, at
 * which point the retention window is replayed.
 *
 * Out-of-order publishes are treated as a producer bug: they are rejected
 * and logged rather than reordered.
 */

import type { ChannelKind } from '../core/protocol/types.js';
import { AtomicCounter } from '../core/queues/atomic-counter.js';
import { OutboundQueue } from '../core/queues/outbound-queue.js';
import { RingBuffer } from '../core/queues/ring-buffer.js';
import { ProtocolViolationError, SubscriberOverflowError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { ChannelSubscription, type ReplayInfo } from './subscription.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RetentionConfig {
  /** Newest items kept for replay (K) */
  maxItems: number;
  /** Items older than this are dropped from replay (T); unset = count only */
  maxAgeMs?: number;
}

export interface ReliableChannelConfig<T> {
  /** Channel name for logs and errors */
  name: string;
  kind?: ChannelKind;
  /** Ordering and acknowledgement key of an item */
  keyOf: (item: T) => number;
  retention?: Partial<RetentionConfig>;
  /** Live items a subscriber may have queued before it is disconnected */
  maxPending?: number;
  /** Clock for age-based retention (default: Date.now) */
  now?: () => number;
  logger?: StructuredLogger;
}

export interface SubscribeOptions {
  /** Replay retained items with a key greater than this */
  lastAcked?: number;
}

export interface ReliableChannelStats {
  subscribers: number;
  published: number;
  /** Out-of-order publishes refused */
  rejected: number;
  /** Forward jumps in the key sequence */
  gaps: number;
  overflowDisconnects: number;
  retained: number;
  /** Items that left the retention window */
  evicted: number;
  lastKey: number | null;
}

interface Retained<T> {
  key: number;
  item: T;
  publishedAt: number;
}

export const DEFAULT_RETENTION: RetentionConfig = { maxItems: 1000 };
export const DEFAULT_MAX_PENDING = 256;

// =============================================================================
// CHANNEL
// =============================================================================

export class ReliableChannel<T> {
  readonly name: string;
  readonly kind: ChannelKind;
  private readonly keyOf: (item: T) => number;
  private readonly retention: RingBuffer<Retained<T>>;
  private readonly maxAgeMs: number | undefined;
  private readonly maxPending: number;
  private readonly now: () => number;
  private readonly log: StructuredLogger;
  private readonly subscriptions = new Map<string, { sub: ChannelSubscription<T>; queue: OutboundQueue<T> }>();
  private readonly ids: AtomicCounter;

  private lastKey: number | null = null;
  private lastEvictedKey: number | null = null;
  private closed = false;

  private publishedCount = 0;
  private rejectedCount = 0;
  private gapCount = 0;
  private overflowCount = 0;
  private evictedCount = 0;

  constructor(config: ReliableChannelConfig<T>) {
    this.name = config.name;
    this.kind = config.kind ?? 'reliable';
    this.keyOf = config.keyOf;
    this.retention = new RingBuffer(config.retention?.maxItems ?? DEFAULT_RETENTION.maxItems);
    this.maxAgeMs = config.retention?.maxAgeMs;
    this.maxPending = config.maxPending ?? DEFAULT_MAX_PENDING;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createComponentLogger(config.name);
    this.ids = new AtomicCounter(`${this.kind}-sub`);
  }

  /**
   * Retains an item and forwards it to every live subscriber.
   * @returns false if the item was refused (out of order, or channel closed)
   */
  publish(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const key = this.keyOf(item);

    if (this.lastKey !== null && key <= this.lastKey) {
      this.rejectedCount++;
      const violation = new ProtocolViolationError(this.name, key, this.lastKey);
      this.log.warn('Rejected out-of-order item', { ...violation.context });
      return false;
    }

    if (this.lastKey !== null && key > this.lastKey + 1) {
      this.gapCount++;
      this.log.debug('Gap in key sequence', { from: this.lastKey, to: key });
    }

    this.lastKey = key;
    this.publishedCount++;
    this.evictExpired();

    const evicted = this.retention.push({ key, item, publishedAt: this.now() });
    if (evicted) {
      this.recordEviction(evicted.key);
    }

    for (const { sub, queue } of this.subscriptions.values()) {
      if (queue.offer(item) === 'full') {
        this.disconnectSlowSubscriber(sub, queue);
      }
    }

    return true;
  }

  /**
   * Opens a subscription. With `lastAcked`, retained items after it are
   * queued first, then live items follow.
   */
  subscribe(options: SubscribeOptions = {}): ChannelSubscription<T> {
    const { lastAcked } = options;
    const queue = new OutboundQueue<T>({ maxPending: this.maxPending });
    const id = this.ids.next();

    this.evictExpired();

    const backlog =
      lastAcked === undefined
        ? []
        : this.retention.toArray().filter((r) => r.key > lastAcked);

    const replay: ReplayInfo = {
      lastAcked,
      replayed: backlog.length,
      truncated:
        lastAcked !== undefined && this.lastEvictedKey !== null && this.lastEvictedKey > lastAcked,
    };

    const sub = new ChannelSubscription<T>({
      id,
      channel: this.name,
      channelKind: this.kind,
      replay,
      queue,
      keyOf: this.keyOf,
    });

    if (this.closed) {
      queue.close('channel_closed');
      return sub;
    }

    if (replay.truncated) {
      this.log.warn('Replay gap: requested items already evicted', {
        subscriberId: id,
        lastAcked,
        oldestRetained: this.retention.peekOldest()?.key ?? null,
      });
    }

    queue.offerBacklog(backlog.map((r) => r.item));
    this.subscriptions.set(id, { sub, queue });
    queue.onClose((reason) => {
      this.subscriptions.delete(id);
      this.log.debug('Subscriber closed', { subscriberId: id, reason });
    });

    this.log.debug('Subscriber opened', { subscriberId: id, lastAcked, replayed: backlog.length });
    return sub;
  }

  /**
   * Closes a subscription by id; same as `subscription.close()`.
   */
  unsubscribe(id: string): boolean {
    const entry = this.subscriptions.get(id);
    if (!entry) {
      return false;
    }
    entry.sub.close();
    return true;
  }

  /**
   * Snapshot of the retention window, oldest first.
   */
  retained(): T[] {
    this.evictExpired();
    return this.retention.toArray().map((r) => r.item);
  }

  /**
   * Closes every subscription and refuses further publishes.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const { queue } of [...this.subscriptions.values()]) {
      queue.close('channel_closed');
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  stats(): ReliableChannelStats {
    return {
      subscribers: this.subscriptions.size,
      published: this.publishedCount,
      rejected: this.rejectedCount,
      gaps: this.gapCount,
      overflowDisconnects: this.overflowCount,
      retained: this.retention.size,
      evicted: this.evictedCount,
      lastKey: this.lastKey,
    };
  }

  private disconnectSlowSubscriber(sub: ChannelSubscription<T>, queue: OutboundQueue<T>): void {
    this.overflowCount++;
    const error = new SubscriberOverflowError(this.name, sub.id, this.maxPending);
    this.log.warn('Disconnecting slow subscriber', {
      ...error.context,
      lastDelivered: sub.lastDeliveredKey ?? null,
    });
    queue.close('overflow');
  }

  private evictExpired(): void {
    if (this.maxAgeMs === undefined) {
      return;
    }
    const cutoff = this.now() - this.maxAgeMs;
    while (true) {
      const oldest = this.retention.peekOldest();
      if (oldest === undefined || oldest.publishedAt >= cutoff) {
        return;
      }
      this.retention.shift();
      this.recordEviction(oldest.key);
    }
  }

  private recordEviction(key: number): void {
    this.evictedCount++;
    this.lastEvictedKey = key;
  }
}
