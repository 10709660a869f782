/**
 * A live consumer of a reliable channel, as seen by the transport layer.
 */

import type { ChannelKind } from '../core/protocol/types.js';
import { OutboundQueue, type CloseReason } from '../core/queues/outbound-queue.js';

/**
 * What happened when the subscription was opened.
 */
export interface ReplayInfo {
  /** The acknowledgement key the client resumed from, if any */
  lastAcked: number | undefined;
  /** Retained items queued ahead of live delivery */
  replayed: number;
  /** True when items after `lastAcked` had already left the retention window */
  truncated: boolean;
}

/**
 * Pull-based subscription. The transport drains it with take() or
 * `for await`, sending each item and tracking the last key it acked.
 */
export class ChannelSubscription<T> implements AsyncIterable<T> {
  readonly id: string;
  readonly channel: string;
  readonly channelKind: ChannelKind;
  readonly replay: ReplayInfo;
  private readonly queue: OutboundQueue<T>;
  private readonly keyOf: (item: T) => number;
  private lastTakenKey: number | undefined;

  constructor(params: {
    id: string;
    channel: string;
    channelKind: ChannelKind;
    replay: ReplayInfo;
    queue: OutboundQueue<T>;
    keyOf: (item: T) => number;
  }) {
    this.id = params.id;
    this.channel = params.channel;
    this.channelKind = params.channelKind;
    this.replay = params.replay;
    this.queue = params.queue;
    this.keyOf = params.keyOf;
    this.lastTakenKey = params.replay.lastAcked;
  }

  /**
   * Next item, waiting if necessary; null once the subscription has closed.
   */
  async take(): Promise<T | null> {
    const item = await this.queue.take();
    if (item !== null) {
      this.lastTakenKey = this.keyOf(item);
    }
    return item;
  }

  tryTake(): T | null {
    const item = this.queue.tryTake();
    if (item !== null) {
      this.lastTakenKey = this.keyOf(item);
    }
    return item;
  }

  /**
   * Key of the last item handed to the consumer; what a client would
   * reconnect with after a disconnect.
   */
  get lastDeliveredKey(): number | undefined {
    return this.lastTakenKey;
  }

  /** Items queued and not yet taken */
  get pending(): number {
    return this.queue.size();
  }

  get closeReason(): CloseReason | null {
    return this.queue.closeReason;
  }

  isClosed(): boolean {
    return this.queue.isClosed();
  }

  onClose(listener: (reason: CloseReason) => void): void {
    this.queue.onClose(listener);
  }

  /**
   * Unsubscribe. Takes effect immediately; queued items are discarded.
   */
  close(): void {
    this.queue.close('unsubscribed');
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.take();
      if (item === null) {
        return;
      }
      yield item;
    }
  }
}
