/**
 * Insight Publisher
 *
 * Reliable fan-out of critic insights. The publisher stamps each insight with
 * an `ordinal` in publish order; clients acknowledge and resume by ordinal.
 * Delivery order is `producedAt` order: an insight older than the last one
 * published is refused, the same way the trace channel refuses stale keys.
 */

import type { Insight, InsightEnvelope } from '../core/protocol/types.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import {
  ReliableChannel,
  type ReliableChannelStats,
  type RetentionConfig,
  type SubscribeOptions,
} from './reliable-channel.js';
import type { ChannelSubscription } from './subscription.js';

/**
 * Where the critic sends finished insights.
 */
export interface InsightSink {
  publish(insight: Insight): unknown;
}

export interface InsightPublisherConfig {
  retention?: Partial<RetentionConfig>;
  maxPending?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

export interface InsightPublisherStats extends ReliableChannelStats {
  /** Insights refused because their producedAt went backwards */
  outOfOrder: number;
}

export class InsightPublisher implements InsightSink {
  private readonly channel: ReliableChannel<InsightEnvelope>;
  private readonly log: StructuredLogger;
  private nextOrdinal = 1;
  private lastProducedAt = Number.NEGATIVE_INFINITY;
  private outOfOrderCount = 0;

  constructor(config: InsightPublisherConfig = {}) {
    this.log = config.logger ?? createComponentLogger('InsightPublisher');
    this.channel = new ReliableChannel<InsightEnvelope>({
      name: 'InsightPublisher',
      kind: 'insight',
      keyOf: (envelope) => envelope.ordinal,
      retention: { maxItems: 200, ...config.retention },
      maxPending: config.maxPending ?? 64,
      now: config.now,
      logger: this.log,
    });
  }

  /**
   * Delivers an insight to all subscribers.
   * @returns The envelope sent, or null if the insight was refused
   */
  publish(insight: Insight): InsightEnvelope | null {
    if (insight.producedAt < this.lastProducedAt) {
      this.outOfOrderCount++;
      this.log.warn('Rejected insight produced before the last published one', {
        insightId: insight.id,
        producedAt: insight.producedAt,
        lastProducedAt: this.lastProducedAt,
      });
      return null;
    }

    const envelope: InsightEnvelope = { ordinal: this.nextOrdinal, insight };
    if (!this.channel.publish(envelope)) {
      return null;
    }

    this.nextOrdinal++;
    this.lastProducedAt = insight.producedAt;
    return envelope;
  }

  subscribe(options?: SubscribeOptions): ChannelSubscription<InsightEnvelope> {
    return this.channel.subscribe(options);
  }

  unsubscribe(id: string): boolean {
    return this.channel.unsubscribe(id);
  }

  retained(): InsightEnvelope[] {
    return this.channel.retained();
  }

  close(): void {
    this.channel.close();
  }

  stats(): InsightPublisherStats {
    return { ...this.channel.stats(), outOfOrder: this.outOfOrderCount };
  }
}
