/**
 * Agent Event Channel: the reliable channel for trace events, keyed by
 * `sequence`. It registers on the event bus as an ordinary sink.
 */

import type { TraceEvent } from '../core/protocol/types.js';
import type { EventSink } from '../core/event-bus.js';
import { ReliableChannel, type ReliableChannelConfig } from './reliable-channel.js';

export type AgentEventChannelConfig = Omit<ReliableChannelConfig<TraceEvent>, 'keyOf' | 'kind' | 'name'> & {
  name?: string;
};

export class AgentEventChannel extends ReliableChannel<TraceEvent> implements EventSink<TraceEvent> {
  constructor(config: AgentEventChannelConfig = {}) {
    super({
      ...config,
      name: config.name ?? 'AgentEventChannel',
      kind: 'reliable',
      keyOf: (event) => event.sequence,
    });
  }

  ingest(event: TraceEvent): void {
    this.publish(event);
  }
}
