/**
 * watchtower public API.
 */

export * from './core/protocol/index.js';
export * from './core/queues/index.js';
export {
  EventBus,
  type EventBusConfig,
  type EventBusStats,
  type EventSink,
  type EventSinkFn,
  type SubscriptionHandle,
} from './core/event-bus.js';

export {
  ReliableChannel,
  DEFAULT_MAX_PENDING,
  DEFAULT_RETENTION,
  type ReliableChannelConfig,
  type ReliableChannelStats,
  type RetentionConfig,
  type SubscribeOptions,
} from './channels/reliable-channel.js';
export { ChannelSubscription, type ReplayInfo } from './channels/subscription.js';
export { AgentEventChannel, type AgentEventChannelConfig } from './channels/agent-event-channel.js';
export {
  FrameChannel,
  FrameSubscription,
  type FrameChannelConfig,
  type FrameChannelStats,
} from './channels/frame-channel.js';
export {
  InsightPublisher,
  type InsightPublisherConfig,
  type InsightPublisherStats,
  type InsightSink,
} from './channels/insight-publisher.js';

export { CriticObserver } from './critic/critic-observer.js';
export { createRuleAnalyzer, DEFAULT_RISKY_PATTERNS, type RiskyPattern, type RuleAnalyzerOptions } from './critic/rule-analyzer.js';
export type {
  AnalyzeFn,
  AnalyzeOptions,
  CriticObserverConfig,
  CriticState,
  CriticStats,
  FlushReason,
  InsightListener,
} from './critic/types.js';

export * from './sources/trace-log.js';
export { TraceLogTailer, entryToDrafts, type TraceLogTailerConfig, type TraceLogTailerStats } from './sources/trace-log-tailer.js';

export * from './transport/sse.js';

export {
  ObservabilityPipeline,
  createPipeline,
  type PipelineOptions,
  type PipelineState,
  type PipelineStats,
} from './pipeline.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './integrations/utilities/logger.js';
