/**
 * Observability Pipeline
 *
 * Wires the components together. Each one owns its own buffers; the only
 * shared thing is the bus they subscribe to.
 *
 *   trace source ─► EventBus ─┬─► AgentEventChannel ─► UI (reliable, replay)
 *                             └─► CriticObserver ─► InsightPublisher ─► UI
 *   frame source ─► FrameChannel ─► UI (latest-wins)
 */

import type { Frame, TraceEvent, TraceEventDraft } from './core/protocol/types.js';
import { parseFrame, parseTraceEvent } from './core/protocol/types.js';
import { EventBus, type EventBusStats } from './core/event-bus.js';
import { SequenceCounter } from './core/queues/atomic-counter.js';
import { AgentEventChannel } from './channels/agent-event-channel.js';
import { FrameChannel, type FrameChannelStats } from './channels/frame-channel.js';
import { InsightPublisher, type InsightPublisherStats } from './channels/insight-publisher.js';
import type { ReliableChannelStats } from './channels/reliable-channel.js';
import { CriticObserver } from './critic/critic-observer.js';
import { createRuleAnalyzer } from './critic/rule-analyzer.js';
import type { AnalyzeFn, CriticStats } from './critic/types.js';
import { PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './config/schema.js';
import { ValidationError, formatErrorForLog } from './errors/index.js';
import { createComponentLogger, type StructuredLogger } from './integrations/utilities/logger.js';

export interface PipelineOptions {
  /** Analysis collaborator for the critic (default: rule-based analyzer) */
  analyze?: AnalyzeFn;
  now?: () => number;
  logger?: StructuredLogger;
}

export type PipelineState = 'created' | 'running' | 'stopped';

export interface PipelineStats {
  state: PipelineState;
  nextSequence: number;
  invalidTraces: number;
  invalidFrames: number;
  bus: EventBusStats;
  agentEvents: ReliableChannelStats;
  frames: FrameChannelStats;
  critic: CriticStats;
  insights: InsightPublisherStats;
}

export class ObservabilityPipeline {
  readonly config: PipelineConfig;
  readonly bus: EventBus<TraceEvent>;
  readonly agentEvents: AgentEventChannel;
  readonly frames: FrameChannel;
  readonly critic: CriticObserver;
  readonly insights: InsightPublisher;

  private readonly sequences: SequenceCounter;
  private readonly now: () => number;
  private readonly log: StructuredLogger;
  private currentState: PipelineState = 'created';
  private invalidTraces = 0;
  private invalidFrames = 0;

  constructor(config: PipelineConfig, options: PipelineOptions = {}) {
    this.config = config;
    this.now = options.now ?? Date.now;
    const parent = options.logger;
    this.log = createComponentLogger('Pipeline', parent);

    this.sequences = new SequenceCounter(config.startSequence);
    this.bus = new EventBus<TraceEvent>({ logger: createComponentLogger('EventBus', parent) });
    this.agentEvents = new AgentEventChannel({
      retention: config.agentEvents.retention,
      maxPending: config.agentEvents.maxPending,
      now: this.now,
      logger: createComponentLogger('AgentEventChannel', parent),
    });
    this.frames = new FrameChannel({
      idleSessionMs: config.frames.idleSessionMs,
      now: this.now,
      logger: createComponentLogger('FrameChannel', parent),
    });
    this.insights = new InsightPublisher({
      retention: config.insights.retention,
      maxPending: config.insights.maxPending,
      now: this.now,
      logger: createComponentLogger('InsightPublisher', parent),
    });
    this.critic = new CriticObserver({
      analyze:
        options.analyze ??
        createRuleAnalyzer({
          criticalFailureCount: config.critic.criticalFailureCount,
          minEventsForProcessNote: config.critic.minEventsForProcessNote,
          summarize: config.critic.summarize,
        }),
      capacity: config.critic.capacity,
      batchSize: config.critic.batchSize,
      flushIntervalMs: config.critic.flushIntervalMs,
      analysisTimeoutMs: config.critic.analysisTimeoutMs,
      sink: this.insights,
      now: this.now,
      logger: createComponentLogger('CriticObserver', parent),
    });

    this.bus.subscribe(this.agentEvents);
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /**
   * Starts the critic. Trace events published before start() reach the
   * reliable channel but are not analyzed.
   */
  start(): void {
    if (this.currentState !== 'created') {
      return;
    }
    this.critic.start(this.bus);
    this.currentState = 'running';
    this.log.info('Pipeline started', { nextSequence: this.sequences.peek() });
  }

  /**
   * Stamps a draft with the next sequence (and a timestamp if it has none),
   * validates it and publishes it. Never throws.
   * @returns The published event, or null if it was invalid or the pipeline is stopped
   */
  publishTrace(draft: TraceEventDraft): TraceEvent | null {
    if (this.currentState === 'stopped') {
      return null;
    }

    let event: TraceEvent;
    try {
      event = parseTraceEvent({
        ...draft,
        sequence: this.sequences.peek(),
        timestamp: draft.timestamp ?? this.now(),
      });
    } catch (error) {
      this.invalidTraces++;
      this.log.warn('Dropped invalid trace event', { error: formatErrorForLog(error) });
      return null;
    }

    this.sequences.next();
    this.bus.publish(event);
    return event;
  }

  /**
   * Validates and publishes a frame. Never throws.
   */
  publishFrame(frame: Frame): boolean {
    if (this.currentState === 'stopped') {
      return false;
    }

    try {
      return this.frames.publish(parseFrame(frame));
    } catch (error) {
      this.invalidFrames++;
      this.log.warn('Dropped invalid frame', { error: formatErrorForLog(error) });
      return false;
    }
  }

  /**
   * Stops the critic (optionally analyzing what it still holds) and closes
   * every channel, ending all subscriptions.
   */
  async stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.currentState === 'stopped') {
      return;
    }
    this.currentState = 'stopped';

    await this.critic.stop({ drain: options.drain ?? false });
    this.bus.clear();
    this.agentEvents.close();
    this.insights.close();
    this.frames.close();
    this.log.info('Pipeline stopped', { published: this.bus.stats().published });
  }

  stats(): PipelineStats {
    return {
      state: this.currentState,
      nextSequence: this.sequences.peek(),
      invalidTraces: this.invalidTraces,
      invalidFrames: this.invalidFrames,
      bus: this.bus.stats(),
      agentEvents: this.agentEvents.stats(),
      frames: this.frames.stats(),
      critic: this.critic.stats(),
      insights: this.insights.stats(),
    };
  }
}

/**
 * Build a pipeline from (partial) configuration.
 * @throws ValidationError if the configuration is invalid
 */
export function createPipeline(
  config: PipelineConfigInput = {},
  options: PipelineOptions = {}
): ObservabilityPipeline {
  const result = PipelineConfigSchema.safeParse(config);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'pipeline config');
  }
  return new ObservabilityPipeline(result.data, options);
}
