/**
 * Critic Observer
 *
 * Watches the trace stream as a bus sink and periodically asks an external
 * analysis function for insights. It is an observer, not an auditor:
 *
 * - ingest() only pushes into a bounded ring buffer; when full the oldest
 *   event is dropped so analysis favors recent activity
 * - a batch is cut when N events are buffered or T ms have passed since the
 *   last flush, whichever comes first
 * - one analysis runs at a time, off the ingest path; buffering continues
 *   into the next batch while it runs
 * - a failed or timed-out analysis discards its batch and the loop goes on
 *
 * State: idle -> buffering -> analyzing -> idle. Analyzing overlaps with
 * buffering; the only terminal state is stopped.
 */

import type { Insight, InsightDraft, TraceEvent } from '../core/protocol/types.js';
import { parseInsightDraft } from '../core/protocol/types.js';
import type { EventBus, EventSink, SubscriptionHandle } from '../core/event-bus.js';
import { AtomicCounter } from '../core/queues/atomic-counter.js';
import { RingBuffer } from '../core/queues/ring-buffer.js';
import type { InsightSink } from '../channels/insight-publisher.js';
import {
  AnalysisError,
  ErrorCategory,
  PipelineError,
  formatErrorForLog,
} from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import type {
  AnalyzeFn,
  CriticObserverConfig,
  CriticState,
  CriticStats,
  FlushReason,
  InsightListener,
} from './types.js';

export const DEFAULT_CRITIC_CAPACITY = 500;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_FLUSH_INTERVAL_MS = 5000;
export const DEFAULT_ANALYSIS_TIMEOUT_MS = 30000;

export class CriticObserver implements EventSink<TraceEvent> {
  readonly name = 'CriticObserver';

  private readonly analyze: AnalyzeFn;
  private readonly buffer: RingBuffer<TraceEvent>;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly analysisTimeoutMs: number;
  private readonly sink: InsightSink | undefined;
  private readonly now: () => number;
  private readonly log: StructuredLogger;
  private readonly ids = new AtomicCounter('ins');
  private readonly listeners = new Set<InsightListener>();

  private busHandle: SubscriptionHandle | null = null;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private countTriggerScheduled = false;
  private pendingTrigger = false;
  private dropWarned = false;
  private started = false;
  private stopping = false;
  private stopped = false;
  private lastProducedAt = 0;

  private counters = {
    received: 0,
    dropped: 0,
    batchesStarted: 0,
    batchesAnalyzed: 0,
    failedBatches: 0,
    timedOutBatches: 0,
    cancelledBatches: 0,
    insightsEmitted: 0,
    insightsDiscarded: 0,
    invalidDrafts: 0,
    referencesStripped: 0,
  };
  private lastFlushAt: number | null = null;
  private lastError: string | null = null;

  constructor(config: CriticObserverConfig) {
    this.analyze = config.analyze;
    this.buffer = new RingBuffer(config.capacity ?? DEFAULT_CRITIC_CAPACITY);
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.flushIntervalMs = config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.analysisTimeoutMs = config.analysisTimeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;
    this.sink = config.sink;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createComponentLogger('CriticObserver');

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
    if (this.flushIntervalMs <= 0) {
      throw new RangeError(`flushIntervalMs must be positive, got ${this.flushIntervalMs}`);
    }
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Arms the flush timer and, if a bus is given, subscribes to it.
   */
  start(bus?: EventBus<TraceEvent>): void {
    if (this.stopped) {
      throw new PipelineError('CriticObserver cannot be restarted after stop()', ErrorCategory.INTERNAL, false);
    }
    if (this.started) {
      return;
    }
    this.started = true;
    if (bus) {
      this.busHandle = bus.subscribe(this);
    }
    this.armFlushTimer();
    this.log.debug('Critic started', {
      batchSize: this.batchSize,
      flushIntervalMs: this.flushIntervalMs,
      capacity: this.buffer.capacity,
    });
  }

  /**
   * Stops observing. With `drain`, buffered events are analyzed first;
   * otherwise they are discarded and an in-flight analysis is cancelled.
   */
  async stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.stopped) {
      return;
    }

    this.stopping = true;
    this.busHandle?.unsubscribe();
    this.busHandle = null;
    this.clearFlushTimer();

    if (options.drain) {
      while (this.buffer.size > 0 || this.inFlight) {
        await this.flush('drain');
      }
    } else {
      this.buffer.clear();
      this.controller?.abort(new PipelineError('Critic stopped', ErrorCategory.CANCELLED, false));
    }

    this.stopped = true;
    if (this.inFlight) {
      await this.inFlight;
    }
    this.log.debug('Critic stopped', { ...this.counters });
  }

  // ===========================================================================
  // INGEST
  // ===========================================================================

  /**
   * Buffers an event. Constant time; never waits on analysis.
   */
  ingest(event: TraceEvent): void {
    if (this.stopped) {
      return;
    }

    this.counters.received++;
    const evicted = this.buffer.push(event);
    if (evicted !== undefined) {
      this.counters.dropped++;
      if (!this.dropWarned) {
        this.dropWarned = true;
        this.log.warn('Critic buffer full, dropping oldest events', {
          capacity: this.buffer.capacity,
          droppedSequence: evicted.sequence,
        });
      } else {
        this.log.debug('Dropped oldest buffered event', { droppedSequence: evicted.sequence });
      }
    }

    if (this.buffer.size >= this.batchSize && !this.countTriggerScheduled) {
      this.countTriggerScheduled = true;
      queueMicrotask(() => {
        this.countTriggerScheduled = false;
        if (this.buffer.size >= this.batchSize) {
          this.trigger('count');
        }
      });
    }
  }

  // ===========================================================================
  // FLUSHING
  // ===========================================================================

  /**
   * Cuts a batch now (or right after the running analysis) and resolves
   * once the analysis queue is idle.
   */
  async flush(reason: FlushReason = 'manual'): Promise<void> {
    if (this.inFlight) {
      this.pendingTrigger = true;
    } else {
      this.trigger(reason);
    }
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private trigger(reason: FlushReason): void {
    if (this.stopped) {
      return;
    }

    if (this.inFlight) {
      this.pendingTrigger = true;
      return;
    }

    if (this.buffer.isEmpty()) {
      this.armFlushTimer();
      return;
    }

    const batch = this.buffer.drain(this.batchSize);
    this.lastFlushAt = this.now();
    this.armFlushTimer();

    this.log.debug('Flushing batch', {
      reason,
      batchSize: batch.length,
      first: batch[0]?.sequence,
      last: batch[batch.length - 1]?.sequence,
    });

    this.inFlight = this.runAnalysis(batch).finally(() => {
      this.inFlight = null;
      this.dropWarned = false;
      const more = this.pendingTrigger || this.buffer.size >= this.batchSize;
      this.pendingTrigger = false;
      if (more) {
        this.trigger('backlog');
      }
    });
  }

  private armFlushTimer(): void {
    if (!this.started || this.stopping) {
      return;
    }
    this.clearFlushTimer();
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.trigger('interval');
    }, this.flushIntervalMs);
    this.flushTimer.unref?.();
  }

  private clearFlushTimer(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  // ===========================================================================
  // ANALYSIS
  // ===========================================================================

  /**
   * Runs one analysis. Never rejects: every failure is logged and counted.
   */
  private async runAnalysis(batch: TraceEvent[]): Promise<void> {
    this.counters.batchesStarted++;
    const controller = new AbortController();
    this.controller = controller;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });

    if (this.analysisTimeoutMs > 0) {
      timeoutId = setTimeout(() => {
        controller.abort(AnalysisError.timeout(this.analysisTimeoutMs, batch.length));
      }, this.analysisTimeoutMs);
      timeoutId.unref?.();
    }

    try {
      const call = Promise.resolve().then(() =>
        this.analyze(batch, { signal: controller.signal })
      );
      const drafts: unknown = await Promise.race([call, aborted]);

      if (!Array.isArray(drafts)) {
        throw new AnalysisError('Analysis returned a non-array result', 'failed', batch.length);
      }
      if (this.stopped) {
        this.counters.cancelledBatches++;
        return;
      }

      this.counters.batchesAnalyzed++;
      this.emitInsights(batch, drafts);
    } catch (error) {
      this.recordFailure(error, batch.length);
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }

  private recordFailure(error: unknown, batchSize: number): void {
    if (error instanceof PipelineError && error.category === ErrorCategory.CANCELLED) {
      this.counters.cancelledBatches++;
      this.log.debug('Analysis cancelled', { batchSize });
      return;
    }

    const failure = AnalysisError.fromError(error, batchSize);
    if (failure.reason === 'timeout') {
      this.counters.timedOutBatches++;
    } else {
      this.counters.failedBatches++;
    }
    this.lastError = failure.message;
    this.log.warn('Analysis failed, batch discarded', {
      batchSize,
      error: formatErrorForLog(failure),
    });
  }

  /**
   * Validates drafts and keeps only references to events in this batch.
   */
  private emitInsights(batch: readonly TraceEvent[], drafts: readonly unknown[]): void {
    const observed = new Set(batch.map((event) => event.sequence));

    for (const raw of drafts) {
      let draft: InsightDraft;
      try {
        draft = parseInsightDraft(raw);
      } catch (error) {
        this.counters.invalidDrafts++;
        this.log.warn('Discarded invalid insight draft', { error: formatErrorForLog(error) });
        continue;
      }

      const related = [...new Set(draft.relatedSequences)].sort((a, b) => a - b);
      const kept = related.filter((sequence) => observed.has(sequence));
      const stripped = related.length - kept.length;

      if (stripped > 0) {
        this.counters.referencesStripped += stripped;
        this.log.warn('Stripped references to events outside the batch', {
          category: draft.category,
          stripped: related.filter((sequence) => !observed.has(sequence)),
        });
      }

      if (related.length > 0 && kept.length === 0) {
        this.counters.insightsDiscarded++;
        continue;
      }

      const producedAt = Math.max(this.now(), this.lastProducedAt);
      this.lastProducedAt = producedAt;

      const insight: Insight = Object.freeze({
        id: this.ids.next(),
        category: draft.category,
        severity: draft.severity,
        message: draft.message,
        relatedSequences: kept,
        producedAt,
      });

      this.counters.insightsEmitted++;
      this.deliver(insight);
    }
  }

  private deliver(insight: Insight): void {
    if (this.sink) {
      try {
        this.sink.publish(insight);
      } catch (error) {
        this.log.error('Insight sink failed', { insightId: insight.id, error: formatErrorForLog(error) });
      }
    }

    for (const listener of this.listeners) {
      try {
        listener(insight);
      } catch (error) {
        this.log.error('Insight listener failed', { insightId: insight.id, error: formatErrorForLog(error) });
      }
    }
  }

  // ===========================================================================
  // INSPECTION
  // ===========================================================================

  /**
   * Subscribes to insights as they are produced.
   * @returns Unsubscribe function
   */
  onInsight(listener: InsightListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get state(): CriticState {
    if (this.stopped) {
      return 'stopped';
    }
    if (this.inFlight) {
      return 'analyzing';
    }
    return this.buffer.isEmpty() ? 'idle' : 'buffering';
  }

  stats(): CriticStats {
    return {
      state: this.state,
      ...this.counters,
      buffered: this.buffer.size,
      lastFlushAt: this.lastFlushAt,
      lastError: this.lastError,
    };
  }
}
