/**
 * Critic Types
 */

import type { Insight, InsightDraft, TraceEvent } from '../core/protocol/types.js';
import type { InsightSink } from '../channels/insight-publisher.js';
import type { StructuredLogger } from '../integrations/utilities/logger.js';

export interface AnalyzeOptions {
  /** Aborted when the call times out or the critic shuts down */
  signal: AbortSignal;
}

/**
 * The external analysis collaborator. Resolving with [] is a successful
 * empty result; rejecting (or throwing) is a failure.
 */
export type AnalyzeFn = (
  batch: readonly TraceEvent[],
  options: AnalyzeOptions
) => Promise<readonly InsightDraft[]>;

export type CriticState = 'idle' | 'buffering' | 'analyzing' | 'stopped';

/**
 * What caused a batch to be cut.
 */
export type FlushReason = 'count' | 'interval' | 'manual' | 'backlog' | 'drain';

export interface CriticObserverConfig {
  analyze: AnalyzeFn;
  /** Input buffer capacity (C); overflow drops the oldest event (default: 500) */
  capacity?: number;
  /** Events per batch (N); reaching it flushes immediately (default: 10) */
  batchSize?: number;
  /** Maximum time between flushes (T) in ms (default: 5000) */
  flushIntervalMs?: number;
  /** Per-call analysis timeout in ms; 0 disables (default: 30000) */
  analysisTimeoutMs?: number;
  /** Where finished insights go, normally the InsightPublisher */
  sink?: InsightSink;
  now?: () => number;
  logger?: StructuredLogger;
}

export interface CriticStats {
  state: CriticState;
  /** Events accepted by ingest() */
  received: number;
  /** Events currently waiting for a batch */
  buffered: number;
  /** Events evicted from a full buffer */
  dropped: number;
  batchesStarted: number;
  batchesAnalyzed: number;
  failedBatches: number;
  timedOutBatches: number;
  cancelledBatches: number;
  insightsEmitted: number;
  /** Insights dropped because every reference was outside the batch */
  insightsDiscarded: number;
  /** Drafts that failed validation */
  invalidDrafts: number;
  /** References removed because they pointed outside the batch */
  referencesStripped: number;
  lastFlushAt: number | null;
  lastError: string | null;
}

export type InsightListener = (insight: Insight) => void;
