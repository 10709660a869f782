/**
 * Pipeline Protocol Types
 *
 * The records that flow through the pipeline: agent trace events, screen
 * frames and critic insights. Each wire-facing type has a zod schema so
 * untrusted input (a tailed log, an analysis response) is validated at the
 * edge before it reaches a channel.
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';

// =============================================================================
// TRACE EVENTS
// =============================================================================

export const TRACE_EVENT_KINDS = ['thinking', 'tool_call', 'tool_result', 'text_output'] as const;

export type TraceEventKind = (typeof TRACE_EVENT_KINDS)[number];

export interface ThinkingPayload {
  text: string;
}

export interface TextOutputPayload {
  text: string;
}

export interface ToolCallPayload {
  toolName: string;
  args: Record<string, unknown>;
  toolUseId?: string;
}

export interface ToolResultPayload {
  toolName: string;
  result: unknown;
  success: boolean;
  toolUseId?: string;
}

interface TraceEventBase {
  /** Strictly increasing per session; the acknowledgement key */
  sequence: number;
  /** Epoch milliseconds */
  timestamp: number;
  agentId: string;
  sessionId: string;
}

export interface ThinkingEvent extends TraceEventBase {
  kind: 'thinking';
  payload: ThinkingPayload;
}

export interface ToolCallEvent extends TraceEventBase {
  kind: 'tool_call';
  payload: ToolCallPayload;
}

export interface ToolResultEvent extends TraceEventBase {
  kind: 'tool_result';
  payload: ToolResultPayload;
}

export interface TextOutputEvent extends TraceEventBase {
  kind: 'text_output';
  payload: TextOutputPayload;
}

/**
 * One unit from the trace source. Immutable after creation.
 */
export type TraceEvent = ThinkingEvent | ToolCallEvent | ToolResultEvent | TextOutputEvent;

/**
 * A trace event before the pipeline stamps its sequence and timestamp.
 */
export type TraceEventDraft = DraftOf<TraceEvent>;

type DraftOf<E> = E extends TraceEvent
  ? Omit<E, 'sequence' | 'timestamp'> & { timestamp?: number }
  : never;

// =============================================================================
// FRAMES
// =============================================================================

/**
 * One captured screen frame. Frames are disposable; only the newest matters.
 */
export interface Frame {
  sessionId: string;
  timestamp: number;
  /** Frame-local counter, unrelated to TraceEvent.sequence */
  sequence: number;
  /** Image format tag, e.g. 'jpeg' or 'webp' */
  encoding: string;
  bytes: Uint8Array;
  width: number;
  height: number;
}

// =============================================================================
// INSIGHTS
// =============================================================================

export const INSIGHT_CATEGORIES = [
  'error',
  'security',
  'missed_opportunity',
  'process_quality',
  'summary',
] as const;

export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

export const SEVERITIES = ['info', 'warning', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Ordinal rank of a severity: info < warning < critical.
 */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

/**
 * What the analysis function returns. The critic turns drafts into insights.
 */
export interface InsightDraft {
  category: InsightCategory;
  severity: Severity;
  message: string;
  relatedSequences: number[];
}

/**
 * Critic output. Every related sequence was observed in an analyzed batch.
 */
export interface Insight extends InsightDraft {
  id: string;
  /** Epoch milliseconds */
  producedAt: number;
}

/**
 * Insight as delivered on the insight channel; `ordinal` is the ack key.
 */
export interface InsightEnvelope {
  ordinal: number;
  insight: Insight;
}

// =============================================================================
// SUBSCRIPTIONS
// =============================================================================

export type ChannelKind = 'reliable' | 'lossy' | 'insight';

// =============================================================================
// SCHEMAS
// =============================================================================

const sequenceSchema = z.number().int().nonnegative();

const baseEventShape = {
  sequence: sequenceSchema,
  timestamp: z.number().nonnegative(),
  agentId: z.string().min(1),
  sessionId: z.string().min(1),
};

export const TraceEventSchema = z.discriminatedUnion('kind', [
  z.object({
    ...baseEventShape,
    kind: z.literal('thinking'),
    payload: z.object({ text: z.string() }),
  }),
  z.object({
    ...baseEventShape,
    kind: z.literal('tool_call'),
    payload: z.object({
      toolName: z.string().min(1),
      args: z.record(z.string(), z.unknown()),
      toolUseId: z.string().optional(),
    }),
  }),
  z.object({
    ...baseEventShape,
    kind: z.literal('tool_result'),
    payload: z.object({
      toolName: z.string().min(1),
      result: z.unknown(),
      success: z.boolean(),
      toolUseId: z.string().optional(),
    }),
  }),
  z.object({
    ...baseEventShape,
    kind: z.literal('text_output'),
    payload: z.object({ text: z.string() }),
  }),
]);

export const FrameSchema = z.object({
  sessionId: z.string().min(1),
  timestamp: z.number().nonnegative(),
  sequence: sequenceSchema,
  encoding: z.string().min(1),
  bytes: z.instanceof(Uint8Array),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const InsightDraftSchema = z.object({
  category: z.enum(INSIGHT_CATEGORIES),
  severity: z.enum(SEVERITIES),
  message: z.string().min(1),
  relatedSequences: z.array(sequenceSchema),
});

// =============================================================================
// PARSERS
// =============================================================================

/**
 * Validate an untrusted trace event. The result is deeply frozen, so every
 * consumer (replay, subscribers, analysis) sees the same unchangeable record.
 * @throws ValidationError
 */
export function parseTraceEvent(value: unknown): TraceEvent {
  const result = TraceEventSchema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'trace event');
  }
  // z.unknown() fields infer as optional; rebuild the exact union member
  const event = toTraceEvent(result.data);
  deepFreeze(event);
  return event;
}

/**
 * Freezes an object graph in place. Binary views are left as they are,
 * since the runtime refuses to freeze them.
 */
export function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value) || ArrayBuffer.isView(value)) {
    return;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}

function toTraceEvent(data: z.infer<typeof TraceEventSchema>): TraceEvent {
  const base = {
    sequence: data.sequence,
    timestamp: data.timestamp,
    agentId: data.agentId,
    sessionId: data.sessionId,
  };
  switch (data.kind) {
    case 'thinking':
      return { ...base, kind: 'thinking', payload: { text: data.payload.text } };
    case 'text_output':
      return { ...base, kind: 'text_output', payload: { text: data.payload.text } };
    case 'tool_call':
      return {
        ...base,
        kind: 'tool_call',
        payload: {
          toolName: data.payload.toolName,
          args: data.payload.args,
          ...(data.payload.toolUseId !== undefined && { toolUseId: data.payload.toolUseId }),
        },
      };
    case 'tool_result':
      return {
        ...base,
        kind: 'tool_result',
        payload: {
          toolName: data.payload.toolName,
          result: data.payload.result,
          success: data.payload.success,
          ...(data.payload.toolUseId !== undefined && { toolUseId: data.payload.toolUseId }),
        },
      };
  }
}

/**
 * Validate an untrusted frame.
 * @throws ValidationError
 */
export function parseFrame(value: unknown): Frame {
  const result = FrameSchema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'frame');
  }
  return result.data;
}

/**
 * Validate one draft returned by an analysis function.
 * @throws ValidationError
 */
export function parseInsightDraft(value: unknown): InsightDraft {
  const result = InsightDraftSchema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'insight draft');
  }
  return result.data;
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isToolCall(event: TraceEvent): event is ToolCallEvent {
  return event.kind === 'tool_call';
}

export function isToolResult(event: TraceEvent): event is ToolResultEvent {
  return event.kind === 'tool_result';
}

export function isThinking(event: TraceEvent): event is ThinkingEvent {
  return event.kind === 'thinking';
}

export function isTextOutput(event: TraceEvent): event is TextOutputEvent {
  return event.kind === 'text_output';
}
