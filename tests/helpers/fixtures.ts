/**
 * Shared test fixtures.
 */

import type {
  Frame,
  ThinkingEvent,
  ToolCallEvent,
  ToolResultEvent,
  TraceEvent,
} from '../../src/core/protocol/types.js';
import { MemorySink, StructuredLogger } from '../../src/integrations/utilities/logger.js';

const base = (sequence: number) => ({
  sequence,
  timestamp: 1_700_000_000_000 + sequence,
  agentId: 'agent-1',
  sessionId: 'session-1',
});

export function thinking(sequence: number, text = 'considering options'): ThinkingEvent {
  return { ...base(sequence), kind: 'thinking', payload: { text } };
}

export function toolCall(
  sequence: number,
  toolName = 'Read',
  args: Record<string, unknown> = {}
): ToolCallEvent {
  return { ...base(sequence), kind: 'tool_call', payload: { toolName, args } };
}

export function toolResult(sequence: number, toolName = 'Read', success = true): ToolResultEvent {
  return { ...base(sequence), kind: 'tool_result', payload: { toolName, result: 'ok', success } };
}

export function events(from: number, to: number): TraceEvent[] {
  const out: TraceEvent[] = [];
  for (let sequence = from; sequence <= to; sequence++) {
    out.push(thinking(sequence));
  }
  return out;
}

export function frame(sequence: number, sessionId = 'session-1'): Frame {
  return {
    sessionId,
    sequence,
    timestamp: 1_700_000_000_000 + sequence,
    encoding: 'jpeg',
    bytes: new Uint8Array([sequence % 256, 1, 2]),
    width: 640,
    height: 480,
  };
}

/**
 * Logger that records everything into memory instead of the console.
 */
export function quietLogger(): { logger: StructuredLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ level: 'trace', sinks: [sink] }), sink };
}

/**
 * Let queued microtasks (bus dispatch) run.
 */
export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}
