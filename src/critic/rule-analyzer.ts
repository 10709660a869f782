/**
 * Rule-based analyzer.
 *
 * A deterministic AnalyzeFn that needs no model: it flags failed tools,
 * risky shell commands and long stretches of thinking without action.
 * Used by the CLI when no external analyzer is configured, and as a
 * reference implementation of the analysis contract.
 */

import type { InsightDraft, ToolCallEvent, ToolResultEvent, TraceEvent } from '../core/protocol/types.js';
import { isThinking, isToolCall, isToolResult } from '../core/protocol/types.js';
import type { AnalyzeFn } from './types.js';

export interface RiskyPattern {
  pattern: RegExp;
  reason: string;
}

export const DEFAULT_RISKY_PATTERNS: RiskyPattern[] = [
  { pattern: /\brm\s+-[a-z]*r[a-z]*f|\brm\s+-[a-z]*f[a-z]*r/i, reason: 'recursive forced delete' },
  { pattern: /\bsudo\b/, reason: 'privilege escalation' },
  { pattern: /\bchmod\s+(-R\s+)?777\b/, reason: 'world-writable permissions' },
  { pattern: /\b(curl|wget)\b[^|]*\|\s*(ba|z)?sh\b/, reason: 'piping a download into a shell' },
  { pattern: /\bgit\s+push\b.*(--force|-f\b)/, reason: 'force push' },
  { pattern: /\bgit\s+reset\s+--hard\b/, reason: 'hard reset' },
  { pattern: /\bmkfs(\.\w+)?\b|\bdd\s+if=.*\bof=\/dev\//, reason: 'raw disk write' },
];

export interface RuleAnalyzerOptions {
  /** Failures of one tool within a batch that escalate to critical (default: 3) */
  criticalFailureCount?: number;
  riskyPatterns?: RiskyPattern[];
  /** Thinking-only batch length that earns a process note (default: 5) */
  minEventsForProcessNote?: number;
  /** Emit one summary insight per batch (default: false) */
  summarize?: boolean;
}

function commandOf(event: ToolCallEvent): string | null {
  const command = event.payload.args['command'];
  return typeof command === 'string' ? command : null;
}

function failureInsights(results: ToolResultEvent[], criticalAt: number): InsightDraft[] {
  const byTool = new Map<string, number[]>();
  for (const event of results) {
    if (event.payload.success) {
      continue;
    }
    const sequences = byTool.get(event.payload.toolName) ?? [];
    sequences.push(event.sequence);
    byTool.set(event.payload.toolName, sequences);
  }

  const drafts: InsightDraft[] = [];
  for (const [toolName, sequences] of byTool) {
    const repeated = sequences.length >= criticalAt;
    drafts.push({
      category: 'error',
      severity: repeated ? 'critical' : 'warning',
      message:
        sequences.length === 1
          ? `${toolName} failed`
          : `${toolName} failed ${sequences.length} times`,
      relatedSequences: sequences,
    });
  }
  return drafts;
}

function securityInsights(calls: ToolCallEvent[], patterns: RiskyPattern[]): InsightDraft[] {
  const drafts: InsightDraft[] = [];
  for (const event of calls) {
    const command = commandOf(event);
    if (command === null) {
      continue;
    }
    const match = patterns.find((p) => p.pattern.test(command));
    if (match) {
      drafts.push({
        category: 'security',
        severity: 'critical',
        message: `Risky command (${match.reason}): ${command}`,
        relatedSequences: [event.sequence],
      });
    }
  }
  return drafts;
}

/**
 * Build an analyzer from rules. The returned function never rejects.
 */
export function createRuleAnalyzer(options: RuleAnalyzerOptions = {}): AnalyzeFn {
  const criticalAt = options.criticalFailureCount ?? 3;
  const patterns = options.riskyPatterns ?? DEFAULT_RISKY_PATTERNS;
  const minThinking = options.minEventsForProcessNote ?? 5;

  return async (batch: readonly TraceEvent[]) => {
    const calls = batch.filter(isToolCall);
    const results = batch.filter(isToolResult);

    const drafts: InsightDraft[] = [
      ...failureInsights(results, criticalAt),
      ...securityInsights(calls, patterns),
    ];

    const thinking = batch.filter(isThinking);
    if (calls.length === 0 && thinking.length >= minThinking) {
      drafts.push({
        category: 'process_quality',
        severity: 'info',
        message: `${thinking.length} thinking steps without a tool call`,
        relatedSequences: thinking.map((e) => e.sequence),
      });
    }

    if (options.summarize && batch.length > 0) {
      const failed = results.filter((e) => !e.payload.success).length;
      drafts.push({
        category: 'summary',
        severity: 'info',
        message: `${batch.length} events, ${calls.length} tool calls, ${failed} failed`,
        relatedSequences: batch.map((e) => e.sequence),
      });
    }

    return drafts;
  };
}
