/**
 * Tool trace log.
 *
 * One JSON line per completed tool use, written by the agent host's
 * post-tool hook and tailed by TraceLogTailer. Entries keep the fields the
 * critic and the UI care about, flattened and truncated so a single huge
 * tool response cannot bloat the log.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

export const TRUNCATE_LIMITS = {
  command: 200,
  description: 200,
  filePath: 200,
  pattern: 200,
  query: 200,
  url: 500,
  model: 100,
  status: 100,
  toolInput: 2000,
  toolResponse: 2000,
} as const;

const MCP_PREFIX = 'mcp__';

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * What the host hands to the hook. Unusable fields fall back to empty.
 */
export const HookInputSchema = z.object({
  session_id: z.string().catch(''),
  tool_use_id: z.string().catch(''),
  tool_name: z.string().catch(''),
  permission_mode: z.string().nullable().catch(null),
  cwd: z.string().nullable().catch(null),
  tool_input: z.unknown(),
  tool_response: z.unknown(),
});

export type HookInput = z.infer<typeof HookInputSchema>;

const nullableString = z.string().nullable();
const nullableNumber = z.number().nullable();

export const TraceLogEntrySchema = z.object({
  timestamp: z.string(),
  sessionId: z.string(),
  toolUseId: z.string(),
  toolName: z.string(),
  isMcp: z.boolean(),
  mcpServer: nullableString,
  mcpTool: nullableString,
  permissionMode: nullableString,
  cwd: nullableString,
  subagentType: nullableString,
  agentId: nullableString,
  command: nullableString,
  description: nullableString,
  filePath: nullableString,
  pattern: nullableString,
  query: nullableString,
  url: nullableString,
  model: nullableString,
  httpCode: nullableNumber,
  bytes: nullableNumber,
  numMatches: nullableNumber,
  numFiles: nullableNumber,
  status: nullableString,
  interrupted: z.boolean(),
  hasStderr: z.boolean(),
  toolInput: nullableString,
  toolResponse: nullableString,
});

export type TraceLogEntry = z.infer<typeof TraceLogEntrySchema>;

export interface McpToolInfo {
  isMcp: boolean;
  mcpServer: string | null;
  mcpTool: string | null;
}

export interface AgentContext {
  subagentType: string | null;
  agentId: string | null;
}

export interface ToolFields {
  command: string | null;
  description: string | null;
  filePath: string | null;
  pattern: string | null;
  query: string | null;
  url: string | null;
  model: string | null;
  httpCode: number | null;
  bytes: number | null;
  numMatches: number | null;
  numFiles: number | null;
  status: string | null;
  interrupted: boolean;
  hasStderr: boolean;
}

// =============================================================================
// FIELD HELPERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shorten to `limit` characters, ending in "..." when cut. Characters are
 * code points, so a surrogate pair is never split.
 * Non-strings are stringified first; null and undefined stay null.
 */
export function truncate(value: unknown, limit: number): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value);
  if (text.length <= limit) {
    return text;
  }
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return text;
  }
  return `${chars.slice(0, Math.max(0, limit - 3)).join('')}...`;
}

/**
 * Hosts sometimes send tool input and output as JSON text.
 * Parses a string when it is valid JSON; returns anything else unchanged.
 */
export function parseJsonField(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

/**
 * First non-null value among `keys`, or null.
 */
export function extractNested(data: unknown, ...keys: string[]): unknown {
  if (!isRecord(data)) {
    return null;
  }
  for (const key of keys) {
    const value = data[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return null;
}

function stringField(data: unknown, limit: number, ...keys: string[]): string | null {
  return truncate(extractNested(data, ...keys), limit);
}

function numberField(data: unknown, ...keys: string[]): number | null {
  const value = extractNested(data, ...keys);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Strings are truncated as-is; everything else is JSON-encoded first.
 */
export function serializeForLog(value: unknown, limit: number): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return truncate(value, limit);
  }
  return truncate(JSON.stringify(value), limit);
}

// =============================================================================
// EXTRACTION
// =============================================================================

/**
 * Split `mcp__<server>__<tool>`. The server part may itself contain
 * underscores; the tool is everything after the last `__`.
 */
export function parseMcpTool(toolName: string): McpToolInfo {
  const notMcp: McpToolInfo = { isMcp: false, mcpServer: null, mcpTool: null };
  if (!toolName.startsWith(MCP_PREFIX)) {
    return notMcp;
  }

  const rest = toolName.slice(MCP_PREFIX.length);
  const split = rest.lastIndexOf('__');
  if (split <= 0) {
    return notMcp;
  }

  const server = rest.slice(0, split);
  const tool = rest.slice(split + 2);
  if (!tool) {
    return notMcp;
  }
  return { isMcp: true, mcpServer: server, mcpTool: tool };
}

/**
 * Subagent details for `Task` tool uses; nulls for everything else.
 */
export function extractAgentContext(toolName: string, input: unknown, response: unknown): AgentContext {
  if (toolName !== 'Task') {
    return { subagentType: null, agentId: null };
  }
  const subagentType = extractNested(parseJsonField(input), 'subagent_type', 'subagentType');
  const agentId = extractNested(parseJsonField(response), 'agent_id', 'agentId');
  return {
    subagentType: typeof subagentType === 'string' ? subagentType : null,
    agentId: typeof agentId === 'string' ? agentId : null,
  };
}

export function extractToolFields(input: unknown, response: unknown): ToolFields {
  const args = parseJsonField(input);
  const result = parseJsonField(response);
  const stderr = extractNested(result, 'stderr');

  return {
    command: stringField(args, TRUNCATE_LIMITS.command, 'command'),
    description: stringField(args, TRUNCATE_LIMITS.description, 'description'),
    filePath: stringField(args, TRUNCATE_LIMITS.filePath, 'file_path', 'filePath'),
    pattern: stringField(args, TRUNCATE_LIMITS.pattern, 'pattern'),
    query: stringField(args, TRUNCATE_LIMITS.query, 'query'),
    url: stringField(args, TRUNCATE_LIMITS.url, 'url'),
    model: stringField(args, TRUNCATE_LIMITS.model, 'model'),
    httpCode: numberField(result, 'httpCode', 'http_code'),
    bytes: numberField(result, 'bytes'),
    numMatches: numberField(result, 'numMatches', 'num_matches'),
    numFiles: numberField(result, 'numFiles', 'num_files'),
    status: stringField(result, TRUNCATE_LIMITS.status, 'status'),
    interrupted: extractNested(result, 'interrupted') === true,
    hasStderr: typeof stderr === 'string' && stderr.length > 0,
  };
}

// =============================================================================
// ENTRIES
// =============================================================================

/**
 * Build a log entry from raw hook input. Never throws: malformed input
 * yields an entry with empty identifiers.
 */
export function createTraceLogEntry(hookInput: unknown, now: Date = new Date()): TraceLogEntry {
  const parsed = HookInputSchema.safeParse(isRecord(hookInput) ? hookInput : {});
  const input: HookInput = parsed.success
    ? parsed.data
    : { session_id: '', tool_use_id: '', tool_name: '', permission_mode: null, cwd: null, tool_input: null, tool_response: null };

  return {
    timestamp: now.toISOString(),
    sessionId: input.session_id,
    toolUseId: input.tool_use_id,
    toolName: input.tool_name,
    ...parseMcpTool(input.tool_name),
    permissionMode: input.permission_mode,
    cwd: input.cwd,
    ...extractAgentContext(input.tool_name, input.tool_input, input.tool_response),
    ...extractToolFields(input.tool_input, input.tool_response),
    toolInput: serializeForLog(input.tool_input, TRUNCATE_LIMITS.toolInput),
    toolResponse: serializeForLog(input.tool_response, TRUNCATE_LIMITS.toolResponse),
  };
}

/**
 * Append one entry as a JSON line, creating the directory if needed.
 */
export async function appendTraceLogEntry(path: string, entry: TraceLogEntry): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf-8');
}

/**
 * Log one hook invocation from the raw stdin text. Unparseable input still
 * produces an entry, with empty identifiers.
 */
export async function recordHookInvocation(rawInput: string, path: string): Promise<TraceLogEntry> {
  const entry = createTraceLogEntry(rawInput.trim() ? parseJsonField(rawInput) : {});
  await appendTraceLogEntry(path, entry);
  return entry;
}
