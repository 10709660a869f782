/**
 * Tool Trace Log Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  TRUNCATE_LIMITS,
  TraceLogEntrySchema,
  createTraceLogEntry,
  extractAgentContext,
  extractNested,
  extractToolFields,
  parseJsonField,
  parseMcpTool,
  recordHookInvocation,
  serializeForLog,
  truncate,
} from '../../src/sources/trace-log.js';

// =============================================================================
// MCP TOOL NAMES
// =============================================================================

describe('parseMcpTool', () => {
  it('splits server and tool', () => {
    expect(parseMcpTool('mcp__memory__create_entities')).toEqual({
      isMcp: true,
      mcpServer: 'memory',
      mcpTool: 'create_entities',
    });
    expect(parseMcpTool('mcp__github__get_pull_request').mcpTool).toBe('get_pull_request');
  });

  it('keeps underscores in the server name', () => {
    expect(parseMcpTool('mcp__plugin_docs_docs__get-library-docs')).toEqual({
      isMcp: true,
      mcpServer: 'plugin_docs_docs',
      mcpTool: 'get-library-docs',
    });
  });

  it('treats built-in and incomplete names as non-MCP', () => {
    const notMcp = { isMcp: false, mcpServer: null, mcpTool: null };
    for (const name of ['Read', 'Bash', '', 'mcp__', 'mcp__memory']) {
      expect(parseMcpTool(name)).toEqual(notMcp);
    }
  });
});

// =============================================================================
// AGENT CONTEXT
// =============================================================================

describe('extractAgentContext', () => {
  it('reads subagent type from input and agent id from response', () => {
    expect(
      extractAgentContext('Task', { subagent_type: 'Solution Architect' }, { agent_id: 'b291f8e', status: 'completed' })
    ).toEqual({ subagentType: 'Solution Architect', agentId: 'b291f8e' });
  });

  it('accepts JSON text input', () => {
    expect(extractAgentContext('Task', JSON.stringify({ subagent_type: 'QA Tester' }), {}).subagentType).toBe(
      'QA Tester'
    );
  });

  it('is null for other tools and for missing data', () => {
    const none = { subagentType: null, agentId: null };
    expect(extractAgentContext('Read', { subagent_type: 'x' }, { agent_id: 'y' })).toEqual(none);
    expect(extractAgentContext('Task', null, null)).toEqual(none);
  });
});

// =============================================================================
// TOOL FIELDS
// =============================================================================

describe('extractToolFields', () => {
  it('pulls shell details', () => {
    const fields = extractToolFields(
      { command: 'ls -la /home', description: 'List directory contents' },
      { stdout: '...', stderr: '', interrupted: false }
    );
    expect(fields).toMatchObject({
      command: 'ls -la /home',
      description: 'List directory contents',
      filePath: null,
      hasStderr: false,
      interrupted: false,
    });
  });

  it('flags non-empty stderr and interruption', () => {
    expect(extractToolFields({}, { stderr: 'cat: nope: No such file or directory' }).hasStderr).toBe(true);
    expect(extractToolFields({}, { interrupted: true }).interrupted).toBe(true);
  });

  it('accepts file_path or filePath', () => {
    expect(extractToolFields({ file_path: '/app/main.ts' }, {}).filePath).toBe('/app/main.ts');
    expect(extractToolFields({ filePath: '/app/other.ts' }, {}).filePath).toBe('/app/other.ts');
  });

  it('pulls search and fetch results', () => {
    expect(extractToolFields({ pattern: '**/*.ts', query: 'test files' }, { numMatches: 15, numFiles: 3 })).toMatchObject({
      pattern: '**/*.ts',
      query: 'test files',
      numMatches: 15,
      numFiles: 3,
    });
    expect(extractToolFields({ url: 'https://example.test/api' }, { httpCode: 200, bytes: 4096 })).toMatchObject({
      url: 'https://example.test/api',
      httpCode: 200,
      bytes: 4096,
    });
  });

  it('reads model and status', () => {
    expect(extractToolFields({ model: 'test-model' }, { status: 'completed', data: { nested: 1 } })).toMatchObject({
      model: 'test-model',
      status: 'completed',
    });
  });

  it('parses JSON text input and ignores a missing response', () => {
    const fields = extractToolFields(JSON.stringify({ file_path: '/test/path.txt' }), null);
    expect(fields.filePath).toBe('/test/path.txt');
    expect(fields.numFiles).toBeNull();
  });

  it('truncates long values to their limits', () => {
    const fields = extractToolFields({ file_path: '/a'.repeat(200), command: `ls ${'a'.repeat(200)}` }, {});
    expect(fields.filePath).toHaveLength(TRUNCATE_LIMITS.filePath);
    expect(fields.filePath?.endsWith('...')).toBe(true);
    expect(fields.command).toHaveLength(TRUNCATE_LIMITS.command);
  });

  it('ignores numeric fields that are not numbers', () => {
    expect(extractToolFields({}, { httpCode: '200' }).httpCode).toBeNull();
  });
});

// =============================================================================
// HELPERS
// =============================================================================

describe('truncate', () => {
  it('leaves short values alone', () => {
    expect(truncate('short', 100)).toBe('short');
    expect(truncate('x'.repeat(100), 100)).toBe('x'.repeat(100));
    expect(truncate('', 100)).toBe('');
  });

  it('cuts long values and ends them with an ellipsis', () => {
    expect(truncate('x'.repeat(150), 100)).toBe(`${'x'.repeat(97)}...`);
  });

  it('never splits an emoji at the cut', () => {
    const cut = truncate(`${'a'.repeat(96)}😀zzzz`, 100);
    expect(cut).toBe(`${'a'.repeat(96)}😀...`);
    expect(cut?.charCodeAt(cut.length - 4)).toBe(0xde00);
  });

  it('counts an emoji as one character', () => {
    const text = `${'a'.repeat(97)}😀zz`;
    expect(text.length).toBe(101);
    expect(truncate(text, 100)).toBe(text);
  });

  it('keeps a truncated tool field whole', () => {
    const fields = extractToolFields({ description: `${'d'.repeat(196)}😀 and more` }, {});
    expect(fields.description).toBe(`${'d'.repeat(196)}😀...`);
  });

  it('stringifies non-strings and keeps null', () => {
    expect(truncate(12345, 10)).toBe('12345');
    expect(truncate(null, 10)).toBeNull();
    expect(truncate(undefined, 10)).toBeNull();
  });
});

describe('parseJsonField', () => {
  it('parses JSON text', () => {
    expect(parseJsonField('{"key": "value", "num": 42}')).toEqual({ key: 'value', num: 42 });
    expect(parseJsonField('[1, 2, 3]')).toEqual([1, 2, 3]);
  });

  it('returns anything else unchanged', () => {
    const record = { key: 'value' };
    expect(parseJsonField(record)).toBe(record);
    expect(parseJsonField('not valid json {')).toBe('not valid json {');
    expect(parseJsonField(null)).toBeNull();
    expect(parseJsonField(42)).toBe(42);
  });
});

describe('extractNested', () => {
  it('returns the first key present', () => {
    expect(extractNested({ file_path: '/a' }, 'file_path', 'filePath')).toBe('/a');
    expect(extractNested({ filePath: '/b' }, 'file_path', 'filePath')).toBe('/b');
  });

  it('is null when nothing matches', () => {
    expect(extractNested({ other: 1 }, 'file_path')).toBeNull();
    expect(extractNested('not a record', 'key')).toBeNull();
    expect(extractNested(null, 'key')).toBeNull();
  });
});

describe('serializeForLog', () => {
  it('keeps strings and encodes the rest as compact JSON', () => {
    expect(serializeForLog('short string', 100)).toBe('short string');
    expect(serializeForLog({ key: 'value' }, 100)).toBe('{"key":"value"}');
    expect(serializeForLog([1, 2, 3], 100)).toBe('[1,2,3]');
    expect(serializeForLog(null, 100)).toBeNull();
  });

  it('truncates long encodings', () => {
    const out = serializeForLog({ key: 'v'.repeat(200) }, 50);
    expect(out).toHaveLength(50);
    expect(out?.endsWith('...')).toBe(true);
  });
});

// =============================================================================
// ENTRIES
// =============================================================================

describe('createTraceLogEntry', () => {
  const at = new Date('2026-01-02T03:04:05.000Z');

  it('builds a full entry', () => {
    const entry = createTraceLogEntry(
      {
        session_id: 'sess_123',
        tool_use_id: 'tu_456',
        tool_name: 'Read',
        permission_mode: 'default',
        cwd: '/home/user/project',
        tool_input: { file_path: '/app/main.py' },
        tool_response: { type: 'text', content: '...' },
      },
      at
    );

    expect(entry).toMatchObject({
      timestamp: '2026-01-02T03:04:05.000Z',
      sessionId: 'sess_123',
      toolUseId: 'tu_456',
      toolName: 'Read',
      isMcp: false,
      mcpServer: null,
      permissionMode: 'default',
      cwd: '/home/user/project',
      filePath: '/app/main.py',
      toolInput: '{"file_path":"/app/main.py"}',
      toolResponse: '{"type":"text","content":"..."}',
    });
    expect(TraceLogEntrySchema.safeParse(entry).success).toBe(true);
  });

  it('fills agent context for Task', () => {
    const entry = createTraceLogEntry({
      tool_name: 'Task',
      tool_input: { subagent_type: 'DevOps Engineer', model: 'test-model' },
      tool_response: { agent_id: 'c39d5a1', status: 'completed' },
    });
    expect(entry).toMatchObject({
      subagentType: 'DevOps Engineer',
      agentId: 'c39d5a1',
      model: 'test-model',
      status: 'completed',
    });
  });

  it('marks MCP tools', () => {
    const entry = createTraceLogEntry({ tool_name: 'mcp__memory__create_entities', tool_input: {}, tool_response: {} });
    expect(entry).toMatchObject({ isMcp: true, mcpServer: 'memory', mcpTool: 'create_entities' });
  });

  it('tolerates empty or malformed input', () => {
    for (const raw of [{}, 'not an object', { session_id: 42, tool_name: null }]) {
      const entry = createTraceLogEntry(raw, at);
      expect(entry).toMatchObject({
        sessionId: '',
        toolName: '',
        isMcp: false,
        timestamp: '2026-01-02T03:04:05.000Z',
        toolInput: null,
      });
    }
  });
});

describe('recordHookInvocation', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'trace-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per call, creating the directory', async () => {
    const path = join(dir, 'nested', 'tool-trace.jsonl');
    const raw = JSON.stringify({
      session_id: 'integration-session',
      tool_name: 'mcp__test__mock_tool',
      tool_input: { test_param: 'test_value' },
      tool_response: { status: 'ok' },
    });

    await recordHookInvocation(raw, path);
    await recordHookInvocation('', path);

    const lines = (await readFile(path, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);

    const first = TraceLogEntrySchema.parse(JSON.parse(lines[0]));
    expect(first).toMatchObject({
      sessionId: 'integration-session',
      toolName: 'mcp__test__mock_tool',
      isMcp: true,
      mcpServer: 'test',
      mcpTool: 'mock_tool',
      status: 'ok',
    });
    expect(TraceLogEntrySchema.parse(JSON.parse(lines[1])).sessionId).toBe('');
  });
});
