/**
 * Trace Log Tailer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TraceLogTailer, entryToDrafts } from '../../src/sources/trace-log-tailer.js';
import { createTraceLogEntry, type TraceLogEntry } from '../../src/sources/trace-log.js';
import type { TraceEventDraft } from '../../src/core/protocol/types.js';
import { quietLogger } from '../helpers/fixtures.js';

const at = new Date('2026-01-02T03:04:05.000Z');

function line(toolName: string, toolInput: unknown = {}, toolResponse: unknown = {}): string {
  const entry = createTraceLogEntry(
    { session_id: 'sess-1', tool_use_id: `tu-${toolName}`, tool_name: toolName, tool_input: toolInput, tool_response: toolResponse },
    at
  );
  return `${JSON.stringify(entry)}\n`;
}

function baseEntry(overrides: Partial<TraceLogEntry> = {}): TraceLogEntry {
  return { ...createTraceLogEntry({}, at), ...overrides };
}

// =============================================================================
// CONVERSION
// =============================================================================

describe('entryToDrafts', () => {
  it('turns an entry into a call and a result', () => {
    const [call, result] = entryToDrafts(
      baseEntry({
        sessionId: 'sess-1',
        toolUseId: 'tu-1',
        toolName: 'Bash',
        toolInput: '{"command":"ls"}',
        toolResponse: '{"stdout":"a.txt"}',
      }),
      'agent-7'
    );

    expect(call).toEqual({
      kind: 'tool_call',
      agentId: 'agent-7',
      sessionId: 'sess-1',
      timestamp: Date.UTC(2026, 0, 2, 3, 4, 5),
      payload: { toolName: 'Bash', args: { command: 'ls' }, toolUseId: 'tu-1' },
    });
    expect(result).toEqual({
      kind: 'tool_result',
      agentId: 'agent-7',
      sessionId: 'sess-1',
      timestamp: Date.UTC(2026, 0, 2, 3, 4, 5),
      payload: { toolName: 'Bash', result: { stdout: 'a.txt' }, success: true, toolUseId: 'tu-1' },
    });
  });

  it('marks stderr or interruption as failure', () => {
    expect(entryToDrafts(baseEntry({ hasStderr: true }))[1].payload).toMatchObject({ success: false });
    expect(entryToDrafts(baseEntry({ interrupted: true }))[1].payload).toMatchObject({ success: false });
  });

  it('falls back to the extracted fields when the input was cut short', () => {
    const [call] = entryToDrafts(
      baseEntry({ toolName: 'Bash', toolInput: '{"command":"ls -la', command: 'ls -la', description: 'List' })
    );
    expect(call.payload).toEqual({ toolName: 'Bash', args: { command: 'ls -la', description: 'List' } });
  });

  it('fills unknown identifiers and leaves a bad timestamp unset', () => {
    const [call] = entryToDrafts(baseEntry({ timestamp: 'yesterday' }));
    expect(call).toMatchObject({ sessionId: 'unknown', agentId: 'main', timestamp: undefined });
    expect(call.payload).toEqual({ toolName: 'unknown', args: {} });
  });
});

// =============================================================================
// TAILING
// =============================================================================

describe('TraceLogTailer', () => {
  let dir: string;
  let path: string;
  let published: TraceEventDraft[];

  function tailer(options: { fromEnd?: boolean; readChunkBytes?: number } = {}) {
    const { logger, sink } = quietLogger();
    const t = new TraceLogTailer({
      path,
      publish: (draft) => published.push(draft),
      fromEnd: options.fromEnd,
      readChunkBytes: options.readChunkBytes,
      pollIntervalMs: 60_000,
      logger,
    });
    return { tailer: t, logs: sink };
  }

  function toolNames(): string[] {
    return published.flatMap((d) => (d.kind === 'tool_call' ? [d.payload.toolName] : []));
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tailer-'));
    path = join(dir, 'tool-trace.jsonl');
    published = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('treats a missing file as empty', async () => {
    const { tailer: t } = tailer();
    expect(await t.poll()).toBe(0);
    expect(t.stats()).toEqual({ offset: 0, entries: 0, malformed: 0, readErrors: 0, rotations: 0 });
  });

  it('publishes complete lines and waits for the rest of a partial one', async () => {
    const { tailer: t } = tailer();
    const third = line('Grep');
    await writeFile(path, line('Read') + line('Bash') + third.slice(0, 20));

    expect(await t.poll()).toBe(2);
    expect(toolNames()).toEqual(['Read', 'Bash']);
    expect(published).toHaveLength(4);

    await appendFile(path, third.slice(20));
    expect(await t.poll()).toBe(1);
    expect(toolNames()).toEqual(['Read', 'Bash', 'Grep']);
  });

  it('skips malformed lines and keeps going', async () => {
    const { tailer: t, logs } = tailer();
    await writeFile(path, `${line('Read')}not json\n{"timestamp":"x"}\n\n${line('Bash')}`);

    expect(await t.poll()).toBe(2);
    expect(t.stats()).toMatchObject({ entries: 2, malformed: 2 });
    expect(logs.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual([
      'Skipping malformed trace log line',
      'Skipping malformed trace log line',
    ]);
  });

  it('starts over when the file shrinks', async () => {
    const { tailer: t } = tailer();
    await writeFile(path, line('Read') + line('Bash'));
    await t.poll();

    await writeFile(path, line('Glob'));
    expect(await t.poll()).toBe(1);
    expect(toolNames()).toEqual(['Read', 'Bash', 'Glob']);
    expect(t.stats().rotations).toBe(1);
  });

  it('can skip what was written before it started', async () => {
    await writeFile(path, line('Read'));
    const { tailer: t } = tailer({ fromEnd: true });
    await t.start();
    await t.stop();

    await appendFile(path, line('Bash'));
    expect(await t.poll()).toBe(1);
    expect(toolNames()).toEqual(['Bash']);
  });

  it('shares one read between concurrent polls', async () => {
    const { tailer: t } = tailer();
    await writeFile(path, line('Read'));

    const [a, b] = await Promise.all([t.poll(), t.poll()]);
    expect([a, b]).toEqual([1, 1]);
    expect(published).toHaveLength(2);
  });

  it('reads a backlog in small chunks without losing lines or characters', async () => {
    const { tailer: t } = tailer({ readChunkBytes: 7 });
    const content = line('Read') + line('Bash', { description: 'deploy 🚀' }) + line('Grep');
    await writeFile(path, content);

    expect(await t.poll()).toBe(3);
    expect(toolNames()).toEqual(['Read', 'Bash', 'Grep']);
    expect(published[2]).toMatchObject({ kind: 'tool_call', payload: { args: { description: 'deploy 🚀' } } });
    expect(t.stats().offset).toBe(Buffer.byteLength(content));
  });

  it('rejects a chunk size that is not a positive integer', () => {
    expect(() => tailer({ readChunkBytes: 0 })).toThrow(RangeError);
  });
});
