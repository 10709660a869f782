/**
 * Structured Logger Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FileSink,
  MemorySink,
  StructuredLogger,
  configureLogger,
  createComponentLogger,
  type LogEntry,
} from '../../src/integrations/utilities/logger.js';

function memoryLogger(level: 'trace' | 'info' | 'warn' | 'silent' = 'trace') {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ level, sinks: [sink] }), sink };
}

describe('StructuredLogger', () => {
  it('drops entries below its level', () => {
    const { logger, sink } = memoryLogger('warn');
    logger.info('quiet');
    logger.warn('loud', { n: 1 });

    expect(sink.getEntries().map((e) => [e.level, e.message, e.data])).toEqual([['warn', 'loud', { n: 1 }]]);
  });

  it('writes nothing when silent', () => {
    const { logger, sink } = memoryLogger('silent');
    logger.error('nothing');
    expect(sink.size).toBe(0);
  });

  it('merges context into every entry', () => {
    const { logger, sink } = memoryLogger();
    const child = createComponentLogger('CriticObserver', logger).withContext({ batch: 4 });

    child.debug('flush', { reason: 'count' });
    child.info('plain');

    expect(sink.getEntries().map((e) => e.data)).toEqual([
      { component: 'CriticObserver', batch: 4, reason: 'count' },
      { component: 'CriticObserver', batch: 4 },
    ]);
  });

  it('keeps going when a sink throws', () => {
    const sink = new MemorySink();
    const logger = new StructuredLogger({
      sinks: [
        {
          write(): void {
            throw new Error('disk full');
          },
        },
        sink,
      ],
    });

    expect(() => logger.info('still logged')).not.toThrow();
    expect(sink.getEntries()[0].message).toBe('still logged');
  });

  it('can change level at runtime', () => {
    const { logger, sink } = memoryLogger('warn');
    logger.setLevel('debug');
    logger.debug('now visible');

    expect(logger.level).toBe('debug');
    expect(sink.size).toBe(1);
  });
});

describe('MemorySink', () => {
  it('keeps only the newest entries', () => {
    const sink = new MemorySink(2);
    const logger = new StructuredLogger({ level: 'trace', sinks: [sink] });
    logger.info('a');
    logger.info('b');
    logger.info('c');

    expect(sink.getEntries().map((e) => e.message)).toEqual(['b', 'c']);
  });

  it('filters by level, component and limit', () => {
    const { logger, sink } = memoryLogger();
    createComponentLogger('EventBus', logger).warn('bus');
    createComponentLogger('FrameChannel', logger).error('frames');
    logger.info('root');

    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual(['bus', 'frames']);
    expect(sink.getEntries({ component: 'FrameChannel' }).map((e) => e.message)).toEqual(['frames']);
    expect(sink.getEntries({ limit: 1 }).map((e) => e.message)).toEqual(['root']);

    sink.clear();
    expect(sink.size).toBe(0);
  });
});

describe('FileSink', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('appends JSON lines, creating the directory', async () => {
    dir = await mkdtemp(join(tmpdir(), 'logger-'));
    const path = join(dir, 'logs', 'watchtower.log');
    const logger = new StructuredLogger({ sinks: [new FileSink(path)] });

    logger.info('first');
    logger.warn('second', { n: 2 });

    const lines = (await readFile(path, 'utf-8')).trim().split('\n');
    const entries: LogEntry[] = lines.map((line) => JSON.parse(line));
    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ['info', 'first'],
      ['warn', 'second'],
    ]);
    expect(entries[1].data).toEqual({ n: 2 });
  });
});

describe('configureLogger', () => {
  it('component loggers created afterwards use the new root', () => {
    const sink = new MemorySink();
    configureLogger({ level: 'info', sinks: [sink] });

    createComponentLogger('Main').info('hello');

    expect(sink.getEntries()[0].data).toEqual({ component: 'Main' });
  });
});
