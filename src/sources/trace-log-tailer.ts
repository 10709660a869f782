/**
 * Trace Log Tailer
 *
 * Follows the tool trace log and turns each entry into a tool_call /
 * tool_result pair. The file is polled from the last byte offset read;
 * a line is only parsed once its newline has arrived. A file that shrinks
 * is assumed rotated and is read again from the start. Reads go in chunks
 * of at most `readChunkBytes`, so a large backlog is never held in memory.
 *
 * Bad lines are the producer's problem: they are logged, counted and
 * skipped, and tailing continues.
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import type { TraceEventDraft } from '../core/protocol/types.js';
import { TraceSourceError, formatErrorForLog, isNotFoundError, ValidationError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { parseJsonField, TraceLogEntrySchema, type TraceLogEntry } from './trace-log.js';

export interface TraceLogTailerConfig {
  path: string;
  /** Receives each converted event; the pipeline stamps its sequence */
  publish: (draft: TraceEventDraft) => unknown;
  /** Poll interval in ms (default: 500) */
  pollIntervalMs?: number;
  /** agentId for the events (default: 'main') */
  agentId?: string;
  /** Start at the current end of file instead of the beginning */
  fromEnd?: boolean;
  /** Largest single read in bytes (default: 64 KiB) */
  readChunkBytes?: number;
  logger?: StructuredLogger;
}

export const DEFAULT_READ_CHUNK_BYTES = 64 * 1024;

export interface TraceLogTailerStats {
  offset: number;
  entries: number;
  malformed: number;
  readErrors: number;
  rotations: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function argsFromFields(entry: TraceLogEntry): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  const fields = {
    command: entry.command,
    description: entry.description,
    file_path: entry.filePath,
    pattern: entry.pattern,
    query: entry.query,
    url: entry.url,
    model: entry.model,
  };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null) {
      args[key] = value;
    }
  }
  return args;
}

/**
 * A completed tool use as the two events the pipeline understands.
 */
export function entryToDrafts(entry: TraceLogEntry, agentId = 'main'): [TraceEventDraft, TraceEventDraft] {
  const parsedTime = Date.parse(entry.timestamp);
  const timestamp = Number.isFinite(parsedTime) ? parsedTime : undefined;
  const sessionId = entry.sessionId || 'unknown';
  const toolName = entry.toolName || 'unknown';
  const toolUseId = entry.toolUseId ? { toolUseId: entry.toolUseId } : {};
  const input = parseJsonField(entry.toolInput);

  return [
    {
      kind: 'tool_call',
      agentId,
      sessionId,
      timestamp,
      payload: {
        toolName,
        args: isRecord(input) ? input : argsFromFields(entry),
        ...toolUseId,
      },
    },
    {
      kind: 'tool_result',
      agentId,
      sessionId,
      timestamp,
      payload: {
        toolName,
        result: parseJsonField(entry.toolResponse),
        success: !entry.hasStderr && !entry.interrupted,
        ...toolUseId,
      },
    },
  ];
}

export class TraceLogTailer {
  private readonly path: string;
  private readonly publish: (draft: TraceEventDraft) => unknown;
  private readonly pollIntervalMs: number;
  private readonly agentId: string;
  private readonly fromEnd: boolean;
  private readonly readChunkBytes: number;
  private readonly log: StructuredLogger;

  private offset = 0;
  private partial = '';
  private decoder = new StringDecoder('utf8');
  private timer: ReturnType<typeof setTimeout> | null = null;
  private polling: Promise<number> | null = null;
  private running = false;

  private counters = { entries: 0, malformed: 0, readErrors: 0, rotations: 0 };

  constructor(config: TraceLogTailerConfig) {
    this.path = config.path;
    this.publish = config.publish;
    this.pollIntervalMs = config.pollIntervalMs ?? 500;
    this.agentId = config.agentId ?? 'main';
    this.fromEnd = config.fromEnd ?? false;
    this.readChunkBytes = config.readChunkBytes ?? DEFAULT_READ_CHUNK_BYTES;
    if (!Number.isInteger(this.readChunkBytes) || this.readChunkBytes <= 0) {
      throw new RangeError(`readChunkBytes must be a positive integer, got ${this.readChunkBytes}`);
    }
    this.log = config.logger ?? createComponentLogger('TraceLogTailer');
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    if (this.fromEnd) {
      this.offset = await this.currentSize();
    }
    this.log.info('Tailing trace log', { path: this.path, offset: this.offset });
    this.schedule();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.polling) {
      await this.polling;
    }
  }

  /**
   * Read whatever has been appended since the last poll.
   * @returns number of entries published
   */
  poll(): Promise<number> {
    if (!this.polling) {
      this.polling = this.readNew().finally(() => {
        this.polling = null;
      });
    }
    return this.polling;
  }

  stats(): TraceLogTailerStats {
    return { offset: this.offset, ...this.counters };
  }

  private schedule(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll().then(
        () => this.schedule(),
        (error: unknown) => {
          this.log.error('Trace log poll failed', { error: formatErrorForLog(error) });
          this.schedule();
        }
      );
    }, this.pollIntervalMs);
    this.timer.unref?.();
  }

  private async currentSize(): Promise<number> {
    try {
      return (await stat(this.path)).size;
    } catch (error) {
      if (isNotFoundError(error)) {
        return 0;
      }
      throw error;
    }
  }

  private async readNew(): Promise<number> {
    let size: number;
    try {
      size = await this.currentSize();
    } catch (error) {
      this.recordReadError(error);
      return 0;
    }

    if (size < this.offset) {
      this.counters.rotations++;
      this.log.info('Trace log truncated, reading from start', {
        path: this.path,
        previousOffset: this.offset,
        size,
      });
      this.offset = 0;
      this.partial = '';
      this.decoder = new StringDecoder('utf8');
    }
    if (size === this.offset) {
      return 0;
    }

    let handle: FileHandle | null = null;
    let published = 0;
    try {
      handle = await open(this.path, 'r');
      const buffer = Buffer.alloc(Math.min(this.readChunkBytes, size - this.offset));
      while (this.offset < size) {
        const length = Math.min(buffer.length, size - this.offset);
        const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
        if (bytesRead === 0) {
          break;
        }
        this.offset += bytesRead;
        published += this.consume(this.decoder.write(buffer.subarray(0, bytesRead)));
      }
    } catch (error) {
      this.recordReadError(error);
    } finally {
      await handle?.close();
    }
    return published;
  }

  /**
   * Splits decoded text into complete lines; the unterminated tail waits
   * for the next chunk.
   * @returns number of entries published
   */
  private consume(text: string): number {
    const lines = (this.partial + text).split('\n');
    this.partial = lines.pop() ?? '';

    let published = 0;
    for (const line of lines) {
      if (this.handleLine(line)) {
        published++;
      }
    }
    return published;
  }

  private recordReadError(error: unknown): void {
    this.counters.readErrors++;
    const failure = new TraceSourceError(
      `Could not read trace log: ${error instanceof Error ? error.message : String(error)}`,
      this.path,
      error instanceof Error ? error : undefined
    );
    this.log.warn('Trace log read failed', { error: failure.toLogString() });
  }

  private handleLine(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed) {
      return false;
    }

    let entry: TraceLogEntry;
    try {
      const result = TraceLogEntrySchema.safeParse(JSON.parse(trimmed));
      if (!result.success) {
        throw ValidationError.fromZodError(result.error, 'trace log entry');
      }
      entry = result.data;
    } catch (error) {
      this.counters.malformed++;
      this.log.warn('Skipping malformed trace log line', {
        error: formatErrorForLog(error),
        line: trimmed.slice(0, 200),
      });
      return false;
    }

    for (const draft of entryToDrafts(entry, this.agentId)) {
      this.publish(draft);
    }
    this.counters.entries++;
    return true;
  }
}
