/**
 * Structured Logger
 *
 * Leveled logging with pluggable sinks. Every pipeline component logs
 * through a component logger so drops, disconnects and analysis failures
 * can be traced back to their owner.
 *
 * Sinks:
 * - console: human-readable lines for development (default)
 * - memory: ring buffer for tests and programmatic inspection
 * - file: JSON lines appended to a log file
 *
 * Usage:
 *   const log = createComponentLogger('CriticObserver');
 *   log.warn('Analysis failed, batch discarded', { batchSize: 10 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
}

// ─── Level Priority ──────────────────────────────────────────────────

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink: one line per entry, errors and warnings on stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const component = typeof entry.data?.component === 'string' ? ` ${entry.data.component}:` : '';
    const rest = entry.data ? omitComponent(entry.data) : {};
    const dataStr = Object.keys(rest).length > 0 ? ' ' + JSON.stringify(rest) : '';
    const line = `[${entry.timestamp}] [${entry.level.toUpperCase()}]${component} ${entry.message}${dataStr}`;

    if (entry.level === 'error' || entry.level === 'warn') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }
}

function omitComponent(data: Record<string, unknown>): Record<string, unknown> {
  const { component: _component, ...rest } = data;
  return rest;
}

/** Memory sink: bounded buffer of recent entries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private readonly maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; component?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.component) {
      entries = entries.filter((e) => e.data?.component === filter.component);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink: appends JSON lines */
export class FileSink implements LogSink {
  private readonly filePath: string;
  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private readonly sinks: LogSink[];
  private readonly defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Child logger sharing sinks, with extra default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel] && level !== 'silent';
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const hasContext = Object.keys(this.defaultContext).length > 0;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || hasContext ? { data: { ...this.defaultContext, ...data } } : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch {
        // A broken sink has nowhere left to report to
      }
    }
  }
}

// ─── Global logger ───────────────────────────────────────────────────

let rootLogger = new StructuredLogger();

/** The process-wide root logger. */
export function getLogger(): StructuredLogger {
  return rootLogger;
}

/**
 * Replace the root logger. Component loggers created afterwards pick up
 * the new sinks; call this once at startup, before building the pipeline.
 */
export function configureLogger(config: LoggerConfig): StructuredLogger {
  rootLogger = new StructuredLogger(config);
  return rootLogger;
}

/**
 * Logger bound to a component name.
 *
 *   const log = createComponentLogger('FrameChannel');
 *   log.debug('Stale frame ignored', { sessionId, sequence });
 */
export function createComponentLogger(component: string, parent?: StructuredLogger): StructuredLogger {
  return (parent ?? rootLogger).withContext({ component });
}
