/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the observability pipeline. None of these
 * ever reach a producer: publish paths catch, log and count them. They exist
 * so that logs, stats and transports can tell the failure modes apart.
 *
 * Error Categories:
 * - TRANSIENT: timeouts, network hiccups in the analysis call
 * - PROTOCOL: a producer broke the ordering contract
 * - OVERFLOW: a bounded buffer or subscriber queue hit its limit
 * - VALIDATION: malformed events, frames, drafts or config
 * - DEPENDENCY: the external analysis function failed
 *
 * @example
 * ```typescript
 * throw AnalysisError.timeout(5000, 10);
 * ```
 */

import type { ZodError } from 'zod';

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (timeouts, connection resets) */
  TRANSIENT = 'TRANSIENT',

  /** Producer violated the sequencing contract */
  PROTOCOL = 'PROTOCOL',

  /** A bounded structure reached capacity */
  OVERFLOW = 'OVERFLOW',

  /** Invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** External collaborator failed */
  DEPENDENCY = 'DEPENDENCY',

  /** Unexpected internal failure */
  INTERNAL = 'INTERNAL',

  /** Operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;

  /** Whether the condition may clear on its own (reconnect, next batch) */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  readonly context: Record<string, unknown>;

  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
    };
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Failure of the external analysis call. The critic discards the batch.
 */
export class AnalysisError extends PipelineError {
  readonly reason: 'failed' | 'timeout';

  readonly batchSize: number;

  constructor(
    message: string,
    reason: 'failed' | 'timeout',
    batchSize: number,
    cause?: Error
  ) {
    super(
      message,
      reason === 'timeout' ? ErrorCategory.TRANSIENT : ErrorCategory.DEPENDENCY,
      true,
      { reason, batchSize },
      cause
    );
    this.name = 'AnalysisError';
    this.reason = reason;
    this.batchSize = batchSize;
  }

  static timeout(timeoutMs: number, batchSize: number): AnalysisError {
    return new AnalysisError(
      `Analysis timed out after ${timeoutMs}ms`,
      'timeout',
      batchSize
    );
  }

  static fromError(error: unknown, batchSize: number): AnalysisError {
    if (error instanceof AnalysisError) {
      return error;
    }
    const err = toError(error);
    return new AnalysisError(`Analysis failed: ${err.message}`, 'failed', batchSize, err);
  }
}

/**
 * An item arrived with a key that does not advance its channel.
 */
export class ProtocolViolationError extends PipelineError {
  readonly channel: string;
  readonly key: number;
  readonly lastKey: number;

  constructor(channel: string, key: number, lastKey: number) {
    super(
      `Out-of-order publish on ${channel}: key ${key} does not follow ${lastKey}`,
      ErrorCategory.PROTOCOL,
      false,
      { channel, key, lastKey }
    );
    this.name = 'ProtocolViolationError';
    this.channel = channel;
    this.key = key;
    this.lastKey = lastKey;
  }
}

/**
 * A subscriber fell too far behind and was disconnected.
 */
export class SubscriberOverflowError extends PipelineError {
  readonly channel: string;
  readonly subscriberId: string;
  readonly limit: number;

  constructor(channel: string, subscriberId: string, limit: number) {
    super(
      `Subscriber ${subscriberId} on ${channel} exceeded ${limit} pending items and was disconnected`,
      ErrorCategory.OVERFLOW,
      true,
      { channel, subscriberId, limit }
    );
    this.name = 'SubscriberOverflowError';
    this.channel = channel;
    this.subscriberId = subscriberId;
    this.limit = limit;
  }
}

/**
 * Malformed input (events, frames, insight drafts).
 */
export class ValidationError extends PipelineError {
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  static fromZodError(error: ZodError, subject = 'input'): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => {
      const path = i.path.length > 0 ? i.path.join('.') : '(root)';
      return `${path}: ${i.message}`;
    });
    return new ValidationError(`Invalid ${subject}: ${messages.join(', ')}`, fields);
  }
}

/**
 * Configuration could not be loaded or is unusable.
 */
export class ConfigError extends PipelineError {
  readonly path?: string;

  constructor(message: string, path?: string, cause?: Error) {
    super(message, ErrorCategory.VALIDATION, false, path ? { path } : {}, cause);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * A trace source could not be read. Downstream sees a gap.
 */
export class TraceSourceError extends PipelineError {
  readonly source: string;

  constructor(message: string, source: string, cause?: Error) {
    super(message, ErrorCategory.TRANSIENT, true, { source }, cause);
    this.name = 'TraceSourceError';
    this.source = source;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function errnoCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Determine a category for an arbitrary error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  if (error instanceof PipelineError) {
    return { category: error.category, recoverable: error.recoverable };
  }

  const message = error.message.toLowerCase();
  const code = errnoCode(error);

  if (
    error.name === 'AbortError' ||
    message.includes('cancelled') ||
    message.includes('aborted')
  ) {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'EPIPE' ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('socket hang up')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (message.includes('invalid') || message.includes('validation')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

/**
 * Wrap an unknown thrown value as a PipelineError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const err = toError(error);
  const { category, recoverable } = categorizeError(err);

  return new PipelineError(err.message, category, recoverable, context, err);
}

export function formatErrorForLog(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}

/**
 * True for a filesystem "no such file" error.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && errnoCode(error) === 'ENOENT';
}
