/**
 * Error Types Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AnalysisError,
  ConfigError,
  ErrorCategory,
  PipelineError,
  ProtocolViolationError,
  SubscriberOverflowError,
  ValidationError,
  categorizeError,
  formatErrorForLog,
  isNotFoundError,
  wrapError,
} from '../src/errors/index.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('error classes', () => {
  it('ProtocolViolationError carries the offending keys', () => {
    const error = new ProtocolViolationError('AgentEventChannel', 2, 5);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error.category).toBe(ErrorCategory.PROTOCOL);
    expect(error.recoverable).toBe(false);
    expect(error.toLogString()).toBe(
      '[ProtocolViolationError] (PROTOCOL) Out-of-order publish on AgentEventChannel: key 2 does not follow 5 ' +
        'context={"channel":"AgentEventChannel","key":2,"lastKey":5}'
    );
  });

  it('SubscriberOverflowError is recoverable by reconnecting', () => {
    const error = new SubscriberOverflowError('InsightPublisher', 'reliable-sub-3', 64);
    expect(error.category).toBe(ErrorCategory.OVERFLOW);
    expect(error.recoverable).toBe(true);
    expect(error.message).toBe('Subscriber reliable-sub-3 on InsightPublisher exceeded 64 pending items and was disconnected');
  });

  it('AnalysisError tells timeouts from failures', () => {
    const timeout = AnalysisError.timeout(1000, 3);
    expect(timeout.reason).toBe('timeout');
    expect(timeout.category).toBe(ErrorCategory.TRANSIENT);
    expect(timeout.context).toEqual({ reason: 'timeout', batchSize: 3 });

    const failed = AnalysisError.fromError(new Error('boom'), 2);
    expect(failed.message).toBe('Analysis failed: boom');
    expect(failed.category).toBe(ErrorCategory.DEPENDENCY);
    expect(failed.cause?.message).toBe('boom');

    expect(AnalysisError.fromError(timeout, 9)).toBe(timeout);
    expect(AnalysisError.fromError('nope', 1).message).toBe('Analysis failed: nope');
  });

  it('ValidationError.fromZodError lists each field', () => {
    const result = z.object({ a: z.number(), b: z.string() }).safeParse({ a: 'x', b: 1 });
    if (result.success) {
      throw new Error('expected a parse failure');
    }

    const error = ValidationError.fromZodError(result.error, 'sample');
    expect(error.fields).toEqual(['a', 'b']);
    expect(error.message).toBe(
      'Invalid sample: a: Expected number, received string, b: Expected string, received number'
    );
  });

  it('ConfigError remembers the file', () => {
    const error = new ConfigError('bad file', '/etc/watchtower.json');
    expect(error.path).toBe('/etc/watchtower.json');
    expect(error.toJSON()).toMatchObject({ name: 'ConfigError', category: 'VALIDATION', context: { path: '/etc/watchtower.json' } });
  });
});

describe('categorizeError', () => {
  it('classifies plain errors by message and code', () => {
    expect(categorizeError(new Error('request timed out'))).toEqual({
      category: ErrorCategory.TRANSIENT,
      recoverable: true,
    });
    expect(categorizeError(withCode('reset', 'ECONNRESET')).category).toBe(ErrorCategory.TRANSIENT);
    expect(categorizeError(Object.assign(new Error('stop'), { name: 'AbortError' })).category).toBe(
      ErrorCategory.CANCELLED
    );
    expect(categorizeError(new Error('invalid frame')).category).toBe(ErrorCategory.VALIDATION);
    expect(categorizeError(new Error('something else'))).toEqual({
      category: ErrorCategory.INTERNAL,
      recoverable: false,
    });
  });

  it('keeps the category of a pipeline error', () => {
    expect(categorizeError(new ProtocolViolationError('c', 1, 1)).category).toBe(ErrorCategory.PROTOCOL);
  });
});

describe('wrapError', () => {
  it('returns pipeline errors unchanged', () => {
    const error = AnalysisError.timeout(10, 1);
    expect(wrapError(error)).toBe(error);
  });

  it('wraps anything else with its cause', () => {
    const wrapped = wrapError('oops', { origin: 'test' });
    expect(wrapped.message).toBe('oops');
    expect(wrapped.category).toBe(ErrorCategory.INTERNAL);
    expect(wrapped.context).toEqual({ origin: 'test' });
    expect(wrapped.cause?.message).toBe('oops');
  });
});

describe('formatErrorForLog', () => {
  it('formats every kind of thrown value', () => {
    expect(formatErrorForLog(new TypeError('bad'))).toBe('[TypeError] bad');
    expect(formatErrorForLog(42)).toBe('[Unknown] 42');
    expect(formatErrorForLog(new PipelineError('x', ErrorCategory.INTERNAL, false))).toBe('[PipelineError] (INTERNAL) x');
  });
});

describe('isNotFoundError', () => {
  it('matches ENOENT only', () => {
    expect(isNotFoundError(withCode('missing', 'ENOENT'))).toBe(true);
    expect(isNotFoundError(withCode('denied', 'EACCES'))).toBe(false);
    expect(isNotFoundError('ENOENT')).toBe(false);
  });
});
