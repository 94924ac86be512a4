/**
 * Tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  InterruptedError,
  IoError,
  NetworkError,
  OutlineError,
  ParseError,
  ReduceError,
  UsageError,
  exitCodeFor,
  getErrorDetails,
  isSnapshotError,
  isUrlRelated,
  toError,
} from './errors.js';

describe('exitCodeFor', () => {
  it('maps each error kind to its exit code', () => {
    expect(exitCodeFor(new UsageError('bad flag'))).toBe(1);
    expect(exitCodeFor(new NetworkError('down'))).toBe(1);
    expect(exitCodeFor(new ParseError('invalid JSON'))).toBe(2);
    expect(exitCodeFor(new ReduceError('missing'))).toBe(3);
    expect(exitCodeFor(new OutlineError('bad schema'))).toBe(3);
    expect(exitCodeFor(new IoError('disk full'))).toBe(4);
    expect(exitCodeFor(new InterruptedError('interrupted before writing'))).toBe(130);
  });

  it('falls back to 1 for unknown errors', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('isUrlRelated', () => {
  it('is true for network and parse errors only', () => {
    expect(isUrlRelated(new NetworkError('down'))).toBe(true);
    expect(isUrlRelated(new ParseError('invalid JSON'))).toBe(true);
    expect(isUrlRelated(new ReduceError('missing'))).toBe(false);
    expect(isUrlRelated(new IoError('disk full'))).toBe(false);
    expect(isUrlRelated(new Error('other'))).toBe(false);
  });
});

describe('NetworkError', () => {
  it('records status code and retryability in details', () => {
    const error = new NetworkError('unexpected status: 503', 503, true);

    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.statusCode).toBe(503);
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ statusCode: 503, retryable: true });
  });

  it('defaults to non-retryable', () => {
    expect(new NetworkError('unexpected status: 404', 404).retryable).toBe(false);
  });
});

describe('getErrorDetails', () => {
  it('includes code for snapshot errors', () => {
    const details = getErrorDetails(new ReduceError('missing top-level key(s): components'));

    expect(details).toEqual({
      name: 'ReduceError',
      code: 'REDUCE_ERROR',
      exitCode: 3,
      details: undefined,
    });
  });

  it('handles non-error values', () => {
    expect(getErrorDetails(42)).toEqual({});
  });
});

describe('toError', () => {
  it('wraps non-error values', () => {
    const error = toError('plain');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain');
    expect(isSnapshotError(error)).toBe(false);
  });
});
