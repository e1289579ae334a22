import { describe, it, expect } from 'vitest';
import {
  AggregationError,
  BackendError,
  BatchError,
  CancelledError,
  ConnectionError,
  InvalidQueryError,
  PaginationConflictError,
} from '../../src/errors.js';

describe('PaginationConflictError', () => {
  it('has correct name', () => {
    expect(new PaginationConflictError('User', 'cursor').name).toBe('PaginationConflictError');
  });

  it('names the configured mode in the default message', () => {
    const err = new PaginationConflictError('User', 'offset');
    expect(err.message).toBe('Query for kind "User" is configured for offset pagination');
    expect(err.configuredMode).toBe('offset');
    expect(err.kind).toBe('User');
  });

  it('uses custom message when provided', () => {
    expect(new PaginationConflictError('User', 'cursor', 'my message').message).toBe('my message');
  });

  it('is instanceof Error', () => {
    expect(new PaginationConflictError('User', 'cursor')).toBeInstanceOf(Error);
  });
});

describe('BackendError', () => {
  it('keeps the backend error as cause', () => {
    const root = new Error('unavailable');
    const err = new BackendError('User', 'select', root);
    expect(err.cause).toBe(root);
    expect(err.kind).toBe('User');
    expect(err.operation).toBe('select');
    expect(err.message).toBe('Datastore select failed for kind "User": Error: unavailable');
  });

  it('has correct name', () => {
    expect(new BackendError('User', 'select').name).toBe('BackendError');
  });

  it('cause is undefined when not provided', () => {
    expect(new BackendError('User', 'select').cause).toBeUndefined();
  });
});

describe('BatchError', () => {
  it('is a BackendError reporting chunk progress', () => {
    const err = new BatchError('Session', 'delete-multi', 2, 5, new Error('deadline exceeded'));
    expect(err).toBeInstanceOf(BatchError);
    expect(err).toBeInstanceOf(BackendError);
    expect(err.name).toBe('BatchError');
    expect(err.completedChunks).toBe(2);
    expect(err.totalChunks).toBe(5);
    expect(err.message).toBe(
      'Datastore delete-multi failed for kind "Session" at chunk 3 of 5: Error: deadline exceeded',
    );
  });
});

describe('other errors', () => {
  it('set their names and keep instanceof', () => {
    const cases: Array<[Error, string]> = [
      [new ConnectionError('bad'), 'ConnectionError'],
      [new AggregationError('User', 'count result not found'), 'AggregationError'],
      [new InvalidQueryError('User', 'bad'), 'InvalidQueryError'],
      [new CancelledError('select'), 'CancelledError'],
    ];
    for (const [err, name] of cases) {
      expect(err.name).toBe(name);
      expect(err).toBeInstanceOf(Error);
      expect(err.stack).toBeDefined();
    }
  });

  it('CancelledError names the operation and keeps the abort reason', () => {
    const err = new CancelledError('delete-multi', 'shutdown');
    expect(err.message).toBe('Datastore delete-multi was cancelled');
    expect(err.cause).toBe('shutdown');
  });
});
