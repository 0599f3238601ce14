import { describe, it, expect } from 'vitest';
import {
  errorCodeOf,
  isRepositoryError,
  RepositoryError,
  statusCodeOf,
  toRepositoryError,
} from './errors.js';

describe('RepositoryError', () => {
  it('describes the kind and the cause', () => {
    const cause = new Error('disk full');
    const error = new RepositoryError('SaveFailed', { cause });

    expect(error.message).toBe('Save failed: disk full');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('RepositoryError');
  });

  it('prefers an explicit detail over the cause', () => {
    expect(RepositoryError.notFound('n1').message).toBe('Note not found: n1');
    expect(RepositoryError.notFound().message).toBe('Note not found');
  });
});

describe('isRepositoryError', () => {
  it('narrows by kind', () => {
    const error = RepositoryError.invalidData('bad');

    expect(isRepositoryError(error)).toBe(true);
    expect(isRepositoryError(error, 'InvalidData')).toBe(true);
    expect(isRepositoryError(error, 'NotFound')).toBe(false);
    expect(isRepositoryError(new Error('bad'))).toBe(false);
  });
});

describe('toRepositoryError', () => {
  it('wraps foreign errors once', () => {
    const wrapped = toRepositoryError('FetchFailed', new Error('offline'));

    expect(wrapped.kind).toBe('FetchFailed');
    expect(toRepositoryError('SaveFailed', wrapped)).toBe(wrapped);
  });
});

describe('statusCodeOf and errorCodeOf', () => {
  it('read numeric status codes and string error codes', () => {
    expect(statusCodeOf(Object.assign(new Error('x'), { statusCode: 409 }))).toBe(409);
    expect(statusCodeOf({ statusCode: '409' })).toBeUndefined();
    expect(errorCodeOf(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(errorCodeOf(null)).toBeUndefined();
  });
});
