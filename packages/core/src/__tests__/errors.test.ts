import { describe, it, expect } from 'vitest';
import { ApiException } from '@kubernetes/client-node';
import { isConflict, isNotFound, statusCodeOf } from '../errors.js';

describe('statusCodeOf', () => {
  it('reads the code of an ApiException', () => {
    expect(statusCodeOf(new ApiException(404, 'not found', {}, {}))).toBe(404);
  });

  it('reads a numeric code from a plain object', () => {
    expect(statusCodeOf({ code: 409 })).toBe(409);
  });

  it('returns undefined for errors without a status', () => {
    expect(statusCodeOf(new Error('socket hang up'))).toBeUndefined();
    expect(statusCodeOf({ code: 'ECONNRESET' })).toBeUndefined();
    expect(statusCodeOf(null)).toBeUndefined();
    expect(statusCodeOf('boom')).toBeUndefined();
  });
});

describe('classification', () => {
  it('recognizes not found', () => {
    expect(isNotFound(new ApiException(404, 'not found', {}, {}))).toBe(true);
    expect(isNotFound(new ApiException(500, 'server error', {}, {}))).toBe(false);
  });

  it('recognizes conflicts', () => {
    expect(isConflict(new ApiException(409, 'conflict', {}, {}))).toBe(true);
    expect(isConflict(new ApiException(404, 'not found', {}, {}))).toBe(false);
  });
});
