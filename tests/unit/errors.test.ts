/**
 * Unit Tests: error classes and best-effort classification of thrown values.
 */
import { describe, it, expect } from 'vitest';
import {
  FatalSchedulingError,
  TransportError,
  ValidationError,
  VolleyError,
  classifyError,
  describeCause,
  errorMessage,
} from '../../src/errors.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('error classes', () => {
  it('ValidationError lists every problem', () => {
    const err = new ValidationError('Request', ['URL cannot be empty', 'Timeout must be positive']);
    expect(err).toBeInstanceOf(VolleyError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ValidationError');
    expect(err.code).toBe('VALIDATION_FAILED');
    expect(err.errors).toEqual(['URL cannot be empty', 'Timeout must be positive']);
    expect(err.message).toBe('Request validation failed: URL cannot be empty; Timeout must be positive');
  });

  it('FatalSchedulingError keeps its cause', () => {
    const cause = new Error('out of memory');
    const err = new FatalSchedulingError('pool failed', cause);
    expect(err.name).toBe('FatalSchedulingError');
    expect(err.code).toBe('FATAL_SCHEDULING');
    expect(err.cause).toBe(cause);
  });

  it('TransportError has a default code', () => {
    const err = new TransportError('broken pipe');
    expect(err.code).toBe('TRANSPORT_ERROR');
    expect(err.statusCode).toBeUndefined();
  });
});

describe('classifyError', () => {
  it.each([
    ['ETIMEDOUT code', withCode('connect ETIMEDOUT', 'ETIMEDOUT'), 'TIMEOUT'],
    ['undici headers timeout', new TypeError('fetch failed', { cause: withCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT') }), 'TIMEOUT'],
    ['timeout in message', new Error('Read timed out'), 'TIMEOUT'],
    ['ECONNREFUSED code', withCode('connect ECONNREFUSED 127.0.0.1:9', 'ECONNREFUSED'), 'NETWORK'],
    ['DNS failure behind fetch', new TypeError('fetch failed', { cause: withCode('getaddrinfo ENOTFOUND nowhere.test', 'ENOTFOUND') }), 'NETWORK'],
    ['bare fetch failure', new TypeError('fetch failed'), 'NETWORK'],
    ['validation', new ValidationError('Request', ['URL cannot be empty']), 'VALIDATION'],
    ['401 transport error', new TransportError('Unauthorized', 'AUTH', 401), 'AUTHENTICATION'],
    ['403 in message', new Error('Proxy returned 403'), 'AUTHENTICATION'],
    ['5xx transport error', new TransportError('Bad gateway from proxy', 'PROXY', 502), 'SERVER_ERROR'],
    ['anything else', new Error('something odd'), 'UNKNOWN'],
    ['non-error value', 42, 'UNKNOWN'],
  ])('%s', (_label, error, expected) => {
    expect(classifyError(error)).toBe(expected);
  });

  it('recognises a TimeoutError by name', () => {
    const err = new Error('The operation was aborted due to timeout');
    err.name = 'TimeoutError';
    expect(classifyError(err)).toBe('TIMEOUT');
  });
});

describe('describeCause', () => {
  it('prefers the code of the wrapped cause', () => {
    const err = new TypeError('fetch failed', { cause: withCode('connect ECONNRESET', 'ECONNRESET') });
    expect(describeCause(err)).toBe('ECONNRESET');
  });

  it('falls back to the error name', () => {
    expect(describeCause(new RangeError('bad'))).toBe('RangeError');
  });

  it('is undefined for non-errors', () => {
    expect(describeCause('oops')).toBeUndefined();
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and strings', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(undefined)).toBe('Unknown error');
  });
});
