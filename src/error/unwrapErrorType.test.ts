import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { NotFoundError } from './notFoundError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class LookupError extends Error {
  constructor(message: string, key: string, options?: ErrorOptions) {
    super(`${key} - ${message}`, options);
  }
}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(LookupError, { message: 'nope' })).toBeNull();
    expect(unwrapErrorType(LookupError, 'string error')).toBeNull();
    expect(unwrapErrorType(LookupError, undefined)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new LookupError('missing', 'agents');

    expect(unwrapErrorType(LookupError, err)).toBe(err);
  });

  it('follows a chain of causes', () => {
    const err = new LookupError('missing', 'agents');
    let wrapped: Error = err;
    for (let depth = 0; depth < 7; depth += 1) {
      wrapped = new Error(`layer ${depth}`, { cause: wrapped });
    }

    expect(unwrapErrorType(LookupError, wrapped)?.message).toBe('agents - missing');
  });

  it('matches subclasses of the requested class', () => {
    const notFound = new NotFoundError(404);
    const wrapped = new Error('outer', { cause: notFound });

    expect(unwrapErrorType(HTTPError, wrapped)).toBe(notFound);
  });

  it('does not match a parent class when a subclass is requested', () => {
    const wrapped = new Error('outer', { cause: new HTTPError(500, 'boom') });

    expect(unwrapErrorType(NotFoundError, wrapped)).toBeNull();
  });

  it('stops on a cyclic cause chain', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(unwrapErrorType(LookupError, second)).toBeNull();
  });

  it('stops at a non-error cause', () => {
    const wrapped = new Error('outer', { cause: { reason: 'plain object' } });

    expect(unwrapErrorType(LookupError, wrapped)).toBeNull();
  });
});
