import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('is recognised directly and through a wrapping error', () => {
    const err = new TimeoutError('error request timed out after 10ms');

    expect(err.name).toBe('TimeoutError');
    expect(isTimeoutError(err)).toBe(true);
    expect(isTimeoutError(new Error('error requesting agents.fetchAll', { cause: err }))).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });

  it('is extracted from a cause chain', () => {
    const err = new TimeoutError('error request timed out after 10ms');

    expect(getTimeoutError(new Error('outer', { cause: new Error('inner', { cause: err }) }))).toBe(err);
    expect(getTimeoutError(new Error('outer'))).toBeNull();
  });
});
