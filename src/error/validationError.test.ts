import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('embeds issues in the message', () => {
    const err = new ValidationError('error validating data', [{ message: 'Expected string', path: ['uuid'] }]);

    expect(err.message).toBe('error validating data; issues: [{"message":"Expected string","path":["uuid"]}]');
    expect(err.issues).toEqual([{ message: 'Expected string', path: ['uuid'] }]);
  });

  it('exposes dotted issue paths', () => {
    const err = new ValidationError('error validating data', [
      { message: 'Expected string', path: ['data', 0, 'displayName'] },
      { message: 'Expected boolean', path: [{ key: 'data' }, { key: 'shipIt' }] },
      { message: 'Expected object' },
    ]);

    expect(err.paths).toEqual(['data.0.displayName', 'data.shipIt', '']);
  });
});

describe('isValidationError', () => {
  it('returns true for wrapped validation errors', () => {
    const err = new Error('outer', { cause: new ValidationError('error validating data', []) });

    expect(isValidationError(err)).toBe(true);
    expect(getValidationError(err)?.issues).toEqual([]);
  });

  it('returns false for other errors', () => {
    expect(isValidationError(new Error('boom'))).toBe(false);
    expect(getValidationError(new Error('boom'))).toBeNull();
  });
});
