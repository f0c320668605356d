import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';
import { getInvalidParametersError, InvalidParametersError, isInvalidParametersError } from './invalidParametersError.js';
import { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';

describe('HTTPError', () => {
  it('defaults the message from the status', () => {
    const err = new HTTPError(503);

    expect(err.message).toBe('HTTP Error: 503');
    expect(err.status).toBe(503);
    expect(err.name).toBe('HTTPError');
  });

  it('converts to its status code', () => {
    const err = new HTTPError(429, 'Too many requests');

    expect(Number(err)).toBe(429);
    expect(+err).toBe(429);
  });

  it('is found through nested causes', () => {
    const err = new HTTPError(500, 'boom');
    const wrapped = new Error('outer', { cause: new Error('middle', { cause: err }) });

    expect(isHttpError(wrapped)).toBe(true);
    expect(getHttpError(wrapped)).toBe(err);
  });
});

describe('InvalidParametersError', () => {
  it('carries the default message and status', () => {
    const err = new InvalidParametersError(400);

    expect(err.message).toBe('Invalid or missing parameters');
    expect(Number(err)).toBe(400);
    expect(err.name).toBe('InvalidParametersError');
  });

  it('is an HTTPError', () => {
    const wrapped = new Error('outer', { cause: new InvalidParametersError(400) });

    expect(isInvalidParametersError(wrapped)).toBe(true);
    expect(isHttpError(wrapped)).toBe(true);
    expect(getInvalidParametersError(wrapped)?.status).toBe(400);
  });
});

describe('NotFoundError', () => {
  it('carries the default message and status', () => {
    const err = new NotFoundError(404);

    expect(err.message).toBe('Resource not found');
    expect(Number(err)).toBe(404);
  });

  it('is not matched by a plain HTTPError', () => {
    const wrapped = new Error('outer', { cause: new HTTPError(404) });

    expect(isNotFoundError(wrapped)).toBe(false);
    expect(getNotFoundError(wrapped)).toBeNull();
  });
});
