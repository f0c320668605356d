import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Validation is synchronous so the same decode step serves blocking and suspending
 * clients. A schema whose `validate` returns a Promise is rejected with a
 * `ValidationError`; the entity schemas shipped with this library never do.
 */
export function validator<Output>(input: unknown, schema: StandardSchemaV1<unknown, Output>): SafeWrap<Error, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    // The pending result is dropped here; its rejection is reported through the returned error instead
    result.catch(() => null);
    return [new ValidationError('error async schemas are not supported', []), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if ('issues' in result && result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
