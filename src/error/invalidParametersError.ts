import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * HTTP 400: the API rejected the query parameters as invalid or missing.
 */
export class InvalidParametersError extends HTTPError {
  /** InvalidParametersError error-name */
  static override name = 'InvalidParametersError';
  override name = 'InvalidParametersError';

  constructor(status: number, message = 'Invalid or missing parameters', opts?: ErrorOptions) {
    super(status, message, opts);
  }
}

/**
 * Type guard for {@link InvalidParametersError}.
 */
export function isInvalidParametersError(error: unknown): boolean {
  return isErrorType(InvalidParametersError, error);
}

/**
 * Extract an {@link InvalidParametersError} from an unknown error value, following nested causes.
 */
export function getInvalidParametersError(error: unknown): null | InvalidParametersError {
  return unwrapErrorType(InvalidParametersError, error);
}
