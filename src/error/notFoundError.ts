import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * HTTP 404: no resource exists for the requested identifier.
 */
export class NotFoundError extends HTTPError {
  /** NotFoundError error-name */
  static override name = 'NotFoundError';
  override name = 'NotFoundError';

  constructor(status: number, message = 'Resource not found', opts?: ErrorOptions) {
    super(status, message, opts);
  }
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): boolean {
  return isErrorType(NotFoundError, error);
}

/**
 * Extract a {@link NotFoundError} from an unknown error value, following nested causes.
 */
export function getNotFoundError(error: unknown): null | NotFoundError {
  return unwrapErrorType(NotFoundError, error);
}
