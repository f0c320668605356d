import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request is aborted because its client was disposed.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';
  override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): boolean {
  return isErrorType(AbortError, error);
}

/**
 * Extract a {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): null | AbortError {
  return unwrapErrorType(AbortError, error);
}
