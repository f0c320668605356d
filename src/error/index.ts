/**
 * Error entrypoint: exports the typed errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted because its client was disposed. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, getAbortError, isAbortError } from './abortError.js';

/** Error thrown when a client is configured wrongly. */
/** Extract a {@link ConfigurationError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConfigurationError}. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';

/** Error raised when a request URL cannot be built. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

/** Extracts an {@link HTTPError} from an unknown error value. */
/** Error representing a non-200 API response. */
/** Type guard that checks if an error is an {@link HTTPError}. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';

/** HTTP 400 from the API. */
export {
  getInvalidParametersError,
  InvalidParametersError,
  isInvalidParametersError,
} from './invalidParametersError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** HTTP 404 from the API. */
export { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';

/** Type guard that checks if an error is a {@link TimeoutError}. */
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
