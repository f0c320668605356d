import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a non-200 response from the API.
 *
 * The status is the one the server reported in the body when present,
 * otherwise the HTTP status. Converting the error to a number yields it:
 * `Number(err) === err.status`.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static override name = 'HTTPError';
  override name = 'HTTPError';
  /** Status code reported for the failure */
  #status: number;

  /** Creates a new instance of a HTTPError with defaulting message */
  constructor(status: number, message: string = `HTTP Error: ${status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
  }

  /** Status code reported for the failure */
  get status(): number {
    return this.#status;
  }

  override valueOf(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link HTTPError}, including its subclasses.
 */
export function isHttpError(error: unknown): boolean {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
