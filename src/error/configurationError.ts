import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error thrown when a client is set up wrongly: an unsupported language,
 * an unknown mode, or a transport that runs in a different mode than the client.
 * It is raised before any request is made.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  static override name = 'ConfigurationError';
  override name = 'ConfigurationError';
  /** Option that was rejected */
  #option: string;

  /** Creates a new instance of a ConfigurationError naming the rejected option */
  constructor(message: string, option: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#option = option;
  }

  /** Option that was rejected */
  get option(): string {
    return this.#option;
  }
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): boolean {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}
