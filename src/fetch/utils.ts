import { HTTPError } from '../error/httpError.js';
import { InvalidParametersError } from '../error/invalidParametersError.js';
import { NotFoundError } from '../error/notFoundError.js';
import type { HeaderOptions, Payload, RawResponse } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Headers every request starts from. */
export const DEFAULT_HEADERS: HeaderOptions = { Accept: 'application/json' };

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 60_000;

/**
 * Merge header layers into one plain record with lowercased names.
 * Later layers win; a `null` value removes the header.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer ?? {})) {
      const name = key.toLowerCase();
      if (value === null) {
        delete merged[name];
        continue;
      }

      merged[name] = value;
    }
  }

  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps a raw response onto the API's error contract.
 *
 * - 200: the JSON body, or an error when the body is not JSON.
 * - 400: {@link InvalidParametersError}.
 * - 404: {@link NotFoundError}.
 * - anything else: {@link HTTPError} with the server-reported status and message.
 *
 * Failure bodies that are not JSON degrade to an {@link HTTPError} carrying the raw text.
 */
export function readPayload(response: RawResponse): SafeWrap<Error, Payload> {
  if (response.status === 200) {
    const [errJson, json] = safeWrap((): unknown => JSON.parse(response.body));
    if (errJson) {
      return [new Error('error parsing json response body in readPayload', { cause: errJson }), null];
    }

    return [null, json];
  }

  const [, parsed] = safeWrap((): unknown => JSON.parse(response.body));
  const details = isRecord(parsed) ? parsed : {};
  const status = typeof details.status === 'number' ? details.status : response.status;
  const message = typeof details.error === 'string' ? details.error : undefined;

  if (response.status === 400) {
    return [new InvalidParametersError(status), null];
  }

  if (response.status === 404) {
    return [new NotFoundError(status, message), null];
  }

  if (message === undefined && !isRecord(parsed) && response.body.trim()) {
    return [new HTTPError(status, response.body.trim()), null];
  }

  return [new HTTPError(status, message), null];
}
