import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryParams } from '../types/request.js';
import type { SafeWrap } from './wrap.js';

/**
 * Constructs a relative URL by replacing `{name}` path parameters and appending query parameters.
 *
 * - Path parameters are percent-encoded; an empty one is rejected.
 * - Query parameters that are `undefined` or `null` are left out; the rest are sorted by name
 *   so the same arguments always produce the same URL.
 * - A leading slash is stripped for clean concatenation with the base URL.
 */
export function constructUrl(
  template: string,
  pathParams: Record<string, string> = {},
  query: QueryParams = {},
): SafeWrap<Error, string> {
  let result = template;

  for (const [key, value] of Object.entries(pathParams)) {
    if (!value) {
      return [new ConstructURLError(`error empty path parameter ${key}`, template), null];
    }

    result = result.replaceAll(`{${key}}`, encodeURIComponent(value));
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, remaining contains {} still ${result}`, result), null];
  }

  const searchParams = new URLSearchParams();
  for (const key of Object.keys(query).sort()) {
    const value = query[key];
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const search = searchParams.toString();
  if (search) {
    result += `?${search}`;
  }

  return [null, result.replace(/^\//, '')];
}
