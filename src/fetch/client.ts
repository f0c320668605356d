import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { FetchClientOptions, Payload, RawResponse, Transport } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { DEFAULT_HEADERS, DEFAULT_TIMEOUT, mergeHeaderOptions, readPayload } from './utils.js';

/**
 * Suspending transport around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-client headers,
 * - maps statuses onto the client's error types,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements Transport<'async'> {
  public readonly mode = 'async';
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default options (headers, timeout). */
  #opts: FetchClientOptions;
  /** Aborts every in-flight request on dispose. */
  #controller = new AbortController();

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: { ...this.#opts.headers, ...opts.headers },
    };
  }

  /**
   * Aborts in-flight requests. Later calls start from a fresh controller.
   */
  public dispose() {
    this.#controller.abort(new AbortError('error fetch client disposed'));
    this.#controller = new AbortController();
  }

  /**
   * Executes a GET request against the given endpoint and decodes the body.
   *
   * Errors:
   * - Network failures are wrapped in `Error`.
   * - Timeouts surface as {@link TimeoutError}, disposal as {@link AbortError}.
   * - Status handling follows {@link readPayload}.
   *
   * @param endpoint - Relative endpoint path (e.g. `agents?language=en-US`).
   */
  public async get(endpoint: string): SafeWrapAsync<Error, Payload> {
    const [err, raw] = await this.#request(endpoint);
    if (err) {
      return [err, null];
    }

    return readPayload(raw);
  }

  async #request(endpoint: string): SafeWrapAsync<Error, RawResponse> {
    const timeout = createTimeoutSignal(this.#opts.timeout ?? DEFAULT_TIMEOUT);
    const merged = mergeSignals([this.#controller.signal, timeout?.signal]);
    const signal = merged?.signal;

    try {
      const [err, res] = await safeWrapAsync(async () => {
        const response = await fetch(this.constructPath(endpoint), {
          method: 'GET',
          headers: mergeHeaderOptions(DEFAULT_HEADERS, this.#opts.headers),
          ...(signal && { signal }),
        });

        return {
          status: response.status,
          body: await response.text(),
        };
      });

      if (err) {
        const reason = signal?.aborted ? signal.reason : undefined;
        if (reason instanceof TimeoutError || reason instanceof AbortError) {
          return [reason, null];
        }

        return [new Error('error wrapping GET request in fetchClient', { cause: err }), null];
      }

      return [null, res];
    } finally {
      merged?.clear();
      timeout?.clear();
    }
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
