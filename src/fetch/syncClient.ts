import { execFileSync } from 'node:child_process';
import { z } from 'zod';
import { TimeoutError } from '../error/timeoutError.js';
import type { FetchClientOptions, Payload, RawResponse, Transport } from '../types/request.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { DEFAULT_HEADERS, DEFAULT_TIMEOUT, mergeHeaderOptions, readPayload } from './utils.js';

/** Request handed to the child process. */
export interface SpawnRequest {
  url: string;
  headers: Record<string, string>;
  timeout: number | false;
}

/** Runs a {@link SpawnRequest} to completion and returns the child's stdout. */
export type SpawnExecutor = (request: SpawnRequest) => string;

/** Options for {@link SyncFetchClient}. */
export interface SyncFetchClientOptions extends FetchClientOptions {
  /** Replaces the child-process runner, mainly for tests. */
  executor?: SpawnExecutor;
}

// Runs inside the child: one fetch, one JSON line on stdout.
const CHILD_SCRIPT = `
const req = JSON.parse(process.argv[1]);
const out = (value) => process.stdout.write(JSON.stringify(value));
(async () => {
  try {
    const res = await fetch(req.url, {
      headers: req.headers,
      signal: req.timeout ? AbortSignal.timeout(req.timeout) : undefined,
    });
    out({ status: res.status, body: await res.text() });
  } catch (err) {
    out({ error: { name: String((err && err.name) || 'Error'), message: String((err && err.message) || err) } });
  }
})();
`;

const childOutputSchema = z.union([
  z.object({ status: z.number().int(), body: z.string() }),
  z.object({ error: z.object({ name: z.string(), message: z.string() }) }),
]);

/**
 * Default executor: blocks on a short-lived node process performing the fetch.
 */
export const spawnFetch: SpawnExecutor = (request) =>
  execFileSync(process.execPath, ['-e', CHILD_SCRIPT, JSON.stringify(request)], {
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

/**
 * Blocking transport. Each `get` returns the settled tuple directly, so the
 * client can be used from code that cannot await.
 */
export class SyncFetchClient implements Transport<'sync'> {
  public readonly mode = 'sync';
  #baseUrl: string;
  #opts: FetchClientOptions;
  #executor: SpawnExecutor;

  constructor(baseUrl: string, opts?: SyncFetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    const { executor, ...rest } = opts ?? {};
    this.#baseUrl = baseUrl;
    this.#opts = rest;
    this.#executor = executor ?? spawnFetch;
  }

  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: { ...this.#opts.headers, ...opts.headers },
    };
  }

  /** Nothing outlives a call, so there is nothing to release. */
  public dispose() {}

  public get(endpoint: string): SafeWrap<Error, Payload> {
    const [err, raw] = this.#request(endpoint);
    if (err) {
      return [err, null];
    }

    return readPayload(raw);
  }

  #request(endpoint: string): SafeWrap<Error, RawResponse> {
    const request: SpawnRequest = {
      url: `${this.#baseUrl}${endpoint.replace(/^\//, '')}`,
      headers: mergeHeaderOptions(DEFAULT_HEADERS, this.#opts.headers),
      timeout: this.#opts.timeout ?? DEFAULT_TIMEOUT,
    };

    const [errExec, stdout] = safeWrap(() => this.#executor(request));
    if (errExec) {
      return [new Error('error running GET request in syncFetchClient', { cause: errExec }), null];
    }

    const [errJson, json] = safeWrap((): unknown => JSON.parse(stdout));
    if (errJson) {
      return [new Error('error parsing output of syncFetchClient child', { cause: errJson }), null];
    }

    const [errShape, output] = validator(json, childOutputSchema);
    if (errShape) {
      return [new Error('error unexpected output of syncFetchClient child', { cause: errShape }), null];
    }

    if ('error' in output) {
      if (output.error.name === 'TimeoutError') {
        return [new TimeoutError(`error request timed out after ${request.timeout}ms`), null];
      }

      return [new Error('error wrapping GET request in syncFetchClient', { cause: new Error(output.error.message) }), null];
    }

    return [null, output];
  }
}
