import type { CacheClientOptions } from '../cache/client.js';
import type { FetchClientOptions, Language, Transport } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { Mode } from '../utils/wrap.js';

/** Options that can be changed on a live client through `config`. */
export interface Config {
  /**
   * Display language sent with every request.
   * @default 'en-US'
   */
  language?: Language;
  /** Transport options: extra headers and the request timeout. */
  fetchOpts?: FetchClientOptions;
  /** Cache policy: TTL and size bound. */
  cacheOpts?: CacheClientOptions;
}

/** Configuration for constructing a {@link ValorantClient}, extends {@link Config}. */
export interface ValorantClientProps<M extends Mode> extends Config {
  /**
   * Execution mode. `sync` blocks and returns tuples, `async` returns promises of tuples.
   */
  mode: M;
  /**
   * Base URL of the API.
   * @default 'https://valorant-api.com/v1/'
   */
  baseUrl?: string;
  /** Replaces the default transport of the mode; its `mode` must match. */
  transport?: Transport<M>;
  /** Log requests and cache activity at debug level. */
  debug?: boolean;
  /** Replaces the JSON-lines stderr logger. */
  logger?: Logger;
}
