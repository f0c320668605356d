/**
 * Root entrypoint: re-exports the client, endpoint facades, entity types, transports and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for valorant-api.com, with one facade per resource.
 */
export { DEFAULT_BASE_URL, DEFAULT_LANGUAGE, ValorantClient } from './core/client.js';

/**
 * Constructor and `config` options accepted by {@link ValorantClient}.
 */
export type { Config, ValorantClientProps } from './core/types.js';

/** Mode capability shared by the endpoint facades. */
export { asyncRuntime, isMode, type Runtime, runtimes, syncRuntime } from './core/runtime.js';

/** Memoization layer owned by each client. */
export { CacheClient, type CacheClientOptions } from './cache/client.js';

/** Endpoint facades. */
export * from './endpoints/index.js';

/** Entity schemas and record types. */
export * from './entities/index.js';

/** Errors and the helpers identifying them through cause chains. */
export * from './error/index.js';

/** Suspending and blocking transports. */
export * from './fetch/index.js';

/** Request types shared by transports and facades. */
export {
  type FetchClientOptions,
  type HeaderOptions,
  isLanguage,
  type Language,
  LANGUAGES,
  type Payload,
  type QueryParams,
  type QueryValue,
  type RawResponse,
  type Transport,
  type TransportFactory,
} from './types/request.js';

/** Structured logger used by the client. */
export { createLogger, type Level, type Logger } from './utils/logger.js';

/** Tuple results. */
export type { Mode, ModeResults, Result, SafeWrap, SafeWrapAsync } from './utils/wrap.js';
