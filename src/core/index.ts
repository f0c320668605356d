/**
 * Core entrypoint: exports the client, its options and the mode runtimes.
 * @module
 */

/** Client for valorant-api.com with one facade per resource. */
export { DEFAULT_BASE_URL, DEFAULT_LANGUAGE, ValorantClient } from './client.js';

/** Mode capability shared by the endpoint facades. */
export { asyncRuntime, isMode, type Runtime, runtimes, syncRuntime } from './runtime.js';

/** Constructor and `config` options accepted by {@link ValorantClient}. */
export type { Config, ValorantClientProps } from './types.js';
