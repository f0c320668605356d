/**
 * Fetch entrypoint: exports both transports and supporting helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { type SpawnExecutor, type SpawnRequest, type SyncFetchClientOptions, SyncFetchClient, spawnFetch } from './syncClient.js';
export { DEFAULT_HEADERS, DEFAULT_TIMEOUT, mergeHeaderOptions, readPayload } from './utils.js';
