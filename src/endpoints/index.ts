/**
 * Endpoint facades, one per resource.
 * @module
 */
export { type AgentsFetchAllOptions, AgentsEndpoint } from './agents.js';
export { BuddiesEndpoint } from './buddies.js';
export { BundlesEndpoint } from './bundles.js';
export { CeremoniesEndpoint } from './ceremonies.js';
export {
  type CompetitiveTiersFetchAllOptions,
  CompetitiveTiersEndpoint,
  removeUnusedTiers,
} from './competitiveTiers.js';
export { ContentTiersEndpoint } from './contentTiers.js';
export { ContractsEndpoint } from './contracts.js';
export { CurrenciesEndpoint } from './currencies.js';
export {
  CollectionEndpoint,
  Endpoint,
  type EndpointContext,
  type EntitySchema,
  type FetchOptions,
  type RequestDefinition,
} from './endpoint.js';
export { EventsEndpoint } from './events.js';
export { GamemodeEquippablesEndpoint, GamemodesEndpoint } from './gamemodes.js';
