/**
 * Entity schemas and the record types they decode to.
 * @module
 */
export * from './agents.js';
export * from './buddies.js';
export * from './bundles.js';
export * from './ceremonies.js';
export * from './competitiveTiers.js';
export * from './contentTiers.js';
export * from './contracts.js';
export * from './currencies.js';
export * from './events.js';
export * from './gamemodes.js';
export { type Entity, type Labelled, labelled } from './shared.js';
