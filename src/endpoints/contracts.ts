import { type Contract, contractSchema } from '../entities/contracts.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** Agent recruitment contracts and battle passes. */
export class ContractsEndpoint<M extends Mode> extends CollectionEndpoint<M, Contract> {
  protected readonly resource = 'contracts';
  protected readonly path = 'contracts';
  protected readonly schema = contractSchema;
}
