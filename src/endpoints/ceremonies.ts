import { type Ceremony, ceremonySchema } from '../entities/ceremonies.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** `ceremonies` endpoints. */
export class CeremoniesEndpoint<M extends Mode> extends CollectionEndpoint<M, Ceremony> {
  protected readonly resource = 'ceremonies';
  protected readonly path = 'ceremonies';
  protected readonly schema = ceremonySchema;
}
