import { type ContentTier, contentTierSchema } from '../entities/contentTiers.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** `contenttiers` endpoints. */
export class ContentTiersEndpoint<M extends Mode> extends CollectionEndpoint<M, ContentTier> {
  protected readonly resource = 'contentTiers';
  protected readonly path = 'contenttiers';
  protected readonly schema = contentTierSchema;
}
