import { type Bundle, bundleSchema } from '../entities/bundles.js';
import type { Mode } from '../utils/wrap.js';
import { CollectionEndpoint } from './endpoint.js';

/** `bundles` endpoints. */
export class BundlesEndpoint<M extends Mode> extends CollectionEndpoint<M, Bundle> {
  protected readonly resource = 'bundles';
  protected readonly path = 'bundles';
  protected readonly schema = bundleSchema;
}
