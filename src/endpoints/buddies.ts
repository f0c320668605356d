import { type Buddy, type BuddyLevel, buddyLevelSchema, buddySchema } from '../entities/buddies.js';
import { list } from '../entities/shared.js';
import type { Mode, Result } from '../utils/wrap.js';
import { CollectionEndpoint, type FetchOptions } from './endpoint.js';

/** Gun buddies and their levels. */
export class BuddiesEndpoint<M extends Mode> extends CollectionEndpoint<M, Buddy> {
  protected readonly resource = 'buddies';
  protected readonly path = 'buddies';
  protected readonly schema = buddySchema;

  /** Fetches every buddy level across all buddies. */
  public fetchAllLevels(opts: FetchOptions = {}): Result<M, readonly BuddyLevel[]> {
    return this.request('fetchAllLevels', {
      path: 'buddies/levels',
      schema: list(buddyLevelSchema),
      cache: opts.cache,
    });
  }

  /** Fetches one buddy level by its uuid. */
  public fetchLevelFromUuid(uuid: string, opts: FetchOptions = {}): Result<M, BuddyLevel> {
    return this.request('fetchLevelFromUuid', {
      path: 'buddies/levels/{uuid}',
      pathParams: { uuid },
      schema: buddyLevelSchema,
      cache: opts.cache,
    });
  }
}
