import { type CompetitiveTier, competitiveTierSchema } from '../entities/competitiveTiers.js';
import { list } from '../entities/shared.js';
import type { Mode, Result } from '../utils/wrap.js';
import { CollectionEndpoint, type FetchOptions } from './endpoint.js';

/** Options for {@link CompetitiveTiersEndpoint.fetchAll}. */
export interface CompetitiveTiersFetchAllOptions extends FetchOptions {
  /** Leave out placeholder tiers whose name contains "unused". Applied locally, never sent. */
  removeUnused?: boolean;
}

const UNUSED_TIER = /unused/i;

/**
 * Rebuilds each table without its placeholder tiers. The input tables are left as they are.
 */
export function removeUnusedTiers(tables: readonly CompetitiveTier[]): readonly CompetitiveTier[] {
  return Object.freeze(
    tables.map((table) =>
      Object.freeze({
        ...table,
        tiers: Object.freeze(table.tiers.filter((tier) => !UNUSED_TIER.test(tier.tierName ?? ''))),
      }),
    ),
  );
}

/** Rank tables, one per episode. */
export class CompetitiveTiersEndpoint<M extends Mode> extends CollectionEndpoint<M, CompetitiveTier> {
  protected readonly resource = 'competitiveTiers';
  protected readonly path = 'competitivetiers';
  protected readonly schema = competitiveTierSchema;

  public override fetchAll({ removeUnused, cache }: CompetitiveTiersFetchAllOptions = {}): Result<
    M,
    readonly CompetitiveTier[]
  > {
    return this.request('fetchAll', {
      path: this.path,
      localParams: { removeUnused },
      schema: list(this.schema),
      cache,
      ...(removeUnused && { select: removeUnusedTiers }),
    });
  }
}
