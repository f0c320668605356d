import type { z } from 'zod';
import { count, entity, frozen, labelled, list, text } from './shared.js';

/** A single rank, stringifying to its tier name. */
export const tierSchema = entity({
  tier: count(),
  tierName: text(),
  division: text(),
  divisionName: text(),
  color: text(),
  backgroundColor: text(),
  smallIcon: text(),
  largeIcon: text(),
  rankTriangleDownIcon: text(),
  rankTriangleUpIcon: text(),
}).transform((data) => labelled(data, data.tierName));

/** The rank table used during one episode. */
export const competitiveTierSchema = entity({
  uuid: text(),
  assetObjectName: text(),
  tiers: list(tierSchema),
  assetPath: text(),
}).transform(frozen);

export type Tier = z.output<typeof tierSchema>;
export type CompetitiveTier = z.output<typeof competitiveTierSchema>;
