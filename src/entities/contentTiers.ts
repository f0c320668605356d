import type { z } from 'zod';
import { count, entity, labelled, text } from './shared.js';

/** Rarity tier of a skin (Select, Deluxe, Premium, ...). */
export const contentTierSchema = entity({
  uuid: text(),
  displayName: text(),
  devName: text(),
  rank: count(),
  juiceValue: count(),
  juiceCost: count(),
  highlightColor: text(),
  displayIcon: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type ContentTier = z.output<typeof contentTierSchema>;
