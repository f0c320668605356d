import type { z } from 'zod';
import { entity, flag, labelled, text } from './shared.js';

export const bundleSchema = entity({
  uuid: text(),
  displayName: text(),
  displayNameSubText: text(),
  description: text(),
  extraDescription: text(),
  promoDescription: text(),
  useAdditionalContext: flag(),
  displayIcon: text(),
  displayIcon2: text(),
  logoIcon: text(),
  verticalPromoImage: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type Bundle = z.output<typeof bundleSchema>;
