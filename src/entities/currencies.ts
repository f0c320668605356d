import type { z } from 'zod';
import { entity, labelled, text } from './shared.js';

export const currencySchema = entity({
  uuid: text(),
  displayName: text(),
  displayNameSingular: text(),
  displayIcon: text(),
  largeIcon: text(),
  rewardPreviewIcon: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type Currency = z.output<typeof currencySchema>;
