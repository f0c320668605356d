import type { z } from 'zod';
import { entity, labelled, text } from './shared.js';

/** Kill ceremony such as "Ace" or "Clutch". */
export const ceremonySchema = entity({
  uuid: text(),
  displayName: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type Ceremony = z.output<typeof ceremonySchema>;
