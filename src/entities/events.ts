import type { z } from 'zod';
import { entity, labelled, text, timestamp } from './shared.js';

/** In-game event with its running window. */
export const eventSchema = entity({
  uuid: text(),
  displayName: text(),
  shortDisplayName: text(),
  startTime: timestamp(),
  endTime: timestamp(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type Event = z.output<typeof eventSchema>;
