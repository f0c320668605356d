import { z } from 'zod';
import { count, entity, flag, labelled, list, text } from './shared.js';

/** One upgrade level of a gun buddy. */
export const buddyLevelSchema = entity({
  uuid: text(),
  charmLevel: count(),
  hideIfNotFound: flag(),
  displayName: text(),
  displayIcon: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

/** A gun buddy (weapon charm). */
export const buddySchema = entity({
  uuid: text(),
  displayName: text(),
  isHiddenIfNotOwned: flag(),
  themeUuid: text(),
  displayIcon: text(),
  assetPath: text(),
  levels: list(buddyLevelSchema),
}).transform((data) => labelled(data, data.displayName));

export type BuddyLevel = z.output<typeof buddyLevelSchema>;
export type Buddy = z.output<typeof buddySchema>;
