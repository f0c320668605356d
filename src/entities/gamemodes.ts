import { z } from 'zod';
import { count, entity, flag, frozen, labelled, list, text } from './shared.js';

export const gameFeatureOverrideSchema = entity({
  featureName: text(),
  state: flag(),
}).transform(frozen);

export const gameRuleBoolOverrideSchema = entity({
  ruleName: text(),
  state: flag(),
}).transform(frozen);

export const gamemodeSchema = entity({
  uuid: text(),
  displayName: text(),
  description: text(),
  duration: text(),
  economyType: text(),
  allowsMatchTimeouts: flag(),
  isTeamVoiceAllowed: flag(),
  isMinimapHidden: flag(),
  orbCount: count(),
  roundsPerHalf: count(),
  teamRoles: list(z.string()),
  gameFeatureOverrides: list(gameFeatureOverrideSchema),
  gameRuleBoolOverrides: list(gameRuleBoolOverrideSchema),
  displayIcon: text(),
  listViewIconTall: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

/** Weapon or item only available in a particular gamemode. */
export const gamemodeEquippableSchema = entity({
  uuid: text(),
  displayName: text(),
  category: text(),
  displayIcon: text(),
  killStreamIcon: text(),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type GameFeatureOverride = z.output<typeof gameFeatureOverrideSchema>;
export type GameRuleBoolOverride = z.output<typeof gameRuleBoolOverrideSchema>;
export type Gamemode = z.output<typeof gamemodeSchema>;
export type GamemodeEquippable = z.output<typeof gamemodeEquippableSchema>;
