import { z } from 'zod';
import { count, entity, flag, frozen, labelled, list, nested, text } from './shared.js';

export const rewardSchema = entity({
  type: text(),
  uuid: text(),
  amount: count(),
  isHighlighted: flag(),
}).transform(frozen);

export const contractLevelSchema = entity({
  reward: nested(rewardSchema),
  xp: count(),
  vpCost: count(),
  isPurchasableWithVP: flag(),
  doughCost: count(),
  isPurchasableWithDough: flag(),
}).transform(frozen);

export const chapterSchema = entity({
  isEpilogue: flag(),
  levels: list(contractLevelSchema),
  freeRewards: list(rewardSchema),
}).transform(frozen);

export const contractContentSchema = z
  .object({
    relationType: text(),
    relationUuid: text(),
    chapters: list(chapterSchema),
    premiumRewardScheduleUuid: text(),
    premiumVPCost: count(),
  })
  .transform(frozen);

/** Agent recruitment contract or battle pass. */
export const contractSchema = entity({
  uuid: text(),
  displayName: text(),
  displayIcon: text(),
  shipIt: flag(),
  useLevelVPCostOverride: flag(),
  levelVPCostOverride: count(),
  freeRewardScheduleUuid: text(),
  content: nested(contractContentSchema),
  assetPath: text(),
}).transform((data) => labelled(data, data.displayName));

export type Reward = z.output<typeof rewardSchema>;
export type ContractLevel = z.output<typeof contractLevelSchema>;
export type Chapter = z.output<typeof chapterSchema>;
export type ContractContent = z.output<typeof contractContentSchema>;
export type Contract = z.output<typeof contractSchema>;
