import { z } from 'zod';
import { count, entity, flag, frozen, labelled, list, nested, text, timestamp } from './shared.js';

export const agentRoleSchema = z
  .object({
    uuid: text(),
    displayName: text(),
    description: text(),
    displayIcon: text(),
    assetPath: text(),
  })
  .transform((data) => labelled(data, data.displayName));

export const agentAbilitySchema = entity({
  slot: text(),
  displayName: text(),
  description: text(),
  displayIcon: text(),
}).transform((data) => labelled(data, data.displayName));

export const recruitmentDataSchema = z
  .object({
    counterId: text(),
    milestoneId: text(),
    milestoneThreshold: count(),
    useLevelVpCostOverride: flag(),
    levelVpCostOverride: count(),
    startDate: timestamp(),
    endDate: timestamp(),
  })
  .transform(frozen);

export const voiceLineMediaSchema = entity({
  id: count(),
  wwise: text(),
  wave: text(),
}).transform(frozen);

export const voiceLineSchema = z
  .object({
    minDuration: count(),
    maxDuration: count(),
    mediaList: list(voiceLineMediaSchema),
  })
  .transform(frozen);

/** A playable (or test) character. Stringifies to its display name. */
export const agentSchema = entity({
  uuid: text(),
  displayName: text(),
  description: text(),
  developerName: text(),
  characterTags: list(z.string()),
  displayIcon: text(),
  displayIconSmall: text(),
  bustPortrait: text(),
  fullPortrait: text(),
  fullPortraitV2: text(),
  killfeedPortrait: text(),
  background: text(),
  backgroundGradientColors: list(z.string()),
  assetPath: text(),
  isFullPortraitRightFacing: flag(),
  isPlayableCharacter: flag(),
  isAvailableForTest: flag(),
  isBaseContent: flag(),
  role: nested(agentRoleSchema),
  recruitmentData: nested(recruitmentDataSchema),
  abilities: list(agentAbilitySchema),
  voiceLine: nested(voiceLineSchema),
}).transform((data) => labelled(data, data.displayName));

export type AgentRole = z.output<typeof agentRoleSchema>;
export type AgentAbility = z.output<typeof agentAbilitySchema>;
export type RecruitmentData = z.output<typeof recruitmentDataSchema>;
export type VoiceLineMedia = z.output<typeof voiceLineMediaSchema>;
export type VoiceLine = z.output<typeof voiceLineSchema>;
export type Agent = z.output<typeof agentSchema>;
