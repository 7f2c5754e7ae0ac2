import { z } from 'zod';
import {
  ACCESS_LEVEL,
  CLEARANCE_LEVEL,
  DAY_RULE_TYPE,
  FACTION_RESTRICTION,
} from '../db/types/enums.js';
import type {
  AccessCodeDefinition,
  CargoManifestDefinition,
  CaptainTypeDefinition,
  ConsequenceDefinition,
  ContentDefaults,
  DayRuleDefinition,
  ShipCategoryDefinition,
  ShipTypeDefinition,
  StoryShipDefinition,
} from './content.types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const day = z.number().int().min(1);

export const ShipCategorySchema: Schema<ShipCategoryDefinition> = z.object({
  categoryId: z.string().min(1),
  name: z.string().min(1),
  associatedFactions: z.array(z.string()),
  compatibleCaptainFactions: z.array(z.string()),
  validAccessCodePrefixes: z.array(z.string()),
  suspicionBaseLevel: z.number().int().min(0),
  requiresSpecialClearance: z.boolean(),
  isPriorityVessel: z.boolean(),
  contrabandExempt: z.boolean(),
  searchExempt: z.boolean(),
});

export const ShipTypeSchema: Schema<ShipTypeDefinition> = z.object({
  shipTypeId: z.string().min(1),
  name: z.string().min(1),
  categoryId: z.string().min(1),
  description: z.string(),
});

export const CaptainTypeSchema: Schema<CaptainTypeDefinition> = z.object({
  captainTypeId: z.string().min(1),
  rank: z.string().min(1),
  names: z.array(z.string().min(1)).min(1),
  factions: z.array(z.string()),
  bribeChance: z.number().min(0).max(1),
});

export const AccessCodeSchema: Schema<AccessCodeDefinition> = z.object({
  code: z.string().min(1),
  level: z.enum(ACCESS_LEVEL),
  validFromDay: day,
  validUntilDay: day.nullable(),
  isRevoked: z.boolean(),
  authorizedFactions: z.array(z.string()),
});

export const CargoManifestSchema: Schema<CargoManifestDefinition> = z.object({
  manifestId: z.string().min(1),
  description: z.string(),
  declaredItems: z.array(z.string()),
  factionRestriction: z.enum(FACTION_RESTRICTION),
  allowedFactions: z.array(z.string()),
  requiredClearanceLevel: z.enum(CLEARANCE_LEVEL),
  hasContraband: z.boolean(),
  hasFalseEntries: z.boolean(),
  isEasilyDetectable: z.boolean(),
  suspiciousKeywords: z.array(z.string()),
  firstAppearanceDay: day,
  lastAppearanceDay: day.nullable(),
  requiredShipCategories: z.array(z.string()),
});

export const DayRuleSchema: Schema<DayRuleDefinition> = z.object({
  ruleId: z.string().min(1),
  activateOnDay: day,
  ruleType: z.enum(DAY_RULE_TYPE),
  description: z.string(),
});

export const StoryShipSchema: Schema<StoryShipDefinition> = z.object({
  storyShipId: z.string().min(1),
  storyTag: z.string().min(1),
  shipName: z.string().min(1),
  categoryId: z.string().min(1),
  captainName: z.string().min(1),
  captainRank: z.string().min(1),
  captainFaction: z.string().min(1),
  accessCode: z.string(),
  manifestId: z.string().nullable(),
  firstDay: day,
  minImperialLoyalty: z.number().int().optional(),
  minRebellionSympathy: z.number().int().optional(),
  approveUnlocksTag: z.string().min(1).optional(),
  denyUnlocksTag: z.string().min(1).optional(),
});

export const ConsequenceSchema: Schema<ConsequenceDefinition> = z.object({
  consequenceId: z.string().min(1),
  trigger: z.object({
    action: z.enum(['APPROVE', 'DENY']),
    shouldApprove: z.boolean().optional(),
    hasContraband: z.boolean().optional(),
    offersBribe: z.boolean().optional(),
    storyTag: z.string().optional(),
    manifestKeyword: z.string().optional(),
  }),
  delayDays: z.number().int().min(0),
  scenarioToTrigger: z.string().nullable(),
  newsHeadline: z.string(),
  newsContent: z.string(),
  loyaltyImpact: z.number().int(),
  suspicionIncrease: z.number().int(),
  affectsFamily: z.boolean(),
});

export const ContentDefaultsSchema: Schema<ContentDefaults> = z.object({
  categoryId: z.string().min(1),
  shipTypeId: z.string().min(1),
  captainName: z.string().min(1),
  captainRank: z.string().min(1),
  captainFaction: z.string().min(1),
  fallbackNewsContent: z.string(),
  severeNewsSuffix: z.string(),
});
