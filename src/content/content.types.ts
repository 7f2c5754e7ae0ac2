// Content definitions (checkpoint_v1 JSON)

import type {
  AccessLevel,
  ClearanceLevel,
  DayRuleType,
  FactionRestriction,
} from '../db/types/enums.js';

export type ShipCategoryDefinition = {
  categoryId: string;
  name: string;
  associatedFactions: string[];
  compatibleCaptainFactions: string[];
  validAccessCodePrefixes: string[];
  suspicionBaseLevel: number;
  requiresSpecialClearance: boolean;
  isPriorityVessel: boolean;
  contrabandExempt: boolean;
  searchExempt: boolean;
};

export type ShipTypeDefinition = {
  shipTypeId: string;
  name: string;
  categoryId: string;
  description: string;
};

export type CaptainTypeDefinition = {
  captainTypeId: string;
  rank: string;
  names: string[];
  factions: string[];
  bribeChance: number;
};

export type AccessCodeDefinition = {
  code: string;
  level: AccessLevel;
  validFromDay: number;
  // null: no end day
  validUntilDay: number | null;
  isRevoked: boolean;
  authorizedFactions: string[];
};

export type CargoManifestDefinition = {
  manifestId: string;
  description: string;
  declaredItems: string[];
  factionRestriction: FactionRestriction;
  allowedFactions: string[];
  requiredClearanceLevel: ClearanceLevel;
  hasContraband: boolean;
  hasFalseEntries: boolean;
  isEasilyDetectable: boolean;
  suspiciousKeywords: string[];
  firstAppearanceDay: number;
  lastAppearanceDay: number | null;
  requiredShipCategories: string[];
};

export type DayRuleDefinition = {
  ruleId: string;
  activateOnDay: number;
  ruleType: DayRuleType;
  description: string;
};

export type StoryShipDefinition = {
  storyShipId: string;
  // 'imperium' | 'insurgent' carry faction weight; other tags are neutral
  storyTag: string;
  shipName: string;
  categoryId: string;
  captainName: string;
  captainRank: string;
  captainFaction: string;
  accessCode: string;
  manifestId: string | null;
  firstDay: number;
  minImperialLoyalty?: number;
  minRebellionSympathy?: number;
  approveUnlocksTag?: string;
  denyUnlocksTag?: string;
};

export type ConsequenceTrigger = {
  action: 'APPROVE' | 'DENY';
  shouldApprove?: boolean;
  hasContraband?: boolean;
  offersBribe?: boolean;
  storyTag?: string;
  manifestKeyword?: string;
};

export type ConsequenceDefinition = {
  consequenceId: string;
  trigger: ConsequenceTrigger;
  delayDays: number;
  scenarioToTrigger: string | null;
  newsHeadline: string;
  newsContent: string;
  loyaltyImpact: number;
  suspicionIncrease: number;
  affectsFamily: boolean;
};

export type ContentDefaults = {
  categoryId: string;
  shipTypeId: string;
  captainName: string;
  captainRank: string;
  captainFaction: string;
  fallbackNewsContent: string;
  severeNewsSuffix: string;
};
