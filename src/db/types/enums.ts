// Canonical enums shared by content, engine and persistence

export const ACCESS_LEVEL = ['LOW', 'MEDIUM', 'HIGH', 'UNRESTRICTED'] as const;
export type AccessLevel = (typeof ACCESS_LEVEL)[number];

// Ordinal: index order is the clearance order
export const CLEARANCE_LEVEL = ['STANDARD', 'RESTRICTED', 'CLASSIFIED'] as const;
export type ClearanceLevel = (typeof CLEARANCE_LEVEL)[number];

export const FACTION_RESTRICTION = [
  'UNIVERSAL',
  'FACTION_SPECIFIC',
  'RESTRICTED',
] as const;
export type FactionRestriction = (typeof FACTION_RESTRICTION)[number];

export const DAY_RULE_TYPE = [
  'VERIFY_ORIGIN',
  'VERIFY_MANIFEST',
  'CHECK_FOR_CONTRABAND',
  'CHECK_FOR_INTELLIGENCE',
  'FORCE_INSPECTION',
  'ACCESS_CODE_CHANGE',
] as const;
export type DayRuleType = (typeof DAY_RULE_TYPE)[number];

// Fixed priority order for invalidReason
export const INVALID_REASON = [
  'MISSING_MANIFEST',
  'FACTION',
  'DAY',
  'CLEARANCE',
  'DAY_RULE',
  'ACCESS_CODE',
] as const;
export type InvalidReason = (typeof INVALID_REASON)[number];

export const DECISION_ACTION = ['APPROVE', 'DENY'] as const;
export type DecisionAction = (typeof DECISION_ACTION)[number];

export const DECISION_CATEGORY = [
  'TACTICAL',
  'FINANCIAL',
  'POLITICAL',
  'MORAL',
] as const;
export type DecisionCategory = (typeof DECISION_CATEGORY)[number];

// Ordinal
export const PRESSURE_LEVEL = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type PressureLevel = (typeof PRESSURE_LEVEL)[number];

export const NARRATIVE_BRANCH = [
  'NEUTRAL',
  'IMPERIUM_PATH',
  'INSURGENT_PATH',
  'COMPLEX_RESISTANCE',
  'DOUBLE_CROSS',
  'SILENT_DEFIANCE',
] as const;
export type NarrativeBranch = (typeof NARRATIVE_BRANCH)[number];

export const ENDING_PATH = ['REBEL', 'IMPERIAL', 'NEUTRAL', 'CORRUPT'] as const;
export type EndingPath = (typeof ENDING_PATH)[number];

export const ENDING_TYPE = [
  'FREEDOM_FIGHTER',
  'MARTYR',
  'REFUGEE',
  'UNDERGROUND',
  'GRAY_MAN',
  'COMPROMISED',
  'GOOD_SOLDIER',
  'TRUE_BELIEVER',
  'BRIDGE_COMMANDER',
  'IMPERIAL_HERO',
] as const;
export type EndingType = (typeof ENDING_TYPE)[number];

export const SESSION_STATUS = ['SESSION_ACTIVE', 'SESSION_ENDED'] as const;
export type SessionStatus = (typeof SESSION_STATUS)[number];
