import { Injectable } from '@nestjs/common';
import type {
  CargoManifestDefinition,
  DayRuleDefinition,
} from '../../content/content.types.js';
import type {
  AccessLevel,
  ClearanceLevel,
  Encounter,
  InvalidReason,
} from '../../db/types/index.js';
import { CLEARANCE_LEVEL } from '../../db/types/index.js';
import { extractKeywords } from '../../common/text-utils.js';

/** What the manifest is checked against */
export type ManifestSubject = Pick<Encounter, 'faction' | 'resolvedAccessCode'>;

const MAX_CLEARANCE: Record<AccessLevel, ClearanceLevel> = {
  LOW: 'STANDARD',
  MEDIUM: 'RESTRICTED',
  HIGH: 'CLASSIFIED',
  UNRESTRICTED: 'CLASSIFIED',
};

export function clearanceRank(level: ClearanceLevel): number {
  return CLEARANCE_LEVEL.indexOf(level);
}

/** Clearances an access level permits; null means no access code */
export function permittedClearances(
  level: AccessLevel | null,
): ClearanceLevel[] {
  const max = level === null ? 'STANDARD' : MAX_CLEARANCE[level];
  return CLEARANCE_LEVEL.filter((c) => clearanceRank(c) <= clearanceRank(max));
}

@Injectable()
export class ManifestPolicyService {
  validate(
    manifest: CargoManifestDefinition | null,
    subject: ManifestSubject,
    currentDay: number,
    dayRules: readonly DayRuleDefinition[],
  ): boolean {
    return this.firstFailure(manifest, subject, currentDay, dayRules) === null;
  }

  /** First failing check in fixed order, or null when the manifest passes */
  firstFailure(
    manifest: CargoManifestDefinition | null,
    subject: ManifestSubject,
    currentDay: number,
    dayRules: readonly DayRuleDefinition[],
  ): InvalidReason | null {
    if (!manifest) return 'MISSING_MANIFEST';
    if (!this.isFactionAuthorized(manifest, subject.faction)) return 'FACTION';
    if (!this.isValidForDay(manifest, currentDay)) return 'DAY';
    if (!this.hasSufficientClearance(manifest, subject.resolvedAccessCode?.level ?? null)) {
      return 'CLEARANCE';
    }
    if (!this.compliesWithDayRules(manifest, dayRules)) return 'DAY_RULE';
    return null;
  }

  isFactionAuthorized(
    manifest: CargoManifestDefinition,
    faction: string,
  ): boolean {
    if (manifest.factionRestriction === 'UNIVERSAL') return true;
    const needle = faction.toLowerCase();
    return manifest.allowedFactions.some((f) => f.toLowerCase() === needle);
  }

  isValidForDay(manifest: CargoManifestDefinition, day: number): boolean {
    if (day < manifest.firstAppearanceDay) return false;
    return manifest.lastAppearanceDay === null || day <= manifest.lastAppearanceDay;
  }

  hasSufficientClearance(
    manifest: CargoManifestDefinition,
    accessLevel: AccessLevel | null,
  ): boolean {
    return permittedClearances(accessLevel).includes(
      manifest.requiredClearanceLevel,
    );
  }

  /** Conjunctive: any failing rule fails the manifest */
  compliesWithDayRules(
    manifest: CargoManifestDefinition,
    dayRules: readonly DayRuleDefinition[],
  ): boolean {
    for (const rule of dayRules) {
      switch (rule.ruleType) {
        case 'CHECK_FOR_CONTRABAND':
          if (manifest.hasContraband) return false;
          break;
        case 'VERIFY_MANIFEST':
          if (manifest.hasFalseEntries) return false;
          break;
        case 'FORCE_INSPECTION':
          if (manifest.hasContraband && manifest.isEasilyDetectable) return false;
          break;
        default:
          break;
      }
    }

    if (dayRules.length === 0) return true;
    const ruleWords = new Set(extractKeywords(dayRules.map((r) => r.description)));
    return !manifest.suspiciousKeywords.some((k) =>
      ruleWords.has(k.toLowerCase()),
    );
  }
}
