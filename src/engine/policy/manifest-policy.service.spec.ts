import {
  ManifestPolicyService,
  permittedClearances,
  type ManifestSubject,
} from './manifest-policy.service.js';
import type {
  AccessCodeDefinition,
  CargoManifestDefinition,
  DayRuleDefinition,
} from '../../content/content.types.js';
import type { AccessLevel } from '../../db/types/index.js';

function makeManifest(
  overrides: Partial<CargoManifestDefinition> = {},
): CargoManifestDefinition {
  return {
    manifestId: 'MF_TEST',
    description: 'Ration crates',
    declaredItems: ['rations'],
    factionRestriction: 'FACTION_SPECIFIC',
    allowedFactions: ['Imperium'],
    requiredClearanceLevel: 'STANDARD',
    hasContraband: false,
    hasFalseEntries: false,
    isEasilyDetectable: false,
    suspiciousKeywords: [],
    firstAppearanceDay: 1,
    lastAppearanceDay: null,
    requiredShipCategories: [],
    ...overrides,
  };
}

function makeCode(level: AccessLevel): AccessCodeDefinition {
  return {
    code: 'IMP-1000',
    level,
    validFromDay: 1,
    validUntilDay: null,
    isRevoked: false,
    authorizedFactions: ['Imperium'],
  };
}

function makeRule(overrides: Partial<DayRuleDefinition> = {}): DayRuleDefinition {
  return {
    ruleId: 'R_TEST',
    activateOnDay: 1,
    ruleType: 'VERIFY_ORIGIN',
    description: 'Confirm origin',
    ...overrides,
  };
}

function makeSubject(level: AccessLevel | null = 'LOW'): ManifestSubject {
  return {
    faction: 'Imperium',
    resolvedAccessCode: level === null ? null : makeCode(level),
  };
}

describe('permittedClearances', () => {
  it('is monotonic in access level', () => {
    const low = permittedClearances('LOW');
    const medium = permittedClearances('MEDIUM');
    const high = permittedClearances('HIGH');
    const unrestricted = permittedClearances('UNRESTRICTED');

    for (const c of low) expect(medium).toContain(c);
    for (const c of medium) expect(high).toContain(c);
    for (const c of high) expect(unrestricted).toContain(c);
  });

  it('maps each level to its maximum clearance', () => {
    expect(permittedClearances('LOW')).toEqual(['STANDARD']);
    expect(permittedClearances('MEDIUM')).toEqual(['STANDARD', 'RESTRICTED']);
    expect(permittedClearances('HIGH')).toEqual(['STANDARD', 'RESTRICTED', 'CLASSIFIED']);
    expect(permittedClearances('UNRESTRICTED')).toEqual(['STANDARD', 'RESTRICTED', 'CLASSIFIED']);
  });

  it('allows only STANDARD without an access code', () => {
    expect(permittedClearances(null)).toEqual(['STANDARD']);
  });
});

describe('ManifestPolicyService', () => {
  let service: ManifestPolicyService;

  beforeEach(() => {
    service = new ManifestPolicyService();
  });

  it('null manifest is a deny, not an error', () => {
    expect(service.validate(null, makeSubject(), 3, [])).toBe(false);
    expect(service.firstFailure(null, makeSubject(), 3, [])).toBe('MISSING_MANIFEST');
  });

  it('passes a manifest that satisfies every check', () => {
    expect(service.validate(makeManifest(), makeSubject(), 3, [makeRule()])).toBe(true);
  });

  describe('conjunction: flipping one check fails the whole manifest', () => {
    const passing = {
      manifest: makeManifest({ requiredClearanceLevel: 'RESTRICTED' }),
      subject: makeSubject('MEDIUM'),
      day: 5,
      rules: [makeRule({ ruleType: 'CHECK_FOR_CONTRABAND', description: 'Scan holds' })],
    };

    it('baseline passes', () => {
      expect(
        service.validate(passing.manifest, passing.subject, passing.day, passing.rules),
      ).toBe(true);
    });

    it('faction', () => {
      const subject = { ...passing.subject, faction: 'Insurgent' };
      expect(service.validate(passing.manifest, subject, passing.day, passing.rules)).toBe(false);
      expect(service.firstFailure(passing.manifest, subject, passing.day, passing.rules)).toBe('FACTION');
    });

    it('day', () => {
      const manifest = { ...passing.manifest, lastAppearanceDay: 4 };
      expect(service.validate(manifest, passing.subject, passing.day, passing.rules)).toBe(false);
      expect(service.firstFailure(manifest, passing.subject, passing.day, passing.rules)).toBe('DAY');
    });

    it('clearance', () => {
      const subject = makeSubject('LOW');
      expect(service.validate(passing.manifest, subject, passing.day, passing.rules)).toBe(false);
      expect(service.firstFailure(passing.manifest, subject, passing.day, passing.rules)).toBe('CLEARANCE');
    });

    it('day rule', () => {
      const manifest = { ...passing.manifest, hasContraband: true };
      expect(service.validate(manifest, passing.subject, passing.day, passing.rules)).toBe(false);
      expect(service.firstFailure(manifest, passing.subject, passing.day, passing.rules)).toBe('DAY_RULE');
    });
  });

  describe('first failure follows the check order', () => {
    const rules = [makeRule({ ruleType: 'CHECK_FOR_CONTRABAND', description: 'Scan holds' })];

    it('faction before clearance', () => {
      const manifest = makeManifest({ requiredClearanceLevel: 'RESTRICTED' });
      const subject = { faction: 'Insurgent', resolvedAccessCode: makeCode('LOW') };
      expect(service.firstFailure(manifest, subject, 5, rules)).toBe('FACTION');
    });

    it('day before day rule', () => {
      const manifest = makeManifest({ lastAppearanceDay: 4, hasContraband: true });
      expect(service.firstFailure(manifest, makeSubject('MEDIUM'), 5, rules)).toBe('DAY');
    });

    it('clearance before day rule', () => {
      const manifest = makeManifest({ requiredClearanceLevel: 'CLASSIFIED', hasContraband: true });
      expect(service.firstFailure(manifest, makeSubject('LOW'), 5, rules)).toBe('CLEARANCE');
    });
  });

  describe('faction authorization', () => {
    it('UNIVERSAL manifests accept any faction', () => {
      const manifest = makeManifest({ factionRestriction: 'UNIVERSAL', allowedFactions: [] });
      expect(service.isFactionAuthorized(manifest, 'Anyone')).toBe(true);
    });

    it('compares allowed factions case-insensitively', () => {
      expect(service.isFactionAuthorized(makeManifest(), 'IMPERIUM')).toBe(true);
    });
  });

  describe('day validity', () => {
    const manifest = makeManifest({ firstAppearanceDay: 3, lastAppearanceDay: 6 });

    it.each([
      [2, false],
      [3, true],
      [6, true],
      [7, false],
    ])('day %d → %s', (day, expected) => {
      expect(service.isValidForDay(manifest, day)).toBe(expected);
    });

    it('null last day is open-ended', () => {
      expect(service.isValidForDay(makeManifest({ lastAppearanceDay: null }), 999)).toBe(true);
    });
  });

  describe('clearance', () => {
    it('no access code restricts to STANDARD', () => {
      const classified = makeManifest({ requiredClearanceLevel: 'CLASSIFIED' });
      expect(service.validate(makeManifest(), makeSubject(null), 1, [])).toBe(true);
      expect(service.validate(classified, makeSubject(null), 1, [])).toBe(false);
    });

    it('UNRESTRICTED permits CLASSIFIED cargo', () => {
      const classified = makeManifest({ requiredClearanceLevel: 'CLASSIFIED' });
      expect(service.hasSufficientClearance(classified, 'UNRESTRICTED')).toBe(true);
    });
  });

  describe('day rules', () => {
    it('VERIFY_MANIFEST fails on false entries', () => {
      const manifest = makeManifest({ hasFalseEntries: true });
      expect(
        service.compliesWithDayRules(manifest, [makeRule({ ruleType: 'VERIFY_MANIFEST' })]),
      ).toBe(false);
    });

    it('FORCE_INSPECTION needs contraband that is easily detectable', () => {
      const rules = [makeRule({ ruleType: 'FORCE_INSPECTION' })];
      const hidden = makeManifest({ hasContraband: true, isEasilyDetectable: false });
      const obvious = makeManifest({ hasContraband: true, isEasilyDetectable: true });
      expect(service.compliesWithDayRules(hidden, rules)).toBe(true);
      expect(service.compliesWithDayRules(obvious, rules)).toBe(false);
    });

    it('fails when a rule description word is a suspicious keyword', () => {
      const manifest = makeManifest({ suspiciousKeywords: ['Spice'] });
      const rules = [makeRule({ description: 'Watch for SPICE runners' })];
      expect(service.compliesWithDayRules(manifest, rules)).toBe(false);
    });

    it('ignores keywords when no rules are active', () => {
      const manifest = makeManifest({ suspiciousKeywords: ['spice'] });
      expect(service.compliesWithDayRules(manifest, [])).toBe(true);
    });

    it('matches whole words only', () => {
      const manifest = makeManifest({ suspiciousKeywords: ['spice'] });
      const rules = [makeRule({ description: 'Watch for spicerunners' })];
      expect(service.compliesWithDayRules(manifest, rules)).toBe(true);
    });
  });
});
