import { FactionPolicy } from './faction-policy.js';
import type { ShipCategoryDefinition } from '../../content/content.types.js';

function makeCategory(
  overrides: Partial<ShipCategoryDefinition> = {},
): ShipCategoryDefinition {
  return {
    categoryId: 'ORBITAL_FREIGHT',
    name: 'Orbital Freight',
    associatedFactions: ['Imperium', 'Merchant Guild'],
    compatibleCaptainFactions: [],
    validAccessCodePrefixes: ['IMP-', 'MG'],
    suspicionBaseLevel: 2,
    requiresSpecialClearance: false,
    isPriorityVessel: false,
    contrabandExempt: false,
    searchExempt: false,
    ...overrides,
  };
}

describe('FactionPolicy', () => {
  describe('isFactionAssociated', () => {
    const policy = new FactionPolicy(makeCategory());

    it.each(['Imperium', 'imperium', 'IMPERIUM', 'merchant guild'])(
      '%s is associated',
      (faction) => {
        expect(policy.isFactionAssociated(faction)).toBe(true);
      },
    );

    it.each(['Insurgent', 'Imperi', 'Imperium ', ''])(
      '%p is not associated',
      (faction) => {
        expect(policy.isFactionAssociated(faction)).toBe(false);
      },
    );

    it('an empty associated set matches nothing', () => {
      const empty = new FactionPolicy(makeCategory({ associatedFactions: [] }));
      expect(empty.isFactionAssociated('Imperium')).toBe(false);
    });
  });

  describe('isCaptainCompatible', () => {
    it('uses the compatible-captain set when it is configured', () => {
      const policy = new FactionPolicy(
        makeCategory({ compatibleCaptainFactions: ['Navy'] }),
      );
      expect(policy.isCaptainCompatible('NAVY')).toBe(true);
      expect(policy.isCaptainCompatible('Imperium')).toBe(false);
    });

    it('falls back to the associated factions when the set is empty', () => {
      const policy = new FactionPolicy(makeCategory());
      expect(policy.isCaptainCompatible('imperium')).toBe(true);
      expect(policy.isCaptainCompatible('Navy')).toBe(false);
    });
  });

  describe('isAccessCodeValid', () => {
    const policy = new FactionPolicy(makeCategory());

    it('matches a configured prefix regardless of case', () => {
      expect(policy.isAccessCodeValid('imp-4471')).toBe(true);
      expect(policy.isAccessCodeValid('MG9000')).toBe(true);
    });

    it('rejects codes without a known prefix', () => {
      expect(policy.isAccessCodeValid('INS-0001')).toBe(false);
    });

    it('rejects an empty code', () => {
      expect(policy.isAccessCodeValid('')).toBe(false);
    });

    it('rejects everything when no prefixes are configured', () => {
      const none = new FactionPolicy(makeCategory({ validAccessCodePrefixes: [] }));
      expect(none.isAccessCodeValid('IMP-4471')).toBe(false);
    });
  });

  describe('getPrimaryFaction', () => {
    it('returns the first associated faction', () => {
      expect(new FactionPolicy(makeCategory()).getPrimaryFaction()).toBe('Imperium');
    });

    it('falls back to the lower-cased category name', () => {
      const policy = new FactionPolicy(makeCategory({ associatedFactions: [] }));
      expect(policy.getPrimaryFaction()).toBe('orbital freight');
    });
  });
});
