// Small in-memory content bundle for specs

import { ContentLoaderService, type ContentBundle } from '../content-loader.service.js';

export function makeContentBundle(overrides: Partial<ContentBundle> = {}): ContentBundle {
  return {
    categories: [
      {
        categoryId: 'FREIGHT',
        name: 'Freight',
        associatedFactions: ['Merchant Guild'],
        compatibleCaptainFactions: [],
        validAccessCodePrefixes: ['MG-'],
        suspicionBaseLevel: 2,
        requiresSpecialClearance: false,
        isPriorityVessel: false,
        contrabandExempt: false,
        searchExempt: false,
      },
      {
        categoryId: 'PATROL',
        name: 'Patrol',
        associatedFactions: ['Imperium'],
        compatibleCaptainFactions: ['Imperium'],
        validAccessCodePrefixes: ['IMP-'],
        suspicionBaseLevel: 0,
        requiresSpecialClearance: false,
        isPriorityVessel: true,
        contrabandExempt: false,
        searchExempt: false,
      },
    ],
    shipTypes: [
      { shipTypeId: 'HAULER', name: 'Hauler', categoryId: 'FREIGHT', description: '' },
      { shipTypeId: 'CUTTER', name: 'Cutter', categoryId: 'PATROL', description: '' },
    ],
    captainTypes: [
      { captainTypeId: 'OFFICER', rank: 'Captain', names: ['Vell'], factions: ['Imperium'], bribeChance: 0 },
      { captainTypeId: 'TRADER', rank: 'Skipper', names: ['Bren'], factions: ['Merchant Guild'], bribeChance: 0 },
    ],
    accessCodes: [
      {
        code: 'MG-1000',
        level: 'LOW',
        validFromDay: 1,
        validUntilDay: null,
        isRevoked: false,
        authorizedFactions: ['Merchant Guild'],
      },
      {
        code: 'IMP-2000',
        level: 'MEDIUM',
        validFromDay: 1,
        validUntilDay: null,
        isRevoked: false,
        authorizedFactions: ['Imperium'],
      },
      {
        code: 'XX-0000',
        level: 'LOW',
        validFromDay: 1,
        validUntilDay: null,
        isRevoked: false,
        authorizedFactions: [],
      },
    ],
    manifests: [
      {
        manifestId: 'MAN_GOODS',
        description: 'Crates of goods',
        declaredItems: ['goods'],
        factionRestriction: 'UNIVERSAL',
        allowedFactions: [],
        requiredClearanceLevel: 'STANDARD',
        hasContraband: false,
        hasFalseEntries: false,
        isEasilyDetectable: false,
        suspiciousKeywords: [],
        firstAppearanceDay: 1,
        lastAppearanceDay: null,
        requiredShipCategories: [],
      },
      {
        manifestId: 'MAN_ORDERS',
        description: 'Sealed orders',
        declaredItems: ['orders'],
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
      },
    ],
    dayRules: [
      { ruleId: 'R_CONTRABAND', activateOnDay: 3, ruleType: 'CHECK_FOR_CONTRABAND', description: 'Deny contraband' },
    ],
    storyShips: [
      {
        storyShipId: 'STORY_RELIEF',
        storyTag: 'insurgent',
        shipName: 'Relief',
        categoryId: 'FREIGHT',
        captainName: 'Aria',
        captainRank: 'Medic',
        captainFaction: 'Merchant Guild',
        accessCode: 'MG-1000',
        manifestId: 'MAN_GOODS',
        firstDay: 1,
        approveUnlocksTag: 'relief_delivered',
        denyUnlocksTag: 'relief_turned_away',
      },
    ],
    consequences: [
      {
        consequenceId: 'INSURGENT_HELPED',
        trigger: { action: 'APPROVE', storyTag: 'insurgent' },
        delayDays: 2,
        scenarioToTrigger: 'REBEL_CONTACT',
        newsHeadline: 'Insurgent Activity Increases',
        newsContent: 'Supplies reached insurgent cells.',
        loyaltyImpact: -3,
        suspicionIncrease: 2,
        affectsFamily: false,
      },
      {
        consequenceId: 'PROTOCOL_BREACH',
        trigger: { action: 'DENY', shouldApprove: true },
        delayDays: 1,
        scenarioToTrigger: null,
        newsHeadline: 'Shipping Delays',
        newsContent: '',
        loyaltyImpact: -1,
        suspicionIncrease: 1,
        affectsFamily: false,
      },
    ],
    defaults: {
      categoryId: 'FREIGHT',
      shipTypeId: 'HAULER',
      captainName: 'Harl',
      captainRank: 'Master Trader',
      captainFaction: 'Merchant Guild',
      fallbackNewsContent: 'Command reviews the checkpoint. Days since incident: {day}',
      severeNewsSuffix: 'Stay vigilant.',
    },
    ...overrides,
  };
}

export function makeContent(overrides: Partial<ContentBundle> = {}): ContentLoaderService {
  const content = new ContentLoaderService();
  content.load(makeContentBundle(overrides));
  return content;
}
