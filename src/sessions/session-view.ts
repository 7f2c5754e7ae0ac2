import type {
  ClearanceLevel,
  DecisionRecord,
  Encounter,
  NarrativeBranch,
  SessionStatus,
  Standing,
} from '../db/types/index.js';
import type { StoredSession, DecisionAuditEntry } from './session-store.js';

/** What the player sees before deciding; the verdict stays hidden */
export type EncounterView = {
  encounterId: string;
  day: number;
  shipName: string;
  categoryId: string;
  faction: string;
  captain: Encounter['captain'];
  accessCode: string;
  manifest: {
    manifestId: string;
    description: string;
    declaredItems: string[];
    requiredClearanceLevel: ClearanceLevel;
  } | null;
  isStoryShip: boolean;
  offersBribe: boolean;
};

export type SessionView = {
  sessionId: string;
  status: SessionStatus;
  version: number;
  day: number;
  narrative: {
    imperialLoyalty: number;
    insurgentSympathy: number;
    currentBranch: NarrativeBranch | null;
    progressionLevel: number;
    unlockedTags: string[];
    decisionCount: number;
  };
  standing: Standing;
  pendingEncounter: EncounterView | null;
  pendingConsequences: number;
};

export function toEncounterView(e: Encounter): EncounterView {
  return {
    encounterId: e.encounterId,
    day: e.day,
    shipName: e.shipName,
    categoryId: e.categoryId,
    faction: e.faction,
    captain: { ...e.captain },
    accessCode: e.accessCode,
    manifest: e.manifest && {
      manifestId: e.manifest.manifestId,
      description: e.manifest.description,
      declaredItems: [...e.manifest.declaredItems],
      requiredClearanceLevel: e.manifest.requiredClearanceLevel,
    },
    isStoryShip: e.isStoryShip,
    offersBribe: e.offersBribe,
  };
}

export function toSessionView(s: StoredSession): SessionView {
  const { narrative, standing, ledger, pendingEncounter } = s.state;
  return {
    sessionId: s.id,
    status: s.status,
    version: s.version,
    day: s.day,
    narrative: {
      imperialLoyalty: narrative.imperialLoyalty,
      insurgentSympathy: narrative.insurgentSympathy,
      currentBranch: narrative.currentBranch,
      progressionLevel: narrative.progressionLevel,
      unlockedTags: [...narrative.unlockedTags],
      decisionCount: narrative.history.length,
    },
    standing: { ...standing, completedStoryBeats: [...standing.completedStoryBeats] },
    pendingEncounter: pendingEncounter ? toEncounterView(pendingEncounter) : null,
    pendingConsequences: ledger.tokens.filter((t) => !t.hasTriggered).length,
  };
}

export function toAuditEntry(record: DecisionRecord, day: number): DecisionAuditEntry {
  return {
    decisionId: record.id,
    day,
    imperialPoints: record.imperialPoints,
    insurgentPoints: record.insurgentPoints,
    category: record.category,
    pressure: record.pressure,
    context: record.context,
    chainParentId: record.chainParentId,
    recordedAt: new Date(record.timestamp),
  };
}
