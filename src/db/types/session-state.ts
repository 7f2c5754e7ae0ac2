import type { ConsequenceLedger } from './consequence.js';
import type { Encounter } from './encounter.js';
import type { NarrativeState } from './narrative.js';
import type { Standing } from './standing.js';

export type SessionState = {
  narrative: NarrativeState;
  ledger: ConsequenceLedger;
  standing: Standing;
  pendingEncounter: Encounter | null;
  // most recent last
  recentShipTypes: string[];
  decisionSeq: number;
  encountersToday: number;
};
