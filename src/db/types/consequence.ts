export type ConsequencePayload = {
  consequenceId: string;
  scenarioToTrigger: string | null;
  newsHeadline: string;
  loyaltyImpact: number;
  suspicionIncrease: number;
  affectsFamily: boolean;
};

export type ConsequenceToken = {
  tokenId: string;
  // null for tokens the game schedules itself (ending path lock)
  sourceDecisionId: string | null;
  dayCreated: number;
  triggerDay: number;
  hasTriggered: boolean;
  payload: ConsequencePayload;
};

// Append-only; tokens are never removed
export type ConsequenceLedger = {
  tokens: ConsequenceToken[];
  nextSeq: number;
};
