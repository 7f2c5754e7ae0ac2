import type {
  DecisionCategory,
  PressureLevel,
  SessionState,
  SessionStatus,
} from '../db/types/index.js';

export interface StoredSession {
  id: string;
  userId: string;
  status: SessionStatus;
  version: number;
  day: number;
  seed: string;
  rngCursor: number;
  state: SessionState;
  startedAt: Date;
  updatedAt: Date;
}

export interface NewSession {
  userId: string;
  seed: string;
  day: number;
  state: SessionState;
}

export interface DecisionAuditEntry {
  decisionId: string;
  day: number;
  imperialPoints: number;
  insurgentPoints: number;
  category: DecisionCategory;
  pressure: PressureLevel;
  context: string;
  chainParentId: string | null;
  recordedAt: Date;
}

/** Persistence seam for sessions; writes are version-checked */
export abstract class SessionStore {
  abstract ensureUser(userId: string): Promise<void>;

  /** Ends the user's active sessions and inserts a fresh one */
  abstract create(input: NewSession): Promise<StoredSession>;

  abstract findById(id: string): Promise<StoredSession | null>;

  abstract findActiveByUser(userId: string): Promise<StoredSession | null>;

  /**
   * Persist `next` if the stored version still equals `expectedVersion`;
   * the returned row carries version + 1. Throws SessionConflictError
   * otherwise. Audit entries are appended in the same write.
   */
  abstract save(
    next: StoredSession,
    expectedVersion: number,
    audit: readonly DecisionAuditEntry[],
  ): Promise<StoredSession>;

  abstract listDecisionAudit(sessionId: string): Promise<DecisionAuditEntry[]>;
}
