import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { SessionConflictError } from '../common/errors/game-errors.js';
import type { SessionState } from '../db/types/index.js';
import {
  SessionStore,
  type DecisionAuditEntry,
  type NewSession,
  type StoredSession,
} from './session-store.js';

// callers never share references with stored rows
function cloneState(state: SessionState): SessionState {
  return structuredClone(state);
}

function cloneRow(row: StoredSession): StoredSession {
  return { ...row, state: cloneState(row.state) };
}

/** Process-local store for SESSION_STORE=memory and tests */
@Injectable()
export class InMemorySessionStore extends SessionStore {
  private readonly users = new Set<string>();
  private readonly sessions = new Map<string, StoredSession>();
  private readonly audit = new Map<string, DecisionAuditEntry[]>();

  async ensureUser(userId: string): Promise<void> {
    this.users.add(userId);
  }

  async create(input: NewSession): Promise<StoredSession> {
    const now = new Date();
    for (const s of this.sessions.values()) {
      if (s.userId === input.userId && s.status === 'SESSION_ACTIVE') {
        s.status = 'SESSION_ENDED';
        s.updatedAt = now;
      }
    }
    const row: StoredSession = {
      id: randomUUID(),
      userId: input.userId,
      status: 'SESSION_ACTIVE',
      version: 0,
      day: input.day,
      seed: input.seed,
      rngCursor: 0,
      state: cloneState(input.state),
      startedAt: now,
      updatedAt: now,
    };
    this.sessions.set(row.id, row);
    return cloneRow(row);
  }

  async findById(id: string): Promise<StoredSession | null> {
    const row = this.sessions.get(id);
    return row ? cloneRow(row) : null;
  }

  async findActiveByUser(userId: string): Promise<StoredSession | null> {
    const active = [...this.sessions.values()].filter(
      (s) => s.userId === userId && s.status === 'SESSION_ACTIVE',
    );
    const latest = active.at(-1);
    return latest ? cloneRow(latest) : null;
  }

  async save(
    next: StoredSession,
    expectedVersion: number,
    audit: readonly DecisionAuditEntry[],
  ): Promise<StoredSession> {
    const current = this.sessions.get(next.id);
    if (!current || current.version !== expectedVersion) {
      throw new SessionConflictError(
        'SESSION_VERSION_MISMATCH',
        'Session was modified concurrently',
        { sessionId: next.id, expectedVersion },
      );
    }
    const row: StoredSession = {
      ...cloneRow(next),
      version: expectedVersion + 1,
      updatedAt: new Date(),
    };
    this.sessions.set(row.id, row);
    const log = this.audit.get(row.id) ?? [];
    log.push(...audit);
    this.audit.set(row.id, log);
    return cloneRow(row);
  }

  async listDecisionAudit(sessionId: string): Promise<DecisionAuditEntry[]> {
    return [...(this.audit.get(sessionId) ?? [])];
  }
}
