import { Inject, Injectable } from '@nestjs/common';
import { and, asc, desc, eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { decisionRecords, gameSessions, users } from '../db/schema/index.js';
import { SessionConflictError } from '../common/errors/game-errors.js';
import {
  SessionStore,
  type DecisionAuditEntry,
  type NewSession,
  type StoredSession,
} from './session-store.js';

@Injectable()
export class DrizzleSessionStore extends SessionStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {
    super();
  }

  async ensureUser(userId: string): Promise<void> {
    await this.db.insert(users).values({ id: userId }).onConflictDoNothing();
  }

  async create(input: NewSession): Promise<StoredSession> {
    return this.db.transaction(async (tx) => {
      await tx
        .update(gameSessions)
        .set({ status: 'SESSION_ENDED', updatedAt: new Date() })
        .where(
          and(
            eq(gameSessions.userId, input.userId),
            eq(gameSessions.status, 'SESSION_ACTIVE'),
          ),
        );
      const [row] = await tx
        .insert(gameSessions)
        .values({
          userId: input.userId,
          seed: input.seed,
          day: input.day,
          state: input.state,
        })
        .returning();
      return row;
    });
  }

  async findById(id: string): Promise<StoredSession | null> {
    const row = await this.db.query.gameSessions.findFirst({
      where: eq(gameSessions.id, id),
    });
    return row ?? null;
  }

  async findActiveByUser(userId: string): Promise<StoredSession | null> {
    const row = await this.db.query.gameSessions.findFirst({
      where: and(
        eq(gameSessions.userId, userId),
        eq(gameSessions.status, 'SESSION_ACTIVE'),
      ),
      orderBy: [desc(gameSessions.startedAt)],
    });
    return row ?? null;
  }

  async save(
    next: StoredSession,
    expectedVersion: number,
    audit: readonly DecisionAuditEntry[],
  ): Promise<StoredSession> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .update(gameSessions)
        .set({
          status: next.status,
          version: expectedVersion + 1,
          day: next.day,
          rngCursor: next.rngCursor,
          state: next.state,
          updatedAt: new Date(),
        })
        .where(
          and(
            eq(gameSessions.id, next.id),
            eq(gameSessions.version, expectedVersion),
          ),
        )
        .returning();
      if (!row) {
        throw new SessionConflictError(
          'SESSION_VERSION_MISMATCH',
          'Session was modified concurrently',
          { sessionId: next.id, expectedVersion },
        );
      }
      if (audit.length > 0) {
        await tx
          .insert(decisionRecords)
          .values(audit.map((a) => ({ sessionId: next.id, ...a })));
      }
      return row;
    });
  }

  async listDecisionAudit(sessionId: string): Promise<DecisionAuditEntry[]> {
    const rows = await this.db
      .select()
      .from(decisionRecords)
      .where(eq(decisionRecords.sessionId, sessionId))
      .orderBy(asc(decisionRecords.recordedAt));
    return rows.map((r) => ({
      decisionId: r.decisionId,
      day: r.day,
      imperialPoints: r.imperialPoints,
      insurgentPoints: r.insurgentPoints,
      category: r.category,
      pressure: r.pressure,
      context: r.context,
      chainParentId: r.chainParentId,
      recordedAt: r.recordedAt,
    }));
  }
}
