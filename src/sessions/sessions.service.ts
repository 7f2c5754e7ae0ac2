import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  SessionConflictError,
} from '../common/errors/game-errors.js';
import type {
  EndingPath,
  EndingType,
  NarrativeEvent,
  SessionState,
} from '../db/types/index.js';
import {
  DecisionRecorderService,
  inferCategory,
  inferPressure,
} from '../engine/narrative/decision-recorder.service.js';
import { NarrativeClassifierService } from '../engine/narrative/narrative-classifier.service.js';
import { createLedger } from '../engine/narrative/consequence-ledger.service.js';
import { createNarrativeState } from '../engine/narrative/narrative-state.js';
import { createStanding, StandingService } from '../engine/narrative/standing.service.js';
import { EndingService } from '../engine/narrative/ending.service.js';
import {
  SessionStore,
  type DecisionAuditEntry,
  type StoredSession,
} from './session-store.js';
import { toAuditEntry, toSessionView, type SessionView } from './session-view.js';
import type { LockEndingPathBody } from './dto/lock-ending-path.dto.js';
import {
  isShipDecisionId,
  type NarrativeDecisionBody,
} from './dto/narrative-decision.dto.js';

export const FIRST_DAY = 1;

export type SessionUpdate = SessionView & { events: NarrativeEvent[] };

export type EndingView = {
  ending: EndingType;
  lockedPath: EndingPath | null;
  suggestedPath: EndingPath;
};

export function createSessionState(): SessionState {
  return {
    narrative: createNarrativeState(),
    ledger: createLedger(),
    standing: createStanding(),
    pendingEncounter: null,
    recentShipTypes: [],
    decisionSeq: 0,
    encountersToday: 0,
  };
}

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);

  constructor(
    private readonly store: SessionStore,
    private readonly recorder: DecisionRecorderService,
    private readonly classifier: NarrativeClassifierService,
    private readonly standing: StandingService,
    private readonly endings: EndingService,
  ) {}

  /** New game: the user's previous active session is ended */
  async createSession(userId: string, seed?: string): Promise<SessionView> {
    await this.store.ensureUser(userId);
    const session = await this.store.create({
      userId,
      seed: seed ?? randomUUID(),
      day: FIRST_DAY,
      state: createSessionState(),
    });
    this.logger.log(`Session ${session.id} started for ${userId}`);
    return toSessionView(session);
  }

  async getActiveSession(userId: string): Promise<SessionView> {
    const session = await this.store.findActiveByUser(userId);
    if (!session) {
      throw new NotFoundError('No active session');
    }
    return toSessionView(session);
  }

  async getSession(sessionId: string, userId: string): Promise<SessionView> {
    return toSessionView(await this.loadOwned(sessionId, userId));
  }

  async getReport(sessionId: string, userId: string): Promise<{ report: string }> {
    const session = await this.loadOwned(sessionId, userId);
    return { report: this.classifier.generateReport(session.state.narrative) };
  }

  async getEnding(sessionId: string, userId: string): Promise<EndingView> {
    const { standing } = (await this.loadOwned(sessionId, userId)).state;
    return {
      ending: this.endings.determineEnding(standing),
      lockedPath: standing.lockedEndingPath,
      suggestedPath: this.endings.getSuggestedEndingPath(standing),
    };
  }

  async getDecisionAudit(
    sessionId: string,
    userId: string,
  ): Promise<DecisionAuditEntry[]> {
    await this.loadOwned(sessionId, userId);
    return this.store.listDecisionAudit(sessionId);
  }

  async lockEndingPath(
    sessionId: string,
    userId: string,
    body: LockEndingPathBody,
  ): Promise<SessionUpdate> {
    const session = await this.loadForWrite(sessionId, userId, body.expectedVersion);
    const { standing, ledger } = session.state;
    const token = this.endings.lockEndingPath(standing, ledger, body.path, session.day);
    if (!token) {
      throw new SessionConflictError(
        'ENDING_PATH_LOCKED',
        `Ending path already locked: ${standing.lockedEndingPath ?? 'unknown'}`,
      );
    }
    const saved = await this.commit(session, body.expectedVersion, []);
    return {
      ...toSessionView(saved),
      events: [{ kind: 'ENDING_PATH_LOCKED', path: body.path, day: session.day }],
    };
  }

  /** Free-form decision outside the checkpoint flow (briefings, story beats) */
  async recordNarrativeDecision(
    sessionId: string,
    userId: string,
    body: NarrativeDecisionBody,
  ): Promise<SessionUpdate> {
    if (isShipDecisionId(body.decisionId)) {
      throw new BadRequestError(`Reserved decision id: ${body.decisionId}`);
    }
    const session = await this.loadForWrite(sessionId, userId, body.expectedVersion);
    const { narrative, standing } = session.state;
    const events: NarrativeEvent[] = [];

    const { record } = this.recorder.record(
      narrative,
      {
        id: body.decisionId,
        imperialPoints: body.imperialPoints,
        insurgentPoints: body.insurgentPoints,
        context: body.context,
        category: body.category ?? inferCategory(body.decisionId, body.context),
        pressure: body.pressure ?? inferPressure(body.imperialPoints, body.insurgentPoints),
      },
      (e) => events.push(e),
    );
    this.standing.applyAlignment(standing, body.imperialPoints, body.insurgentPoints);

    const saved = await this.commit(session, body.expectedVersion, [
      toAuditEntry(record, session.day),
    ]);
    return { ...toSessionView(saved), events };
  }

  async loadOwned(sessionId: string, userId: string): Promise<StoredSession> {
    const session = await this.store.findById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    if (session.userId !== userId) {
      throw new ForbiddenError('Session belongs to another user');
    }
    return session;
  }

  /** Owned, active and at the version the caller last saw */
  async loadForWrite(
    sessionId: string,
    userId: string,
    expectedVersion: number,
  ): Promise<StoredSession> {
    const session = await this.loadOwned(sessionId, userId);
    if (session.status !== 'SESSION_ACTIVE') {
      throw new SessionConflictError('SESSION_ENDED', 'Session has ended');
    }
    if (session.version !== expectedVersion) {
      throw new SessionConflictError(
        'SESSION_VERSION_MISMATCH',
        'Session version mismatch',
        { expected: session.version, received: expectedVersion },
      );
    }
    return session;
  }

  commit(
    session: StoredSession,
    expectedVersion: number,
    audit: readonly DecisionAuditEntry[],
  ): Promise<StoredSession> {
    return this.store.save(session, expectedVersion, audit);
  }
}
