import { Injectable, Logger } from '@nestjs/common';
import { BadRequestError, SessionConflictError } from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { ConsequenceDefinition } from '../content/content.types.js';
import { GameConfigService } from '../config/game-config.service.js';
import type {
  DecisionAction,
  DecisionCategory,
  Encounter,
  InvalidReason,
  NarrativeEvent,
  PressureLevel,
} from '../db/types/index.js';
import { RngService } from '../engine/rng/rng.service.js';
import {
  EncounterClassifierService,
  RECENT_SHIP_TYPE_WINDOW,
} from '../engine/encounter/encounter-classifier.service.js';
import { DecisionRecorderService } from '../engine/narrative/decision-recorder.service.js';
import { NarrativeClassifierService } from '../engine/narrative/narrative-classifier.service.js';
import { ConsequenceLedgerService } from '../engine/narrative/consequence-ledger.service.js';
import { StandingService } from '../engine/narrative/standing.service.js';
import {
  EndingService,
  isPointOfNoReturnWindow,
} from '../engine/narrative/ending.service.js';
import { NewsFeedService, type NewsItem } from '../engine/narrative/news-feed.service.js';
import { SessionsService, type SessionUpdate } from '../sessions/sessions.service.js';
import {
  toAuditEntry,
  toEncounterView,
  toSessionView,
  type EncounterView,
} from '../sessions/session-view.js';
import type { DecideBody } from './dto/decide.dto.js';
import type { VersionedBody } from '../sessions/dto/versioned.dto.js';
import { SHIP_DECISION_PREFIX } from '../sessions/dto/narrative-decision.dto.js';

type Points = { imperial: number; insurgent: number };

// story ships tagged with a faction move the totals; everything else is neutral
const STORY_POINTS: Partial<Record<string, Record<DecisionAction, Points>>> = {
  imperium: {
    APPROVE: { imperial: 10, insurgent: -5 },
    DENY: { imperial: -5, insurgent: 5 },
  },
  insurgent: {
    APPROVE: { imperial: -5, insurgent: 10 },
    DENY: { imperial: 10, insurgent: -5 },
  },
};
const NO_POINTS: Points = { imperial: 0, insurgent: 0 };
const BRIBE_CORRUPTION = 10;

function decisionPoints(encounter: Encounter, action: DecisionAction): Points {
  if (!encounter.isStoryShip || encounter.storyTag === null) return NO_POINTS;
  const table = STORY_POINTS[encounter.storyTag];
  return table ? table[action] : NO_POINTS;
}

export type EncounterResponse = {
  sessionId: string;
  version: number;
  encounter: EncounterView;
};

export type DecisionResponse = SessionUpdate & {
  decisionId: string;
  correct: boolean;
  shouldApprove: boolean;
  invalidReason: InvalidReason | null;
  scheduledConsequences: string[];
};

export type DayAdvanceResponse = SessionUpdate & {
  news: NewsItem[];
  upcomingConsequences: number;
};

export function matchesTrigger(
  def: ConsequenceDefinition,
  action: DecisionAction,
  encounter: Encounter,
): boolean {
  const t = def.trigger;
  if (t.action !== action) return false;
  if (t.shouldApprove !== undefined && t.shouldApprove !== encounter.shouldApprove) return false;
  if (t.hasContraband !== undefined && t.hasContraband !== (encounter.manifest?.hasContraband ?? false)) {
    return false;
  }
  if (t.offersBribe !== undefined && t.offersBribe !== encounter.offersBribe) return false;
  if (t.storyTag !== undefined && t.storyTag !== encounter.storyTag) return false;
  if (t.manifestKeyword !== undefined) {
    const keyword = t.manifestKeyword.toLowerCase();
    const manifest = encounter.manifest;
    if (!manifest) return false;
    const text = [manifest.description, ...manifest.declaredItems].join(' ').toLowerCase();
    if (!text.includes(keyword)) return false;
  }
  return true;
}

/** One checkpoint shift: generate → decide → advance day */
@Injectable()
export class ShiftsService {
  private readonly logger = new Logger(ShiftsService.name);

  constructor(
    private readonly sessions: SessionsService,
    private readonly content: ContentLoaderService,
    private readonly config: GameConfigService,
    private readonly rngService: RngService,
    private readonly classifier: EncounterClassifierService,
    private readonly recorder: DecisionRecorderService,
    private readonly narrative: NarrativeClassifierService,
    private readonly ledger: ConsequenceLedgerService,
    private readonly standing: StandingService,
    private readonly endings: EndingService,
    private readonly news: NewsFeedService,
  ) {}

  /** Returns the pending encounter if one is waiting; otherwise generates */
  async nextEncounter(
    sessionId: string,
    userId: string,
    body: VersionedBody,
  ): Promise<EncounterResponse> {
    const session = await this.sessions.loadForWrite(sessionId, userId, body.expectedVersion);
    const { state } = session;

    if (state.pendingEncounter) {
      return {
        sessionId: session.id,
        version: session.version,
        encounter: toEncounterView(state.pendingEncounter),
      };
    }
    if (state.encountersToday >= this.config.get().encountersPerDay) {
      throw new SessionConflictError(
        'SHIFT_COMPLETE',
        'No more ships today; advance the day',
        { day: session.day },
      );
    }

    const rng = this.rngService.create(session.seed, session.rngCursor);
    const encounter = this.classifier.generate(
      rng,
      session.day,
      state.standing.imperialLoyalty,
      state.standing.rebellionSympathy,
      {
        recentShipTypes: state.recentShipTypes,
        completedStoryShips: state.standing.completedStoryBeats,
      },
    );
    if (encounter.degradedMatch) {
      this.logger.warn(`Session ${session.id}: degraded encounter ${encounter.encounterId}`);
    }

    state.pendingEncounter = encounter;
    state.encountersToday += 1;
    if (!encounter.isStoryShip) {
      state.recentShipTypes = [...state.recentShipTypes, encounter.shipTypeId].slice(
        -RECENT_SHIP_TYPE_WINDOW,
      );
    }
    session.rngCursor = rng.cursor;

    const saved = await this.sessions.commit(session, body.expectedVersion, []);
    return {
      sessionId: saved.id,
      version: saved.version,
      encounter: toEncounterView(encounter),
    };
  }

  async decide(
    sessionId: string,
    userId: string,
    body: DecideBody,
  ): Promise<DecisionResponse> {
    const session = await this.sessions.loadForWrite(sessionId, userId, body.expectedVersion);
    const { state } = session;
    const encounter = state.pendingEncounter;
    if (!encounter) {
      throw new SessionConflictError('NO_PENDING_ENCOUNTER', 'No encounter awaiting a decision');
    }
    if (encounter.encounterId !== body.encounterId) {
      throw new BadRequestError('Encounter id does not match the pending encounter', {
        pending: encounter.encounterId,
        received: body.encounterId,
      });
    }

    const approved = body.action === 'APPROVE';
    const points = decisionPoints(encounter, body.action);
    const category: DecisionCategory = encounter.offersBribe
      ? 'FINANCIAL'
      : encounter.isStoryShip
        ? 'POLITICAL'
        : 'TACTICAL';
    const pressure: PressureLevel = encounter.isStoryShip ? 'HIGH' : 'MEDIUM';

    state.decisionSeq += 1;
    const decisionId =
      `${SHIP_DECISION_PREFIX}${encounter.shipTypeId}_${approved ? 'approved' : 'denied'}_${state.decisionSeq}`.toLowerCase();
    const context = `${approved ? 'Approved' : 'Denied'} ${encounter.shipName} - Captain: ${encounter.captain.name}`;

    const events: NarrativeEvent[] = [];
    const listener = (e: NarrativeEvent) => events.push(e);
    const { record } = this.recorder.record(
      state.narrative,
      {
        id: decisionId,
        imperialPoints: points.imperial,
        insurgentPoints: points.insurgent,
        context,
        category,
        pressure,
      },
      listener,
    );
    this.standing.applyAlignment(state.standing, points.imperial, points.insurgent);
    if (approved && encounter.offersBribe) {
      this.standing.applyCorruption(state.standing, BRIBE_CORRUPTION);
    }

    if (encounter.isStoryShip && encounter.storyShipId) {
      this.standing.completeStoryBeat(state.standing, encounter.storyShipId);
      const story = this.content.getStoryShip(encounter.storyShipId);
      const tag = approved ? story?.approveUnlocksTag : story?.denyUnlocksTag;
      if (tag) this.narrative.unlockStoryTag(state.narrative, tag, listener);
    }

    const scheduled = this.content
      .getConsequences()
      .filter((def) => matchesTrigger(def, body.action, encounter))
      .map((def) =>
        this.ledger.addToken(state.ledger, record.id, session.day, def.delayDays, {
          consequenceId: def.consequenceId,
          scenarioToTrigger: def.scenarioToTrigger,
          newsHeadline: def.newsHeadline,
          loyaltyImpact: def.loyaltyImpact,
          suspicionIncrease: def.suspicionIncrease,
          affectsFamily: def.affectsFamily,
        }),
      );

    state.pendingEncounter = null;
    const saved = await this.sessions.commit(session, body.expectedVersion, [
      toAuditEntry(record, session.day),
    ]);

    return {
      ...toSessionView(saved),
      events,
      decisionId: record.id,
      correct: approved === encounter.shouldApprove,
      shouldApprove: encounter.shouldApprove,
      invalidReason: encounter.invalidReason,
      scheduledConsequences: scheduled.map((t) => t.payload.consequenceId),
    };
  }

  /**
   * Start the next day. Refused while an encounter is pending; once token
   * processing starts every due token is delivered.
   */
  async advanceDay(
    sessionId: string,
    userId: string,
    body: VersionedBody,
  ): Promise<DayAdvanceResponse> {
    const session = await this.sessions.loadForWrite(sessionId, userId, body.expectedVersion);
    const { state } = session;
    if (state.pendingEncounter) {
      throw new SessionConflictError(
        'ENCOUNTER_PENDING',
        'Decide the pending encounter before ending the day',
        { encounterId: state.pendingEncounter.encounterId },
      );
    }

    const day = session.day + 1;
    const events: NarrativeEvent[] = [];
    const news: NewsItem[] = [];

    const triggered = this.ledger.processDay(state.ledger, day, (token) => {
      this.standing.applyConsequence(state.standing, token.payload);
      const item = this.news.compose(token, day);
      news.push(item);
      events.push({
        kind: 'CONSEQUENCE_TRIGGERED',
        tokenId: token.tokenId,
        consequenceId: token.payload.consequenceId,
        headline: item.headline,
        content: item.content,
      });
    });
    if (triggered.length === 0) {
      this.standing.decaySuspicion(state.standing);
    }

    if (isPointOfNoReturnWindow(day) && state.standing.lockedEndingPath === null) {
      events.push({
        kind: 'PATH_SUGGESTED',
        path: this.endings.getSuggestedEndingPath(state.standing),
        day,
      });
    }

    session.day = day;
    state.encountersToday = 0;
    const saved = await this.sessions.commit(session, body.expectedVersion, []);
    this.logger.log(`Session ${saved.id} advanced to day ${day} (${triggered.length} consequences)`);

    return {
      ...toSessionView(saved),
      events,
      news,
      upcomingConsequences: this.ledger.getUpcomingTokenCount(saved.state.ledger, day, 3),
    };
  }
}
