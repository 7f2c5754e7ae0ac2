import { Injectable } from '@nestjs/common';
import type {
  DecisionCategory,
  DecisionRecord,
  NarrativeEvent,
  NarrativeListener,
  NarrativeState,
  PressureLevel,
} from '../../db/types/index.js';
import { PRESSURE_LEVEL } from '../../db/types/index.js';
import {
  BadRequestError,
  ReentrantCallError,
} from '../../common/errors/game-errors.js';
import { NarrativeClassifierService } from './narrative-classifier.service.js';
import { noopListener } from './narrative-state.js';

export const MAX_CHAIN_LENGTH = 5;

export interface DecisionInput {
  id: string;
  imperialPoints: number;
  insurgentPoints: number;
  context: string;
  category: DecisionCategory;
  pressure: PressureLevel;
  timestamp?: string;
}

export interface RecordResult {
  record: DecisionRecord;
  events: NarrativeEvent[];
}

function pressureRank(p: PressureLevel): number {
  return PRESSURE_LEVEL.indexOf(p);
}

/** Category guess for decisions recorded without one */
export function inferCategory(id: string, context: string): DecisionCategory {
  const lowerId = id.toLowerCase();
  const lowerContext = context.toLowerCase();
  if (lowerId.includes('bribe') || lowerContext.includes('credits')) return 'FINANCIAL';
  if (lowerId.includes('moral') || lowerContext.includes('family')) return 'MORAL';
  if (['imperium', 'insurgent', 'rebel'].some((k) => lowerId.includes(k))) {
    return 'POLITICAL';
  }
  return 'TACTICAL';
}

/** Pressure from total point magnitude */
export function inferPressure(
  imperialPoints: number,
  insurgentPoints: number,
): PressureLevel {
  const magnitude = Math.abs(imperialPoints) + Math.abs(insurgentPoints);
  if (magnitude >= 20) return 'CRITICAL';
  if (magnitude >= 10) return 'HIGH';
  if (magnitude >= 5) return 'MEDIUM';
  return 'LOW';
}

@Injectable()
export class DecisionRecorderService {
  private readonly inFlight = new WeakSet<NarrativeState>();

  constructor(private readonly classifier: NarrativeClassifierService) {}

  /**
   * Append an immutable record, update totals and chains, then re-classify.
   * State is fully consistent when this returns. Listeners run inside the
   * call and must not record into the same state.
   */
  record(
    state: NarrativeState,
    input: DecisionInput,
    listener: NarrativeListener = noopListener,
  ): RecordResult {
    if (this.inFlight.has(state)) {
      throw new ReentrantCallError('record');
    }
    if (state.history.some((d) => d.id === input.id)) {
      throw new BadRequestError(`Decision already recorded: ${input.id}`);
    }

    this.inFlight.add(state);
    try {
      const record: DecisionRecord = Object.freeze({
        id: input.id,
        timestamp: input.timestamp ?? new Date().toISOString(),
        imperialPoints: input.imperialPoints,
        insurgentPoints: input.insurgentPoints,
        category: input.category,
        pressure: input.pressure,
        context: input.context,
        chainParentId: state.openChainId,
      });
      state.history.push(record);
      state.imperialLoyalty += input.imperialPoints;
      state.insurgentSympathy += input.insurgentPoints;
      this.trackChain(state, record);

      const events: NarrativeEvent[] = [];
      const changed = this.classifier.updateBranch(state, listener);
      if (changed) events.push(changed);
      return { record, events };
    } finally {
      this.inFlight.delete(state);
    }
  }

  /** Record with category and pressure inferred from id, context and points */
  recordInferred(
    state: NarrativeState,
    id: string,
    imperialPoints: number,
    insurgentPoints: number,
    context: string,
    listener: NarrativeListener = noopListener,
  ): RecordResult {
    return this.record(
      state,
      {
        id,
        imperialPoints,
        insurgentPoints,
        context,
        category: inferCategory(id, context),
        pressure: inferPressure(imperialPoints, insurgentPoints),
      },
      listener,
    );
  }

  private trackChain(state: NarrativeState, record: DecisionRecord): void {
    const open = state.chains.find((c) => c.chainId === state.openChainId && !c.closed);

    if (pressureRank(record.pressure) >= pressureRank('HIGH')) {
      if (open) open.closed = true;
      state.chains.push({ chainId: record.id, length: 1, closed: false });
      state.openChainId = record.id;
      return;
    }

    if (!open) return;
    open.length += 1;
    if (open.length >= MAX_CHAIN_LENGTH) {
      open.closed = true;
      state.openChainId = null;
    }
  }
}
