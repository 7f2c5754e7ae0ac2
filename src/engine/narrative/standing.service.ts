import { Injectable } from '@nestjs/common';
import type { ConsequencePayload, Standing } from '../../db/types/index.js';

const ALIGNMENT_MIN = -100;
const ALIGNMENT_MAX = 100;
const LEVEL_MIN = 0;
const LEVEL_MAX = 100;
const HIGH_CORRUPTION = 50;
const SUSPICION_DECAY = 1;
const FAMILY_STATUS_START = 50;
const FAMILY_PRESSURE_STEP = 10;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function createStanding(): Standing {
  return {
    imperialLoyalty: 0,
    rebellionSympathy: 0,
    corruption: 0,
    suspicion: 0,
    familyStatus: FAMILY_STATUS_START,
    completedStoryBeats: [],
    lockedEndingPath: null,
    pathLockedOnDay: null,
  };
}

/** Clamped meters that feed the ending; mutated in place like NarrativeState */
@Injectable()
export class StandingService {
  applyAlignment(s: Standing, imperialChange: number, rebellionChange: number): void {
    s.imperialLoyalty = clamp(s.imperialLoyalty + imperialChange, ALIGNMENT_MIN, ALIGNMENT_MAX);
    s.rebellionSympathy = clamp(s.rebellionSympathy + rebellionChange, ALIGNMENT_MIN, ALIGNMENT_MAX);
  }

  applySuspicion(s: Standing, change: number): void {
    s.suspicion = clamp(s.suspicion + change, LEVEL_MIN, LEVEL_MAX);
  }

  /** Corruption past the threshold draws one point of suspicion per change */
  applyCorruption(s: Standing, change: number): void {
    s.corruption = clamp(s.corruption + change, LEVEL_MIN, LEVEL_MAX);
    if (s.corruption > HIGH_CORRUPTION) this.applySuspicion(s, 1);
  }

  applyFamilyPressure(s: Standing): void {
    s.familyStatus = clamp(s.familyStatus - FAMILY_PRESSURE_STEP, LEVEL_MIN, LEVEL_MAX);
  }

  /** Token effects; loyalty impact moves imperial loyalty only */
  applyConsequence(s: Standing, payload: ConsequencePayload): void {
    if (payload.loyaltyImpact !== 0) this.applyAlignment(s, payload.loyaltyImpact, 0);
    if (payload.suspicionIncrease !== 0) this.applySuspicion(s, payload.suspicionIncrease);
    if (payload.affectsFamily) this.applyFamilyPressure(s);
  }

  /** Called on day-advance when nothing triggered */
  decaySuspicion(s: Standing): void {
    this.applySuspicion(s, -SUSPICION_DECAY);
  }

  completeStoryBeat(s: Standing, beatId: string): boolean {
    if (s.completedStoryBeats.includes(beatId)) return false;
    s.completedStoryBeats.push(beatId);
    return true;
  }

  /** -1 (rebel) .. 1 (imperial) */
  alignmentScore(s: Standing): number {
    return (s.imperialLoyalty - s.rebellionSympathy) / 200;
  }

  familyScore(s: Standing): number {
    return s.familyStatus / 100;
  }
}
