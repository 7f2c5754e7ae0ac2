import { Injectable, Logger } from '@nestjs/common';
import type {
  ConsequenceLedger,
  ConsequencePayload,
  ConsequenceToken,
  EndingPath,
  EndingType,
  Standing,
} from '../../db/types/index.js';
import { ConsequenceLedgerService } from './consequence-ledger.service.js';
import { StandingService } from './standing.service.js';

export const POINT_OF_NO_RETURN_START = 23;
export const POINT_OF_NO_RETURN_END = 27;
const PATH_CONSEQUENCE_DELAY = 2;

const PATH_CONSEQUENCES: Record<EndingPath, Omit<ConsequencePayload, 'consequenceId'>> = {
  REBEL: {
    scenarioToTrigger: null,
    newsHeadline: 'Security Alert: Increased Rebel Activity Detected',
    loyaltyImpact: -3,
    suspicionIncrease: 10,
    affectsFamily: true,
  },
  IMPERIAL: {
    scenarioToTrigger: null,
    newsHeadline: 'Command Commends Loyalty: Exemplary Service Recognized',
    loyaltyImpact: 3,
    suspicionIncrease: 0,
    affectsFamily: false,
  },
  NEUTRAL: {
    scenarioToTrigger: null,
    newsHeadline: 'Personnel Review: Standard Performance Evaluation',
    loyaltyImpact: 0,
    suspicionIncrease: 2,
    affectsFamily: false,
  },
  CORRUPT: {
    scenarioToTrigger: null,
    newsHeadline: 'Internal Affairs: Random Audit Procedures Implemented',
    loyaltyImpact: -1,
    suspicionIncrease: 15,
    affectsFamily: true,
  },
};

export function isPointOfNoReturnWindow(day: number): boolean {
  return day >= POINT_OF_NO_RETURN_START && day <= POINT_OF_NO_RETURN_END;
}

@Injectable()
export class EndingService {
  private readonly logger = new Logger(EndingService.name);

  constructor(
    private readonly standing: StandingService,
    private readonly ledger: ConsequenceLedgerService,
  ) {}

  getSuggestedEndingPath(s: Standing): EndingPath {
    if (s.corruption > 60) return 'CORRUPT';
    const alignment = this.standing.alignmentScore(s);
    if (alignment < -0.5) return 'REBEL';
    if (alignment > 0.5) return 'IMPERIAL';
    return 'NEUTRAL';
  }

  /**
   * Commit to an ending path. Only the first lock takes effect; it schedules
   * the path's consequence token. Returns null when a path is already locked.
   */
  lockEndingPath(
    s: Standing,
    ledger: ConsequenceLedger,
    path: EndingPath,
    day: number,
  ): ConsequenceToken | null {
    if (s.lockedEndingPath !== null) return null;
    s.lockedEndingPath = path;
    s.pathLockedOnDay = day;
    this.logger.log(`Ending path locked: ${path} on day ${day}`);

    const consequenceId = `ENDING_PATH_${path}`;
    return this.ledger.addToken(ledger, null, day, PATH_CONSEQUENCE_DELAY, {
      consequenceId,
      ...PATH_CONSEQUENCES[path],
    });
  }

  determineEnding(s: Standing): EndingType {
    if (s.lockedEndingPath !== null) {
      return this.endingFromLockedPath(s, s.lockedEndingPath);
    }
    return this.endingFromScores(
      this.standing.alignmentScore(s),
      s.corruption / 100,
      this.standing.familyScore(s),
      s.suspicion,
    );
  }

  private endingFromLockedPath(s: Standing, path: EndingPath): EndingType {
    switch (path) {
      case 'REBEL':
        return this.standing.familyScore(s) > 0.7 ? 'FREEDOM_FIGHTER' : 'MARTYR';
      case 'IMPERIAL':
        return s.corruption < 30 ? 'IMPERIAL_HERO' : 'BRIDGE_COMMANDER';
      case 'NEUTRAL':
        return s.suspicion < 50 ? 'GRAY_MAN' : 'COMPROMISED';
      case 'CORRUPT':
        return 'COMPROMISED';
    }
  }

  private endingFromScores(
    alignment: number,
    corruption: number,
    family: number,
    suspicion: number,
  ): EndingType {
    if (corruption > 0.7) return 'COMPROMISED';

    if (alignment < -0.6) {
      if (family > 0.8) return 'FREEDOM_FIGHTER';
      if (family > 0.4) return 'UNDERGROUND';
      return 'REFUGEE';
    }
    if (alignment > 0.6) {
      if (corruption < 0.2 && family > 0.6) return 'GOOD_SOLDIER';
      if (corruption < 0.3) return 'TRUE_BELIEVER';
      return 'BRIDGE_COMMANDER';
    }
    if (alignment < -0.2) return family > 0.5 ? 'REFUGEE' : 'UNDERGROUND';
    if (alignment > 0.2) return family > 0.5 ? 'GOOD_SOLDIER' : 'TRUE_BELIEVER';

    return suspicion > 50 ? 'COMPROMISED' : 'GRAY_MAN';
  }
}
