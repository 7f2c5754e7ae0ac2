import { Injectable, Logger } from '@nestjs/common';
import type {
  ConsequenceLedger,
  ConsequencePayload,
  ConsequenceToken,
} from '../../db/types/index.js';
import {
  BadRequestError,
  ReentrantCallError,
} from '../../common/errors/game-errors.js';

export type TokenDelivery = (token: ConsequenceToken) => void;

export function createLedger(): ConsequenceLedger {
  return { tokens: [], nextSeq: 1 };
}

@Injectable()
export class ConsequenceLedgerService {
  private readonly logger = new Logger(ConsequenceLedgerService.name);
  private readonly inFlight = new WeakSet<ConsequenceLedger>();

  addToken(
    ledger: ConsequenceLedger,
    sourceDecisionId: string | null,
    currentDay: number,
    delayDays: number,
    payload: ConsequencePayload,
  ): ConsequenceToken {
    if (!Number.isInteger(delayDays) || delayDays < 0) {
      throw new BadRequestError(`delayDays must be a non-negative integer, got ${delayDays}`);
    }
    const token: ConsequenceToken = {
      tokenId: `tok_${ledger.nextSeq}`,
      sourceDecisionId,
      dayCreated: currentDay,
      triggerDay: currentDay + delayDays,
      hasTriggered: false,
      payload: { ...payload },
    };
    ledger.nextSeq += 1;
    ledger.tokens.push(token);
    this.logger.debug(
      `Token ${token.tokenId} (${payload.consequenceId}) scheduled for day ${token.triggerDay}`,
    );
    return token;
  }

  /**
   * Mark every due token triggered and hand it to `deliver` once, in
   * scheduling order. A token is marked before its delivery runs. Tokens
   * are kept after triggering. Not re-entrant per ledger.
   */
  processDay(
    ledger: ConsequenceLedger,
    currentDay: number,
    deliver: TokenDelivery = () => undefined,
  ): ConsequenceToken[] {
    if (this.inFlight.has(ledger)) {
      throw new ReentrantCallError('processDay');
    }
    this.inFlight.add(ledger);
    try {
      const due = ledger.tokens.filter(
        (t) => !t.hasTriggered && t.triggerDay <= currentDay,
      );
      for (const token of due) {
        token.hasTriggered = true;
        this.logger.log(`Delivering ${token.payload.consequenceId} (${token.tokenId}) on day ${currentDay}`);
        deliver(token);
      }
      return due;
    } finally {
      this.inFlight.delete(ledger);
    }
  }

  getActiveTokens(ledger: ConsequenceLedger): ConsequenceToken[] {
    return ledger.tokens.filter((t) => !t.hasTriggered);
  }

  hasActiveTokenOfType(ledger: ConsequenceLedger, consequenceId: string): boolean {
    return ledger.tokens.some(
      (t) => !t.hasTriggered && t.payload.consequenceId === consequenceId,
    );
  }

  /** Untriggered tokens due after today and within `days` */
  getUpcomingTokenCount(
    ledger: ConsequenceLedger,
    currentDay: number,
    days: number,
  ): number {
    return ledger.tokens.filter(
      (t) =>
        !t.hasTriggered &&
        t.triggerDay > currentDay &&
        t.triggerDay <= currentDay + days,
    ).length;
  }
}
