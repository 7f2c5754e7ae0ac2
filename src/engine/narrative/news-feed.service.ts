import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { ConsequenceToken } from '../../db/types/index.js';

export type NewsItem = {
  tokenId: string;
  day: number;
  headline: string;
  content: string;
  requiresAction: boolean;
};

const SEVERE_LOYALTY_IMPACT = -2;
const SEVERE_SUSPICION = 3;
const ACTION_SUSPICION = 5;

@Injectable()
export class NewsFeedService {
  constructor(private readonly content: ContentLoaderService) {}

  compose(token: ConsequenceToken, day: number): NewsItem {
    const { payload } = token;
    const defaults = this.content.getDefaults();
    const definition = this.content
      .getConsequences()
      .find((c) => c.consequenceId === payload.consequenceId);

    let body =
      definition?.newsContent ||
      defaults.fallbackNewsContent.replace('{day}', String(token.dayCreated));
    if (
      payload.loyaltyImpact < SEVERE_LOYALTY_IMPACT ||
      payload.suspicionIncrease > SEVERE_SUSPICION
    ) {
      body += `\n\n${defaults.severeNewsSuffix}`;
    }

    return {
      tokenId: token.tokenId,
      day,
      headline: payload.newsHeadline,
      content: body,
      requiresAction: payload.suspicionIncrease > ACTION_SUSPICION,
    };
  }
}
