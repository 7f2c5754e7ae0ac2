import { NewsFeedService } from './news-feed.service.js';
import { makeContent } from '../../content/testing/make-content.js';
import type { ConsequencePayload, ConsequenceToken } from '../../db/types/index.js';

function makeToken(payload: Partial<ConsequencePayload> = {}): ConsequenceToken {
  return {
    tokenId: 'tok_1',
    sourceDecisionId: 'd1',
    dayCreated: 3,
    triggerDay: 5,
    hasTriggered: true,
    payload: {
      consequenceId: 'INSURGENT_HELPED',
      scenarioToTrigger: 'REBEL_CONTACT',
      newsHeadline: 'Insurgent Activity Increases',
      loyaltyImpact: -1,
      suspicionIncrease: 2,
      affectsFamily: false,
      ...payload,
    },
  };
}

describe('NewsFeedService', () => {
  const service = new NewsFeedService(makeContent());

  it('uses the consequence news text', () => {
    expect(service.compose(makeToken(), 5)).toEqual({
      tokenId: 'tok_1',
      day: 5,
      headline: 'Insurgent Activity Increases',
      content: 'Supplies reached insurgent cells.',
      requiresAction: false,
    });
  });

  it('falls back to the default text with the day filled in', () => {
    const item = service.compose(makeToken({ consequenceId: 'PROTOCOL_BREACH' }), 5);
    expect(item.content).toBe('Command reviews the checkpoint. Days since incident: 3');
  });

  it('marks severe consequences', () => {
    const item = service.compose(makeToken({ loyaltyImpact: -3 }), 5);
    expect(item.content).toBe('Supplies reached insurgent cells.\n\nStay vigilant.');
  });

  it('flags heavy suspicion as needing action', () => {
    const item = service.compose(makeToken({ consequenceId: 'ENDING_PATH_CORRUPT', suspicionIncrease: 15 }), 5);
    expect(item.requiresAction).toBe(true);
    expect(item.content).toBe(
      'Command reviews the checkpoint. Days since incident: 3\n\nStay vigilant.',
    );
  });
});
