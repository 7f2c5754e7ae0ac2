import { Injectable, Logger } from '@nestjs/common';
import type {
  NarrativeBranch,
  NarrativeEvent,
  NarrativeListener,
  NarrativeState,
} from '../../db/types/index.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { containsAnyKeyword } from '../../common/text-utils.js';
import { noopListener } from './narrative-state.js';

const NEUTRAL_BAND = 10;
const RECENT_DECISION_WINDOW = 5;
const REPORT_RECENT_WINDOW = 3;
const DOUBLE_CROSS_KEYWORDS = ['betrayal', 'manipulation'] as const;

@Injectable()
export class NarrativeClassifierService {
  private readonly logger = new Logger(NarrativeClassifierService.name);

  constructor(private readonly config: GameConfigService) {}

  /**
   * Pure: totals plus the last few decision contexts. Bands are checked in
   * a fixed order; when thresholds overlap the earlier band wins.
   */
  determineBranch(state: NarrativeState): NarrativeBranch {
    const {
      imperialLoyaltyThreshold,
      insurgentSympathyThreshold,
      complexResistanceThreshold,
    } = this.config.get();
    const diff = state.imperialLoyalty - state.insurgentSympathy;

    if (Math.abs(diff) < NEUTRAL_BAND) return 'NEUTRAL';
    if (diff > imperialLoyaltyThreshold) return 'IMPERIUM_PATH';
    if (diff < insurgentSympathyThreshold) return 'INSURGENT_PATH';
    if (Math.abs(diff) < complexResistanceThreshold) {
      const recent = state.history.slice(-RECENT_DECISION_WINDOW);
      const doubleCross = recent.some((d) =>
        containsAnyKeyword(d.context, DOUBLE_CROSS_KEYWORDS),
      );
      return doubleCross ? 'DOUBLE_CROSS' : 'COMPLEX_RESISTANCE';
    }
    return 'SILENT_DEFIANCE';
  }

  /** Re-evaluate and apply; notifies only on an actual change */
  updateBranch(
    state: NarrativeState,
    listener: NarrativeListener = noopListener,
  ): NarrativeEvent | null {
    const next = this.determineBranch(state);
    if (next === state.currentBranch) return null;

    const from = state.currentBranch;
    state.currentBranch = next;
    state.progressionLevel += 1;
    this.logger.log(`Branch ${from ?? 'UNSET'} → ${next} (level ${state.progressionLevel})`);

    const event: NarrativeEvent = {
      kind: 'BRANCH_CHANGED',
      from,
      to: next,
      progressionLevel: state.progressionLevel,
    };
    listener(event);
    return event;
  }

  unlockStoryTag(
    state: NarrativeState,
    tag: string,
    listener: NarrativeListener = noopListener,
  ): NarrativeEvent | null {
    if (state.unlockedTags.includes(tag)) return null;
    state.unlockedTags.push(tag);
    const event: NarrativeEvent = { kind: 'TAG_UNLOCKED', tag };
    listener(event);
    return event;
  }

  isStoryTagUnlocked(state: NarrativeState, tag: string): boolean {
    return state.unlockedTags.includes(tag);
  }

  /** Debug text; layout is not a stable contract */
  generateReport(state: NarrativeState): string {
    const recent = state.history.slice(-REPORT_RECENT_WINDOW);
    return [
      'Narrative Report:',
      `Branch: ${state.currentBranch ?? 'UNSET'}`,
      `Progression Level: ${state.progressionLevel}`,
      `Imperial Loyalty: ${state.imperialLoyalty}`,
      `Insurgent Sympathy: ${state.insurgentSympathy}`,
      `Unlocked Story Tags: ${state.unlockedTags.join(', ')}`,
      `Recent Decisions: ${recent.length}`,
      ...recent.map((d) => `  - ${d.id} (${d.category}/${d.pressure}): ${d.context}`),
    ].join('\n');
  }
}
