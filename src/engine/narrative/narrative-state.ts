import type { NarrativeListener, NarrativeState } from '../../db/types/index.js';

export function createNarrativeState(): NarrativeState {
  return {
    imperialLoyalty: 0,
    insurgentSympathy: 0,
    currentBranch: null,
    progressionLevel: 0,
    unlockedTags: [],
    history: [],
    chains: [],
    openChainId: null,
  };
}

export const noopListener: NarrativeListener = () => undefined;
