import type {
  DecisionCategory,
  EndingPath,
  NarrativeBranch,
  PressureLevel,
} from './enums.js';

// Immutable once appended to history
export type DecisionRecord = {
  readonly id: string;
  readonly timestamp: string;
  readonly imperialPoints: number;
  readonly insurgentPoints: number;
  readonly category: DecisionCategory;
  readonly pressure: PressureLevel;
  readonly context: string;
  readonly chainParentId: string | null;
};

export type DecisionChain = {
  chainId: string;
  length: number;
  closed: boolean;
};

export type NarrativeState = {
  imperialLoyalty: number;
  insurgentSympathy: number;
  // null until the first decision is classified
  currentBranch: NarrativeBranch | null;
  progressionLevel: number;
  unlockedTags: string[];
  history: DecisionRecord[];
  chains: DecisionChain[];
  openChainId: string | null;
};

export type NarrativeEvent =
  | { kind: 'BRANCH_CHANGED'; from: NarrativeBranch | null; to: NarrativeBranch; progressionLevel: number }
  | { kind: 'TAG_UNLOCKED'; tag: string }
  | { kind: 'CONSEQUENCE_TRIGGERED'; tokenId: string; consequenceId: string; headline: string; content: string }
  | { kind: 'PATH_SUGGESTED'; path: EndingPath; day: number }
  | { kind: 'ENDING_PATH_LOCKED'; path: EndingPath; day: number };

export type NarrativeListener = (event: NarrativeEvent) => void;

