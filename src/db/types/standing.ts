import type { EndingPath } from './enums.js';

export type Standing = {
  // [-100, 100]
  imperialLoyalty: number;
  rebellionSympathy: number;
  // [0, 100]
  corruption: number;
  suspicion: number;
  familyStatus: number;
  completedStoryBeats: string[];
  lockedEndingPath: EndingPath | null;
  pathLockedOnDay: number | null;
};
