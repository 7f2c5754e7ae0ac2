import type {
  AccessCodeDefinition,
  CargoManifestDefinition,
} from '../../content/content.types.js';
import type { InvalidReason } from './enums.js';

export type EncounterCaptain = {
  name: string;
  rank: string;
  faction: string;
};

export type Encounter = {
  encounterId: string;
  day: number;
  shipTypeId: string;
  shipName: string;
  categoryId: string;
  faction: string;
  captain: EncounterCaptain;
  accessCode: string;
  resolvedAccessCode: AccessCodeDefinition | null;
  manifest: CargoManifestDefinition | null;
  isStoryShip: boolean;
  storyShipId: string | null;
  storyTag: string | null;
  offersBribe: boolean;
  // ground truth
  shouldApprove: boolean;
  invalidReason: InvalidReason | null;
  // default category/captain pairing was used
  degradedMatch: boolean;
};
