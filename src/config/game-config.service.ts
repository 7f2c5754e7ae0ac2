// Game tuning: .env defaults + runtime patch

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

export type GameConfig = {
  imperialLoyaltyThreshold: number;
  insurgentSympathyThreshold: number;
  complexResistanceThreshold: number;
  validShipChance: number;
  storyShipChance: number;
  encountersPerDay: number;
};

/** PATCH /v1/settings/narrative body */
export const GameConfigPatchSchema = z
  .object({
    imperialLoyaltyThreshold: z.number().int(),
    insurgentSympathyThreshold: z.number().int(),
    complexResistanceThreshold: z.number().int().min(0),
    validShipChance: z.number().min(0).max(1),
    storyShipChance: z.number().min(0).max(1),
    encountersPerDay: z.number().int().min(1).max(100),
  })
  .partial()
  .strict();

export type GameConfigPatch = z.infer<typeof GameConfigPatchSchema>;

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

@Injectable()
export class GameConfigService {
  private readonly logger = new Logger(GameConfigService.name);
  private config: GameConfig;

  constructor() {
    this.config = {
      imperialLoyaltyThreshold: envNumber('NARRATIVE_IMPERIAL_THRESHOLD', 50),
      insurgentSympathyThreshold: envNumber('NARRATIVE_INSURGENT_THRESHOLD', -50),
      complexResistanceThreshold: envNumber('NARRATIVE_COMPLEX_THRESHOLD', 25),
      validShipChance: envNumber('VALID_SHIP_CHANCE', 0.7),
      storyShipChance: envNumber('STORY_SHIP_CHANCE', 0.2),
      encountersPerDay: envNumber('ENCOUNTERS_PER_DAY', 8),
    };
  }

  get(): GameConfig {
    return this.config;
  }

  /** Overlapping bands are accepted as-is; evaluation order decides */
  update(patch: GameConfigPatch): GameConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Game config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
