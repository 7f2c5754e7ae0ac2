import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { ManifestPolicyService } from './policy/manifest-policy.service.js';
import { DayRulesService } from './day/day-rules.service.js';
import { EncounterClassifierService } from './encounter/encounter-classifier.service.js';
import { NarrativeClassifierService } from './narrative/narrative-classifier.service.js';
import { DecisionRecorderService } from './narrative/decision-recorder.service.js';
import { ConsequenceLedgerService } from './narrative/consequence-ledger.service.js';
import { StandingService } from './narrative/standing.service.js';
import { EndingService } from './narrative/ending.service.js';
import { NewsFeedService } from './narrative/news-feed.service.js';

const providers = [
  // Layer 1: randomness
  RngService,
  // Layer 2: policy
  ManifestPolicyService,
  DayRulesService,
  // Layer 3: generation
  EncounterClassifierService,
  // Layer 4: narrative
  NarrativeClassifierService,
  DecisionRecorderService,
  ConsequenceLedgerService,
  StandingService,
  EndingService,
  NewsFeedService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
