import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  AccessCodeDefinition,
  CaptainTypeDefinition,
  CargoManifestDefinition,
  DayRuleDefinition,
  ShipCategoryDefinition,
  StoryShipDefinition,
} from '../../content/content.types.js';
import type { Encounter, EncounterCaptain } from '../../db/types/index.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { InternalError } from '../../common/errors/game-errors.js';
import { FactionPolicy } from '../policy/faction-policy.js';
import {
  ManifestPolicyService,
  type ManifestSubject,
} from '../policy/manifest-policy.service.js';
import {
  DayRulesService,
  isAccessCodeValidOnDay,
  isAuthorizedFor,
} from '../day/day-rules.service.js';
import type { Rng } from '../rng/rng.service.js';

// keep at least this many ship types in play when filtering recent ones
const MIN_SHIP_TYPE_OPTIONS = 3;
export const RECENT_SHIP_TYPE_WINDOW = 5;

export interface GenerationHistory {
  recentShipTypes: readonly string[];
  completedStoryShips: readonly string[];
}

const EMPTY_HISTORY: GenerationHistory = {
  recentShipTypes: [],
  completedStoryShips: [],
};

type CaptainMatch = { captainType: CaptainTypeDefinition; faction: string };

type Flaw = 'ACCESS_CODE' | 'MANIFEST' | null;

@Injectable()
export class EncounterClassifierService {
  private readonly logger = new Logger(EncounterClassifierService.name);

  constructor(
    private readonly content: ContentLoaderService,
    private readonly config: GameConfigService,
    private readonly manifestPolicy: ManifestPolicyService,
    private readonly dayRules: DayRulesService,
  ) {}

  /**
   * Compose one encounter and compute its ground-truth verdict.
   * Every random draw comes from `rng`, so the same seed, cursor and
   * arguments reproduce the same encounter.
   */
  generate(
    rng: Rng,
    day: number,
    imperialLoyalty: number,
    rebellionSympathy: number,
    history: GenerationHistory = EMPTY_HISTORY,
  ): Encounter {
    const { validShipChance, storyShipChance } = this.config.get();
    const activeRules = this.dayRules.getActiveRules(day);
    const looksValid = rng.roll(validShipChance);

    if (rng.roll(storyShipChance)) {
      const story = this.pickStoryShip(rng, day, imperialLoyalty, rebellionSympathy, history);
      if (story) return this.buildStoryEncounter(rng, story, day, activeRules);
    }

    const flaw: Flaw = looksValid ? null : rng.roll(0.5) ? 'ACCESS_CODE' : 'MANIFEST';

    const shipTypes = this.content.getAllShipTypes();
    const fresh = shipTypes.filter((s) => !history.recentShipTypes.includes(s.shipTypeId));
    let shipType = rng.pick(fresh.length > MIN_SHIP_TYPE_OPTIONS ? fresh : shipTypes);
    let category = this.requireCategory(shipType.categoryId);
    let policy = new FactionPolicy(category);

    let captain: EncounterCaptain;
    let offersBribe = false;
    let degradedMatch = false;
    const match = this.findCaptain(policy);
    if (match) {
      captain = {
        name: rng.pick(match.captainType.names),
        rank: match.captainType.rank,
        faction: match.faction,
      };
      offersBribe = rng.roll(match.captainType.bribeChance);
    } else {
      const defaults = this.content.getDefaults();
      this.logger.warn(
        `No compatible captain for category ${category.categoryId}; using default pairing ${defaults.categoryId}`,
      );
      const fallbackType = this.content.getShipType(defaults.shipTypeId);
      if (!fallbackType) {
        throw new InternalError(`Default ship type missing: ${defaults.shipTypeId}`);
      }
      shipType = fallbackType;
      category = this.requireCategory(defaults.categoryId);
      policy = new FactionPolicy(category);
      captain = {
        name: defaults.captainName,
        rank: defaults.captainRank,
        faction: defaults.captainFaction,
      };
      degradedMatch = true;
    }

    const faction = policy.getPrimaryFaction();
    const access = this.pickAccessCode(rng, policy, faction, day, flaw !== 'ACCESS_CODE');
    const subject: ManifestSubject = { faction, resolvedAccessCode: access.resolved };
    const manifest = this.pickManifest(
      rng, category.categoryId, subject, day, activeRules, flaw !== 'MANIFEST',
    );

    return {
      encounterId: `enc_${day}_${rng.token()}`,
      day,
      shipTypeId: shipType.shipTypeId,
      shipName: shipType.name,
      categoryId: category.categoryId,
      faction,
      captain,
      accessCode: access.code,
      resolvedAccessCode: access.resolved,
      manifest,
      isStoryShip: false,
      storyShipId: null,
      storyTag: null,
      offersBribe,
      degradedMatch,
      ...this.classify(policy, manifest, subject, access.code, day, activeRules),
    };
  }

  /**
   * First captain type, in declaration order, with a faction the category
   * accepts. Each captain's factions are tried in their own order.
   */
  findCaptain(policy: FactionPolicy): CaptainMatch | null {
    for (const captainType of this.content.getCaptainTypes()) {
      const faction = captainType.factions.find((f) => policy.isCaptainCompatible(f));
      if (faction !== undefined) return { captainType, faction };
    }
    return null;
  }

  /** shouldApprove = manifest validates AND the code carries a valid prefix */
  classify(
    policy: FactionPolicy,
    manifest: CargoManifestDefinition | null,
    subject: ManifestSubject,
    accessCode: string,
    day: number,
    activeRules: readonly DayRuleDefinition[],
  ): Pick<Encounter, 'shouldApprove' | 'invalidReason'> {
    const manifestFailure = this.manifestPolicy.firstFailure(manifest, subject, day, activeRules);
    const codeAccepted = policy.isAccessCodeValid(accessCode);
    return {
      shouldApprove: manifestFailure === null && codeAccepted,
      invalidReason: manifestFailure ?? (codeAccepted ? null : 'ACCESS_CODE'),
    };
  }

  private pickStoryShip(
    rng: Rng,
    day: number,
    imperialLoyalty: number,
    rebellionSympathy: number,
    history: GenerationHistory,
  ): StoryShipDefinition | null {
    const eligible = this.content.getAllStoryShips().filter(
      (s) =>
        s.firstDay <= day &&
        !history.completedStoryShips.includes(s.storyShipId) &&
        (s.minImperialLoyalty === undefined || imperialLoyalty >= s.minImperialLoyalty) &&
        (s.minRebellionSympathy === undefined || rebellionSympathy >= s.minRebellionSympathy),
    );
    return eligible.length > 0 ? rng.pick(eligible) : null;
  }

  private buildStoryEncounter(
    rng: Rng,
    story: StoryShipDefinition,
    day: number,
    activeRules: readonly DayRuleDefinition[],
  ): Encounter {
    const category = this.requireCategory(story.categoryId);
    const policy = new FactionPolicy(category);
    const faction = policy.getPrimaryFaction();
    const resolved = this.resolveAccessCode(story.accessCode, day);
    const manifest =
      story.manifestId === null ? null : (this.content.getManifest(story.manifestId) ?? null);
    const subject: ManifestSubject = { faction, resolvedAccessCode: resolved };

    return {
      encounterId: `enc_${day}_${rng.token()}`,
      day,
      shipTypeId: story.storyShipId,
      shipName: story.shipName,
      categoryId: category.categoryId,
      faction,
      captain: {
        name: story.captainName,
        rank: story.captainRank,
        faction: story.captainFaction,
      },
      accessCode: story.accessCode,
      resolvedAccessCode: resolved,
      manifest,
      isStoryShip: true,
      storyShipId: story.storyShipId,
      storyTag: story.storyTag,
      offersBribe: false,
      degradedMatch: false,
      ...this.classify(policy, manifest, subject, story.accessCode, day, activeRules),
    };
  }

  private pickAccessCode(
    rng: Rng,
    policy: FactionPolicy,
    faction: string,
    day: number,
    wantValid: boolean,
  ): { code: string; resolved: AccessCodeDefinition | null } {
    const codes = this.content.getAccessCodes();
    const checksOut = (c: AccessCodeDefinition) =>
      isAccessCodeValidOnDay(c, day) && policy.isAccessCodeValid(c.code);

    const pool = wantValid
      ? codes.filter((c) => checksOut(c) && isAuthorizedFor(c, faction))
      : codes.filter((c) => !checksOut(c));
    if (pool.length === 0) {
      return { code: '', resolved: null };
    }
    const chosen = rng.pick(pool);
    return {
      code: chosen.code,
      resolved: isAccessCodeValidOnDay(chosen, day) ? chosen : null,
    };
  }

  /** Credential lookup; expired, revoked or unknown codes resolve to null */
  resolveAccessCode(code: string, day: number): AccessCodeDefinition | null {
    if (!code) return null;
    const found = this.content.findAccessCode(code);
    return found && isAccessCodeValidOnDay(found, day) ? found : null;
  }

  private pickManifest(
    rng: Rng,
    categoryId: string,
    subject: ManifestSubject,
    day: number,
    activeRules: readonly DayRuleDefinition[],
    wantValid: boolean,
  ): CargoManifestDefinition | null {
    const target = categoryId.toLowerCase();
    const eligible = this.content
      .getAllManifests()
      .filter(
        (m) =>
          m.requiredShipCategories.length === 0 ||
          m.requiredShipCategories.some((c) => c.toLowerCase() === target),
      );

    const pool = eligible.filter(
      (m) => this.manifestPolicy.validate(m, subject, day, activeRules) === wantValid,
    );
    if (pool.length > 0) return rng.pick(pool);
    // nothing fits the intent: a valid ship still gets cargo, a flawed one gets none
    if (wantValid && eligible.length > 0) return rng.pick(eligible);
    return null;
  }

  private requireCategory(categoryId: string): ShipCategoryDefinition {
    const category = this.content.getCategory(categoryId);
    if (!category) {
      throw new InternalError(`Unknown ship category: ${categoryId}`);
    }
    return category;
  }
}
