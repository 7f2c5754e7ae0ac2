// checkpoint_v1 JSON load + in-memory index

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import {
  AccessCodeSchema,
  CaptainTypeSchema,
  CargoManifestSchema,
  ConsequenceSchema,
  ContentDefaultsSchema,
  DayRuleSchema,
  ShipCategorySchema,
  ShipTypeSchema,
  StoryShipSchema,
} from './content.schemas.js';
import type {
  AccessCodeDefinition,
  CaptainTypeDefinition,
  CargoManifestDefinition,
  ConsequenceDefinition,
  ContentDefaults,
  DayRuleDefinition,
  ShipCategoryDefinition,
  ShipTypeDefinition,
  StoryShipDefinition,
} from './content.types.js';

export type ContentBundle = {
  categories: ShipCategoryDefinition[];
  shipTypes: ShipTypeDefinition[];
  captainTypes: CaptainTypeDefinition[];
  accessCodes: AccessCodeDefinition[];
  manifests: CargoManifestDefinition[];
  dayRules: DayRuleDefinition[];
  storyShips: StoryShipDefinition[];
  consequences: ConsequenceDefinition[];
  defaults: ContentDefaults;
};

export function defaultContentDir(): string {
  return process.env.CONTENT_DIR ?? join(process.cwd(), 'content', 'checkpoint_v1');
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);

  private categories = new Map<string, ShipCategoryDefinition>();
  private shipTypes = new Map<string, ShipTypeDefinition>();
  private manifests = new Map<string, CargoManifestDefinition>();
  private storyShips = new Map<string, StoryShipDefinition>();
  // declaration order matters for captain selection
  private captainTypes: CaptainTypeDefinition[] = [];
  private accessCodes: AccessCodeDefinition[] = [];
  private dayRules: DayRuleDefinition[] = [];
  private consequences: ConsequenceDefinition[] = [];
  private defaults: ContentDefaults | null = null;

  async onModuleInit() {
    const bundle = await this.readBundle(defaultContentDir());
    this.load(bundle);
  }

  async readBundle(dir: string): Promise<ContentBundle> {
    const read = async <T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) => {
      const raw: unknown = JSON.parse(await readFile(join(dir, file), 'utf-8'));
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ');
        throw new Error(`Invalid content file ${file}: ${issues}`);
      }
      return parsed.data;
    };

    const [
      categories, shipTypes, captainTypes, accessCodes, manifests,
      dayRules, storyShips, consequences, defaults,
    ] = await Promise.all([
      read('ship_categories.json', z.array(ShipCategorySchema)),
      read('ship_types.json', z.array(ShipTypeSchema)),
      read('captain_types.json', z.array(CaptainTypeSchema)),
      read('access_codes.json', z.array(AccessCodeSchema)),
      read('manifests.json', z.array(CargoManifestSchema)),
      read('day_rules.json', z.array(DayRuleSchema)),
      read('story_ships.json', z.array(StoryShipSchema)),
      read('consequences.json', z.array(ConsequenceSchema)),
      read('defaults.json', ContentDefaultsSchema),
    ]);

    return {
      categories, shipTypes, captainTypes, accessCodes, manifests,
      dayRules, storyShips, consequences, defaults,
    };
  }

  /** Index a bundle; throws on dangling references */
  load(bundle: ContentBundle): void {
    const categories = new Map(bundle.categories.map((c) => [c.categoryId, c]));
    const shipTypes = new Map(bundle.shipTypes.map((s) => [s.shipTypeId, s]));
    const manifests = new Map(bundle.manifests.map((m) => [m.manifestId, m]));

    const missing: string[] = [];
    for (const s of bundle.shipTypes) {
      if (!categories.has(s.categoryId)) missing.push(`shipType ${s.shipTypeId} → category ${s.categoryId}`);
    }
    for (const s of bundle.storyShips) {
      if (!categories.has(s.categoryId)) missing.push(`storyShip ${s.storyShipId} → category ${s.categoryId}`);
      if (s.manifestId !== null && !manifests.has(s.manifestId)) {
        missing.push(`storyShip ${s.storyShipId} → manifest ${s.manifestId}`);
      }
    }
    const defaultType = shipTypes.get(bundle.defaults.shipTypeId);
    if (!categories.has(bundle.defaults.categoryId)) {
      missing.push(`defaults → category ${bundle.defaults.categoryId}`);
    }
    if (!defaultType) {
      missing.push(`defaults → shipType ${bundle.defaults.shipTypeId}`);
    } else if (defaultType.categoryId !== bundle.defaults.categoryId) {
      missing.push(`defaults → shipType ${defaultType.shipTypeId} is not in category ${bundle.defaults.categoryId}`);
    }
    if (missing.length > 0) {
      throw new Error(`Content references are broken: ${missing.join(', ')}`);
    }

    this.categories = categories;
    this.shipTypes = shipTypes;
    this.manifests = manifests;
    this.storyShips = new Map(bundle.storyShips.map((s) => [s.storyShipId, s]));
    this.captainTypes = [...bundle.captainTypes];
    this.accessCodes = [...bundle.accessCodes];
    this.dayRules = [...bundle.dayRules];
    this.consequences = [...bundle.consequences];
    this.defaults = bundle.defaults;

    this.logger.log(
      `Content loaded: ${categories.size} categories, ${shipTypes.size} ship types, ` +
        `${manifests.size} manifests, ${this.storyShips.size} story ships`,
    );
  }

  getCategory(id: string): ShipCategoryDefinition | undefined {
    return this.categories.get(id);
  }

  getShipType(id: string): ShipTypeDefinition | undefined {
    return this.shipTypes.get(id);
  }

  getManifest(id: string): CargoManifestDefinition | undefined {
    return this.manifests.get(id);
  }

  getStoryShip(id: string): StoryShipDefinition | undefined {
    return this.storyShips.get(id);
  }

  getAllShipTypes(): ShipTypeDefinition[] {
    return [...this.shipTypes.values()];
  }

  getAllManifests(): CargoManifestDefinition[] {
    return [...this.manifests.values()];
  }

  getAllStoryShips(): StoryShipDefinition[] {
    return [...this.storyShips.values()];
  }

  getCaptainTypes(): CaptainTypeDefinition[] {
    return this.captainTypes;
  }

  getAccessCodes(): AccessCodeDefinition[] {
    return this.accessCodes;
  }

  findAccessCode(code: string): AccessCodeDefinition | undefined {
    const upper = code.toUpperCase();
    return this.accessCodes.find((c) => c.code.toUpperCase() === upper);
  }

  getDayRules(): DayRuleDefinition[] {
    return this.dayRules;
  }

  getConsequences(): ConsequenceDefinition[] {
    return this.consequences;
  }

  getDefaults(): ContentDefaults {
    if (!this.defaults) {
      throw new Error('Content has not been loaded');
    }
    return this.defaults;
  }
}
