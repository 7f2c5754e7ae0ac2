import type { ShipCategoryDefinition } from '../../content/content.types.js';

/**
 * Compatibility rules for one ship category: which factions it flies for,
 * which captains may command it and which access-code prefixes it accepts.
 */
export class FactionPolicy {
  constructor(private readonly category: ShipCategoryDefinition) {}

  get categoryId(): string {
    return this.category.categoryId;
  }

  get suspicionBaseLevel(): number {
    return this.category.suspicionBaseLevel;
  }

  get requiresSpecialClearance(): boolean {
    return this.category.requiresSpecialClearance;
  }

  get isPriorityVessel(): boolean {
    return this.category.isPriorityVessel;
  }

  get contrabandExempt(): boolean {
    return this.category.contrabandExempt;
  }

  get searchExempt(): boolean {
    return this.category.searchExempt;
  }

  isFactionAssociated(faction: string): boolean {
    const needle = faction.toLowerCase();
    return this.category.associatedFactions.some(
      (f) => f.toLowerCase() === needle,
    );
  }

  /** Empty compatible-captain list falls back to the associated factions */
  isCaptainCompatible(captainFaction: string): boolean {
    const compatible = this.category.compatibleCaptainFactions;
    if (compatible.length === 0) {
      return this.isFactionAssociated(captainFaction);
    }
    const needle = captainFaction.toLowerCase();
    return compatible.some((f) => f.toLowerCase() === needle);
  }

  isAccessCodeValid(code: string): boolean {
    if (!code) return false;
    const upper = code.toUpperCase();
    return this.category.validAccessCodePrefixes.some(
      (prefix) => prefix.length > 0 && upper.startsWith(prefix.toUpperCase()),
    );
  }

  getPrimaryFaction(): string {
    return (
      this.category.associatedFactions[0] ?? this.category.name.toLowerCase()
    );
  }
}
