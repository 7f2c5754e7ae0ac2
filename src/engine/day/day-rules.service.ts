import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  AccessCodeDefinition,
  DayRuleDefinition,
} from '../../content/content.types.js';

export function isAccessCodeValidOnDay(
  code: AccessCodeDefinition,
  day: number,
): boolean {
  if (code.isRevoked) return false;
  if (day < code.validFromDay) return false;
  return code.validUntilDay === null || day <= code.validUntilDay;
}

export function isAuthorizedFor(
  code: AccessCodeDefinition,
  faction: string,
): boolean {
  const needle = faction.toLowerCase();
  return code.authorizedFactions.some((f) => f.toLowerCase() === needle);
}

/** Day-scoped rules and credentials */
@Injectable()
export class DayRulesService {
  constructor(private readonly content: ContentLoaderService) {}

  getActiveRules(day: number): DayRuleDefinition[] {
    return this.content.getDayRules().filter((r) => r.activateOnDay <= day);
  }

  getValidAccessCodes(day: number): AccessCodeDefinition[] {
    return this.content
      .getAccessCodes()
      .filter((c) => isAccessCodeValidOnDay(c, day));
  }

  /** Codes that will not check out today: expired, revoked or not yet issued */
  getInvalidAccessCodes(day: number): AccessCodeDefinition[] {
    return this.content
      .getAccessCodes()
      .filter((c) => !isAccessCodeValidOnDay(c, day));
  }
}
