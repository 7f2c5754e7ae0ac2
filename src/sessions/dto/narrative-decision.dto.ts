import { z } from 'zod';
import { DECISION_CATEGORY, PRESSURE_LEVEL } from '../../db/types/index.js';
import { VersionedBodySchema } from './versioned.dto.js';

// checkpoint decisions are recorded under this prefix by the server
export const SHIP_DECISION_PREFIX = 'ship_';

export function isShipDecisionId(id: string): boolean {
  return id.toLowerCase().startsWith(SHIP_DECISION_PREFIX);
}

export const NarrativeDecisionBodySchema = VersionedBodySchema.extend({
  decisionId: z
    .string()
    .min(1)
    .max(80)
    .regex(/^[A-Za-z0-9_.-]+$/)
    .refine((id) => !isShipDecisionId(id), {
      message: `Decision ids starting with "${SHIP_DECISION_PREFIX}" are reserved`,
    }),
  imperialPoints: z.number().int().min(-100).max(100),
  insurgentPoints: z.number().int().min(-100).max(100),
  context: z.string().max(500),
  // inferred from id, context and points when omitted
  category: z.enum(DECISION_CATEGORY).optional(),
  pressure: z.enum(PRESSURE_LEVEL).optional(),
});

export type NarrativeDecisionBody = z.infer<typeof NarrativeDecisionBodySchema>;
