import { z } from 'zod';
import { DECISION_ACTION } from '../../db/types/index.js';
import { VersionedBodySchema } from '../../sessions/dto/versioned.dto.js';

export const DecideBodySchema = VersionedBodySchema.extend({
  encounterId: z.string().min(1),
  action: z.enum(DECISION_ACTION),
});

export type DecideBody = z.infer<typeof DecideBodySchema>;
