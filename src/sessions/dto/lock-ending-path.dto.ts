import { z } from 'zod';
import { ENDING_PATH } from '../../db/types/index.js';
import { VersionedBodySchema } from './versioned.dto.js';

export const LockEndingPathBodySchema = VersionedBodySchema.extend({
  path: z.enum(ENDING_PATH),
});

export type LockEndingPathBody = z.infer<typeof LockEndingPathBodySchema>;
