import { z } from 'zod';

export const VersionedBodySchema = z.object({
  expectedVersion: z.number().int().min(0),
});

export type VersionedBody = z.infer<typeof VersionedBodySchema>;
