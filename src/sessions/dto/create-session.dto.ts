import { z } from 'zod';

export const CreateSessionBodySchema = z.object({
  // fixed seed replays the same encounters
  seed: z.string().min(1).max(64).optional(),
});

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>;
