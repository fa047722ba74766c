import { z } from 'zod';

export const ConfigCheckSchema = z.object({
  repo: z.string().default('.'),
  config: z.string().min(1).optional(),
});

export type ConfigCheckInput = z.output<typeof ConfigCheckSchema>;
