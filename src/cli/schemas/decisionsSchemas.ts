import { z } from 'zod';

export const RecordDecisionSchema = z.object({
  log: z.string().min(1).optional(),
  repo: z.string().default('.'),
  kind: z.enum(['removal', 'migration', 'addition']),
  entity: z.string().min(1),
  module: z.string().optional(),
  file: z.string().optional(),
  oldPattern: z.string().optional(),
  newPattern: z.string().optional(),
  proposal: z.string().min(1),
  description: z.string().optional(),
  timestamp: z.string().optional(),
});

export const ListDecisionsSchema = z.object({
  log: z.string().min(1).optional(),
  repo: z.string().default('.'),
  depth: z.coerce.number().int().positive().default(50),
});

export type RecordDecisionInput = z.output<typeof RecordDecisionSchema>;
export type ListDecisionsInput = z.output<typeof ListDecisionsSchema>;
