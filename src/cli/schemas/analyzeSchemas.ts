import { z } from 'zod';

export const AnalyzeSchema = z
  .object({
    snapshot: z.string().min(1).optional(),
    repo: z.string().min(1).optional(),
    config: z.string().min(1).optional(),
    target: z.string().min(1).default('main'),
    prefix: z.string().default(''),
    decisions: z.string().min(1).optional(),
    cacheDir: z.string().min(1).optional(),
    deadline: z.coerce.number().int().positive().optional(),
    post: z.boolean().default(false),
  })
  .superRefine((v, ctx) => {
    if ((v.snapshot === undefined) === (v.repo === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['snapshot'], message: 'pass exactly one of --snapshot or --repo' });
    }
  });

export type AnalyzeInput = z.output<typeof AnalyzeSchema>;
