import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage, issuesFromZod } from './errors';
import type { RiskWeights } from './types';

export const CONFIG_FILE = '.merge-radar.yml';

export const DEFAULT_RISK_WEIGHTS: RiskWeights = {
  conflictSeverity: 0.3,
  blastRadius: 0.25,
  patternDeviation: 0.2,
  churn: 0.15,
  attribution: 0.1,
};

export const DEFAULT_IGNORED_PATHS = [
  '*.lock',
  '*.min.js',
  '*.min.css',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'poetry.lock',
];

const WEIGHT_TOLERANCE = 1e-6;

const weight = z.number().min(0).max(1);

export const RiskWeightsSchema = z
  .object({
    conflictSeverity: weight,
    blastRadius: weight,
    patternDeviation: weight,
    churn: weight,
    attribution: weight,
  })
  .strict()
  .superRefine((w, ctx) => {
    const sum = w.conflictSeverity + w.blastRadius + w.patternDeviation + w.churn + w.attribution;
    if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `risk weights must sum to 1.0 (got ${sum.toFixed(6)})` });
    }
  });

const limit = z.number().int().positive();

export const GuardrailRuleSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1).optional(),
    when: z.enum(['automated-authored', 'human-authored']).optional(),
    cannotImportFrom: z.array(z.string().min(1)).default([]),
    mustNotContain: z.array(z.string().min(1)).default([]),
    maxFilesChanged: limit.optional(),
    maxLinesChanged: limit.optional(),
    maxFunctionLines: limit.optional(),
    maxCyclomaticComplexity: limit.optional(),
    severity: z.enum(['critical', 'warning', 'info']).default('warning'),
    message: z.string().optional(),
  })
  .strict()
  .superRefine((r, ctx) => {
    const hasConstraint =
      r.cannotImportFrom.length > 0 ||
      r.mustNotContain.length > 0 ||
      r.maxFilesChanged !== undefined ||
      r.maxLinesChanged !== undefined ||
      r.maxFunctionLines !== undefined ||
      r.maxCyclomaticComplexity !== undefined;
    if (!hasConstraint) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `rule "${r.name}" declares no constraint` });
    }
    r.mustNotContain.forEach((src, i) => {
      try {
        new RegExp(src);
      } catch (e) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['mustNotContain', i],
          message: `invalid regular expression: ${errorMessage(e)}`,
        });
      }
    });
  });

export type GuardrailRule = z.output<typeof GuardrailRuleSchema>;

export const EngineConfigSchema = z
  .object({
    riskThreshold: z.number().min(0).max(100).default(50),
    checkRegressions: z.boolean().default(true),
    maxOpenProposals: z.number().int().positive().default(30),
    decisionsLogDepth: z.number().int().nonnegative().default(50),
    riskWeights: RiskWeightsSchema.default(DEFAULT_RISK_WEIGHTS),
    rules: z.array(GuardrailRuleSchema).default([]),
    ignoredPaths: z.array(z.string().min(1)).default(DEFAULT_IGNORED_PATHS),
    similarityThreshold: z.number().min(0).max(1).default(0.7),
    regressionRecencyMinutes: z.number().nonnegative().default(10080),
    blastRadius: z
      .object({
        maxDepth: z.number().int().positive().default(5),
        saturation: z.number().positive().default(20),
      })
      .strict()
      .default({}),
    patternDeviation: z
      .object({
        minBaselineSymbols: z.number().int().nonnegative().default(2),
      })
      .strict()
      .default({}),
    concurrency: z.number().int().positive().default(4),
    deadlineMs: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((c, ctx) => {
    const seen = new Set<string>();
    c.rules.forEach((r, i) => {
      if (seen.has(r.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', i, 'name'], message: `duplicate rule name "${r.name}"` });
      }
      seen.add(r.name);
    });
  });

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function resolveConfig(raw: unknown, file: string | null = null): EngineConfig {
  const res = EngineConfigSchema.safeParse(raw ?? {});
  if (!res.success) throw new ConfigError(file, issuesFromZod(res.error));
  return res.data;
}

export function defaultConfig(): EngineConfig {
  return resolveConfig({});
}

export async function loadConfig(repoRoot: string, file: string = CONFIG_FILE): Promise<EngineConfig> {
  const configPath = path.resolve(repoRoot, file);
  if (!(await fs.pathExists(configPath))) return defaultConfig();

  const text = await fs.readFile(configPath, 'utf-8');
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (e) {
    throw new ConfigError(configPath, [{ path: '', message: `YAML parse error: ${errorMessage(e)}` }]);
  }
  if (doc !== null && doc !== undefined && (typeof doc !== 'object' || Array.isArray(doc))) {
    throw new ConfigError(configPath, [{ path: '', message: 'configuration root must be a mapping' }]);
  }
  return resolveConfig(doc ?? {}, configPath);
}
