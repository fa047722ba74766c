import { z } from 'zod';
import { InputShapeError, issuesFromZod, type ShapeIssue } from './errors';
import type { ChangeProposal, CodeSymbol, Decision, FileAnalysis, FileDiff } from './types';

const lineNumber = z.number().int().nonnegative();

export const LineRangeSchema = z
  .object({ start: lineNumber, end: lineNumber })
  .refine((r) => r.start <= r.end, { message: 'range start must not exceed end' });

const HunkLineSchema = z.object({
  line: z.number().int().positive(),
  text: z.string(),
});

export const HunkSchema = z
  .object({
    before: LineRangeSchema,
    after: LineRangeSchema,
    added: z.array(HunkLineSchema).default([]),
    removed: z.array(HunkLineSchema).default([]),
  })
  .superRefine((h, ctx) => {
    h.removed.forEach((l, i) => {
      if (l.line < h.before.start || l.line > h.before.end) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['removed', i], message: `removed line ${l.line} outside before-range` });
      }
    });
    h.added.forEach((l, i) => {
      if (l.line < h.after.start || l.line > h.after.end) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['added', i], message: `added line ${l.line} outside after-range` });
      }
    });
  });

export const FileDiffSchema = z
  .object({
    path: z.string().min(1),
    previousPath: z.string().min(1).optional(),
    change: z.enum(['added', 'modified', 'removed', 'renamed']),
    hunks: z.array(HunkSchema).default([]),
  })
  .superRefine((f, ctx) => {
    for (let i = 1; i < f.hunks.length; i++) {
      const prev = f.hunks[i - 1];
      const cur = f.hunks[i];
      if (prev && cur && cur.before.start <= prev.before.end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hunks', i],
          message: 'hunks must be ordered by position and non-overlapping',
        });
      }
    }
  });

export const FileDiffListSchema = z.array(FileDiffSchema).superRefine((files, ctx) => {
  const seen = new Set<string>();
  files.forEach((f, i) => {
    const key = f.previousPath ?? f.path;
    if (seen.has(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'path'], message: `duplicate diff for ${key}` });
    }
    seen.add(key);
  });
});

export const CodeSymbolSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['function', 'method', 'class']),
  file: z.string().min(1),
  range: LineRangeSchema,
  signature: z.object({
    params: z.array(
      z.object({
        name: z.string(),
        type: z.string().optional(),
        optional: z.boolean().optional(),
      }),
    ),
    returns: z.string().optional(),
  }),
  module: z.string(),
  parent: z.string().optional(),
  nesting: z.number().int().nonnegative().optional(),
  complexity: z.number().int().positive().optional(),
});

/**
 * Symbols of one file may only overlap as strict enclosures.
 * Walks ranges sorted by (start asc, end desc) with a stack of open parents.
 */
export function checkSymbolNesting(symbols: readonly CodeSymbol[]): ShapeIssue[] {
  const issues: ShapeIssue[] = [];
  const order = symbols
    .map((s, i) => ({ s, i }))
    .sort((x, y) => x.s.range.start - y.s.range.start || y.s.range.end - x.s.range.end);
  const stack: Array<{ s: CodeSymbol; i: number }> = [];

  for (const cur of order) {
    while (stack.length > 0 && (stack[stack.length - 1]?.s.range.end ?? -1) < cur.s.range.start) stack.pop();
    const top = stack[stack.length - 1];
    if (top) {
      const p = top.s.range;
      const c = cur.s.range;
      const encloses = p.start <= c.start && c.end <= p.end && (p.start !== c.start || p.end !== c.end);
      if (!encloses) {
        issues.push({
          path: `symbols.${cur.i}`,
          message: `${cur.s.name} [${c.start}-${c.end}] overlaps ${top.s.name} [${p.start}-${p.end}] without strict enclosure`,
        });
        continue;
      }
    }
    stack.push(cur);
  }
  return issues;
}

export const FileAnalysisSchema = z
  .object({
    path: z.string().min(1),
    symbols: z.array(CodeSymbolSchema).default([]),
    imports: z.array(z.string()).default([]),
    calls: z
      .array(z.object({ name: z.string().min(1), line: z.number().int().positive() }))
      .default([]),
  })
  .superRefine((a, ctx) => {
    a.symbols.forEach((s, i) => {
      if (s.file !== a.path) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['symbols', i, 'file'], message: `symbol file ${s.file} differs from ${a.path}` });
      }
    });
    for (const issue of checkSymbolNesting(a.symbols)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path.split('.'), message: issue.message });
    }
  });

export const ChangeProposalSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  sourceRef: z.string().min(1),
  targetRef: z.string().min(1),
  baseRef: z.string().min(1).optional(),
  author: z.string().default('unknown'),
  labels: z.array(z.string()).default([]),
  automation: z
    .object({
      confidence: z.number().min(0).max(1).default(0),
      signals: z.array(z.string()).default([]),
    })
    .default({}),
});

export const DecisionSchema = z
  .object({
    kind: z.enum(['removal', 'migration', 'addition']),
    entity: z.string().min(1),
    module: z.string().optional(),
    file: z.string().optional(),
    oldPattern: z.string().min(1).optional(),
    newPattern: z.string().optional(),
    proposalRef: z.string().min(1),
    description: z.string().optional(),
    timestamp: z.string().refine((t) => !Number.isNaN(Date.parse(t)), { message: 'timestamp must be an ISO date' }),
  })
  .superRefine((d, ctx) => {
    if (d.kind === 'migration' && !d.oldPattern) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['oldPattern'], message: 'migration decisions need an oldPattern' });
    }
  });

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.output<S> {
  const res = schema.safeParse(raw);
  if (!res.success) throw new InputShapeError(source, issuesFromZod(res.error));
  return res.data;
}

export function parseFileDiffs(raw: unknown, source = 'file diffs'): FileDiff[] {
  return parseWith(FileDiffListSchema, raw, source);
}

export function parseFileAnalysis(raw: unknown, source = 'file analysis'): FileAnalysis {
  return parseWith(FileAnalysisSchema, raw, source);
}

export function parseProposal(raw: unknown, source = 'change proposal'): ChangeProposal {
  return parseWith(ChangeProposalSchema, raw, source);
}

export function parseDecision(raw: unknown, source = 'decision'): Decision {
  return parseWith(DecisionSchema, raw, source);
}
