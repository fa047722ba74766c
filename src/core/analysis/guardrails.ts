import type { GuardrailRule } from '../config';
import type { DependencyGraph } from '../graph/dependencyGraph';
import { rangeLength } from '../diff/ranges';
import { matchesGlob } from '../paths';
import type { Conflict } from '../types';
import { importTargets, scanImportLine } from './imports';
import type { PreparedFile, PreparedProposal } from './prepared';

export const AUTOMATED_THRESHOLD = 0.5;

export interface GuardrailContext {
  /** Attribution confidence in [0,1]. */
  automation: number;
  graph?: DependencyGraph;
}

export function ruleApplies(rule: GuardrailRule, automation: number): boolean {
  if (rule.when === 'automated-authored') return automation >= AUTOMATED_THRESHOLD;
  if (rule.when === 'human-authored') return automation < AUTOMATED_THRESHOLD;
  return true;
}

/** Imports the proposal introduces in this file. */
export function newImports(file: PreparedFile): string[] {
  if (file.head) {
    const before = new Set(file.base?.imports ?? []);
    return Array.from(new Set(file.head.imports.filter((i) => !before.has(i))));
  }
  const out = new Set<string>();
  for (const h of file.diff.hunks) {
    for (const l of h.added) for (const spec of scanImportLine(l.text, file.diff.path)) out.add(spec);
  }
  return Array.from(out);
}

function violation(prepared: PreparedProposal, rule: GuardrailRule, file: string, detail: string, symbol?: string): Conflict {
  const id = prepared.proposal.id;
  return {
    kind: 'guardrail',
    severity: rule.severity,
    proposals: [id, id],
    file,
    ...(symbol ? { symbol } : {}),
    rule: rule.name,
    explanation: `Guardrail "${rule.name}" violated in ${file}: ${detail}.${rule.message ? ` ${rule.message}` : ''}`,
    recommendation: rule.message ?? `Bring ${file} back within the "${rule.name}" policy before merging.`,
  };
}

function evaluateRule(prepared: PreparedProposal, rule: GuardrailRule, ctx: GuardrailContext): Conflict[] {
  const files = Array.from(prepared.files.values())
    .filter((f) => !rule.pattern || matchesGlob(f.diff.path, rule.pattern))
    .sort((a, b) => a.diff.path.localeCompare(b.diff.path));
  if (files.length === 0) return [];

  const out: Conflict[] = [];
  const scope = rule.pattern ?? '*';

  if (rule.maxFilesChanged !== undefined && files.length > rule.maxFilesChanged) {
    out.push(violation(prepared, rule, scope, `${files.length} files changed, limit is ${rule.maxFilesChanged} (maxFilesChanged)`));
  }

  if (rule.maxLinesChanged !== undefined) {
    const lines = files.reduce(
      (sum, f) => sum + f.diff.hunks.reduce((s, h) => s + h.added.length + h.removed.length, 0),
      0,
    );
    if (lines > rule.maxLinesChanged) {
      out.push(violation(prepared, rule, scope, `${lines} lines changed, limit is ${rule.maxLinesChanged} (maxLinesChanged)`));
    }
  }

  for (const f of files) {
    const path = f.diff.path;

    if (rule.cannotImportFrom.length > 0) {
      for (const spec of newImports(f)) {
        const targets = importTargets(path, spec, ctx.graph);
        const banned = rule.cannotImportFrom.find((glob) => targets.some((t) => matchesGlob(t, glob)));
        if (banned) out.push(violation(prepared, rule, path, `imports "${spec}", which matches forbidden source "${banned}" (cannotImportFrom)`));
      }
    }

    for (const src of rule.mustNotContain) {
      const re = new RegExp(src);
      const hit = f.diff.hunks.flatMap((h) => h.added).find((l) => re.test(l.text));
      if (hit) out.push(violation(prepared, rule, path, `line ${hit.line} matches forbidden content /${src}/ (mustNotContain)`));
    }

    if (rule.maxFunctionLines === undefined && rule.maxCyclomaticComplexity === undefined) continue;
    for (const cs of f.changed) {
      if (cs.change === 'removed') continue;
      const sym = cs.head ?? cs.symbol;
      if (sym.kind === 'class') continue;
      const length = rangeLength(sym.range);
      if (rule.maxFunctionLines !== undefined && length > rule.maxFunctionLines) {
        out.push(
          violation(prepared, rule, path, `${cs.key} is ${length} lines long, limit is ${rule.maxFunctionLines} (maxFunctionLines)`, cs.key),
        );
      }
      if (rule.maxCyclomaticComplexity !== undefined && sym.complexity !== undefined && sym.complexity > rule.maxCyclomaticComplexity) {
        out.push(
          violation(
            prepared,
            rule,
            path,
            `${cs.key} has cyclomatic complexity ${sym.complexity}, limit is ${rule.maxCyclomaticComplexity} (maxCyclomaticComplexity)`,
            cs.key,
          ),
        );
      }
    }
  }
  return out;
}

/** Evaluate every rule against one proposal. No cross-proposal state is read. */
export function evaluateGuardrails(
  prepared: PreparedProposal,
  rules: readonly GuardrailRule[],
  ctx: GuardrailContext,
): Conflict[] {
  return rules.filter((r) => ruleApplies(r, ctx.automation)).flatMap((r) => evaluateRule(prepared, r, ctx));
}
