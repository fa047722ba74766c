import { matchesGlob } from '../paths';
import type { Conflict, Decision, Severity } from '../types';
import type { PreparedProposal } from './prepared';

export interface RegressionOptions {
  /** Removal decisions younger than this are escalated to critical. */
  recencyMinutes: number;
  now: Date;
}

function ageMinutes(decision: Decision, now: Date): number {
  return (now.getTime() - Date.parse(decision.timestamp)) / 60_000;
}

function removalMatches(decision: Decision, name: string, module: string, file: string): boolean {
  if (decision.entity !== name) return false;
  if (decision.module !== undefined) return decision.module === module;
  return decision.file !== undefined && decision.file === file;
}

function formatAge(minutes: number): string {
  if (minutes < 90) return `${Math.max(0, Math.round(minutes))} minutes`;
  if (minutes < 60 * 48) return `${Math.round(minutes / 60)} hours`;
  return `${Math.round(minutes / 1440)} days`;
}

/**
 * Cross-reference a proposal against recent merge decisions.
 * Matching is exact: a removal needs the same name and module, a migration the
 * literal old pattern on an added line.
 */
export function detectRegressions(
  prepared: PreparedProposal,
  decisions: readonly Decision[],
  opts: RegressionOptions,
): Conflict[] {
  const id = prepared.proposal.id;
  const out: Conflict[] = [];

  for (const d of decisions) {
    if (d.kind === 'removal') {
      for (const file of prepared.files.values()) {
        for (const cs of file.changed) {
          if (cs.change !== 'added') continue;
          if (!removalMatches(d, cs.symbol.name, cs.symbol.module, cs.symbol.file)) continue;
          const age = ageMinutes(d, opts.now);
          const severity: Severity = age < opts.recencyMinutes ? 'critical' : 'warning';
          out.push({
            kind: 'regression',
            severity,
            proposals: [id, d.proposalRef],
            file: cs.symbol.file,
            symbol: cs.key,
            explanation:
              `${id} re-adds ${cs.symbol.kind} ${cs.symbol.name} in ${cs.symbol.module || cs.symbol.file}, ` +
              `which ${d.proposalRef} removed ${formatAge(age)} ago${d.description ? ` (${d.description})` : ''}.`,
            recommendation: `Confirm the removal in ${d.proposalRef} should be reverted; otherwise drop ${cs.symbol.name} from ${id}.`,
          });
        }
      }
      continue;
    }

    if (d.kind === 'migration' && d.oldPattern) {
      const pattern = d.oldPattern;
      for (const file of prepared.files.values()) {
        if (d.file && !matchesGlob(file.diff.path, d.file)) continue;
        const hit = file.diff.hunks.flatMap((h) => h.added).find((l) => l.text.includes(pattern));
        if (!hit) continue;
        out.push({
          kind: 'regression',
          severity: 'warning',
          proposals: [id, d.proposalRef],
          file: file.diff.path,
          explanation:
            `${id} introduces "${pattern}" at line ${hit.line} of ${file.diff.path}, a pattern ${d.proposalRef} migrated away from` +
            `${d.newPattern ? ` in favor of "${d.newPattern}"` : ''}.`,
          recommendation: d.newPattern ? `Use "${d.newPattern}" instead.` : `Follow the migration made in ${d.proposalRef}.`,
        });
      }
    }
  }
  return out;
}
