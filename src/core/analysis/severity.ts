import type { Conflict, Severity } from '../types';

export const SEVERITY_VALUE: Record<Severity, number> = {
  critical: 100,
  warning: 50,
  info: 15,
};

const RANK: Record<Severity, number> = { critical: 0, warning: 1, info: 2 };

export function maxSeverity(a: Severity, b: Severity): Severity {
  return RANK[a] <= RANK[b] ? a : b;
}

/** Severity first, then proposal ids, kind, file and symbol. */
export function compareConflicts(x: Conflict, y: Conflict): number {
  return (
    RANK[x.severity] - RANK[y.severity] ||
    x.proposals[0].localeCompare(y.proposals[0]) ||
    x.proposals[1].localeCompare(y.proposals[1]) ||
    x.kind.localeCompare(y.kind) ||
    x.file.localeCompare(y.file) ||
    (x.symbol ?? '').localeCompare(y.symbol ?? '')
  );
}
