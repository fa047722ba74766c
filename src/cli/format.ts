import type { StatusState } from '../core/collaborators';
import type { Conflict, ConflictKind, ProposalReport } from '../core/types';

const KIND_LABEL: Record<ConflictKind, string> = {
  hard: 'Hard conflict',
  interface: 'Interface conflict',
  behavioral: 'Behavioral conflict',
  duplication: 'Duplication',
  regression: 'Regression',
  guardrail: 'Guardrail violation',
};

const SEVERITY_MARK = { critical: '[critical]', warning: '[warning]', info: '[info]' } as const;

function conflictLines(c: Conflict): string[] {
  const other = c.kind === 'guardrail' ? '' : ` with ${c.proposals[1]}`;
  const lines = [`### ${SEVERITY_MARK[c.severity]} ${KIND_LABEL[c.kind]}${other}`, `**File:** \`${c.file}\``];
  if (c.symbol) lines.push(`**Symbol:** \`${c.symbol}\``);
  lines.push('', c.explanation, '', `**Recommendation:** ${c.recommendation}`);
  if (c.degraded) lines.push('', '_Detected with reduced precision; confirm by hand._');
  return lines;
}

/** Markdown comment body for one proposal. Info-level findings are collapsed. */
export function formatComment(report: ProposalReport): string {
  const lines: string[] = ['## merge-radar: cross-proposal analysis', ''];
  lines.push(`**Risk score: ${report.risk.composite.toFixed(0)}/100** | ${report.conflicts.length} conflict(s) detected`, '');

  const important = report.conflicts.filter((c) => c.severity !== 'info');
  for (const c of important) lines.push(...conflictLines(c), '');

  const info = report.conflicts.filter((c) => c.severity === 'info');
  if (info.length > 0) {
    lines.push('<details>', `<summary>${info.length} low-severity finding(s)</summary>`, '');
    for (const c of info) lines.push(...conflictLines(c), '');
    lines.push('</details>', '');
  }

  if (report.noConflictWith.length > 0) {
    lines.push(`**No conflicts with:** ${report.noConflictWith.join(', ')}`, '');
  }
  if (report.conflicts.length === 0) {
    lines.push('**No cross-proposal conflicts detected.**', '');
  }
  if (report.coverage.length > 0) {
    const files = Array.from(new Set(report.coverage.map((n) => n.file))).sort();
    lines.push(`_Partial coverage for: ${files.join(', ')}_`, '');
  }

  lines.push('---', `<sub>Analysis completed in ${report.durationMs}ms</sub>`);
  return lines.join('\n');
}

export function statusFor(report: ProposalReport): { state: StatusState; description: string } {
  const { critical, warning } = report.counts;
  const description = `risk ${report.risk.composite.toFixed(0)}/100, ${critical} critical, ${warning} warning`;
  return { state: report.exceedsThreshold ? 'failure' : 'success', description };
}
