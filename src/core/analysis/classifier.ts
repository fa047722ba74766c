import type { SemanticAdjudicator, SimilarityMeasure } from '../collaborators';
import { containsLine, formatRange } from '../diff/ranges';
import { errorMessage } from '../errors';
import type { DependencyGraph } from '../graph/dependencyGraph';
import type { Logger } from '../log';
import type { ChangedSymbol, ChangedSymbolKind, CodeSymbol, Conflict, Overlap, Severity, SymbolOverlap } from '../types';
import { addedLines, orderPair, touchedRanges, type PreparedFile, type PreparedProposal } from './prepared';
import { maxSeverity } from './severity';
import { duplicationScore } from './similarity';

export interface ClassifierOptions {
  graph: DependencyGraph;
  similarityThreshold: number;
  similarity?: SimilarityMeasure;
  adjudicator?: SemanticAdjudicator;
  log?: Logger;
}

const HARD_KINDS: ReadonlySet<ChangedSymbolKind> = new Set(['body-modified', 'signature-modified', 'removed']);
const EDIT_KINDS: ReadonlySet<ChangedSymbolKind> = new Set(['body-modified', 'signature-modified']);

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function formatSignature(s: CodeSymbol): string {
  const params = s.signature.params.map((p) => (p.type ? `${p.name}: ${p.type}` : p.name)).join(', ');
  return `${s.name}(${params})${s.signature.returns ? ` -> ${s.signature.returns}` : ''}`;
}

function formatRanges(ranges: ReadonlyArray<{ start: number; end: number }>): string {
  return ranges.map(formatRange).join(', ');
}

function describeKind(kind: CodeSymbol['kind']): string {
  return kind === 'class' ? 'class' : kind;
}

/** Lines where `name(` is called and not defined. */
export function callPattern(name: string): { call: RegExp; definition: RegExp } {
  const n = escapeRegex(name);
  return {
    call: new RegExp(`(?:^|[^\\w$])${n}\\s*\\(`),
    definition: new RegExp(`\\b(?:def|function|fn|func)\\s+${n}\\b`),
  };
}

/** A file refers to `owner` through a base call site or an added line. */
function mentionsOwner(file: PreparedFile, owner: string): boolean {
  if (file.base?.calls.some((c) => c.name === owner)) return true;
  const word = new RegExp(`(?:^|[^\\w$])${escapeRegex(owner)}(?![\\w$])`);
  return addedLines(file).some((l) => word.test(l.text));
}

function hardConflict(x: PreparedProposal, y: PreparedProposal, file: string, so: SymbolOverlap): Conflict {
  const sym = so.a.symbol;
  return {
    kind: 'hard',
    severity: 'critical',
    proposals: [x.proposal.id, y.proposal.id],
    file,
    symbol: so.key,
    explanation:
      `Both proposals edit ${describeKind(sym.kind)} ${so.key} in ${file} at overlapping lines ` +
      `(${formatRanges(so.a.touched)} vs ${formatRanges(so.b.touched)}).`,
    recommendation: `Merge one proposal first and rebase the other onto it, resolving ${so.key} by hand.`,
  };
}

/**
 * Callers of a signature-changed symbol inside files the other proposal touches.
 * New calls in the other proposal's added lines, or existing calls inside its touched
 * ranges, are critical; other existing calls in those files are warnings.
 */
function interfaceConflicts(
  source: PreparedProposal,
  other: PreparedProposal,
  definingFile: string,
  cs: ChangedSymbol,
  graph: DependencyGraph,
): Conflict[] {
  const name = cs.symbol.name;
  const { call, definition } = callPattern(name);
  const candidates = new Set<string>([definingFile, ...graph.reachable([definingFile], 'reverse', 1)]);
  const out: Conflict[] = [];

  for (const file of Array.from(candidates).sort()) {
    const of = other.files.get(file);
    if (!of) continue;

    const critical: number[] = [];
    const warning: number[] = [];
    for (const l of addedLines(of)) {
      if (call.test(l.text) && !definition.test(l.text)) critical.push(l.before.start);
    }
    if (of.base) {
      const ranges = touchedRanges(of);
      for (const c of of.base.calls) {
        if (c.name !== name) continue;
        if (file === definingFile && containsLine(cs.symbol.range, c.line)) continue;
        if (ranges.some((r) => containsLine(r, c.line))) critical.push(c.line);
        else warning.push(c.line);
      }
    }
    if (critical.length === 0 && warning.length === 0) continue;

    // Outside its own file a method is matched by name only unless its class shows up there.
    const owner = cs.symbol.kind === 'method' ? cs.symbol.parent : undefined;
    const byNameOnly = owner !== undefined && file !== definingFile && !mentionsOwner(of, owner);
    const severity: Severity = critical.length > 0 && !byNameOnly ? 'critical' : 'warning';
    const lines = Array.from(new Set(critical.length > 0 ? critical : warning)).sort((a, b) => a - b);
    const before = formatSignature(cs.symbol);
    const after = cs.head ? formatSignature(cs.head) : before;
    out.push({
      kind: 'interface',
      severity,
      proposals: [source.proposal.id, other.proposal.id],
      file,
      symbol: cs.key,
      explanation:
        `${source.proposal.id} changes the signature of ${cs.key} (${before} -> ${after}); ` +
        `${other.proposal.id} ${critical.length > 0 ? 'calls it in edited code' : 'touches a file that calls it'} ` +
        `in ${file} at line${lines.length > 1 ? 's' : ''} ${lines.join(', ')}.` +
        (byNameOnly ? ` ${owner} is not referenced there, so the calls may target another ${name}.` : ''),
      recommendation: `Update the calls to ${name} in ${other.proposal.id} to the new signature before merging either proposal.`,
      ...(of.base && !byNameOnly ? {} : { degraded: true }),
    });
  }
  return out;
}

export class ConflictClassifier {
  constructor(private readonly opts: ClassifierOptions) {}

  private async behavioral(x: PreparedProposal, y: PreparedProposal, file: string, so: SymbolOverlap): Promise<Conflict> {
    const conflict: Conflict = {
      kind: 'behavioral',
      severity: 'warning',
      proposals: [x.proposal.id, y.proposal.id],
      file,
      symbol: so.key,
      explanation:
        `Both proposals change ${so.key} in ${file} at separate lines ` +
        `(${formatRanges(so.a.touched)} vs ${formatRanges(so.b.touched)}); the combined behavior is untested.`,
      recommendation: `Review both changes to ${so.key} together and add a test for the merged behavior.`,
    };
    const adjudicator = this.opts.adjudicator;
    if (!adjudicator) return conflict;

    try {
      const verdict = await adjudicator.adjudicate({
        file,
        symbol: so.key,
        source: { proposal: x.proposal.id, touched: so.a.touched, addedLines: so.a.addedLines },
        target: { proposal: y.proposal.id, touched: so.b.touched, addedLines: so.b.addedLines },
        defaultSeverity: conflict.severity,
      });
      if (verdict?.severity) {
        conflict.severity = verdict.severity;
        conflict.adjudicated = true;
      }
      if (verdict?.explanation) {
        conflict.explanation = `${conflict.explanation} ${verdict.explanation}`;
        conflict.adjudicated = true;
      }
    } catch (e) {
      this.opts.log?.warn('adjudicator_failed', { file, symbol: so.key, err: errorMessage(e) });
    }
    return conflict;
  }

  private async duplication(
    x: PreparedProposal,
    y: PreparedProposal,
    a: ChangedSymbol,
    b: ChangedSymbol,
  ): Promise<Conflict | null> {
    const score = await duplicationScore(a, b, this.opts.similarity, this.opts.log);
    if (score.value < this.opts.similarityThreshold) return null;
    const names = a.key === b.key ? a.key : `${a.key} and ${b.key}`;
    return {
      kind: 'duplication',
      severity: 'info',
      proposals: [x.proposal.id, y.proposal.id],
      file: a.symbol.file,
      symbol: a.key,
      explanation:
        `Both proposals add similar ${describeKind(a.symbol.kind)}s ${names} in module ${a.symbol.module || a.symbol.file} ` +
        `(similarity ${score.value.toFixed(2)}).`,
      recommendation: `Keep one implementation and have the other proposal reuse it.`,
    };
  }

  /** Rules in priority order; the first that matches claims the symbol. */
  private async classifySymbol(
    x: PreparedProposal,
    y: PreparedProposal,
    file: string,
    so: SymbolOverlap,
  ): Promise<Conflict[]> {
    const { a, b } = so;
    if (HARD_KINDS.has(a.change) && HARD_KINDS.has(b.change) && so.touchedIntersect) {
      return [hardConflict(x, y, file, so)];
    }

    const iface: Conflict[] = [];
    if (a.change === 'signature-modified') iface.push(...interfaceConflicts(x, y, file, a, this.opts.graph));
    if (b.change === 'signature-modified') iface.push(...interfaceConflicts(y, x, file, b, this.opts.graph));
    if (iface.length > 0) return iface;

    if (EDIT_KINDS.has(a.change) && EDIT_KINDS.has(b.change) && !so.touchedIntersect) {
      return [await this.behavioral(x, y, file, so)];
    }

    if (a.change === 'added' && b.change === 'added' && a.symbol.kind === b.symbol.kind) {
      const dup = await this.duplication(x, y, a, b);
      return dup ? [dup] : [];
    }
    return [];
  }

  private fileLevel(x: PreparedProposal, y: PreparedProposal, overlap: Overlap, claimedHard: boolean): Conflict | null {
    if (!overlap.hasLineOverlap || claimedHard) return null;
    const ranges = overlap.spans.map((s) => s.range);
    return {
      kind: 'hard',
      severity: 'warning',
      proposals: [x.proposal.id, y.proposal.id],
      file: overlap.file,
      explanation: overlap.coarseFallback
        ? `Both proposals edit ${overlap.file} at overlapping lines (${formatRanges(ranges)}); symbol analysis is unavailable for this file, so the overlap is reported at line level.`
        : `Both proposals edit ${overlap.file} at overlapping lines (${formatRanges(ranges)}) outside any symbol they both change.`,
      recommendation: 'Merge one proposal first and rebase the other, checking the overlapping lines by hand.',
      ...(overlap.coarseFallback ? { degraded: true } : {}),
    };
  }

  /** Pairs without a shared file produce no conflicts. */
  async classify(a: PreparedProposal, b: PreparedProposal, overlaps: readonly Overlap[]): Promise<Conflict[]> {
    if (overlaps.length === 0) return [];
    const [x, y] = orderPair(a, b);
    const out: Conflict[] = [];
    const claimed = new Set<string>();
    const claim = (file: string, key: string) => claimed.add(`${file}\0${key}`);
    const isClaimed = (file: string, key: string) => claimed.has(`${file}\0${key}`);

    for (const overlap of overlaps) {
      let hard = false;
      for (const so of overlap.symbols) {
        const found = await this.classifySymbol(x, y, overlap.file, so);
        claim(overlap.file, so.key);
        if (found.some((c) => c.kind === 'hard')) hard = true;
        out.push(...found);
      }
      const fileLevel = this.fileLevel(x, y, overlap, hard);
      if (fileLevel) out.push(fileLevel);
    }

    // Signature changes whose callers sit in files only the other proposal edits.
    for (const [source, other] of [
      [x, y],
      [y, x],
    ] as const) {
      for (const pf of source.files.values()) {
        for (const cs of pf.changed) {
          if (cs.change !== 'signature-modified' || isClaimed(pf.key, cs.key)) continue;
          const found = interfaceConflicts(source, other, pf.key, cs, this.opts.graph);
          if (found.length > 0) claim(pf.key, cs.key);
          out.push(...found);
        }
      }
    }

    out.push(...(await this.crossDuplication(x, y, isClaimed)));
    return mergeInterface(out);
  }

  /** Added symbols with different names but the same module and kind. */
  private async crossDuplication(
    x: PreparedProposal,
    y: PreparedProposal,
    isClaimed: (file: string, key: string) => boolean,
  ): Promise<Conflict[]> {
    const added = (p: PreparedProposal): Array<{ file: PreparedFile; cs: ChangedSymbol }> =>
      Array.from(p.files.values()).flatMap((file) =>
        file.changed.filter((cs) => cs.change === 'added').map((cs) => ({ file, cs })),
      );
    const ys = added(y);
    const out: Conflict[] = [];
    for (const xa of added(x)) {
      for (const ya of ys) {
        const a = xa.cs;
        const b = ya.cs;
        if (xa.file.key === ya.file.key && a.key === b.key) continue;
        if (a.symbol.kind !== b.symbol.kind || a.symbol.module !== b.symbol.module) continue;
        if (isClaimed(xa.file.key, a.key) && isClaimed(ya.file.key, b.key)) continue;
        const dup = await this.duplication(x, y, a, b);
        if (dup) out.push(dup);
      }
    }
    return out;
  }
}

/** Collapse interface findings for the same symbol and file into the most severe one. */
function mergeInterface(conflicts: Conflict[]): Conflict[] {
  const seen = new Map<string, Conflict>();
  const out: Conflict[] = [];
  for (const c of conflicts) {
    if (c.kind !== 'interface') {
      out.push(c);
      continue;
    }
    const key = `${c.proposals.join('\0')}\0${c.file}\0${c.symbol ?? ''}`;
    const prev = seen.get(key);
    if (!prev) {
      seen.set(key, c);
      out.push(c);
    } else if (maxSeverity(prev.severity, c.severity) !== prev.severity) {
      Object.assign(prev, c);
    }
  }
  return out;
}
