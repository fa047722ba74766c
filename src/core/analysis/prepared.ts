import type { SymbolIndex } from '../symbols/symbolIndex';
import type { ChangeProposal, ChangedSymbol, CoverageNote, FileAnalysis, FileDiff, LineRange } from '../types';

/** One touched file of a proposal, keyed by its base path. */
export interface PreparedFile {
  key: string;
  diff: FileDiff;
  base: FileAnalysis | null;
  head: FileAnalysis | null;
  changed: ChangedSymbol[];
  /** False when a side needed for symbol-level comparison could not be analyzed. */
  symbolsAvailable: boolean;
  baseIndex: SymbolIndex;
}

export interface PreparedProposal {
  proposal: ChangeProposal;
  files: Map<string, PreparedFile>;
  coverage: CoverageNote[];
}

export function touchedRanges(file: PreparedFile): LineRange[] {
  return file.diff.hunks.map((h) => h.before);
}

export function addedLines(file: PreparedFile): Array<{ line: number; text: string; before: LineRange }> {
  return file.diff.hunks.flatMap((h) => h.added.map((l) => ({ line: l.line, text: l.text, before: h.before })));
}

export function sharesFile(a: PreparedProposal, b: PreparedProposal): boolean {
  const [small, large] = a.files.size <= b.files.size ? [a.files, b.files] : [b.files, a.files];
  for (const k of small.keys()) if (large.has(k)) return true;
  return false;
}

/** Order a pair by proposal id so pairwise results do not depend on argument order. */
export function orderPair(a: PreparedProposal, b: PreparedProposal): [PreparedProposal, PreparedProposal] {
  return a.proposal.id <= b.proposal.id ? [a, b] : [b, a];
}
