import { containsLine, mergeRanges, rangesIntersect } from '../diff/ranges';
import type { ChangedSymbol, CodeSymbol, FileAnalysis, FileDiff, LineRange } from '../types';
import { SymbolIndex } from './symbolIndex';

export function signatureKey(s: CodeSymbol): string {
  return JSON.stringify({
    params: s.signature.params.map((p) => [p.name, p.type ?? '', p.optional === true]),
    returns: s.signature.returns ?? '',
  });
}

function clip(r: LineRange, within: LineRange): LineRange {
  if (rangesIntersect(r, within)) {
    return { start: Math.max(r.start, within.start), end: Math.min(r.end, within.end) };
  }
  const line = Math.min(Math.max(r.start, within.start), within.end);
  return { start: line, end: line };
}

/**
 * Match base and head symbols by qualified name and classify what the diff did to each.
 * Returns [] when a side needed for the comparison has no analysis.
 */
export function deriveChangedSymbols(
  diff: FileDiff,
  base: FileAnalysis | null,
  head: FileAnalysis | null,
): ChangedSymbol[] {
  if (diff.change !== 'added' && !base) return [];
  if (diff.change !== 'removed' && !head) return [];

  const baseIdx = new SymbolIndex(diff.change === 'added' ? [] : base?.symbols ?? []);
  const headIdx = new SymbolIndex(diff.change === 'removed' ? [] : head?.symbols ?? []);

  const touched = new Map<string, LineRange[]>();
  const touch = (key: string, r: LineRange) => {
    const list = touched.get(key);
    if (list) list.push(r);
    else touched.set(key, [r]);
  };

  for (const h of diff.hunks) {
    for (const l of h.removed) {
      const s = baseIdx.innermostAt(l.line);
      if (s) touch(baseIdx.keyOf(s), { start: l.line, end: l.line });
    }
    for (const l of h.added) {
      const s = headIdx.innermostAt(l.line);
      if (!s) continue;
      const baseSym = baseIdx.get(headIdx.keyOf(s));
      if (baseSym) touch(headIdx.keyOf(s), clip(h.before, baseSym.range));
    }
  }

  const addedWithin = (s: CodeSymbol): string[] => {
    const out: string[] = [];
    for (const h of diff.hunks) {
      for (const l of h.added) if (containsLine(s.range, l.line)) out.push(l.text);
    }
    return out;
  };

  const out: ChangedSymbol[] = [];

  for (const b of baseIdx.all()) {
    const key = baseIdx.keyOf(b);
    const h = headIdx.get(key);
    if (!h) {
      out.push({ key, symbol: b, change: 'removed', touched: mergeRanges(touched.get(key) ?? [b.range]), addedLines: [] });
      continue;
    }
    const sigChanged = signatureKey(b) !== signatureKey(h);
    const ranges = touched.get(key);
    if (!ranges && !sigChanged) continue;
    out.push({
      key,
      symbol: b,
      head: h,
      change: sigChanged ? 'signature-modified' : 'body-modified',
      touched: mergeRanges(ranges ?? [{ start: b.range.start, end: b.range.start }]),
      addedLines: addedWithin(h),
    });
  }

  for (const h of headIdx.all()) {
    const key = headIdx.keyOf(h);
    if (baseIdx.has(key)) continue;
    const anchors: LineRange[] = [];
    for (const hunk of diff.hunks) {
      if (hunk.added.some((l) => containsLine(h.range, l.line))) anchors.push(hunk.before);
    }
    out.push({ key, symbol: h, change: 'added', touched: mergeRanges(anchors), addedLines: addedWithin(h) });
  }

  return out.sort((x, y) => x.symbol.range.start - y.symbol.range.start || x.key.localeCompare(y.key));
}
