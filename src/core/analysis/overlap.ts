import { anyIntersect, intersectRanges } from '../diff/ranges';
import type { Overlap, OverlapSpan, SymbolOverlap } from '../types';
import { orderPair, touchedRanges, type PreparedFile, type PreparedProposal } from './prepared';

function fileOverlap(first: PreparedProposal, second: PreparedProposal, fa: PreparedFile, fb: PreparedFile): Overlap {
  const spansRaw = intersectRanges(touchedRanges(fa), touchedRanges(fb));
  const coarse = !fa.symbolsAvailable || !fb.symbolsAvailable;
  const index = fa.base ? fa.baseIndex : fb.baseIndex;

  const spans: OverlapSpan[] = [];
  for (const r of spansRaw) {
    if (coarse) {
      spans.push({ range: r });
      continue;
    }
    for (const part of index.attribute(r)) {
      spans.push(part.symbol ? { range: part.range, symbol: index.keyOf(part.symbol) } : { range: part.range });
    }
  }

  const symbols: SymbolOverlap[] = [];
  if (!coarse) {
    const byKey = new Map(fb.changed.map((c) => [c.key, c]));
    for (const a of fa.changed) {
      const b = byKey.get(a.key);
      if (!b) continue;
      symbols.push({ key: a.key, a, b, touchedIntersect: anyIntersect(a.touched, b.touched) });
    }
    symbols.sort((x, y) => x.key.localeCompare(y.key));
  }

  return {
    pair: [first.proposal.id, second.proposal.id],
    file: fa.key,
    hasLineOverlap: spansRaw.length > 0,
    spans,
    symbols,
    coarseFallback: coarse,
  };
}

/**
 * One Overlap per file both proposals touch, keyed by base path.
 * Swapping the arguments yields the same result.
 */
export function computeOverlaps(a: PreparedProposal, b: PreparedProposal): Overlap[] {
  const [first, second] = orderPair(a, b);
  const [small, large] = first.files.size <= second.files.size ? [first.files, second.files] : [second.files, first.files];
  const shared: string[] = [];
  for (const key of small.keys()) if (large.has(key)) shared.push(key);
  shared.sort();

  const out: Overlap[] = [];
  for (const key of shared) {
    const fa = first.files.get(key);
    const fb = second.files.get(key);
    if (fa && fb) out.push(fileOverlap(first, second, fa, fb));
  }
  return out;
}
