import type { LineRange } from '../types';

/** Closed-interval test; touching endpoints overlap. */
export function rangesIntersect(a: LineRange, b: LineRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}

export function containsLine(r: LineRange, line: number): boolean {
  return r.start <= line && line <= r.end;
}

export function rangeLength(r: LineRange): number {
  return r.end - r.start + 1;
}

/** Sort and coalesce overlapping or adjacent ranges. */
export function mergeRanges(ranges: readonly LineRange[]): LineRange[] {
  const sorted = ranges.map((r) => ({ start: r.start, end: r.end })).sort((a, b) => a.start - b.start || a.end - b.end);
  const out: LineRange[] = [];
  for (const r of sorted) {
    const last = out[out.length - 1];
    if (last && r.start <= last.end + 1) {
      last.end = Math.max(last.end, r.end);
    } else {
      out.push(r);
    }
  }
  return out;
}

/** Pairwise intersection of two range lists by sorted merge. */
export function intersectRanges(a: readonly LineRange[], b: readonly LineRange[]): LineRange[] {
  const xs = mergeRanges(a);
  const ys = mergeRanges(b);
  const out: LineRange[] = [];
  let i = 0;
  let j = 0;
  while (i < xs.length && j < ys.length) {
    const x = xs[i];
    const y = ys[j];
    if (!x || !y) break;
    if (rangesIntersect(x, y)) {
      out.push({ start: Math.max(x.start, y.start), end: Math.min(x.end, y.end) });
    }
    if (x.end < y.end) i++;
    else j++;
  }
  return out;
}

export function anyIntersect(a: readonly LineRange[], b: readonly LineRange[]): boolean {
  return intersectRanges(a, b).length > 0;
}

export function formatRange(r: LineRange): string {
  return r.start === r.end ? `line ${r.start}` : `lines ${r.start}-${r.end}`;
}
