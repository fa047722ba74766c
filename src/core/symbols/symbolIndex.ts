import type { CodeSymbol, LineRange } from '../types';

export function qualifiedName(s: CodeSymbol): string {
  return s.parent ? `${s.parent}.${s.name}` : s.name;
}

export interface AttributedSpan {
  range: LineRange;
  symbol?: CodeSymbol;
}

/**
 * Range index over one file's symbols.
 * Lookups binary-search the (start asc, end desc) order and climb parent links
 * to the innermost symbol containing the line.
 */
export class SymbolIndex {
  private readonly sorted: CodeSymbol[];
  private readonly parents: number[];
  private readonly keys = new Map<CodeSymbol, string>();
  private readonly byKey = new Map<string, CodeSymbol>();

  constructor(symbols: readonly CodeSymbol[]) {
    const seen = new Map<string, number>();
    for (const s of symbols) {
      const base = qualifiedName(s);
      const n = (seen.get(base) ?? 0) + 1;
      seen.set(base, n);
      const key = n === 1 ? base : `${base}#${n}`;
      this.keys.set(s, key);
      this.byKey.set(key, s);
    }

    this.sorted = symbols.slice().sort((a, b) => a.range.start - b.range.start || b.range.end - a.range.end);
    this.parents = new Array<number>(this.sorted.length).fill(-1);
    const stack: number[] = [];
    this.sorted.forEach((s, i) => {
      while (stack.length > 0) {
        const top = this.sorted[stack[stack.length - 1] ?? -1];
        if (top && top.range.end >= s.range.start) break;
        stack.pop();
      }
      this.parents[i] = stack.length > 0 ? stack[stack.length - 1] ?? -1 : -1;
      stack.push(i);
    });
  }

  get size(): number {
    return this.sorted.length;
  }

  all(): CodeSymbol[] {
    return this.sorted.slice();
  }

  keyOf(s: CodeSymbol): string {
    return this.keys.get(s) ?? qualifiedName(s);
  }

  get(key: string): CodeSymbol | undefined {
    return this.byKey.get(key);
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  innermostAt(line: number): CodeSymbol | undefined {
    let lo = 0;
    let hi = this.sorted.length - 1;
    let idx = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const s = this.sorted[mid];
      if (s && s.range.start <= line) {
        idx = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    while (idx >= 0) {
      const s = this.sorted[idx];
      if (s && s.range.end >= line) return s;
      idx = this.parents[idx] ?? -1;
    }
    return undefined;
  }

  /** Split a range into maximal runs sharing the same innermost symbol. */
  attribute(range: LineRange): AttributedSpan[] {
    const out: AttributedSpan[] = [];
    let runStart = range.start;
    let runSymbol = this.innermostAt(range.start);
    for (let line = range.start + 1; line <= range.end + 1; line++) {
      const s = line <= range.end ? this.innermostAt(line) : undefined;
      if (line > range.end || s !== runSymbol) {
        out.push(runSymbol ? { range: { start: runStart, end: line - 1 }, symbol: runSymbol } : { range: { start: runStart, end: line - 1 } });
        runStart = line;
        runSymbol = s;
      }
    }
    return out;
  }
}
