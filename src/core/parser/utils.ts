import Parser from 'tree-sitter';
import { splitPosixPath, stripExtension } from '../paths';
import type { CodeSymbol, LineRange } from '../types';

export const lineRange = (n: Parser.SyntaxNode): LineRange => ({
  start: n.startPosition.row + 1,
  end: n.endPosition.row + 1,
});

export const namedChildren = (n: Parser.SyntaxNode | null): Parser.SyntaxNode[] => {
  const out: Parser.SyntaxNode[] = [];
  if (!n) return out;
  for (let i = 0; i < n.namedChildCount; i++) {
    const c = n.namedChild(i);
    if (c) out.push(c);
  }
  return out;
};

/** Type text without the leading `:` or `->` of an annotation. */
export const annotationText = (n: Parser.SyntaxNode | null): string | undefined => {
  if (!n) return undefined;
  const t = n.text.replace(/^\s*(?::|->)\s*/, '').trim();
  return t || undefined;
};

/** First syntax error in the tree, as a 1-based line. */
export const firstErrorLine = (root: Parser.SyntaxNode): number | null => {
  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    if (n.type === 'ERROR') return n.startPosition.row + 1;
    for (let i = n.childCount - 1; i >= 0; i--) {
      const c = n.child(i);
      if (c) stack.push(c);
    }
  }
  return null;
};

export interface ShapeRules {
  decisions: ReadonlySet<string>;
  /** Binary operator node type and the operators in it that branch. */
  logical?: { type: string; operators: ReadonlySet<string> };
  blocks: ReadonlySet<string>;
  /** Nested definitions; their bodies belong to their own symbol. */
  boundaries: ReadonlySet<string>;
  /** `else if` style chains that should not deepen nesting. */
  chained?: (n: Parser.SyntaxNode) => boolean;
}

/** Cyclomatic complexity and control-flow nesting depth of one callable body. */
export function measureBody(body: Parser.SyntaxNode | null, rules: ShapeRules): { complexity: number; nesting: number } {
  let complexity = 1;
  let nesting = 0;
  const walk = (n: Parser.SyntaxNode, depth: number) => {
    if (rules.boundaries.has(n.type)) return;
    if (rules.decisions.has(n.type)) complexity++;
    if (rules.logical && n.type === rules.logical.type) {
      const op = n.childForFieldName('operator');
      if (op && rules.logical.operators.has(op.type)) complexity++;
    }
    let next = depth;
    if (rules.blocks.has(n.type) && !(rules.chained?.(n) ?? false)) {
      next = depth + 1;
      nesting = Math.max(nesting, next);
    }
    for (let i = 0; i < n.childCount; i++) {
      const c = n.child(i);
      if (c) walk(c, next);
    }
  };
  if (body) walk(body, 0);
  return { complexity, nesting };
}

/** Symbols come out in pre-order; a later symbol with an already-seen range is dropped. */
export function keepStrictlyNested(symbols: CodeSymbol[]): CodeSymbol[] {
  const seen = new Set<string>();
  return symbols.filter((s) => {
    const k = `${s.range.start}:${s.range.end}`;
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

export function pathModule(filePath: string): string {
  return stripExtension(filePath);
}

export function dottedModule(filePath: string): string {
  const parts = splitPosixPath(stripExtension(filePath));
  if (parts[parts.length - 1] === '__init__') parts.pop();
  return parts.join('.');
}

export const unquote = (s: string): string => s.replace(/^['"`]|['"`]$/g, '');
