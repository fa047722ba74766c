import type { DependencyGraph } from '../graph/dependencyGraph';
import { specifierStems } from '../graph/dependencyGraph';

const PY_IMPORT = /^\s*import\s+([\w.]+(?:\s+as\s+\w+)?(?:\s*,\s*[\w.]+(?:\s+as\s+\w+)?)*)/;
const PY_FROM = /^\s*from\s+([\w.]+)\s+import\s+\(?\s*([\w\s,*]+)/;
const JS_FROM = /\bfrom\s+['"]([^'"]+)['"]/;
const JS_SIDE_EFFECT = /^\s*import\s+['"]([^'"]+)['"]/;
const JS_REQUIRE = /\b(?:require|import)\(\s*['"]([^'"]+)['"]\s*\)/;
const GO_IMPORT = /^\s*(?:import\s+)?(?:[\w.]+\s+)?"([^"]+)"\s*$/;

/** Import specifiers on one source line, for files the extractor could not parse. */
export function scanImportLine(line: string, filePath: string): string[] {
  if (filePath.endsWith('.py')) {
    const from = PY_FROM.exec(line);
    if (from) {
      const mod = from[1] ?? '';
      const names = (from[2] ?? '')
        .split(',')
        .map((n) => n.trim().split(/\s+/)[0] ?? '')
        .filter((n) => n && n !== '*');
      return [mod, ...names.map((n) => (mod.endsWith('.') ? `${mod}${n}` : `${mod}.${n}`))];
    }
    const imp = PY_IMPORT.exec(line);
    if (imp) {
      return (imp[1] ?? '')
        .split(',')
        .map((p) => p.trim().split(/\s+/)[0] ?? '')
        .filter(Boolean);
    }
    return [];
  }
  if (filePath.endsWith('.go')) {
    const m = GO_IMPORT.exec(line);
    return m?.[1] ? [m[1]] : [];
  }
  const out: string[] = [];
  for (const re of [JS_FROM, JS_SIDE_EFFECT, JS_REQUIRE]) {
    const m = re.exec(line);
    if (m?.[1]) out.push(m[1]);
  }
  return Array.from(new Set(out));
}

/** Repository paths an import may refer to, for glob matching. */
export function importTargets(fromFile: string, spec: string, graph?: DependencyGraph): string[] {
  const out = new Set<string>();
  const resolved = graph?.resolve(fromFile, spec);
  if (resolved) out.add(resolved);
  for (const stem of specifierStems(fromFile, spec)) out.add(stem);
  return Array.from(out);
}
