import { dirnamePosix, normalizeRepoPath, stripExtension, toPosixPath } from '../paths';

export type GraphDirection = 'forward' | 'reverse';

function addEdge(map: Map<string, Set<string>>, from: string, to: string): void {
  const set = map.get(from);
  if (set) set.add(to);
  else map.set(from, new Set([to]));
}

/** Candidate repository stems (paths without extension) an import specifier may name. */
export function specifierStems(fromFile: string, spec: string): string[] {
  const s = toPosixPath(spec.trim());
  if (!s) return [];
  const dir = dirnamePosix(fromFile);

  if (s === '.' || s === '..' || s.startsWith('./') || s.startsWith('../')) {
    return [normalizeRepoPath(dir ? `${dir}/${s}` : s)];
  }

  const pyRelative = /^(\.+)([\w.]*)$/.exec(s);
  if (pyRelative) {
    const ups = (pyRelative[1] ?? '.').length - 1;
    const parts = dir ? dir.split('/') : [];
    const baseParts = parts.slice(0, Math.max(0, parts.length - ups));
    const rest = (pyRelative[2] ?? '').split('.').filter(Boolean);
    return [normalizeRepoPath([...baseParts, ...rest].join('/'))];
  }

  if (s.includes('/')) return [normalizeRepoPath(s)];
  if (/^[\w]+(\.[\w]+)+$/.test(s)) return [s.replace(/\./g, '/'), s];
  return [s];
}

/**
 * File-level import graph over one revision of the repository.
 * Only files registered through `addFile` count as having dependency data.
 */
export class DependencyGraph {
  private readonly forward = new Map<string, Set<string>>();
  private readonly reverse = new Map<string, Set<string>>();
  private readonly known = new Set<string>();
  private readonly byStem = new Map<string, string[]>();
  private readonly analyzed = new Set<string>();

  constructor(files: Iterable<string> = []) {
    for (const f of files) this.register(f);
  }

  static fromImports(imports: Iterable<[string, readonly string[]]>, extraFiles: Iterable<string> = []): DependencyGraph {
    const entries = Array.from(imports);
    const g = new DependencyGraph([...entries.map(([file]) => file), ...extraFiles]);
    for (const [file, specs] of entries) g.addFile(file, specs);
    return g;
  }

  private register(file: string): void {
    const p = normalizeRepoPath(file);
    if (this.known.has(p)) return;
    this.known.add(p);
    const stem = stripExtension(p);
    const list = this.byStem.get(stem);
    if (list) {
      list.push(p);
      list.sort();
    } else {
      this.byStem.set(stem, [p]);
    }
  }

  get files(): string[] {
    return Array.from(this.known).sort();
  }

  resolve(fromFile: string, spec: string): string | null {
    for (const stem of specifierStems(fromFile, spec)) {
      if (this.known.has(stem)) return stem;
      for (const candidate of [stem, `${stem}/index`, `${stem}/__init__`]) {
        const hit = this.byStem.get(candidate)?.[0];
        if (hit) return hit;
      }
    }
    return null;
  }

  addFile(file: string, specifiers: readonly string[]): void {
    const from = normalizeRepoPath(file);
    this.register(from);
    this.analyzed.add(from);
    for (const spec of specifiers) {
      const to = this.resolve(from, spec);
      if (!to || to === from) continue;
      addEdge(this.forward, from, to);
      addEdge(this.reverse, to, from);
    }
  }

  hasImportsFor(file: string): boolean {
    return this.analyzed.has(normalizeRepoPath(file));
  }

  dependencies(file: string): string[] {
    return Array.from(this.forward.get(normalizeRepoPath(file)) ?? []).sort();
  }

  dependents(file: string): string[] {
    return Array.from(this.reverse.get(normalizeRepoPath(file)) ?? []).sort();
  }

  /** Breadth-first closure from `starts`, excluding the starts themselves. */
  reachable(starts: Iterable<string>, direction: GraphDirection, maxDepth: number): Set<string> {
    const edges = direction === 'reverse' ? this.reverse : this.forward;
    const origin = new Set(Array.from(starts, normalizeRepoPath));
    const visited = new Set(origin);
    let frontier = Array.from(origin);
    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const f of frontier) {
        for (const n of edges.get(f) ?? []) {
          if (visited.has(n)) continue;
          visited.add(n);
          next.push(n);
        }
      }
      frontier = next;
    }
    for (const o of origin) visited.delete(o);
    return visited;
  }
}
