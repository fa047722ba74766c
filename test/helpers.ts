import type { AstExtractor, ExtractOutcome } from '../src/core/collaborators';
import { errorMessage } from '../src/core/errors';
import { createLogger, type Logger } from '../src/core/log';
import type { PreparedFile, PreparedProposal } from '../src/core/analysis/prepared';
import { stripExtension } from '../src/core/paths';
import { parseFileAnalysis } from '../src/core/schemas';
import { deriveChangedSymbols } from '../src/core/symbols/changedSymbols';
import { SymbolIndex } from '../src/core/symbols/symbolIndex';
import type { CallSite, ChangeProposal, CodeSymbol, FileAnalysis, FileDiff, Hunk } from '../src/core/types';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function captureLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  process.env.MERGE_RADAR_LOG_LEVEL = 'debug';
  const records: Array<Record<string, unknown>> = [];
  const logger = createLogger({}, (line) => {
    const rec: unknown = JSON.parse(line);
    if (isRecord(rec)) records.push(rec);
  });
  return { logger, records };
}

export function silentLogger(): Logger {
  return createLogger({}, () => undefined);
}

export function moduleOf(file: string): string {
  return stripExtension(file).replace(/\//g, '.');
}

export function sym(file: string, name: string, start: number, end: number, extra: Partial<CodeSymbol> = {}): CodeSymbol {
  return {
    name,
    kind: 'function',
    file,
    range: { start, end },
    signature: { params: [] },
    module: moduleOf(file),
    ...extra,
  };
}

/** Removed lines are numbered from `before[0]`, added lines from `after[0]`. */
export function hunk(before: [number, number], after: [number, number], removed: string[] = [], added: string[] = []): Hunk {
  return {
    before: { start: before[0], end: before[1] },
    after: { start: after[0], end: after[1] },
    removed: removed.map((text, i) => ({ line: before[0] + i, text })),
    added: added.map((text, i) => ({ line: after[0] + i, text })),
  };
}

export function modified(path: string, hunks: Hunk[]): FileDiff {
  return { path, change: 'modified', hunks };
}

export function analysis(path: string, symbols: CodeSymbol[], extra: { imports?: string[]; calls?: CallSite[] } = {}): FileAnalysis {
  return { path, symbols, imports: extra.imports ?? [], calls: extra.calls ?? [] };
}

export function proposal(id: string, overrides: Partial<ChangeProposal> = {}): ChangeProposal {
  return {
    id,
    title: id,
    sourceRef: `refs/heads/${id}`,
    targetRef: 'main',
    author: 'dev',
    labels: [],
    automation: { confidence: 0, signals: [] },
    ...overrides,
  };
}

export interface FileSpec {
  diff: FileDiff;
  base?: FileAnalysis | null;
  head?: FileAnalysis | null;
}

/** Builds a prepared file the same way the engine does after extraction. */
export function preparedFile(spec: FileSpec): PreparedFile {
  const { diff } = spec;
  const base = spec.base ?? null;
  const head = spec.head ?? null;
  const symbolsAvailable = (diff.change === 'added' || base !== null) && (diff.change === 'removed' || head !== null);
  return {
    key: diff.previousPath ?? diff.path,
    diff,
    base,
    head,
    changed: symbolsAvailable ? deriveChangedSymbols(diff, base, head) : [],
    symbolsAvailable,
    baseIndex: new SymbolIndex(base?.symbols ?? []),
  };
}

export function prepared(p: ChangeProposal | string, files: FileSpec[]): PreparedProposal {
  const prop = typeof p === 'string' ? proposal(p) : p;
  return {
    proposal: prop,
    files: new Map(files.map((f) => {
      const pf = preparedFile(f);
      return [pf.key, pf];
    })),
    coverage: [],
  };
}

export interface JsonSymbol {
  name: string;
  kind?: CodeSymbol['kind'];
  range: [number, number];
  params?: string[];
  parent?: string;
}

/** File content understood by JsonExtractor. */
export function jsonSource(symbols: JsonSymbol[], extra: { imports?: string[]; calls?: CallSite[] } = {}): string {
  return JSON.stringify({ symbols, imports: extra.imports ?? [], calls: extra.calls ?? [] });
}

/**
 * Extractor over JSON file bodies, so engine tests can describe symbols without a grammar.
 * Content that is not JSON is a parse error.
 */
export class JsonExtractor implements AstExtractor {
  extracted = 0;

  constructor(private readonly extensions: readonly string[] = ['.py', '.ts']) {}

  supports(filePath: string): boolean {
    return this.extensions.some((ext) => filePath.endsWith(ext));
  }

  extract(filePath: string, content: string): ExtractOutcome {
    this.extracted++;
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e) {
      return { status: 'parse-error', message: `${filePath}: ${errorMessage(e)}` };
    }
    if (!isRecord(raw)) return { status: 'parse-error', message: `${filePath}: not an object` };
    const symbols: unknown[] = Array.isArray(raw.symbols) ? raw.symbols : [];
    return {
      status: 'ok',
      analysis: parseFileAnalysis(
        {
          path: filePath,
          symbols: symbols.map((s) => {
            if (!isRecord(s) || !Array.isArray(s.range)) return s;
            const params: unknown[] = Array.isArray(s.params) ? s.params : [];
            return {
              name: s.name,
              kind: s.kind ?? 'function',
              file: filePath,
              range: { start: s.range[0], end: s.range[1] },
              signature: { params: params.map((name) => ({ name })) },
              module: moduleOf(filePath),
              ...(s.parent === undefined ? {} : { parent: s.parent }),
            };
          }),
          imports: raw.imports ?? [],
          calls: raw.calls ?? [],
        },
        `symbols of ${filePath}`,
      ),
    };
  }
}
