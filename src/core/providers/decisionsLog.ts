import fs from 'fs-extra';
import path from 'path';
import type { DecisionsReader } from '../collaborators';
import { InputShapeError, errorMessage } from '../errors';
import { parseDecision } from '../schemas';
import type { Decision } from '../types';

/** Sort by timestamp descending; among equal timestamps the later entry comes first. */
export function newestFirst(decisions: readonly Decision[]): Decision[] {
  return decisions
    .map((d, i) => ({ d, i, t: Date.parse(d.timestamp) }))
    .sort((x, y) => y.t - x.t || y.i - x.i)
    .map((x) => x.d);
}

export class InMemoryDecisions implements DecisionsReader {
  constructor(private readonly decisions: readonly Decision[]) {}

  async recent(depth: number): Promise<Decision[]> {
    return newestFirst(this.decisions).slice(0, depth);
  }
}

/**
 * Append-only JSON-lines log of merge decisions.
 * The engine only reads through `recent`; `recordMerge` is the merge-time writer.
 */
export class DecisionsLog implements DecisionsReader {
  constructor(readonly file: string) {}

  static forRepo(repoRoot: string): DecisionsLog {
    return new DecisionsLog(path.join(repoRoot, '.merge-radar', 'decisions.jsonl'));
  }

  async readAll(): Promise<Decision[]> {
    if (!(await fs.pathExists(this.file))) return [];
    const text = await fs.readFile(this.file, 'utf-8');
    const out: Decision[] = [];
    text.split(/\r?\n/).forEach((line, i) => {
      if (!line.trim()) return;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (e) {
        throw new InputShapeError(`${this.file}:${i + 1}`, [{ path: '', message: `invalid JSON: ${errorMessage(e)}` }]);
      }
      out.push(parseDecision(raw, `${this.file}:${i + 1}`));
    });
    return out;
  }

  async recent(depth: number): Promise<Decision[]> {
    return newestFirst(await this.readAll()).slice(0, depth);
  }

  async recordMerge(entry: unknown): Promise<Decision> {
    const decision = parseDecision(entry, 'decision entry');
    await fs.ensureDir(path.dirname(this.file));
    await fs.appendFile(this.file, JSON.stringify(decision) + '\n', 'utf-8');
    return decision;
  }
}
