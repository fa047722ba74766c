import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import type { AnalysisCache, AnalysisCacheKey, ExtractOutcome } from '../collaborators';
import { cacheKey } from '../crypto';
import { FileAnalysisSchema } from '../schemas';

export class LruCache<V> {
  private maxSize: number;
  private map: Map<string, V>;

  constructor(maxSize: number) {
    this.maxSize = Math.max(1, maxSize);
    this.map = new Map();
  }

  get size(): number {
    return this.map.size;
  }

  get(key: string): V | undefined {
    if (!this.map.has(key)) return undefined;
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    if (this.map.size > this.maxSize) {
      const first = this.map.keys().next();
      if (!first.done) this.map.delete(first.value);
    }
  }

  clear(): void {
    this.map.clear();
  }
}

function keyString(key: AnalysisCacheKey): string {
  return cacheKey(key.path, key.digest);
}

export class MemoryAnalysisCache implements AnalysisCache {
  private readonly lru: LruCache<ExtractOutcome>;

  constructor(maxEntries = 2000) {
    this.lru = new LruCache(maxEntries);
  }

  async get(key: AnalysisCacheKey): Promise<ExtractOutcome | undefined> {
    return this.lru.get(keyString(key));
  }

  async set(key: AnalysisCacheKey, value: ExtractOutcome): Promise<void> {
    this.lru.set(keyString(key), value);
  }
}

const ExtractOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok'), analysis: FileAnalysisSchema }),
  z.object({ status: z.literal('unsupported') }),
  z.object({ status: z.literal('parse-error'), message: z.string() }),
]);

/**
 * One JSON file per key. Writes go to a temp file renamed into place, so a
 * concurrent reader sees either the old entry or the new one. Unreadable or
 * invalid entries are misses.
 */
export class FileAnalysisCache implements AnalysisCache {
  constructor(readonly dir: string) {}

  private file(key: AnalysisCacheKey): string {
    return path.join(this.dir, `${keyString(key)}.json`);
  }

  async get(key: AnalysisCacheKey): Promise<ExtractOutcome | undefined> {
    const file = this.file(key);
    if (!(await fs.pathExists(file))) return undefined;
    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch {
      // corrupt or half-written entry
      return undefined;
    }
    const res = ExtractOutcomeSchema.safeParse(raw);
    return res.success ? res.data : undefined;
  }

  async set(key: AnalysisCacheKey, value: ExtractOutcome): Promise<void> {
    const file = this.file(key);
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    await fs.outputJson(tmp, value);
    await fs.move(tmp, file, { overwrite: true });
  }
}
