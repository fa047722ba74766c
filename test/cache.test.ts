import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { ExtractOutcome } from '../src/core/collaborators';
import { cacheKey } from '../src/core/crypto';
import { FileAnalysisCache, LruCache, MemoryAnalysisCache } from '../src/core/providers/cache';
import { analysis, sym } from './helpers';

test('lru evicts the least recently used entry', () => {
  const lru = new LruCache<number>(2);
  lru.set('a', 1);
  lru.set('b', 2);
  assert.equal(lru.get('a'), 1);
  lru.set('c', 3);
  assert.equal(lru.get('b'), undefined);
  assert.equal(lru.get('a'), 1);
  assert.equal(lru.get('c'), 3);
  assert.equal(lru.size, 2);
  lru.clear();
  assert.equal(lru.size, 0);
});

const outcome: ExtractOutcome = {
  status: 'ok',
  analysis: analysis('src/a.py', [sym('src/a.py', 'run', 1, 4)], { imports: ['os'], calls: [{ name: 'print', line: 2 }] }),
};

test('memory cache is keyed by path and digest', async () => {
  const cache = new MemoryAnalysisCache();
  await cache.set({ path: 'src/a.py', digest: 'd1' }, outcome);
  assert.deepEqual(await cache.get({ path: 'src/a.py', digest: 'd1' }), outcome);
  assert.equal(await cache.get({ path: 'src/a.py', digest: 'd2' }), undefined);
});

test('file cache round-trips outcomes and treats invalid entries as misses', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-radar-cache-'));
  const cache = new FileAnalysisCache(dir);
  const key = { path: 'src/a.py', digest: 'd1' };

  assert.equal(await cache.get(key), undefined);
  await cache.set(key, outcome);
  assert.deepEqual(await cache.get(key), outcome);
  await cache.set({ path: 'src/b.py', digest: 'd1' }, { status: 'parse-error', message: 'bad token' });
  assert.deepEqual(await cache.get({ path: 'src/b.py', digest: 'd1' }), { status: 'parse-error', message: 'bad token' });

  assert.deepEqual((await fs.readdir(dir)).filter((f) => f.endsWith('.tmp')), []);

  await fs.writeJson(path.join(dir, `${cacheKey('src/a.py', 'd1')}.json`), { status: 'ok', analysis: { symbols: 3 } });
  assert.equal(await cache.get(key), undefined);
});

test('a corrupt cache file reads as a miss', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-radar-cache-'));
  const cache = new FileAnalysisCache(dir);
  await fs.writeFile(path.join(dir, `${cacheKey('src/a.py', 'd1')}.json`), '{"status": "ok", "analy');
  assert.equal(await cache.get({ path: 'src/a.py', digest: 'd1' }), undefined);
});
