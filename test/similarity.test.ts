import test from 'node:test';
import assert from 'node:assert/strict';
import { duplicationScore, jaccardSimilarity, measureSimilarity, nameSimilarity, tokenize } from '../src/core/analysis/similarity';
import type { ChangedSymbol } from '../src/core/types';
import { captureLogger } from './helpers';

function added(name: string, lines: string[]): ChangedSymbol {
  return {
    key: name,
    change: 'added',
    touched: [{ start: 0, end: 0 }],
    addedLines: lines,
    symbol: { name, kind: 'function', file: 'a.py', range: { start: 1, end: lines.length }, signature: { params: [] }, module: 'a' },
  };
}

test('tokens are lowercased words', () => {
  assert.deepEqual(tokenize('def Fetch_User(id):'), ['def', 'fetch_user', 'id']);
});

test('jaccard over token sets', () => {
  assert.equal(jaccardSimilarity(['a', 'b'], ['b', 'c']), 1 / 3);
  assert.equal(jaccardSimilarity([], ['a']), 0);
});

test('name similarity tiers', () => {
  assert.equal(nameSimilarity('fetch_user', 'fetch_user'), 1);
  assert.equal(nameSimilarity('fetch_user', 'fetchUser'), 0.95);
  assert.equal(nameSimilarity('fetch', 'fetchAll'), 0.7);
  assert.equal(nameSimilarity('abc', 'xyz'), 0);
});

test('a throwing measure falls back to jaccard and logs it', async () => {
  const { logger, records } = captureLogger();
  const res = await measureSimilarity(
    () => {
      throw new Error('model offline');
    },
    ['a', 'b'],
    ['b', 'c'],
    logger,
  );
  assert.deepEqual(res, { value: 1 / 3, fellBack: true });
  assert.equal(records.length, 1);
  assert.equal(records[0]?.msg, 'similarity_fallback');
  assert.equal(records[0]?.reason, 'model offline');
});

test('an out-of-range answer also falls back', async () => {
  const res = await measureSimilarity(() => 3, ['a'], ['a']);
  assert.deepEqual(res, { value: 1, fellBack: true });
});

test('duplication blends name and token similarity', async () => {
  const x = added('parse_date', ['return datetime.strptime(s, fmt)']);
  const y = added('parse_date', ['return datetime.strptime(s, fmt)']);
  const res = await duplicationScore(x, y, undefined);
  assert.equal(res.value, 1 * 0.4 + 1 * 0.6);
  assert.equal(res.fellBack, false);
});
