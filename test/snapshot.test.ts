import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { InputShapeError, ProviderError } from '../src/core/errors';
import { SnapshotProvider } from '../src/core/providers/snapshot';

const PATCH = [
  'diff --git a/src/app.py b/src/app.py',
  '--- a/src/app.py',
  '+++ b/src/app.py',
  '@@ -3,1 +3,1 @@',
  '-x = 1',
  '+x = 2',
  '',
].join('\n');

function provider(): SnapshotProvider {
  return SnapshotProvider.fromObject({
    proposals: [
      { id: 'pr-1', sourceRef: 'feature/a', targetRef: 'main', patch: PATCH },
      { id: 'pr-2', sourceRef: 'feature/b', targetRef: 'main', diffs: [{ path: 'src/b.py', change: 'added', hunks: [] }] },
      { id: 'pr-3', sourceRef: 'feature/c', targetRef: 'main' },
    ],
    contents: { main: { 'src/app.py': 'x = 1\n', 'src/lib.py': '' } },
    decisions: [
      { kind: 'removal', entity: 'old', proposalRef: 'PR-1', timestamp: '2026-01-01T00:00:00Z' },
      { kind: 'removal', entity: 'older', proposalRef: 'PR-0', timestamp: '2025-12-01T00:00:00Z' },
    ],
  });
}

test('proposals are listed without their diffs and with defaults filled', async () => {
  const list = await provider().listOpenProposals(2);
  assert.deepEqual(list, [
    { id: 'pr-1', title: '', sourceRef: 'feature/a', targetRef: 'main', author: 'unknown', labels: [], automation: { confidence: 0, signals: [] } },
    { id: 'pr-2', title: '', sourceRef: 'feature/b', targetRef: 'main', author: 'unknown', labels: [], automation: { confidence: 0, signals: [] } },
  ]);
});

test('structured diffs win, a patch is parsed, neither means no changes', async () => {
  const p = provider();
  assert.deepEqual(await p.getFileDiffs('pr-2'), [{ path: 'src/b.py', change: 'added', hunks: [] }]);
  assert.deepEqual(await p.getFileDiffs('pr-1'), [
    {
      path: 'src/app.py',
      change: 'modified',
      hunks: [
        {
          before: { start: 3, end: 3 },
          after: { start: 3, end: 3 },
          removed: [{ line: 3, text: 'x = 1' }],
          added: [{ line: 3, text: 'x = 2' }],
        },
      ],
    },
  ]);
  assert.deepEqual(await p.getFileDiffs('pr-3'), []);
});

test('contents, file listing and decisions', async () => {
  const p = provider();
  assert.equal(await p.getFileContent('src/app.py', 'main'), 'x = 1\n');
  assert.equal(await p.getFileContent('src/app.py', 'feature/a'), null);
  assert.deepEqual(await p.listFiles('main'), ['src/app.py', 'src/lib.py']);
  assert.deepEqual(
    (await p.recent(1)).map((d) => d.entity),
    ['old'],
  );
  assert.equal(p.hasChurn, false);
  assert.equal(p.hasDecisions, true);
});

test('comments and statuses are kept in memory', async () => {
  const p = provider();
  await p.postComment('pr-1', 'hello');
  await p.setStatus('pr-1', 'failure', 'risk 80/100');
  assert.deepEqual(p.comments, [{ proposalId: 'pr-1', body: 'hello' }]);
  assert.deepEqual(p.statuses, [{ proposalId: 'pr-1', state: 'failure', description: 'risk 80/100' }]);
});

test('unknown proposals are a provider error', async () => {
  await assert.rejects(provider().getFileDiffs('pr-9'), (e: unknown) => e instanceof ProviderError && e.message === 'snapshot: unknown proposal pr-9');
});

test('churn only reports known paths', async () => {
  const p = SnapshotProvider.fromObject({ proposals: [], churn: { 'a.py': 0.25 } });
  assert.equal(p.hasChurn, true);
  assert.deepEqual(await p.churn(['a.py', 'b.py']), new Map([['a.py', 0.25]]));
});

test('malformed snapshots are rejected with the failing path', () => {
  assert.throws(
    () => SnapshotProvider.fromObject({ proposals: [{ id: 'pr-1', targetRef: 'main' }] }),
    (e: unknown) => e instanceof InputShapeError && e.issues[0]?.path === 'proposals.0.sourceRef',
  );
});

test('snapshot files are read from disk', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-radar-snapshot-'));
  const file = path.join(dir, 'snapshot.json');
  await fs.writeJson(file, { proposals: [{ id: 'pr-1', sourceRef: 'a', targetRef: 'main' }] });
  assert.deepEqual(
    (await (await SnapshotProvider.fromFile(file)).listOpenProposals(5)).map((p) => p.id),
    ['pr-1'],
  );
  await fs.writeFile(file, '{ nope');
  await assert.rejects(SnapshotProvider.fromFile(file), (e: unknown) => e instanceof InputShapeError && e.source === file);
});
