import test from 'node:test';
import assert from 'node:assert/strict';
import { ConflictEngine, type EngineDeps } from '../src/core/analysis/engine';
import type { SemanticAdjudicator } from '../src/core/collaborators';
import { resolveConfig } from '../src/core/config';
import { SnapshotProvider } from '../src/core/providers/snapshot';
import type { AnalysisRun, ProposalReport } from '../src/core/types';
import { hunk, JsonExtractor, jsonSource, modified, silentLogger } from './helpers';

const APP = 'src/app.py';
const LIB = 'src/lib.py';
const NOW = new Date('2026-03-01T12:00:00Z');

const appBase = jsonSource(
  [
    { name: 'helper', range: [1, 5] },
    { name: 'compute', range: [7, 12] },
  ],
  { imports: ['src.lib'] },
);
const libBase = jsonSource([
  { name: 'fetch', range: [1, 3] },
  { name: 'retry', range: [9, 12] },
]);

const baseContents = { [APP]: appBase, [LIB]: libBase, 'docs/guide.md': '# Guide' };

interface ProposalFixture {
  id: string;
  diffs: unknown[];
  contents?: Record<string, string>;
}

function snapshot(specs: ProposalFixture[], extra: { churn?: Record<string, number> } = {}): SnapshotProvider {
  const contents: Record<string, Record<string, string>> = { main: baseContents };
  for (const s of specs) contents[s.id] = s.contents ?? { [APP]: appBase, [LIB]: libBase };
  return SnapshotProvider.fromObject({
    proposals: specs.map((s) => ({ id: s.id, title: s.id, sourceRef: s.id, targetRef: 'main', diffs: s.diffs })),
    contents,
    ...extra,
  });
}

function editApp(from: number, to: number) {
  const lines = Array.from({ length: to - from + 1 }, (_, i) => from + i);
  return modified(APP, [hunk([from, to], [from, to], lines.map((n) => `old ${n}`), lines.map((n) => `new ${n}`))]);
}

async function run(provider: SnapshotProvider, config: unknown = {}, deps: Partial<EngineDeps> = {}): Promise<AnalysisRun> {
  const engine = new ConflictEngine(resolveConfig(config), {
    provider,
    extractor: new JsonExtractor(),
    logger: silentLogger(),
    now: () => NOW,
    ...deps,
  });
  return engine.run();
}

function report(r: AnalysisRun, id: string): ProposalReport {
  const found = r.reports.find((x) => x.proposal.id === id);
  assert.ok(found, `no report for ${id}`);
  return found;
}

test('overlapping edits, an unrelated proposal and ignored paths', async () => {
  const provider = snapshot([
    { id: 'pr-1', diffs: [editApp(3, 4), modified('yarn.lock', [hunk([1, 1], [1, 1], ['a'], ['b'])])] },
    { id: 'pr-2', diffs: [editApp(4, 4)] },
    { id: 'pr-3', diffs: [modified('docs/guide.md', [hunk([1, 1], [1, 1], ['# Guide'], ['# Guide v2'])])] },
  ]);
  const r = await run(provider, { riskThreshold: 25 });

  assert.deepEqual(
    r.reports.map((x) => x.proposal.id),
    ['pr-1', 'pr-2', 'pr-3'],
  );
  assert.equal(r.deadlineExceeded, false);
  assert.deepEqual(r.skippedPairs, []);
  assert.equal(r.startedAt, NOW.toISOString());

  const one = report(r, 'pr-1');
  assert.deepEqual(
    one.conflicts.map((c) => [c.kind, c.severity, c.proposals, c.symbol]),
    [['hard', 'critical', ['pr-1', 'pr-2'], 'helper']],
  );
  assert.deepEqual(one.counts, { critical: 1, warning: 0, info: 0 });
  assert.deepEqual(one.noConflictWith, ['pr-3']);
  assert.deepEqual(one.coverage, []);
  assert.deepEqual(one.issues, []);
  assert.equal(one.risk.composite, 30);
  assert.equal(one.exceedsThreshold, true);
  assert.equal(one.risk.factors.churn.available, false);
  assert.equal(one.risk.factors.blastRadius.detail, '0 dependent files');

  const two = report(r, 'pr-2');
  assert.deepEqual(two.conflicts[0]?.proposals, ['pr-2', 'pr-1']);

  const three = report(r, 'pr-3');
  assert.deepEqual(three.conflicts, []);
  assert.deepEqual(three.noConflictWith, ['pr-1', 'pr-2']);
  assert.deepEqual(three.coverage, [{ file: 'docs/guide.md', reason: 'unsupported-language' }]);
  assert.equal(three.risk.composite, 0);
  assert.equal(three.exceedsThreshold, false);
});

test('a signature change and a new caller in another file', async () => {
  const libHead = jsonSource([
    { name: 'fetch', range: [1, 3], params: ['timeout'] },
    { name: 'retry', range: [9, 12] },
  ]);
  const appHead = jsonSource(
    [
      { name: 'helper', range: [1, 5] },
      { name: 'compute', range: [7, 13] },
    ],
    { imports: ['src.lib'] },
  );
  const provider = snapshot([
    {
      id: 'pr-4',
      diffs: [modified(LIB, [hunk([1, 1], [1, 1], ['def fetch():'], ['def fetch(timeout):'])])],
      contents: { [LIB]: libHead },
    },
    {
      id: 'pr-5',
      diffs: [
        modified(APP, [hunk([8, 8], [9, 9], [], ['    fetch()'])]),
        modified(LIB, [hunk([10, 10], [10, 10], ['    pass'], ['    return None'])]),
      ],
      contents: { [APP]: appHead, [LIB]: libBase },
    },
  ]);
  const r = await run(provider);

  const four = report(r, 'pr-4');
  assert.deepEqual(four.conflicts, [
    {
      kind: 'interface',
      severity: 'critical',
      proposals: ['pr-4', 'pr-5'],
      file: APP,
      symbol: 'fetch',
      explanation:
        'pr-4 changes the signature of fetch (fetch() -> fetch(timeout)); pr-5 calls it in edited code in src/app.py at line 8.',
      recommendation: 'Update the calls to fetch in pr-5 to the new signature before merging either proposal.',
    },
  ]);
  assert.equal(four.risk.factors.blastRadius.detail, '1 dependent files');
  assert.equal(four.risk.composite, 31.25);
  assert.deepEqual(report(r, 'pr-5').conflicts[0]?.proposals, ['pr-5', 'pr-4']);
});

test('pairs still running at the deadline are reported as skipped', async () => {
  const adjudicator: SemanticAdjudicator = { adjudicate: () => new Promise(() => undefined) };
  const provider = snapshot([
    { id: 'p1', diffs: [editApp(2, 2)] },
    { id: 'p2', diffs: [editApp(4, 4)] },
    { id: 'p3', diffs: [editApp(8, 8)] },
    { id: 'p4', diffs: [editApp(8, 9)] },
  ]);
  const r = await run(provider, { deadlineMs: 200 }, { adjudicator });

  assert.equal(r.deadlineExceeded, true);
  assert.deepEqual(r.skippedPairs, [['p1', 'p2']]);
  const p1 = report(r, 'p1');
  assert.deepEqual(p1.issues, [{ stage: 'deadline', message: 'pair not analyzed before the deadline', other: 'p2' }]);
  assert.deepEqual(p1.noConflictWith, ['p3', 'p4']);
  assert.deepEqual(
    report(r, 'p3').conflicts.map((c) => [c.kind, c.proposals]),
    [['hard', ['p3', 'p4']]],
  );
});

test('a proposal with malformed diffs is reported with an issue and the rest proceed', async () => {
  const provider = snapshot([
    { id: 'bad', diffs: [{ path: APP, change: 'modified', hunks: [{ before: { start: 4, end: 3 }, after: { start: 4, end: 4 } }] }] },
    { id: 'good', diffs: [editApp(2, 2)] },
  ]);
  const r = await run(provider);

  const bad = report(r, 'bad');
  assert.deepEqual(bad.issues, [
    { stage: 'prepare', message: 'Invalid diffs of bad:\n  [0.hunks.0.before] range start must not exceed end' },
  ]);
  assert.deepEqual(bad.conflicts, []);
  assert.equal(bad.risk.factors.patternDeviation.available, false);
  assert.equal(bad.risk.factors.blastRadius.available, false);
  assert.deepEqual(bad.noConflictWith, []);

  assert.deepEqual(report(r, 'good').issues, []);
});

test('an unreadable decisions log is noted without failing the run', async () => {
  const provider = snapshot([{ id: 'pr-1', diffs: [editApp(3, 3)] }]);
  const r = await run(provider, {}, {
    decisions: {
      recent: async () => {
        throw new Error('disk gone');
      },
    },
  });
  assert.deepEqual(report(r, 'pr-1').issues, [{ stage: 'regression', message: 'decisions log unavailable: disk gone' }]);
});

test('invalid proposal records are rejected and the rest are analyzed', async () => {
  const provider = snapshot([
    { id: 'pr-1', diffs: [editApp(3, 3)] },
    { id: 'pr-2', diffs: [editApp(3, 3)] },
  ]);
  const engine = new ConflictEngine(resolveConfig({}), {
    provider,
    extractor: new JsonExtractor(),
    logger: silentLogger(),
    now: () => NOW,
  });
  const record = (id: string) => ({ id, title: id, sourceRef: id, targetRef: 'main' });
  const r = await engine.run([
    record('pr-1'),
    { ...record('pr-2'), automation: { confidence: 1.5, signals: [] } },
    { title: 'no id' },
  ]);

  assert.deepEqual(
    r.reports.map((x) => x.proposal.id),
    ['pr-1'],
  );
  assert.deepEqual(r.rejected, [
    {
      index: 1,
      id: 'pr-2',
      issue: { stage: 'prepare', message: 'Invalid proposal #1:\n  [automation.confidence] Number must be less than or equal to 1' },
    },
    {
      index: 2,
      id: null,
      issue: {
        stage: 'prepare',
        message: 'Invalid proposal #2:\n  [id] Required\n  [sourceRef] Required\n  [targetRef] Required',
      },
    },
  ]);
});

test('a churn provider that never answers is cut off at the deadline', async () => {
  const provider = snapshot([{ id: 'pr-1', diffs: [editApp(3, 3)] }]);
  const r = await run(provider, { deadlineMs: 150 }, { churn: { churn: () => new Promise(() => undefined) } });

  assert.equal(r.deadlineExceeded, true);
  assert.deepEqual(r.skippedPairs, []);
  const one = report(r, 'pr-1');
  assert.equal(one.risk.factors.churn.available, false);
  assert.deepEqual(one.issues, [{ stage: 'deadline', message: 'churn provider did not answer before the deadline' }]);
});

test('churn rates feed the risk score', async () => {
  const provider = snapshot([{ id: 'pr-1', diffs: [editApp(3, 3)] }], { churn: { [APP]: 0.5 } });
  const r = await run(provider, {}, { churn: provider });
  const one = report(r, 'pr-1');
  assert.equal(one.risk.factors.churn.raw, 0.5);
  assert.equal(one.risk.composite, 7.5);
});

test('extractions are shared between proposals with the same content', async () => {
  const extractor = new JsonExtractor();
  const provider = snapshot([
    { id: 'pr-1', diffs: [editApp(3, 3)] },
    { id: 'pr-2', diffs: [editApp(9, 9)] },
  ]);
  await run(provider, {}, { extractor });
  // app.py and lib.py each have one distinct content across main and both branches.
  assert.equal(extractor.extracted, 2);
});
