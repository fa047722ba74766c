import test from 'node:test';
import assert from 'node:assert/strict';
import { ProviderError } from '../src/core/errors';
import {
  automationFromCommits,
  churnRates,
  LocalGitProvider,
  parseBranchList,
  parseChurnLog,
  parseCommitLog,
  type GitRunner,
} from '../src/core/providers/localGit';
import { captureLogger } from './helpers';

test('branch listing is tab separated', () => {
  assert.deepEqual(parseBranchList('feature/a\tAda\tAdd parser\nmain\tBob\tRelease 1.2\n\n'), [
    { branch: 'feature/a', author: 'Ada', subject: 'Add parser' },
    { branch: 'main', author: 'Bob', subject: 'Release 1.2' },
  ]);
});

const commitLog = [
  'Ada\x1fada@example.com\x1fFix parser\n\nCo-authored-by: Copilot <copilot@example.com>\n',
  '\ndependabot[bot]\x1fdeps@example.com\x1fBump zod',
  '\nGrace\x1fgrace@example.com\x1fRefactor cache',
  '\n',
].join('\x1e');

test('commit records are split on record and field separators', () => {
  assert.deepEqual(parseCommitLog(commitLog), [
    { author: 'Ada', email: 'ada@example.com', message: 'Fix parser\n\nCo-authored-by: Copilot <copilot@example.com>' },
    { author: 'dependabot[bot]', email: 'deps@example.com', message: 'Bump zod' },
    { author: 'Grace', email: 'grace@example.com', message: 'Refactor cache' },
  ]);
});

test('automation confidence is the share of flagged commits', () => {
  assert.deepEqual(automationFromCommits(parseCommitLog(commitLog)), {
    confidence: 2 / 3,
    signals: ['assistant-co-author', 'bot-author'],
  });
  assert.deepEqual(automationFromCommits([{ author: 'ci-bot', email: 'ci@example.com', message: 'Generated-by: codegen' }]), {
    confidence: 1,
    signals: ['bot-author', 'generated-trailer'],
  });
  assert.deepEqual(automationFromCommits([]), { confidence: 0, signals: [] });
});

test('churn rate is reverts and hotfixes over all commits per path', () => {
  const raw = [
    '',
    'Revert "add cache"\n\nsrc/cache.py\n',
    'Add cache\n\nsrc/cache.py\nsrc/app.py\n',
    'Hotfix: null check\n\nsrc/app.py\n',
    'Tidy imports\n\nsrc/app.py\n',
  ].join('\x1e');
  const commits = parseChurnLog(raw);
  assert.deepEqual(commits[0], { subject: 'Revert "add cache"', files: ['src/cache.py'] });
  assert.equal(commits.length, 4);
  assert.deepEqual(
    churnRates(commits, ['src/cache.py', 'src/app.py', 'src/none.py']),
    new Map([
      ['src/cache.py', 0.5],
      ['src/app.py', 1 / 3],
    ]),
  );
});

function fakeGit(branches: string): GitRunner {
  return {
    raw: async (args) => {
      if (args[0] === 'for-each-ref') return branches;
      if (args[0] === 'merge-base') {
        if (args[2] === 'feature/orphan') throw new Error('fatal: no merge base');
        return 'abc123\n';
      }
      return '';
    },
    show: async () => '',
  };
}

test('a branch without common history falls back to the target as its base', async () => {
  const { logger, records } = captureLogger();
  const provider = new LocalGitProvider({
    repoRoot: '.',
    git: fakeGit('feature/a\tAda\tAdd parser\nfeature/orphan\tBob\tImport history\nmain\tCi\tRelease\n'),
    logger,
  });
  const proposals = await provider.listOpenProposals(10);
  assert.deepEqual(
    proposals.map((p) => [p.id, p.baseRef, p.targetRef]),
    [
      ['feature/a', 'abc123', 'main'],
      ['feature/orphan', 'main', 'main'],
    ],
  );
  assert.equal(records[0]?.msg, 'merge_base_failed');
  assert.equal(records[0]?.branch, 'feature/orphan');
});

test('a failing branch listing is a provider error', async () => {
  const git: GitRunner = {
    raw: async () => {
      throw new Error('not a git repository');
    },
    show: async () => '',
  };
  const provider = new LocalGitProvider({ repoRoot: '.', git });
  await assert.rejects(
    provider.listOpenProposals(5),
    (e: unknown) => e instanceof ProviderError && e.message === 'local-git: cannot list branches: not a git repository',
  );
});
