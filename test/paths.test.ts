import test from 'node:test';
import assert from 'node:assert/strict';
import { mergeRanges, intersectRanges, formatRange, rangesIntersect } from '../src/core/diff/ranges';
import { dirnamePosix, matchesAnyGlob, matchesGlob, normalizeRepoPath, stripExtension, toPosixPath } from '../src/core/paths';

test('paths are normalized to posix and collapse dot segments', () => {
  assert.equal(toPosixPath('src\\core\\a.ts'), 'src/core/a.ts');
  assert.equal(normalizeRepoPath('./src/../lib/a.ts'), 'lib/a.ts');
  assert.equal(dirnamePosix('src/a/b.ts'), 'src/a');
  assert.equal(stripExtension('src/a.test.ts'), 'src/a.test');
  assert.equal(stripExtension('.env'), '.env');
});

test('globs without a slash match the basename anywhere', () => {
  assert.equal(matchesGlob('web/vendor/app.min.js', '*.min.js'), true);
  assert.equal(matchesGlob('web/vendor/app.js', '*.min.js'), false);
  assert.equal(matchesGlob('deep/dir/yarn.lock', 'yarn.lock'), true);
});

test('double star crosses directories, single star does not', () => {
  assert.equal(matchesGlob('src/api/a.ts', 'src/**/*.ts'), true);
  assert.equal(matchesGlob('src/a.ts', 'src/**/*.ts'), true);
  assert.equal(matchesGlob('lib/a.ts', 'src/**'), false);
  assert.equal(matchesGlob('src/a.ts', './src/*.ts'), true);
  assert.equal(matchesGlob('src/x/a.ts', './src/*.ts'), false);
  assert.equal(matchesAnyGlob('docs/readme.md', ['*.lock', 'docs/**']), true);
});

test('ranges merge when adjacent and intersect on shared endpoints', () => {
  assert.deepEqual(mergeRanges([{ start: 5, end: 6 }, { start: 1, end: 2 }, { start: 3, end: 3 }]), [
    { start: 1, end: 3 },
    { start: 5, end: 6 },
  ]);
  assert.deepEqual(intersectRanges([{ start: 1, end: 5 }], [{ start: 5, end: 9 }]), [{ start: 5, end: 5 }]);
  assert.equal(rangesIntersect({ start: 1, end: 4 }, { start: 5, end: 6 }), false);
  assert.equal(formatRange({ start: 7, end: 7 }), 'line 7');
  assert.equal(formatRange({ start: 7, end: 9 }), 'lines 7-9');
});
