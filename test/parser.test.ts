import test from 'node:test';
import assert from 'node:assert/strict';
import { TreeSitterExtractor } from '../src/core/parser/extractor';
import { dottedModule, keepStrictlyNested, pathModule } from '../src/core/parser/utils';
import { sym } from './helpers';

const extractor = new TreeSitterExtractor();

const PY = [
  'import os',
  'from .models import User, Order as O',
  '',
  'class Store:',
  '    def get(self, key: str, default=None) -> str:',
  '        if key in self.data and default:',
  '            return self.data[key]',
  '        return default',
  '',
  'def run(items):',
  '    for x in items:',
  '        print(x)',
  '',
].join('\n');

test('python symbols, imports and calls', () => {
  const out = extractor.extract('pkg/store.py', PY);
  assert.equal(out.status, 'ok');
  if (out.status !== 'ok') return;
  const { analysis } = out;

  assert.equal(analysis.path, 'pkg/store.py');
  assert.deepEqual(analysis.imports, ['os', '.models', '.models.User', '.models.Order']);
  assert.deepEqual(analysis.calls, [{ name: 'print', line: 12 }]);
  assert.deepEqual(analysis.symbols, [
    { name: 'Store', kind: 'class', file: 'pkg/store.py', range: { start: 4, end: 8 }, signature: { params: [] }, module: 'pkg.store' },
    {
      name: 'get',
      kind: 'method',
      file: 'pkg/store.py',
      range: { start: 5, end: 8 },
      signature: {
        params: [{ name: 'self' }, { name: 'key', type: 'str' }, { name: 'default', optional: true }],
        returns: 'str',
      },
      module: 'pkg.store',
      complexity: 3,
      nesting: 1,
      parent: 'Store',
    },
    {
      name: 'run',
      kind: 'function',
      file: 'pkg/store.py',
      range: { start: 10, end: 12 },
      signature: { params: [{ name: 'items' }] },
      module: 'pkg.store',
      complexity: 2,
      nesting: 1,
    },
  ]);
});

const TS = [
  "import { readFile } from 'fs';",
  "import type { Config } from './config';",
  '',
  'export class Loader {',
  '  private cache = new Map<string, string>();',
  '',
  '  async load(path: string, opts?: Config): Promise<string> {',
  '    if (this.cache.has(path) || opts === undefined) {',
  "      return this.cache.get(path) ?? '';",
  '    }',
  '    return readFile(path);',
  '  }',
  '}',
  '',
  'export const parse = (text: string) => text.trim();',
  '',
  "const legacy = require('./legacy');",
  '',
].join('\n');

test('typescript symbols, imports and calls', () => {
  const out = extractor.extract('src/loader.ts', TS);
  assert.equal(out.status, 'ok');
  if (out.status !== 'ok') return;
  const { analysis } = out;

  assert.deepEqual(analysis.imports, ['fs', './config', './legacy']);
  assert.deepEqual(analysis.calls, [
    { name: 'Map', line: 5 },
    { name: 'has', line: 8 },
    { name: 'get', line: 9 },
    { name: 'readFile', line: 11 },
    { name: 'trim', line: 15 },
  ]);
  assert.deepEqual(analysis.symbols, [
    { name: 'Loader', kind: 'class', file: 'src/loader.ts', range: { start: 4, end: 13 }, signature: { params: [] }, module: 'src/loader' },
    {
      name: 'load',
      kind: 'method',
      file: 'src/loader.ts',
      range: { start: 7, end: 12 },
      signature: {
        params: [
          { name: 'path', type: 'string' },
          { name: 'opts', type: 'Config', optional: true },
        ],
        returns: 'Promise<string>',
      },
      module: 'src/loader',
      complexity: 4,
      nesting: 1,
      parent: 'Loader',
    },
    {
      name: 'parse',
      kind: 'function',
      file: 'src/loader.ts',
      range: { start: 15, end: 15 },
      signature: { params: [{ name: 'text', type: 'string' }] },
      module: 'src/loader',
      complexity: 1,
      nesting: 0,
    },
  ]);
});

test('else-if chains add complexity but not nesting', () => {
  const src = [
    'function pick(n: number): string {',
    '  if (n > 1) {',
    "    return 'many';",
    '  } else if (n === 1) {',
    "    return 'one';",
    '  }',
    "  return 'none';",
    '}',
    '',
  ].join('\n');
  const out = extractor.extract('pick.ts', src);
  assert.equal(out.status, 'ok');
  if (out.status !== 'ok') return;
  const [pick] = out.analysis.symbols;
  assert.equal(pick?.complexity, 3);
  assert.equal(pick?.nesting, 1);
  assert.equal(pick?.signature.returns, 'string');
});

test('syntax errors and unknown languages', () => {
  const broken = extractor.extract('bad.py', 'def broken(:\n    pass\n');
  assert.equal(broken.status, 'parse-error');
  if (broken.status === 'parse-error') assert.match(broken.message, /^bad\.py: python syntax error at line \d+$/);

  assert.deepEqual(extractor.extract('README.md', '# Title'), { status: 'unsupported' });
  assert.equal(extractor.supports('ui/App.tsx'), true);
  assert.equal(extractor.supports('notes.txt'), false);
});

test('module names and duplicate ranges', () => {
  assert.equal(dottedModule('src/pkg/__init__.py'), 'src.pkg');
  assert.equal(dottedModule('src/pkg/util.py'), 'src.pkg.util');
  assert.equal(pathModule('src/lib/index.ts'), 'src/lib/index');

  const outer = sym('a.ts', 'handler', 1, 3);
  const alias = sym('a.ts', 'inner', 1, 3);
  const other = sym('a.ts', 'other', 5, 6);
  assert.deepEqual(keepStrictlyNested([outer, alias, other]), [outer, other]);
});
