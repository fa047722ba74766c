import path from 'path';
import Parser from 'tree-sitter';
import type { AstExtractor, ExtractOutcome } from '../collaborators';
import { errorMessage } from '../errors';
import { toPosixPath } from '../paths';
import type { LanguageAdapter } from './adapter';
import { PythonAdapter } from './python';
import { TypeScriptAdapter } from './typescript';
import { firstErrorLine } from './utils';

export function defaultAdapters(): LanguageAdapter[] {
  return [new TypeScriptAdapter(false), new TypeScriptAdapter(true), new PythonAdapter()];
}

/** Symbols, imports and call sites via tree-sitter. A tree with any ERROR node is a parse error. */
export class TreeSitterExtractor implements AstExtractor {
  private parser: Parser;
  private byExtension = new Map<string, LanguageAdapter>();

  constructor(adapters: LanguageAdapter[] = defaultAdapters()) {
    this.parser = new Parser();
    for (const a of adapters) {
      for (const ext of a.getSupportedFileExtensions()) this.byExtension.set(ext, a);
    }
  }

  private pick(filePath: string): LanguageAdapter | undefined {
    return this.byExtension.get(path.extname(filePath).toLowerCase());
  }

  supports(filePath: string): boolean {
    return this.pick(filePath) !== undefined;
  }

  private parse(content: string): Parser.Tree {
    try {
      return this.parser.parse(content);
    } catch (e) {
      if (!errorMessage(e).includes('Invalid argument')) throw e;
      return this.parser.parse(content, undefined, { bufferSize: 1024 * 1024 });
    }
  }

  extract(filePath: string, content: string): ExtractOutcome {
    const adapter = this.pick(filePath);
    if (!adapter) return { status: 'unsupported' };
    const file = toPosixPath(filePath);

    this.parser.setLanguage(adapter.getTreeSitterLanguage());
    let tree: Parser.Tree;
    try {
      tree = this.parse(content);
    } catch (e) {
      return { status: 'parse-error', message: `${file}: ${errorMessage(e)}` };
    }

    const errorLine = firstErrorLine(tree.rootNode);
    if (errorLine !== null) {
      return { status: 'parse-error', message: `${file}: ${adapter.getLanguageId()} syntax error at line ${errorLine}` };
    }
    const out = adapter.extract(tree.rootNode, file);
    return { status: 'ok', analysis: { path: file, ...out } };
  }
}
