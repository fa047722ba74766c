import Parser from 'tree-sitter';
import TypeScript from 'tree-sitter-typescript';
import type { CallSite, CodeSymbol, ParamDescriptor, SymbolKind } from '../types';
import type { ExtractedFile, LanguageAdapter } from './adapter';
import { annotationText, keepStrictlyNested, lineRange, measureBody, namedChildren, pathModule, unquote, type ShapeRules } from './utils';

const FUNCTION_VALUES = new Set(['arrow_function', 'function', 'function_expression', 'generator_function']);

const SHAPE: ShapeRules = {
  decisions: new Set([
    'if_statement',
    'for_statement',
    'for_in_statement',
    'while_statement',
    'do_statement',
    'switch_case',
    'catch_clause',
    'ternary_expression',
  ]),
  logical: { type: 'binary_expression', operators: new Set(['&&', '||', '??']) },
  blocks: new Set(['if_statement', 'for_statement', 'for_in_statement', 'while_statement', 'do_statement', 'switch_statement', 'try_statement']),
  boundaries: new Set([
    'function_declaration',
    'generator_function_declaration',
    'function_expression',
    'function',
    'generator_function',
    'arrow_function',
    'method_definition',
    'class_declaration',
    'abstract_class_declaration',
    'class',
  ]),
  chained: (n) => n.type === 'if_statement' && n.parent?.type === 'else_clause',
};

const extractTsCalleeName = (callee: Parser.SyntaxNode | null): string | null => {
  if (!callee) return null;
  if (callee.type === 'identifier') return callee.text;
  if (callee.type === 'member_expression' || callee.type === 'optional_chain') {
    const prop = callee.childForFieldName('property');
    if (prop) return prop.text;
    const last = callee.namedChild(callee.namedChildCount - 1);
    if (last) return last.text;
  }
  return null;
};

const stringArg = (call: Parser.SyntaxNode): string | null => {
  const first = call.childForFieldName('arguments')?.namedChild(0);
  return first?.type === 'string' ? unquote(first.text) : null;
};

function params(fn: Parser.SyntaxNode): ParamDescriptor[] {
  const list = fn.childForFieldName('parameters');
  if (!list) {
    // `x => x + 1`
    const single = fn.childForFieldName('parameter');
    return single ? [{ name: single.text }] : [];
  }
  return namedChildren(list).flatMap((p): ParamDescriptor[] => {
    if (p.type === 'required_parameter' || p.type === 'optional_parameter') {
      const pattern = p.childForFieldName('pattern');
      if (!pattern || pattern.type === 'this') return [];
      const out: ParamDescriptor = { name: pattern.text };
      const type = annotationText(p.childForFieldName('type'));
      if (type) out.type = type;
      if (p.type === 'optional_parameter' || p.childForFieldName('value')) out.optional = true;
      return [out];
    }
    if (p.type === 'identifier' || p.type === 'rest_pattern' || p.type === 'object_pattern' || p.type === 'array_pattern') {
      return [{ name: p.text }];
    }
    if (p.type === 'assignment_pattern') {
      return [{ name: p.childForFieldName('left')?.text ?? p.text, optional: true }];
    }
    return [];
  });
}

export class TypeScriptAdapter implements LanguageAdapter {
  constructor(private isTsx: boolean = false) {}

  getLanguageId(): string {
    return this.isTsx ? 'tsx' : 'typescript';
  }

  getTreeSitterLanguage(): unknown {
    return this.isTsx ? TypeScript.tsx : TypeScript.typescript;
  }

  getSupportedFileExtensions(): string[] {
    return this.isTsx ? ['.tsx', '.jsx'] : ['.ts', '.mts', '.cts', '.js', '.mjs', '.cjs'];
  }

  extract(root: Parser.SyntaxNode, filePath: string): ExtractedFile {
    const symbols: CodeSymbol[] = [];
    const imports: string[] = [];
    const calls: CallSite[] = [];
    const module = pathModule(filePath);

    const pushSymbol = (
      name: string,
      kind: SymbolKind,
      span: Parser.SyntaxNode,
      fn: Parser.SyntaxNode | null,
      parent: string | undefined,
    ) => {
      const sym: CodeSymbol = {
        name,
        kind,
        file: filePath,
        range: lineRange(span),
        signature: { params: fn ? params(fn) : [] },
        module,
      };
      if (fn) {
        const returns = annotationText(fn.childForFieldName('return_type'));
        if (returns) sym.signature.returns = returns;
        const shape = measureBody(fn.childForFieldName('body'), SHAPE);
        sym.complexity = shape.complexity;
        sym.nesting = shape.nesting;
      }
      if (parent) sym.parent = parent;
      symbols.push(sym);
    };

    const traverse = (n: Parser.SyntaxNode, owner: string | undefined) => {
      let childOwner = owner;

      switch (n.type) {
        case 'import_statement':
        case 'export_statement': {
          const source = n.childForFieldName('source');
          if (source) imports.push(unquote(source.text));
          break;
        }
        case 'call_expression': {
          const fn = n.childForFieldName('function') ?? n.namedChild(0);
          if (fn?.type === 'import' || (fn?.type === 'identifier' && fn.text === 'require')) {
            const spec = stringArg(n);
            if (spec) imports.push(spec);
          } else {
            const callee = extractTsCalleeName(fn);
            if (callee) calls.push({ name: callee, line: (fn ?? n).startPosition.row + 1 });
          }
          break;
        }
        case 'new_expression': {
          const ctor = n.childForFieldName('constructor') ?? n.namedChild(0);
          const callee = extractTsCalleeName(ctor);
          if (callee) calls.push({ name: callee, line: (ctor ?? n).startPosition.row + 1 });
          break;
        }
        case 'function_declaration':
        case 'generator_function_declaration': {
          const name = n.childForFieldName('name');
          if (name) pushSymbol(name.text, 'function', n, n, undefined);
          childOwner = undefined;
          break;
        }
        case 'class_declaration':
        case 'abstract_class_declaration': {
          const name = n.childForFieldName('name');
          if (name) pushSymbol(name.text, 'class', n, null, undefined);
          childOwner = name?.text;
          break;
        }
        case 'method_definition': {
          const name = n.childForFieldName('name');
          if (name) pushSymbol(name.text, owner ? 'method' : 'function', n, n, owner);
          childOwner = undefined;
          break;
        }
        case 'public_field_definition': {
          const name = n.childForFieldName('name');
          const value = n.childForFieldName('value');
          if (name && value && FUNCTION_VALUES.has(value.type)) {
            pushSymbol(name.text, owner ? 'method' : 'function', n, value, owner);
            childOwner = undefined;
          }
          break;
        }
        case 'variable_declarator': {
          const name = n.childForFieldName('name');
          const value = n.childForFieldName('value');
          if (name?.type === 'identifier' && value && FUNCTION_VALUES.has(value.type)) {
            pushSymbol(name.text, 'function', n, value, undefined);
            childOwner = undefined;
          }
          break;
        }
        default:
          break;
      }

      for (let i = 0; i < n.childCount; i++) {
        const c = n.child(i);
        if (c) traverse(c, childOwner);
      }
    };

    traverse(root, undefined);
    return { symbols: keepStrictlyNested(symbols), imports: Array.from(new Set(imports)), calls };
  }
}
