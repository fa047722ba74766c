import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { CallSite, CodeSymbol, ParamDescriptor } from '../types';
import type { ExtractedFile, LanguageAdapter } from './adapter';
import { annotationText, dottedModule, keepStrictlyNested, lineRange, measureBody, namedChildren, type ShapeRules } from './utils';

const SHAPE: ShapeRules = {
  decisions: new Set([
    'if_statement',
    'elif_clause',
    'for_statement',
    'while_statement',
    'except_clause',
    'conditional_expression',
    'for_in_clause',
    'if_clause',
  ]),
  logical: { type: 'boolean_operator', operators: new Set(['and', 'or']) },
  blocks: new Set(['if_statement', 'for_statement', 'while_statement', 'try_statement', 'with_statement']),
  boundaries: new Set(['function_definition', 'class_definition', 'lambda']),
};

function param(p: Parser.SyntaxNode): ParamDescriptor | null {
  switch (p.type) {
    case 'identifier':
      return { name: p.text };
    case 'typed_parameter': {
      const name = p.namedChild(0);
      if (!name) return null;
      const out: ParamDescriptor = { name: name.text };
      const type = annotationText(p.childForFieldName('type'));
      if (type) out.type = type;
      return out;
    }
    case 'default_parameter':
    case 'typed_default_parameter': {
      const name = p.childForFieldName('name');
      if (!name) return null;
      const out: ParamDescriptor = { name: name.text, optional: true };
      const type = annotationText(p.childForFieldName('type'));
      if (type) out.type = type;
      return out;
    }
    case 'list_splat_pattern':
    case 'dictionary_splat_pattern':
      return { name: p.text, optional: true };
    default:
      return null;
  }
}

export class PythonAdapter implements LanguageAdapter {
  getLanguageId(): string {
    return 'python';
  }

  getTreeSitterLanguage(): unknown {
    return Python;
  }

  getSupportedFileExtensions(): string[] {
    return ['.py'];
  }

  extract(root: Parser.SyntaxNode, filePath: string): ExtractedFile {
    const symbols: CodeSymbol[] = [];
    const imports: string[] = [];
    const calls: CallSite[] = [];
    const module = dottedModule(filePath);

    const traverse = (n: Parser.SyntaxNode, owner: string | undefined) => {
      let childOwner = owner;

      if (n.type === 'import_statement') {
        for (const c of namedChildren(n)) {
          const target = c.type === 'aliased_import' ? c.childForFieldName('name') : c;
          if (target?.type === 'dotted_name') imports.push(target.text);
        }
      } else if (n.type === 'import_from_statement') {
        const from = n.childForFieldName('module_name');
        if (from) {
          imports.push(from.text);
          const sep = from.text.endsWith('.') ? '' : '.';
          for (const c of namedChildren(n)) {
            if (c.startIndex === from.startIndex) continue;
            const target = c.type === 'aliased_import' ? c.childForFieldName('name') : c;
            if (target?.type === 'dotted_name') imports.push(`${from.text}${sep}${target.text}`);
          }
        }
      } else if (n.type === 'call') {
        const nameNode = this.getCallNameNode(n.childForFieldName('function'));
        if (nameNode) calls.push({ name: nameNode.text, line: nameNode.startPosition.row + 1 });
      } else if (n.type === 'function_definition') {
        const nameNode = n.childForFieldName('name');
        if (nameNode) {
          const shape = measureBody(n.childForFieldName('body'), SHAPE);
          const sym: CodeSymbol = {
            name: nameNode.text,
            kind: owner ? 'method' : 'function',
            file: filePath,
            range: lineRange(n),
            signature: { params: namedChildren(n.childForFieldName('parameters')).flatMap((p) => param(p) ?? []) },
            module,
            complexity: shape.complexity,
            nesting: shape.nesting,
          };
          const returns = annotationText(n.childForFieldName('return_type'));
          if (returns) sym.signature.returns = returns;
          if (owner) sym.parent = owner;
          symbols.push(sym);
        }
        childOwner = undefined;
      } else if (n.type === 'class_definition') {
        const nameNode = n.childForFieldName('name');
        if (nameNode) {
          symbols.push({
            name: nameNode.text,
            kind: 'class',
            file: filePath,
            range: lineRange(n),
            signature: { params: [] },
            module,
          });
        }
        childOwner = nameNode?.text;
      }

      for (let i = 0; i < n.childCount; i++) {
        const c = n.child(i);
        if (c) traverse(c, childOwner);
      }
    };

    traverse(root, undefined);
    return { symbols: keepStrictlyNested(symbols), imports: Array.from(new Set(imports)), calls };
  }

  private getCallNameNode(node: Parser.SyntaxNode | null): Parser.SyntaxNode | null {
    if (!node) return null;
    if (node.type === 'identifier') return node;
    if (node.type === 'attribute') return node.childForFieldName('attribute');
    return null;
  }
}
