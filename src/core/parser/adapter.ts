import Parser from 'tree-sitter';
import type { CallSite, CodeSymbol } from '../types';

export interface ExtractedFile {
  symbols: CodeSymbol[];
  imports: string[];
  calls: CallSite[];
}

export interface LanguageAdapter {
  getLanguageId(): string;
  getTreeSitterLanguage(): unknown;
  getSupportedFileExtensions(): string[];
  extract(root: Parser.SyntaxNode, filePath: string): ExtractedFile;
}
