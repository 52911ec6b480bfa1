import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { readFileSync } from 'fs';
import type { SyntaxNode, Tree } from 'tree-sitter';

export interface ParseResult {
  tree: Tree;
  source: string;
  filePath: string;
}

// Sources are handed to tree-sitter in chunks; large strings passed in one
// piece exceed the binding's internal buffer.
const CHUNK_SIZE = 8192;

export class PythonParser {
  private parser: Parser;
  private initialized = false;

  constructor() {
    this.parser = new Parser();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.parser.setLanguage(Python);
    this.initialized = true;
  }

  parseFile(filePath: string): ParseResult {
    return this.parseSource(readFileSync(filePath, 'utf-8'), filePath);
  }

  parseSource(source: string, filePath = '<string>'): ParseResult {
    if (!this.initialized) {
      throw new Error('Parser not initialized. Call initialize() first.');
    }

    const tree = this.parser.parse((index: number) => source.slice(index, index + CHUNK_SIZE));
    return { tree, source, filePath };
  }

  static getNodeText(node: SyntaxNode, source: string): string {
    return source.slice(node.startIndex, node.endIndex);
  }

  static findChildByType(node: SyntaxNode, type: string): SyntaxNode | null {
    for (const child of node.children) {
      if (child.type === type) {
        return child;
      }
    }
    return null;
  }

  static findChildrenByType(node: SyntaxNode, type: string): SyntaxNode[] {
    return node.children.filter((child) => child.type === type);
  }

  static walkTree(node: SyntaxNode, callback: (node: SyntaxNode) => void): void {
    callback(node);
    for (const child of node.children) {
      PythonParser.walkTree(child, callback);
    }
  }

  static findAllByType(root: SyntaxNode, type: string): SyntaxNode[] {
    const results: SyntaxNode[] = [];
    PythonParser.walkTree(root, (node) => {
      if (node.type === type) {
        results.push(node);
      }
    });
    return results;
  }

  static getLine(node: SyntaxNode): number {
    return node.startPosition.row + 1;
  }
}
