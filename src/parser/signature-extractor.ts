import type { SyntaxNode } from 'tree-sitter';
import { basename } from 'path';
import { PythonParser, type ParseResult } from './python-parser.js';
import { UnanalyzableUnitError } from './errors.js';
import { isPrivateName } from '../types/signature.js';
import type {
  CallableKind,
  CallableSignature,
  ClassSignature,
  ModuleSignature,
  Parameter,
  SignatureNode,
} from '../types/signature.js';

type Scope = 'module' | 'class' | 'function';

const STRING_LITERAL_RE = /^([rRuU]*)("""|'''|"|')([\s\S]*)\2$/;

// Bodies of these nodes belong to another callable.
const NESTED_SCOPES = new Set(['function_definition', 'class_definition', 'lambda']);

const SPLAT_PATTERNS = new Set(['list_splat_pattern', 'dictionary_splat_pattern']);

/**
 * Normalize docstring indentation the way Python's `inspect.cleandoc` does.
 *
 * Returns null for docstrings that are empty once cleaned.
 */
export function cleanDocstring(raw: string): string | null {
  const lines = raw.replace(/\t/g, '        ').split(/\r?\n/);
  const rest = lines.slice(1);

  let margin = Number.POSITIVE_INFINITY;
  for (const line of rest) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = [
    (lines[0] ?? '').trim(),
    ...rest.map((line) => (Number.isFinite(margin) ? line.slice(margin) : line).trimEnd()),
  ];

  while (cleaned.length > 0 && cleaned[0] === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') cleaned.pop();

  return cleaned.length > 0 ? cleaned.join('\n') : null;
}

export class SignatureExtractor {
  private source: string;
  private filePath: string;

  constructor(private parseResult: ParseResult) {
    this.source = parseResult.source;
    this.filePath = parseResult.filePath;
  }

  extractModule(): ModuleSignature {
    const root = this.parseResult.tree.rootNode;

    const errorNode = PythonParser.findAllByType(root, 'ERROR')[0];
    if (errorNode) {
      throw new UnanalyzableUnitError(
        this.filePath,
        `syntax error at line ${PythonParser.getLine(errorNode)}`
      );
    }

    const name = basename(this.filePath);
    return {
      kind: 'module',
      name,
      filePath: this.filePath,
      line: 0,
      docstring: this.extractDocstring(root),
      isPrivate: isPrivateName(basename(this.filePath, '.py')),
      children: this.extractDefinitions(root, 'module'),
    };
  }

  private getText(node: SyntaxNode): string {
    return PythonParser.getNodeText(node, this.source);
  }

  private statements(body: SyntaxNode): SyntaxNode[] {
    return body.children.filter((child) => child.type !== 'comment');
  }

  private namedParts(node: SyntaxNode): SyntaxNode[] {
    return node.namedChildren.filter((child) => child.type !== 'comment');
  }

  /**
   * The docstring is the first statement of a body when it is a plain string literal.
   */
  private extractDocstring(body: SyntaxNode | null): string | null {
    if (!body) return null;

    const first = this.statements(body)[0];
    if (!first || first.type !== 'expression_statement' || first.children.length !== 1) return null;

    const contents = this.literalContents(first.children[0]);
    return contents === null ? null : cleanDocstring(contents);
  }

  /**
   * Unquoted text of a string literal, of adjacent literals (`"a" "b"`) or of
   * either in parentheses. Null for f-strings, bytes and anything else.
   */
  private literalContents(node: SyntaxNode | undefined): string | null {
    if (!node) return null;

    switch (node.type) {
      case 'string': {
        const match = this.getText(node).match(STRING_LITERAL_RE);
        return match ? (match[3] ?? '') : null;
      }
      case 'parenthesized_expression': {
        const inner = this.namedParts(node);
        return inner.length === 1 ? this.literalContents(inner[0]) : null;
      }
      case 'concatenated_string': {
        let text = '';
        for (const part of this.namedParts(node)) {
          const piece = this.literalContents(part);
          if (piece === null) return null;
          text += piece;
        }
        return text;
      }
      default:
        return null;
    }
  }

  private extractDefinitions(body: SyntaxNode, scope: Scope): SignatureNode[] {
    const definitions: SignatureNode[] = [];

    for (const statement of this.statements(body)) {
      let node = statement;
      let decorators: string[] = [];

      if (statement.type === 'decorated_definition') {
        const definition = statement.childForFieldName('definition');
        if (!definition) continue;
        decorators = this.extractDecorators(statement);
        node = definition;
      }

      if (node.type === 'class_definition') {
        const classDef = this.extractClass(node);
        if (classDef) definitions.push(classDef);
      } else if (node.type === 'function_definition') {
        const fnDef = this.extractCallable(node, this.classify(scope, decorators));
        if (fnDef) definitions.push(fnDef);
      }
    }

    return definitions;
  }

  private classify(scope: Scope, decorators: string[]): CallableKind {
    if (scope !== 'class') return 'function';
    return decorators.includes('staticmethod') ? 'staticmethod' : 'method';
  }

  /**
   * Decorator names reduced to their last dotted segment, call arguments dropped.
   */
  private extractDecorators(node: SyntaxNode): string[] {
    const names: string[] = [];
    for (const decorator of PythonParser.findChildrenByType(node, 'decorator')) {
      const expression = decorator.children.find((c) => c.type !== '@' && c.type !== 'comment');
      if (!expression) continue;

      const target = expression.type === 'call' ? expression.childForFieldName('function') : expression;
      if (!target) continue;

      const segments = this.getText(target).split('.');
      names.push((segments[segments.length - 1] ?? '').trim());
    }
    return names;
  }

  private extractClass(node: SyntaxNode): ClassSignature | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const name = this.getText(nameNode);
    const body = node.childForFieldName('body');

    return {
      kind: 'class',
      name,
      line: PythonParser.getLine(node),
      docstring: this.extractDocstring(body),
      isPrivate: isPrivateName(name),
      children: body ? this.extractDefinitions(body, 'class') : [],
    };
  }

  private extractCallable(node: SyntaxNode, kind: CallableKind): CallableSignature | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const name = this.getText(nameNode);
    const body = node.childForFieldName('body');
    const allParams = this.extractParameters(node);
    const hasReceiver = kind === 'method' && allParams.length > 0;

    return {
      kind,
      name,
      line: PythonParser.getLine(node),
      docstring: this.extractDocstring(body),
      isPrivate: isPrivateName(name),
      parameters: hasReceiver ? allParams.slice(1) : allParams,
      receiver: hasReceiver ? (allParams[0]?.name ?? null) : null,
      returnsValue: body ? this.containsValueReturn(body) : false,
      children: body ? this.extractDefinitions(body, 'function') : [],
    };
  }

  private extractParameters(node: SyntaxNode): Parameter[] {
    const params: Parameter[] = [];
    const paramList = node.childForFieldName('parameters');
    if (!paramList) return params;

    for (const child of paramList.children) {
      const param = this.extractParameter(child);
      if (param) params.push(param);
    }

    return params;
  }

  private extractParameter(node: SyntaxNode): Parameter | null {
    switch (node.type) {
      case 'identifier':
        return { name: this.getText(node), hasDefault: false };
      case 'default_parameter':
      case 'typed_default_parameter': {
        const nameNode = node.childForFieldName('name');
        return nameNode ? { name: this.getText(nameNode), hasDefault: true } : null;
      }
      case 'typed_parameter': {
        const inner = node.children.find((c) => c.type === 'identifier' || SPLAT_PATTERNS.has(c.type));
        return inner ? this.extractParameter(inner) : null;
      }
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern': {
        const nameNode = PythonParser.findChildByType(node, 'identifier');
        return nameNode ? { name: this.getText(nameNode), hasDefault: false } : null;
      }
      default:
        return null;
    }
  }

  /**
   * True when the body has a `return <expr>` or a `yield`, ignoring nested scopes.
   * A bare `return` does not count.
   */
  private containsValueReturn(node: SyntaxNode): boolean {
    for (const child of node.children) {
      if (NESTED_SCOPES.has(child.type)) continue;

      if (child.type === 'return_statement') {
        if (child.children.some((c) => c.type !== 'return' && c.type !== 'comment')) return true;
        continue;
      }
      if (child.type === 'yield' && child.childCount > 0) return true;
      if (this.containsValueReturn(child)) return true;
    }
    return false;
  }
}
