import Parser from 'tree-sitter';
import { ImportBinding } from '../../reexports/types';
import {
  ExportDeclaration,
  PUBLIC_EXPORT_NAME,
  SEQUENCE_LITERAL_TYPES,
  STRING_LITERAL_PATTERN,
} from './types';

/**
 * True when `moduleName` is the upstream package itself or one of its submodules.
 * `langchain_core_extra` does not match `langchain_core`.
 */
export function matchesUpstreamModule(moduleName: string, upstreamPackage: string): boolean {
  return moduleName === upstreamPackage || moduleName.startsWith(`${upstreamPackage}.`);
}

function normalizeDottedName(text: string): string {
  return text.replace(/\s+/g, '');
}

/**
 * Extract the upstream bindings introduced by one `from ... import ...` statement.
 * Relative imports and wildcard imports produce no bindings.
 */
export function extractImportBindings(
  node: Parser.SyntaxNode,
  upstreamPackage: string
): ImportBinding[] {
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode || moduleNode.type !== 'dotted_name') {
    return [];
  }

  const originModule = normalizeDottedName(moduleNode.text);
  if (!matchesUpstreamModule(originModule, upstreamPackage)) {
    return [];
  }

  const bindings: ImportBinding[] = [];

  for (const nameNode of node.childrenForFieldName('name')) {
    if (nameNode.type === 'dotted_name') {
      const name = normalizeDottedName(nameNode.text);
      bindings.push({
        local_name: name,
        origin_module: originModule,
        original_name: name,
        line_number: nameNode.startPosition.row + 1,
      });
    } else if (nameNode.type === 'aliased_import') {
      const originalNode = nameNode.childForFieldName('name');
      const aliasNode = nameNode.childForFieldName('alias');
      if (!originalNode) continue;

      const originalName = normalizeDottedName(originalNode.text);
      bindings.push({
        local_name: aliasNode ? aliasNode.text : originalName,
        origin_module: originModule,
        original_name: originalName,
        line_number: nameNode.startPosition.row + 1,
      });
    }
  }

  return bindings;
}

/**
 * Extract a public export declaration from an assignment node.
 *
 * Handles `__all__ = [...]`, `__all__: list[str] = [...]`, chained
 * `x = __all__ = [...]` and `__all__ += [...]`. Only list and tuple literals
 * count (a bare `"a", "b"` is a tuple); elements that are not plain string
 * literals are skipped.
 */
export function extractExportDeclaration(
  node: Parser.SyntaxNode,
  exportName: string = PUBLIC_EXPORT_NAME
): ExportDeclaration | null {
  if (node.type === 'augmented_assignment') {
    const left = node.childForFieldName('left');
    const operator = node.childForFieldName('operator');
    const right = node.childForFieldName('right');

    if (!left || !right || !isNamedTarget(left, exportName) || operator?.text !== '+=') {
      return null;
    }
    if (!SEQUENCE_LITERAL_TYPES.has(right.type)) {
      return null;
    }

    return {
      mode: 'extend',
      names: extractStringElements(right),
      line_number: node.startPosition.row + 1,
    };
  }

  if (node.type !== 'assignment') {
    return null;
  }

  const targets: Parser.SyntaxNode[] = [];
  let current: Parser.SyntaxNode = node;
  let value: Parser.SyntaxNode | null = null;

  while (current.type === 'assignment') {
    const left = current.childForFieldName('left');
    if (left) {
      targets.push(left);
    }

    const right = current.childForFieldName('right');
    if (!right) {
      // Bare annotation without a value
      value = null;
      break;
    }
    if (right.type !== 'assignment') {
      value = right;
      break;
    }
    current = right;
  }

  if (!value || !targets.some(target => isNamedTarget(target, exportName))) {
    return null;
  }
  if (!SEQUENCE_LITERAL_TYPES.has(value.type)) {
    return null;
  }

  return {
    mode: 'assign',
    names: extractStringElements(value),
    line_number: node.startPosition.row + 1,
  };
}

function isNamedTarget(node: Parser.SyntaxNode, name: string): boolean {
  return node.type === 'identifier' && node.text === name;
}

function extractStringElements(sequence: Parser.SyntaxNode): string[] {
  const names: string[] = [];

  for (const element of sequence.namedChildren) {
    const value = stringLiteralValue(unwrapParentheses(element));
    if (value !== null) {
      names.push(value);
    }
  }

  return names;
}

function unwrapParentheses(node: Parser.SyntaxNode): Parser.SyntaxNode {
  let current = node;
  while (current.type === 'parenthesized_expression') {
    const inner = current.namedChildren.find(child => child.type !== 'comment');
    if (!inner) break;
    current = inner;
  }
  return current;
}

/**
 * Value of a plain string literal node, or null when the node is anything else.
 * Byte strings and f-strings are not string constants and yield null.
 */
export function stringLiteralValue(node: Parser.SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    let joined = '';
    for (const part of node.namedChildren) {
      if (part.type === 'comment') continue;
      const value = stringLiteralValue(part);
      if (value === null) {
        return null;
      }
      joined += value;
    }
    return joined;
  }

  if (node.type !== 'string') {
    return null;
  }

  const text = node.text;
  const match = STRING_LITERAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const prefix = match[1].toLowerCase();
  const quote = match[2];
  if (prefix.includes('b') || prefix.includes('f')) {
    return null;
  }

  const body = text.slice(match[0].length, text.length - quote.length);
  return prefix.includes('r') ? body : decodeEscapes(body);
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const ESCAPE_PATTERN =
  /\\(\r?\n|[\\'"abfnrtv]|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3})/g;

export function decodeEscapes(body: string): string {
  return body.replace(ESCAPE_PATTERN, (_sequence, escape: string) => {
    if (escape === '\n' || escape === '\r\n') {
      return '';
    }
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      return simple;
    }
    if (/^[0-7]/.test(escape)) {
      return String.fromCodePoint(parseInt(escape, 8));
    }
    return String.fromCodePoint(parseInt(escape.slice(1), 16));
  });
}
