import Parser from 'tree-sitter';
import { MODULE_SCOPE_CONTAINERS, ModuleScopeVisitor } from './types';

/**
 * Visit every statement-level node that executes in module scope, in source order.
 *
 * Compound statements (if/try/with/for/while/match) are descended into, so
 * `if TYPE_CHECKING:` imports are seen. Function and class bodies are not
 * module scope and are never entered. Expression statements are unwrapped so
 * the visitor receives the assignment node itself.
 */
export function walkModuleScope(node: Parser.SyntaxNode, visit: ModuleScopeVisitor): void {
  for (const child of node.namedChildren) {
    if (MODULE_SCOPE_CONTAINERS.has(child.type)) {
      walkModuleScope(child, visit);
    } else if (child.type === 'expression_statement') {
      for (const expression of child.namedChildren) {
        visit(expression);
      }
    } else {
      visit(child);
    }
  }
}
