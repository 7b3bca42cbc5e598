import Parser from 'tree-sitter';

export const PUBLIC_EXPORT_NAME = '__all__';

export const ENTRY_POINT_FILE_NAME = '__init__.py';

/**
 * Statements whose bodies still execute in module scope
 */
export const MODULE_SCOPE_CONTAINERS = new Set([
  'block',
  'if_statement',
  'elif_clause',
  'else_clause',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
  'for_statement',
  'while_statement',
  'match_statement',
  'case_clause',
]);

export const SEQUENCE_LITERAL_TYPES = new Set(['list', 'tuple', 'expression_list']);

export const STRING_LITERAL_PATTERN = /^([A-Za-z]*)('''|"""|'|")/;

export type ExportDeclarationMode = 'assign' | 'extend';

export interface ExportDeclaration {
  mode: ExportDeclarationMode;
  names: string[];
  line_number: number;
}

export type ModuleScopeVisitor = (node: Parser.SyntaxNode) => void;
