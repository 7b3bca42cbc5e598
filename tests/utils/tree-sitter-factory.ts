import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

function createTestParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

function parsePython(source: string): Parser.Tree {
  return createTestParser().parse(source);
}

/**
 * The first module-level statement, unwrapped from its expression_statement
 */
export function firstStatement(source: string): Parser.SyntaxNode {
  const statement = parsePython(source).rootNode.namedChildren[0];
  if (!statement) {
    throw new Error(`No statement in: ${source}`);
  }
  if (statement.type === 'expression_statement') {
    const expression = statement.namedChildren[0];
    if (!expression) {
      throw new Error(`Empty expression statement in: ${source}`);
    }
    return expression;
  }
  return statement;
}
