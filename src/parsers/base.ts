import Parser from 'tree-sitter';
import winston from 'winston';
import { createComponentLogger } from '../utils/logger';

export interface ParseError {
  message: string;
  line: number;
  column: number;
  severity: 'error' | 'warning';
}

export interface ParseResult {
  errors: ParseError[];
}

export interface ParseOptions {
  maxFileSize?: number;
}

export type ContentParseOutcome =
  | { tree: Parser.Tree; error: null }
  | { tree: null; error: ParseError };

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5MB

/**
 * Abstract base class for all language parsers
 *
 * Parsers hold no tree-sitter state between calls: every parse builds its own
 * tree-sitter instance through createTreeParser(), so one parser object can
 * serve many concurrent module analyses.
 */
export abstract class BaseParser<
  TResult extends ParseResult,
  TOptions extends ParseOptions = ParseOptions,
> {
  protected language: string;
  protected logger: winston.Logger;

  constructor(language: string) {
    this.language = language;
    this.logger = createComponentLogger(`parser-${language}`);
  }

  /**
   * Parse a file and extract the language-specific facts
   */
  abstract parseFile(filePath: string, content: string, options: TOptions): Promise<TResult>;

  /**
   * Get file extensions that this parser supports
   */
  abstract getSupportedExtensions(): string[];

  /**
   * Build a fresh tree-sitter parser for this language
   */
  protected abstract createTreeParser(): Parser;

  /**
   * Check if this parser can handle the given file
   */
  canParseFile(filePath: string): boolean {
    const extension = this.getFileExtension(filePath);
    return this.getSupportedExtensions().includes(extension);
  }

  /**
   * Parse content and return the syntax tree, or the first syntax error found
   */
  protected parseContent(content: string, options?: ParseOptions): ContentParseOutcome {
    const maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

    const byteLength = Buffer.byteLength(content, 'utf8');
    if (byteLength > maxFileSize) {
      return this.failure(
        `File is too large (${byteLength} bytes, limit: ${maxFileSize} bytes)`,
        1,
        1
      );
    }

    // Check for binary content (null bytes never appear in source text)
    if (content.indexOf('\0') !== -1) {
      return this.failure('Content appears to be binary', 1, 1);
    }

    // Normalize line endings to prevent parser issues
    const normalizedContent = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    let tree: Parser.Tree;
    try {
      // Large inputs need an explicit buffer size or the binding rejects them
      tree = this.createTreeParser().parse(normalizedContent, undefined, {
        bufferSize: Math.max(32 * 1024, normalizedContent.length * 2 + 1),
      });
    } catch (error) {
      this.logger.error('Failed to parse content', { error: (error as Error).message });
      return this.failure((error as Error).message, 1, 1);
    }

    if (tree.rootNode.hasError) {
      const errorNode = this.findFirstSyntaxError(tree.rootNode);
      const line = (errorNode ?? tree.rootNode).startPosition.row + 1;
      const column = (errorNode ?? tree.rootNode).startPosition.column + 1;
      const message =
        errorNode && errorNode.isMissing
          ? `invalid syntax: missing "${errorNode.type}" at line ${line}, column ${column}`
          : `invalid syntax at line ${line}, column ${column}`;
      return this.failure(message, line, column);
    }

    return { tree, error: null };
  }

  /**
   * Locate the earliest ERROR or missing node in document order
   */
  protected findFirstSyntaxError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
    if (node.type === 'ERROR' || node.isMissing) {
      return node;
    }

    for (const child of node.children) {
      if (child.hasError || child.isMissing) {
        const found = this.findFirstSyntaxError(child);
        if (found) {
          return found;
        }
      }
    }

    return null;
  }

  /**
   * Get file extension
   */
  protected getFileExtension(filePath: string): string {
    const parts = filePath.split('.');
    return parts.length > 1 ? `.${parts[parts.length - 1]}` : '';
  }

  private failure(message: string, line: number, column: number): ContentParseOutcome {
    return { tree: null, error: { message, line, column, severity: 'error' } };
  }
}
