import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { BaseParser, ParseOptions, ParseResult } from './base';
import { ExportDeclarationPolicy, ImportBinding } from '../reexports/types';
import {
  extractExportDeclaration,
  extractImportBindings,
  walkModuleScope,
  ENTRY_POINT_FILE_NAME,
  PUBLIC_EXPORT_NAME,
} from './python/';

export interface PythonParseOptions extends ParseOptions {
  upstreamPackage: string;
  exportPolicy?: ExportDeclarationPolicy;
  exportName?: string;
}

export interface PythonParseResult extends ParseResult {
  bindings: ImportBinding[];
  publicExports: string[];
}

/**
 * Extracts upstream import bindings and the `__all__` export list from a
 * Python module in a single pass over its module scope.
 */
export class PythonParser extends BaseParser<PythonParseResult, PythonParseOptions> {
  constructor() {
    super('python');
  }

  getSupportedExtensions(): string[] {
    return ['.py', '.pyi'];
  }

  protected createTreeParser(): Parser {
    const parser = new Parser();
    parser.setLanguage(Python);
    return parser;
  }

  async parseFile(
    filePath: string,
    content: string,
    options: PythonParseOptions
  ): Promise<PythonParseResult> {
    const outcome = this.parseContent(content, options);

    if (outcome.error) {
      this.logger.debug('Syntax error in module', { filePath, error: outcome.error.message });
      return { bindings: [], publicExports: [], errors: [outcome.error] };
    }

    const exportPolicy = options.exportPolicy ?? 'append';
    const exportName = options.exportName ?? PUBLIC_EXPORT_NAME;
    const bindings: ImportBinding[] = [];
    let publicExports: string[] = [];

    walkModuleScope(outcome.tree.rootNode, node => {
      if (node.type === 'import_from_statement') {
        bindings.push(...extractImportBindings(node, options.upstreamPackage));
        return;
      }

      const declaration = extractExportDeclaration(node, exportName);
      if (!declaration) return;

      if (declaration.mode === 'assign' && exportPolicy === 'replace') {
        publicExports = [...declaration.names];
      } else {
        publicExports.push(...declaration.names);
      }
    });

    this.logger.debug('Parsed module', {
      filePath,
      bindings: bindings.length,
      publicExports: publicExports.length,
    });

    return { bindings, publicExports, errors: [] };
  }
}

/**
 * Module facts for one source text, on a parser of its own
 */
export async function extractModuleFacts(
  content: string,
  options: PythonParseOptions
): Promise<PythonParseResult> {
  return new PythonParser().parseFile(ENTRY_POINT_FILE_NAME, content, options);
}
