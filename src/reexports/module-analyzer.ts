import fs from 'fs/promises';
import winston from 'winston';
import { PythonParser } from '../parsers/python';
import { createComponentLogger } from '../utils/logger';
import {
  BindingConflictError,
  resolveBindings,
  resolveReexports,
  toOriginRecord,
} from './reexport-resolver';
import { AnalysisOptions, EntryPointModule, ImportOrigin, ModuleAnalysis } from './types';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Module Analyzer
 * Turns one entry-point module into a ModuleAnalysis. Read, decode, parse and
 * binding-conflict failures are recorded on the result and never thrown.
 */
export class ModuleAnalyzer {
  private parser = new PythonParser();
  private logger: winston.Logger;

  constructor(
    private options: AnalysisOptions,
    logger?: winston.Logger
  ) {
    this.logger = logger || createComponentLogger('module-analyzer');
  }

  async analyzeFile(entryPoint: EntryPointModule): Promise<ModuleAnalysis> {
    let content: string;
    try {
      const buffer = await fs.readFile(entryPoint.path);
      content = utf8Decoder.decode(buffer);
    } catch (error) {
      const message = (error as Error).message;
      this.logger.warn('Failed to read module', { path: entryPoint.path, error: message });
      return emptyAnalysis(entryPoint.modulePath, entryPoint.relativePath, message);
    }

    return this.analyzeSource(entryPoint.modulePath, entryPoint.relativePath, content);
  }

  async analyzeSource(modulePath: string, file: string, content: string): Promise<ModuleAnalysis> {
    const result = await this.parser.parseFile(file, content, {
      upstreamPackage: this.options.upstreamPackage,
      exportPolicy: this.options.exportPolicy,
    });

    if (result.errors.length > 0) {
      const message = result.errors[0].message;
      this.logger.warn('Failed to parse module', { modulePath, error: message });
      return emptyAnalysis(modulePath, file, message);
    }

    let importsFromUpstream: Map<string, ImportOrigin>;
    try {
      importsFromUpstream = resolveBindings(result.bindings, this.options.bindingPolicy);
    } catch (error) {
      if (error instanceof BindingConflictError) {
        this.logger.warn('Conflicting upstream bindings', { modulePath, localName: error.localName });
        return {
          ...emptyAnalysis(modulePath, file, error.message),
          declared_public_exports: [...result.publicExports],
        };
      }
      throw error;
    }

    const reexports = resolveReexports(importsFromUpstream, result.publicExports);

    return {
      module_path: modulePath,
      file,
      error: null,
      imports_from_upstream: toOriginRecord(importsFromUpstream),
      declared_public_exports: [...result.publicExports],
      reexports: toOriginRecord(
        reexports.map((entry): [string, ImportOrigin] => [entry.local_name, entry])
      ),
    };
  }
}

export function emptyAnalysis(modulePath: string, file: string, error: string): ModuleAnalysis {
  return {
    module_path: modulePath,
    file,
    error,
    imports_from_upstream: {},
    declared_public_exports: [],
    reexports: {},
  };
}
