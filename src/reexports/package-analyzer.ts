import pLimit from 'p-limit';
import winston from 'winston';
import { createComponentLogger } from '../utils/logger';
import { compareModulePaths, EntryPointLocator } from './entry-point-locator';
import { emptyAnalysis, ModuleAnalyzer } from './module-analyzer';
import { summarize } from './reexport-resolver';
import { resolveInstalledVersion, UNKNOWN_VERSION } from './version-resolver';
import {
  AnalysisDiagnostic,
  AnalysisErrorType,
  ErrorSeverity,
  ModuleAnalysis,
  PackageAnalysisOptions,
  PackageReport,
} from './types';

const DEFAULT_CONCURRENCY = 8;

/**
 * Package Analyzer
 * Locates entry points, analyzes them through a bounded worker pool and
 * assembles the package report
 */
export class PackageAnalyzer {
  private locator = new EntryPointLocator();
  private logger: winston.Logger;

  constructor(logger?: winston.Logger) {
    this.logger = logger || createComponentLogger('package-analyzer');
  }

  async analyze(options: PackageAnalysisOptions): Promise<PackageReport> {
    const { entryPoints, diagnostics } = await this.locator.locate(
      options.downstreamRoot,
      options.downstreamPackage,
      { entryPointFileName: options.entryPointFileName }
    );

    this.logger.info('Analyzing entry points', {
      downstreamPackage: options.downstreamPackage,
      upstreamPackage: options.upstreamPackage,
      entryPoints: entryPoints.length,
    });

    const analyzer = new ModuleAnalyzer(
      {
        upstreamPackage: options.upstreamPackage,
        bindingPolicy: options.bindingPolicy,
        exportPolicy: options.exportPolicy,
      },
      this.logger
    );

    const limit = pLimit(options.concurrency || DEFAULT_CONCURRENCY);

    const modules = await Promise.all(
      entryPoints.map(entryPoint =>
        limit(async () => {
          try {
            return await analyzer.analyzeFile(entryPoint);
          } catch (error) {
            this.logger.error('Failed to analyze module', {
              path: entryPoint.path,
              error: (error as Error).message,
            });
            return emptyAnalysis(
              entryPoint.modulePath,
              entryPoint.relativePath,
              (error as Error).message
            );
          }
        })
      )
    );

    modules.sort((a, b) => compareModulePaths(a.module_path, b.module_path));

    const [downstreamVersion, upstreamVersion] = await Promise.all([
      options.downstreamVersion ??
        resolveInstalledVersion(options.downstreamRoot, options.downstreamPackage),
      options.upstreamVersion ??
        (options.upstreamRoot
          ? resolveInstalledVersion(options.upstreamRoot, options.upstreamPackage)
          : UNKNOWN_VERSION),
    ]);

    const report = buildReport({
      downstreamPackage: options.downstreamPackage,
      upstreamPackage: options.upstreamPackage,
      downstreamVersion,
      upstreamVersion,
      modules,
      diagnostics,
    });

    this.logger.info('Package analysis completed', { ...report.summary });

    return report;
  }
}

export interface ReportInput {
  downstreamPackage: string;
  upstreamPackage: string;
  downstreamVersion: string;
  upstreamVersion: string;
  modules: ModuleAnalysis[];
  diagnostics?: AnalysisDiagnostic[];
}

/**
 * Assemble a PackageReport. Adds a configuration-mismatch warning when modules
 * were scanned but none imports from the upstream package.
 */
export function buildReport(input: ReportInput): PackageReport {
  const diagnostics = [...(input.diagnostics ?? [])];
  const summary = summarize(input.modules);

  const importsUpstream = input.modules.some(
    module => Object.keys(module.imports_from_upstream).length > 0
  );
  if (input.modules.length > 0 && !importsUpstream) {
    diagnostics.push({
      type: AnalysisErrorType.CONFIGURATION_MISMATCH,
      severity: ErrorSeverity.WARNING,
      message: `No module imports from ${input.upstreamPackage}; check the upstream package name`,
    });
  }

  return {
    metadata: {
      downstream_package: input.downstreamPackage,
      upstream_package: input.upstreamPackage,
      downstream_version: input.downstreamVersion,
      upstream_version: input.upstreamVersion,
      total_modules_scanned: input.modules.length,
    },
    modules: input.modules,
    summary,
    diagnostics,
  };
}

export async function analyzePackages(options: PackageAnalysisOptions): Promise<PackageReport> {
  return new PackageAnalyzer().analyze(options);
}
