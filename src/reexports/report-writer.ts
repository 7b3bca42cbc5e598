import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createComponentLogger } from '../utils/logger';
import { AnalysisErrorType, ErrorSeverity, PackageReport } from './types';

const logger = createComponentLogger('report-writer');

const ImportOriginSchema = z.object({
  origin_module: z.string(),
  original_name: z.string(),
});

const ModuleAnalysisSchema = z.object({
  module_path: z.string(),
  file: z.string(),
  error: z.string().nullable(),
  imports_from_upstream: z.record(ImportOriginSchema),
  declared_public_exports: z.array(z.string()),
  reexports: z.record(ImportOriginSchema),
});

export const PackageReportSchema = z.object({
  metadata: z.object({
    downstream_package: z.string(),
    upstream_package: z.string(),
    downstream_version: z.string(),
    upstream_version: z.string(),
    total_modules_scanned: z.number().int().nonnegative(),
  }),
  modules: z.array(ModuleAnalysisSchema),
  summary: z.object({
    total_reexports: z.number().int().nonnegative(),
    modules_with_reexports: z.number().int().nonnegative(),
    modules_with_errors: z.number().int().nonnegative(),
  }),
  diagnostics: z.array(
    z.object({
      type: z.nativeEnum(AnalysisErrorType),
      severity: z.nativeEnum(ErrorSeverity),
      message: z.string(),
      path: z.string().optional(),
    })
  ),
});

/**
 * Stable JSON rendering: two-space indent and a trailing newline. Reports carry
 * no timestamps, so unchanged inputs serialize to identical bytes.
 */
export function serializeReport(report: PackageReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export async function writeReport(report: PackageReport, outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, serializeReport(report), 'utf-8');
  logger.info('Report written', { outputPath, modules: report.modules.length });
}

/**
 * Load a saved report, validating its shape
 */
export async function loadReport(reportPath: string): Promise<PackageReport> {
  const content = await fs.readFile(reportPath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Report ${reportPath} is not valid JSON: ${(error as Error).message}`);
  }

  const parsed = PackageReportSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Report ${reportPath} is malformed at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }

  return parsed.data;
}

/**
 * Summary lines printed after an analysis run
 */
export function formatSummary(report: PackageReport): string[] {
  const { metadata, summary } = report;
  return [
    `${metadata.downstream_package} version: ${metadata.downstream_version}`,
    `${metadata.upstream_package} version: ${metadata.upstream_version}`,
    `Modules scanned: ${metadata.total_modules_scanned}`,
    `Total ${metadata.upstream_package} re-exports: ${summary.total_reexports}`,
    `Modules with ${metadata.upstream_package} re-exports: ${summary.modules_with_reexports}`,
    `Modules with errors: ${summary.modules_with_errors}`,
  ];
}
