#!/usr/bin/env node
import process from 'process';
import path from 'path';
import fs from 'fs/promises';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import {
  AnalysisErrorType,
  ErrorSeverity,
  PackageAnalyzer,
  buildOriginIndex,
  formatImportStatement,
  formatSummary,
  loadReport,
  lookupOrigin,
  writeReport,
} from '../reexports';
import { logger, config, flushLogs } from '../utils';

const AnalyzeOptionsSchema = z.object({
  downstreamRoot: z.string().min(1),
  upstreamRoot: z.string().min(1).optional(),
  downstreamPackage: z.string().min(1),
  upstreamPackage: z.string().min(1),
  downstreamVersion: z.string().min(1).optional(),
  upstreamVersion: z.string().min(1).optional(),
  output: z.string().min(1),
  concurrency: z.coerce.number().int().positive(),
  bindingPolicy: z.enum(['last-wins', 'first-wins', 'error']),
  exportPolicy: z.enum(['append', 'replace']),
  verbose: z.boolean().optional(),
});

const LookupOptionsSchema = z.object({
  report: z.string().min(1),
});

async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

function describeValidationError(error: z.ZodError): string {
  return error.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
}

const program = new Command();

program
  .name('reexport-mapper')
  .description(
    'Map public names of a downstream Python package to the upstream core symbols it re-exports'
  )
  .version('0.1.0');

// Analyze command
program
  .command('analyze')
  .description('Analyze installed package sources and write the import mapping report')
  .requiredOption(
    '--downstream-root <dir>',
    'Directory the downstream package is installed in (contains the package directory)'
  )
  .option('--upstream-root <dir>', 'Directory the upstream package is installed in (for its version)')
  .option('--downstream-package <name>', 'Downstream package name', config.analysis.downstreamPackage)
  .option(
    '--upstream-package <name>',
    'Upstream package identifier matched against import origins',
    config.analysis.upstreamPackage
  )
  .option('--downstream-version <version>', 'Override the detected downstream version')
  .option('--upstream-version <version>', 'Override the detected upstream version')
  .option('--output <file>', 'Report output path', config.analysis.reportFile)
  .option(
    '--concurrency <number>',
    'Maximum modules analyzed concurrently',
    String(config.analysis.concurrency)
  )
  .option(
    '--binding-policy <policy>',
    'Duplicate local import names: last-wins, first-wins or error',
    'last-wins'
  )
  .option('--export-policy <policy>', 'Repeated __all__ assignments: append or replace', 'append')
  .option('--verbose', 'Enable verbose logging')
  .action(async rawOptions => {
    const parsed = AnalyzeOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      console.error(chalk.red(`Invalid options: ${describeValidationError(parsed.error)}`));
      process.exitCode = 1;
      return;
    }
    const options = parsed.data;

    if (options.verbose) {
      logger.level = 'debug';
    }

    const downstreamRoot = path.resolve(options.downstreamRoot);
    if (!(await directoryExists(downstreamRoot))) {
      console.error(chalk.red(`Downstream source root not found: ${downstreamRoot}`));
      process.exitCode = 1;
      return;
    }

    const spinner = ora(`Analyzing ${options.downstreamPackage}...`).start();

    try {
      const startTime = Date.now();
      const report = await new PackageAnalyzer().analyze({
        downstreamRoot,
        downstreamPackage: options.downstreamPackage,
        upstreamRoot: options.upstreamRoot ? path.resolve(options.upstreamRoot) : undefined,
        upstreamPackage: options.upstreamPackage,
        downstreamVersion: options.downstreamVersion,
        upstreamVersion: options.upstreamVersion,
        concurrency: options.concurrency,
        bindingPolicy: options.bindingPolicy,
        exportPolicy: options.exportPolicy,
      });
      const duration = Date.now() - startTime;

      await writeReport(report, options.output);
      spinner.succeed(
        `Analyzed ${report.metadata.total_modules_scanned} modules in ${(duration / 1000).toFixed(2)}s`
      );

      console.log(chalk.blue('\nSummary:'));
      for (const line of formatSummary(report)) {
        console.log(`- ${line}`);
      }

      for (const diagnostic of report.diagnostics) {
        const colour = diagnostic.severity === ErrorSeverity.ERROR ? chalk.red : chalk.yellow;
        console.log(colour(`${diagnostic.severity}: ${diagnostic.message}`));
      }

      const failedModules = report.modules.filter(module => module.error !== null);
      for (const module of failedModules) {
        console.log(chalk.yellow(`Error analyzing ${module.file}: ${module.error}`));
      }

      console.log(chalk.green(`\nResults saved to ${options.output}`));

      if (report.diagnostics.some(d => d.type === AnalysisErrorType.SOURCE_UNAVAILABLE)) {
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Analysis failed');
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    } finally {
      await flushLogs();
    }
  });

// Lookup command
program
  .command('lookup')
  .description('Show the downstream import paths for an upstream symbol')
  .argument('<symbol>', 'Upstream symbol, qualified (langchain_core.messages.AIMessage) or bare')
  .option('--report <file>', 'Report produced by analyze', config.analysis.reportFile)
  .action(async (symbol: string, rawOptions) => {
    const parsed = LookupOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      console.error(chalk.red(`Invalid options: ${describeValidationError(parsed.error)}`));
      process.exitCode = 1;
      return;
    }

    try {
      const report = await loadReport(parsed.data.report);
      const matches = lookupOrigin(buildOriginIndex(report), symbol);

      if (matches.length === 0) {
        console.log(
          chalk.yellow(`${symbol} is not re-exported by ${report.metadata.downstream_package}`)
        );
        return;
      }

      for (const match of matches) {
        console.log(formatImportStatement(match));
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.gray('See --help for a list of available commands.'));
  process.exitCode = 1;
});

program.parseAsync().catch(error => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
