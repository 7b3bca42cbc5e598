import { config as dotenvConfig } from 'dotenv';
import path from 'path';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  consoleLevel: string;
  file: string;
}

export interface AnalysisConfig {
  upstreamPackage: string;
  downstreamPackage: string;
  reportFile: string;
  concurrency: number;
}

export interface Config {
  logging: LoggingConfig;
  analysis: AnalysisConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    // The CLI reports module failures itself; the console only carries hard errors
    consoleLevel: getEnvVar('LOG_CONSOLE_LEVEL', 'error'),
    file: getEnvVar('LOG_FILE', path.join(process.cwd(), 'logs', 'reexport-mapper.log')),
  },
  analysis: {
    upstreamPackage: getEnvVar('UPSTREAM_PACKAGE', 'langchain_core'),
    downstreamPackage: getEnvVar('DOWNSTREAM_PACKAGE', 'langchain'),
    reportFile: getEnvVar('REPORT_FILE', 'import_mappings.json'),
    concurrency: getEnvVarAsNumber('ANALYSIS_CONCURRENCY', 8),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
