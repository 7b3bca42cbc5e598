/**
 * Type definitions for re-export analysis
 * Shared across the locator, analyzer, resolver and report modules
 */

export interface ImportOrigin {
  origin_module: string;
  original_name: string;
}

/** One name bound in a module's namespace by `from <upstream...> import ...` */
export interface ImportBinding extends ImportOrigin {
  local_name: string;
  line_number: number;
}

export interface ReexportEntry extends ImportOrigin {
  local_name: string;
}

export interface EntryPointModule {
  path: string;
  relativePath: string;
  /** Dotted module path, package root name first (e.g. `langchain.chains`) */
  modulePath: string;
}

export interface ModuleAnalysis {
  module_path: string;
  file: string;
  error: string | null;
  imports_from_upstream: Record<string, ImportOrigin>;
  declared_public_exports: string[];
  reexports: Record<string, ImportOrigin>;
}

export interface ReportMetadata {
  downstream_package: string;
  upstream_package: string;
  downstream_version: string;
  upstream_version: string;
  total_modules_scanned: number;
}

export interface ReportSummary {
  total_reexports: number;
  modules_with_reexports: number;
  modules_with_errors: number;
}

export enum AnalysisErrorType {
  SOURCE_UNAVAILABLE = 'source_unavailable',
  READ_FAILURE = 'read_failure',
  PARSE_FAILURE = 'parse_failure',
  BINDING_CONFLICT = 'binding_conflict',
  CONFIGURATION_MISMATCH = 'configuration_mismatch',
}

export enum ErrorSeverity {
  WARNING = 'warning',
  ERROR = 'error',
}

export interface AnalysisDiagnostic {
  type: AnalysisErrorType;
  severity: ErrorSeverity;
  message: string;
  path?: string;
}

export interface PackageReport {
  metadata: ReportMetadata;
  modules: ModuleAnalysis[];
  summary: ReportSummary;
  diagnostics: AnalysisDiagnostic[];
}

/**
 * How duplicate local names among upstream bindings are folded.
 * `last-wins` mirrors sequential name shadowing in the analyzed module.
 */
export type BindingConflictPolicy = 'last-wins' | 'first-wins' | 'error';

/** How a second `__all__ = [...]` assignment combines with earlier ones */
export type ExportDeclarationPolicy = 'append' | 'replace';

export interface AnalysisOptions {
  upstreamPackage: string;
  bindingPolicy?: BindingConflictPolicy;
  exportPolicy?: ExportDeclarationPolicy;
}

export interface LocatorOptions {
  entryPointFileName?: string;
}

export interface LocatorResult {
  entryPoints: EntryPointModule[];
  diagnostics: AnalysisDiagnostic[];
}

export interface PackageAnalysisOptions extends AnalysisOptions, LocatorOptions {
  downstreamRoot: string;
  downstreamPackage: string;
  upstreamRoot?: string;
  downstreamVersion?: string;
  upstreamVersion?: string;
  concurrency?: number;
}
