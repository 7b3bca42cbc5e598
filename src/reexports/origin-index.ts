import { compareModulePaths } from './entry-point-locator';
import { PackageReport } from './types';

export interface DownstreamImportPath {
  module_path: string;
  local_name: string;
}

/** `<origin_module>.<original_name>` → downstream modules that re-export it */
export type OriginIndex = Map<string, DownstreamImportPath[]>;

/**
 * Invert a report so documentation tooling can ask "where should this
 * upstream symbol be imported from downstream?"
 */
export function buildOriginIndex(report: PackageReport): OriginIndex {
  const index: OriginIndex = new Map();

  for (const module of report.modules) {
    for (const [localName, origin] of Object.entries(module.reexports)) {
      const key = `${origin.origin_module}.${origin.original_name}`;
      const paths = index.get(key) ?? [];
      paths.push({ module_path: module.module_path, local_name: localName });
      index.set(key, paths);
    }
  }

  for (const paths of index.values()) {
    paths.sort(
      (a, b) =>
        compareModulePaths(a.module_path, b.module_path) ||
        compareModulePaths(a.local_name, b.local_name)
    );
  }

  return index;
}

/**
 * Find downstream import paths for an upstream symbol, given either its fully
 * qualified path (`langchain_core.messages.AIMessage`) or its bare name
 * (`AIMessage`, matched against every origin module).
 */
export function lookupOrigin(index: OriginIndex, symbol: string): DownstreamImportPath[] {
  const exact = index.get(symbol);
  if (exact) {
    return exact;
  }

  if (symbol.includes('.')) {
    return [];
  }

  const matches: DownstreamImportPath[] = [];
  const keys = Array.from(index.keys()).sort(compareModulePaths);
  for (const key of keys) {
    if (key.slice(key.lastIndexOf('.') + 1) === symbol) {
      matches.push(...(index.get(key) ?? []));
    }
  }
  return matches;
}

export function formatImportStatement(path: DownstreamImportPath): string {
  return `from ${path.module_path} import ${path.local_name}`;
}
