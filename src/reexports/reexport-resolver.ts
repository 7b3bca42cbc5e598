import {
  BindingConflictPolicy,
  ImportBinding,
  ImportOrigin,
  ModuleAnalysis,
  ReexportEntry,
  ReportSummary,
} from './types';

export class BindingConflictError extends Error {
  constructor(
    public readonly localName: string,
    public readonly bindings: ImportBinding[]
  ) {
    super(
      `Conflicting upstream bindings for "${localName}": ` +
        bindings.map(b => `${b.origin_module}.${b.original_name} (line ${b.line_number})`).join(', ')
    );
    this.name = 'BindingConflictError';
  }
}

/**
 * Fold a module's bindings, in source order, into one origin per local name.
 *
 * `last-wins` (default) follows name shadowing: a later import of the same
 * local name replaces the earlier origin while the name keeps its first
 * position. `first-wins` keeps the earliest; `error` throws on any local name
 * bound to two different origins.
 */
export function resolveBindings(
  bindings: ImportBinding[],
  policy: BindingConflictPolicy = 'last-wins'
): Map<string, ImportOrigin> {
  const resolved = new Map<string, ImportOrigin>();
  const seen = new Map<string, ImportBinding[]>();

  for (const binding of bindings) {
    const origin: ImportOrigin = {
      origin_module: binding.origin_module,
      original_name: binding.original_name,
    };
    const previous = resolved.get(binding.local_name);
    const history = seen.get(binding.local_name) ?? [];
    history.push(binding);
    seen.set(binding.local_name, history);

    if (!previous) {
      resolved.set(binding.local_name, origin);
      continue;
    }

    if (policy === 'first-wins') {
      continue;
    }

    if (
      policy === 'error' &&
      (previous.origin_module !== origin.origin_module ||
        previous.original_name !== origin.original_name)
    ) {
      throw new BindingConflictError(binding.local_name, history);
    }

    resolved.set(binding.local_name, origin);
  }

  return resolved;
}

/**
 * Public exports that are upstream imports, in declaration order.
 * Matched by local name; repeated exports appear once.
 */
export function resolveReexports(
  importsFromUpstream: Map<string, ImportOrigin>,
  publicExports: string[]
): ReexportEntry[] {
  const entries: ReexportEntry[] = [];
  const emitted = new Set<string>();

  for (const exportName of publicExports) {
    const origin = importsFromUpstream.get(exportName);
    if (!origin || emitted.has(exportName)) continue;

    emitted.add(exportName);
    entries.push({ local_name: exportName, ...origin });
  }

  return entries;
}

export function toOriginRecord(
  entries: Iterable<[string, ImportOrigin]>
): Record<string, ImportOrigin> {
  return Object.fromEntries(
    Array.from(entries, ([name, origin]) => [
      name,
      { origin_module: origin.origin_module, original_name: origin.original_name },
    ])
  );
}

export function summarize(modules: ModuleAnalysis[]): ReportSummary {
  let totalReexports = 0;
  let modulesWithReexports = 0;
  let modulesWithErrors = 0;

  for (const module of modules) {
    const count = Object.keys(module.reexports).length;
    totalReexports += count;
    if (count > 0) {
      modulesWithReexports++;
    }
    if (module.error !== null) {
      modulesWithErrors++;
    }
  }

  return {
    total_reexports: totalReexports,
    modules_with_reexports: modulesWithReexports,
    modules_with_errors: modulesWithErrors,
  };
}
