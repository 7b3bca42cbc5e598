import {
  BindingConflictError,
  ImportBinding,
  ModuleAnalysis,
  resolveBindings,
  resolveReexports,
  summarize,
  toOriginRecord,
} from '../../src/reexports';

function binding(
  localName: string,
  originModule: string,
  originalName: string,
  lineNumber: number
): ImportBinding {
  return {
    local_name: localName,
    origin_module: originModule,
    original_name: originalName,
    line_number: lineNumber,
  };
}

function moduleWith(modulePath: string, reexportNames: string[], error: string | null = null): ModuleAnalysis {
  const reexports = Object.fromEntries(
    reexportNames.map(name => [name, { origin_module: 'langchain_core', original_name: name }])
  );
  return {
    module_path: modulePath,
    file: `${modulePath.replace(/\./g, '/')}/__init__.py`,
    error,
    imports_from_upstream: reexports,
    declared_public_exports: reexportNames,
    reexports,
  };
}

describe('Re-export resolver', () => {
  const duplicated = [
    binding('Memory', 'langchain_core.memory', 'BaseMemory', 1),
    binding('Prompt', 'langchain_core.prompts', 'PromptTemplate', 2),
    binding('Memory', 'langchain_core.chat_history', 'BaseChatMessageHistory', 3),
  ];

  describe('resolveBindings', () => {
    it('should let the last binding win by default', () => {
      const resolved = resolveBindings(duplicated);

      expect(Array.from(resolved.entries())).toEqual([
        ['Memory', { origin_module: 'langchain_core.chat_history', original_name: 'BaseChatMessageHistory' }],
        ['Prompt', { origin_module: 'langchain_core.prompts', original_name: 'PromptTemplate' }],
      ]);
    });

    it('should keep the first binding under first-wins', () => {
      const resolved = resolveBindings(duplicated, 'first-wins');

      expect(resolved.get('Memory')).toEqual({
        origin_module: 'langchain_core.memory',
        original_name: 'BaseMemory',
      });
    });

    it('should throw on conflicting bindings under the error policy', () => {
      expect(() => resolveBindings(duplicated, 'error')).toThrow(BindingConflictError);
      expect(() => resolveBindings(duplicated, 'error')).toThrow(
        'Conflicting upstream bindings for "Memory": ' +
          'langchain_core.memory.BaseMemory (line 1), ' +
          'langchain_core.chat_history.BaseChatMessageHistory (line 3)'
      );
    });

    it('should accept identical repeated bindings under the error policy', () => {
      const repeated = [
        binding('Chain', 'langchain_core.chains', 'Chain', 1),
        binding('Chain', 'langchain_core.chains', 'Chain', 4),
      ];

      expect(resolveBindings(repeated, 'error').size).toBe(1);
    });
  });

  describe('resolveReexports', () => {
    it('should intersect exports with imports by local name in export order', () => {
      const imports = resolveBindings([
        binding('Chain', 'upstream.chains', 'LLMChain', 1),
        binding('Tool', 'upstream.tools', 'BaseTool', 2),
      ]);

      expect(resolveReexports(imports, ['Tool', 'Other', 'Chain'])).toEqual([
        { local_name: 'Tool', origin_module: 'upstream.tools', original_name: 'BaseTool' },
        { local_name: 'Chain', origin_module: 'upstream.chains', original_name: 'LLMChain' },
      ]);
    });

    it('should not match on the original upstream name', () => {
      const imports = resolveBindings([binding('Chain', 'upstream.chains', 'LLMChain', 1)]);

      expect(resolveReexports(imports, ['LLMChain'])).toEqual([]);
    });

    it('should emit a repeated export once', () => {
      const imports = resolveBindings([binding('Chain', 'upstream.chains', 'LLMChain', 1)]);

      expect(resolveReexports(imports, ['Chain', 'Chain'])).toHaveLength(1);
    });

    it('should be empty without upstream imports', () => {
      expect(resolveReexports(new Map(), ['A', 'B'])).toEqual([]);
    });
  });

  describe('toOriginRecord', () => {
    it('should build a plain record keyed by local name', () => {
      const record = toOriginRecord([
        ['A', { origin_module: 'upstream.a', original_name: 'Alpha' }],
      ]);

      expect(record).toEqual({ A: { origin_module: 'upstream.a', original_name: 'Alpha' } });
    });
  });

  describe('summarize', () => {
    it('should count re-exports, modules with re-exports and failed modules', () => {
      const summary = summarize([
        moduleWith('langchain', ['A', 'B']),
        moduleWith('langchain.chains', []),
        moduleWith('langchain.tools', ['C']),
        moduleWith('langchain.broken', [], 'invalid syntax at line 1, column 1'),
      ]);

      expect(summary).toEqual({
        total_reexports: 3,
        modules_with_reexports: 2,
        modules_with_errors: 1,
      });
    });

    it('should be all zeros for no modules', () => {
      expect(summarize([])).toEqual({
        total_reexports: 0,
        modules_with_reexports: 0,
        modules_with_errors: 0,
      });
    });
  });
});
