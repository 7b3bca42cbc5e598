import * as fs from 'fs/promises';
import * as path from 'path';
import {
  AnalysisErrorType,
  ErrorSeverity,
  formatSummary,
  loadReport,
  PackageReport,
  serializeReport,
  writeReport,
} from '../../src/reexports';
import { createPackageFixture, removePackageFixture } from '../utils/package-fixture';

function sampleReport(): PackageReport {
  return {
    metadata: {
      downstream_package: 'langchain',
      upstream_package: 'langchain_core',
      downstream_version: '0.2.1',
      upstream_version: 'unknown',
      total_modules_scanned: 2,
    },
    modules: [
      {
        module_path: 'langchain',
        file: 'langchain/__init__.py',
        error: null,
        imports_from_upstream: {
          AIMessage: { origin_module: 'langchain_core.messages', original_name: 'AIMessage' },
        },
        declared_public_exports: ['AIMessage'],
        reexports: {
          AIMessage: { origin_module: 'langchain_core.messages', original_name: 'AIMessage' },
        },
      },
      {
        module_path: 'langchain.broken',
        file: 'langchain/broken/__init__.py',
        error: 'invalid syntax at line 3, column 12',
        imports_from_upstream: {},
        declared_public_exports: [],
        reexports: {},
      },
    ],
    summary: { total_reexports: 1, modules_with_reexports: 1, modules_with_errors: 1 },
    diagnostics: [
      {
        type: AnalysisErrorType.CONFIGURATION_MISMATCH,
        severity: ErrorSeverity.WARNING,
        message: 'No module imports from langchain_kore; check the upstream package name',
      },
    ],
  };
}

describe('Report writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createPackageFixture({});
  });

  afterEach(async () => {
    await removePackageFixture(dir);
  });

  describe('serializeReport', () => {
    it('should indent with two spaces and end with a newline', () => {
      const text = serializeReport(sampleReport());

      expect(text.startsWith('{\n  "metadata": {\n    "downstream_package": "langchain",')).toBe(true);
      expect(text.endsWith('}\n')).toBe(true);
    });

    it('should write the error marker as null for clean modules', () => {
      const text = serializeReport(sampleReport());

      expect(text).toContain('      "error": null,\n');
    });
  });

  describe('writeReport and loadReport', () => {
    it('should create missing directories and read the report back', async () => {
      const output = path.join(dir, 'out', 'nested', 'import_mappings.json');

      await writeReport(sampleReport(), output);

      await expect(loadReport(output)).resolves.toEqual(sampleReport());
      await expect(fs.readFile(output, 'utf-8')).resolves.toBe(serializeReport(sampleReport()));
    });

    it('should reject a file that is not JSON', async () => {
      const output = path.join(dir, 'bad.json');
      await fs.writeFile(output, 'not json');

      await expect(loadReport(output)).rejects.toThrow(`Report ${output} is not valid JSON:`);
    });

    it('should name the first malformed field', async () => {
      const output = path.join(dir, 'malformed.json');
      const report = { ...sampleReport(), summary: { total_reexports: -1, modules_with_reexports: 1, modules_with_errors: 1 } };
      await fs.writeFile(output, JSON.stringify(report));

      await expect(loadReport(output)).rejects.toThrow(
        `Report ${output} is malformed at summary.total_reexports:`
      );
    });

    it('should point at the root for a non-object document', async () => {
      const output = path.join(dir, 'array.json');
      await fs.writeFile(output, '[]');

      await expect(loadReport(output)).rejects.toThrow(`Report ${output} is malformed at <root>:`);
    });
  });

  describe('formatSummary', () => {
    it('should print versions and counts', () => {
      expect(formatSummary(sampleReport())).toEqual([
        'langchain version: 0.2.1',
        'langchain_core version: unknown',
        'Modules scanned: 2',
        'Total langchain_core re-exports: 1',
        'Modules with langchain_core re-exports: 1',
        'Modules with errors: 1',
      ]);
    });
  });
});
