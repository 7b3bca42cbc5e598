import {
  normalizeDistributionName,
  parseMetadataVersion,
  resolveInstalledVersion,
  UNKNOWN_VERSION,
} from '../../src/reexports';
import { createPackageFixture, removePackageFixture } from '../utils/package-fixture';

describe('Version resolver', () => {
  describe('normalizeDistributionName', () => {
    it('should fold case and separator runs', () => {
      expect(normalizeDistributionName('Langchain-Core')).toBe('langchain_core');
      expect(normalizeDistributionName('langchain.core')).toBe('langchain_core');
      expect(normalizeDistributionName('langchain__-core')).toBe('langchain_core');
    });
  });

  describe('parseMetadataVersion', () => {
    it('should read the Version header', () => {
      expect(parseMetadataVersion('Metadata-Version: 2.1\nName: langchain\nVersion: 0.2.1\n')).toBe('0.2.1');
    });

    it('should stop at the end of the headers', () => {
      expect(parseMetadataVersion('Name: langchain\n\nVersion: 0.2.1\n')).toBeNull();
    });

    it('should accept CRLF metadata', () => {
      expect(parseMetadataVersion('Name: langchain\r\nVersion: 1.0.0rc1\r\n')).toBe('1.0.0rc1');
    });
  });

  describe('resolveInstalledVersion', () => {
    let root: string;

    afterEach(async () => {
      await removePackageFixture(root);
    });

    it('should prefer the METADATA version', async () => {
      root = await createPackageFixture({
        'langchain_core-0.2.5.dist-info/METADATA': 'Name: langchain-core\nVersion: 0.2.5.post1\n',
      });

      await expect(resolveInstalledVersion(root, 'langchain-core')).resolves.toBe('0.2.5.post1');
    });

    it('should fall back to the directory name without METADATA', async () => {
      root = await createPackageFixture({
        'langchain-0.2.1.dist-info/RECORD': '',
      });

      await expect(resolveInstalledVersion(root, 'langchain')).resolves.toBe('0.2.1');
    });

    it('should not confuse distributions sharing a prefix', async () => {
      root = await createPackageFixture({
        'langchain_core-0.2.5.dist-info/METADATA': 'Version: 0.2.5\n',
      });

      await expect(resolveInstalledVersion(root, 'langchain')).resolves.toBe(UNKNOWN_VERSION);
    });

    it('should return unknown for a missing source root', async () => {
      root = await createPackageFixture({});

      await expect(resolveInstalledVersion(`${root}/absent`, 'langchain')).resolves.toBe(
        UNKNOWN_VERSION
      );
    });
  });
});
