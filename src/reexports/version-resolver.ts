import fs from 'fs/promises';
import path from 'path';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('version-resolver');

export const UNKNOWN_VERSION = 'unknown';

const DIST_INFO_PATTERN = /^(.+?)-([^-]+)\.dist-info$/;

/**
 * Normalise a distribution name so `langchain-core`, `Langchain.Core` and
 * `langchain_core` compare equal
 */
export function normalizeDistributionName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '_');
}

/**
 * Read the `Version:` header of a dist-info METADATA file
 */
export function parseMetadataVersion(metadata: string): string | null {
  for (const line of metadata.split(/\r?\n/)) {
    // Headers end at the first blank line; the description follows
    if (line.trim() === '') break;
    const match = /^Version:\s*(\S+)\s*$/.exec(line);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Resolve the installed version of a distribution from the `*.dist-info`
 * directories that `pip install --target` leaves next to the package.
 */
export async function resolveInstalledVersion(
  sourceRoot: string,
  distributionName: string
): Promise<string> {
  let entries: string[];
  try {
    entries = await fs.readdir(sourceRoot);
  } catch (error) {
    logger.warn('Cannot read source root for version lookup', {
      sourceRoot,
      error: (error as Error).message,
    });
    return UNKNOWN_VERSION;
  }

  const wanted = normalizeDistributionName(distributionName);
  const candidates = entries
    .map(entry => ({ entry, match: DIST_INFO_PATTERN.exec(entry) }))
    .filter(
      (candidate): candidate is { entry: string; match: RegExpExecArray } =>
        candidate.match !== null && normalizeDistributionName(candidate.match[1]) === wanted
    )
    .sort((a, b) => (a.entry < b.entry ? -1 : a.entry > b.entry ? 1 : 0));

  if (candidates.length === 0) {
    logger.warn('No dist-info found for distribution', { sourceRoot, distributionName });
    return UNKNOWN_VERSION;
  }

  if (candidates.length > 1) {
    logger.warn('Multiple dist-info directories found, using the first', {
      distributionName,
      candidates: candidates.map(c => c.entry),
    });
  }

  const [{ entry, match }] = candidates;

  try {
    const metadata = await fs.readFile(path.join(sourceRoot, entry, 'METADATA'), 'utf-8');
    const version = parseMetadataVersion(metadata);
    if (version) {
      return version;
    }
  } catch (error) {
    logger.debug('No readable METADATA, using directory name', { entry });
  }

  return match[2];
}
