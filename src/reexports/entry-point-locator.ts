import fs from 'fs/promises';
import path from 'path';
import { ENTRY_POINT_FILE_NAME } from '../parsers/python/types';
import { createComponentLogger } from '../utils/logger';
import {
  AnalysisErrorType,
  EntryPointModule,
  ErrorSeverity,
  LocatorOptions,
  LocatorResult,
} from './types';

const logger = createComponentLogger('entry-point-locator');

/**
 * Entry-Point Locator
 * Walks an installed package and yields its public package-init modules
 */
export class EntryPointLocator {
  /**
   * Locate every public `__init__.py` below `<sourceRoot>/<packageName>`.
   * A missing package directory yields no entry points and one diagnostic.
   */
  async locate(
    sourceRoot: string,
    packageName: string,
    options: LocatorOptions = {}
  ): Promise<LocatorResult> {
    const packageRoot = path.join(sourceRoot, packageName);
    const entryPointFileName = options.entryPointFileName ?? ENTRY_POINT_FILE_NAME;

    if (!(await this.isDirectory(packageRoot))) {
      logger.error('Package directory not found', { packageRoot });
      return {
        entryPoints: [],
        diagnostics: [
          {
            type: AnalysisErrorType.SOURCE_UNAVAILABLE,
            severity: ErrorSeverity.ERROR,
            message: `${packageName} directory not found at ${packageRoot}`,
            path: packageRoot,
          },
        ],
      };
    }

    const entryPoints: EntryPointModule[] = [];

    const traverse = async (currentPath: string): Promise<void> => {
      try {
        const lstats = await fs.lstat(currentPath);

        let stats = lstats;
        if (lstats.isSymbolicLink()) {
          try {
            stats = await fs.stat(currentPath);
          } catch (symlinkError) {
            logger.debug('Skipping broken symlink', { path: currentPath });
            return;
          }

          // Linked files count; linked directories would alias or cycle
          if (stats.isDirectory()) {
            logger.debug('Skipping symlinked directory', { path: currentPath });
            return;
          }
        }

        if (stats.isDirectory()) {
          if (currentPath !== packageRoot && this.isPrivateSegment(path.basename(currentPath))) {
            return;
          }

          const entries = await fs.readdir(currentPath);

          await Promise.all(
            entries.map(async entry => {
              await traverse(path.join(currentPath, entry));
            })
          );
        } else if (stats.isFile() && path.basename(currentPath) === entryPointFileName) {
          const relativePath = path.relative(sourceRoot, currentPath).split(path.sep).join('/');
          entryPoints.push({
            path: currentPath,
            relativePath,
            modulePath: this.toModulePath(packageName, packageRoot, currentPath),
          });
        }
      } catch (error) {
        logger.error('Error traversing path', {
          path: currentPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };

    await traverse(packageRoot);

    entryPoints.sort((a, b) => compareModulePaths(a.modulePath, b.modulePath));

    logger.info('Entry point discovery completed', {
      packageRoot,
      totalEntryPoints: entryPoints.length,
    });

    return { entryPoints, diagnostics: [] };
  }

  /**
   * Directory segments starting with an underscore mark private subpackages
   */
  isPrivateSegment(segment: string): boolean {
    return segment.startsWith('_');
  }

  private toModulePath(packageName: string, packageRoot: string, filePath: string): string {
    const directory = path.relative(packageRoot, path.dirname(filePath));
    const segments = directory ? directory.split(path.sep) : [];
    return [packageName, ...segments].join('.');
  }

  private async isDirectory(dirPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dirPath);
      return stats.isDirectory();
    } catch (error) {
      return false;
    }
  }
}

/**
 * Plain code-unit ordering, independent of locale
 */
export function compareModulePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function locateEntryPoints(
  sourceRoot: string,
  packageName: string,
  options?: LocatorOptions
): Promise<LocatorResult> {
  return new EntryPointLocator().locate(sourceRoot, packageName, options);
}
