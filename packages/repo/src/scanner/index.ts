import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { directoryOf } from '@precheck/shared';
import type { GoPackage, GoSourceTree, ScanOptions } from './types';
import { DEFAULT_IGNORES, isTestFile, readModulePath } from './utils';

export * from './types';
export { DEFAULT_IGNORES, readModulePath, isTestFile, allGoFiles, testPackages } from './utils';

type Fs = Pick<typeof nodeFs, 'readdir'>;

/**
 * Finds every Go package (directory holding `.go` files) under a repository root.
 */
export class GoPackageScanner {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async scan(repoRoot: string, options: ScanOptions = {}): Promise<GoSourceTree> {
    const ig = ignore();
    ig.add(DEFAULT_IGNORES);
    if (options.ignorePatterns && options.ignorePatterns.length > 0) {
      ig.add(options.ignorePatterns);
    }

    const packages = new Map<string, GoPackage>();

    const walk = async (dir: string, relativeDir: string) => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch {
        // Access denied or deleted during scan
        return;
      }

      for (const entry of entries) {
        const entryRelativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

        if (entry.isDirectory()) {
          // Trailing slash so directory-only patterns match
          if (ig.ignores(entryRelativePath + '/')) continue;
          await walk(path.join(dir, entry.name), entryRelativePath);
        } else if (entry.isFile() && entry.name.endsWith('.go')) {
          if (ig.ignores(entryRelativePath)) continue;

          const pkgDir = directoryOf(entryRelativePath);
          let pkg = packages.get(pkgDir);
          if (!pkg) {
            pkg = { dir: pkgDir, sourceFiles: [], testFiles: [] };
            packages.set(pkgDir, pkg);
          }
          if (isTestFile(entry.name)) {
            pkg.testFiles.push(entryRelativePath);
          } else {
            pkg.sourceFiles.push(entryRelativePath);
          }
        }
      }
    };

    await walk(repoRoot, '');

    const sorted = [...packages.values()].sort((a, b) => a.dir.localeCompare(b.dir));
    for (const pkg of sorted) {
      pkg.sourceFiles.sort();
      pkg.testFiles.sort();
    }

    return {
      repoRoot,
      modulePath: await readModulePath(repoRoot),
      packages: sorted,
    };
  }
}
