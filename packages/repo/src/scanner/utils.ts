import fs from 'node:fs/promises';
import path from 'node:path';
import type { GoPackage, GoSourceTree } from './types';

/**
 * Directories the go tool itself never treats as packages.
 */
export const DEFAULT_IGNORES = ['.git', 'vendor', 'testdata'];

/**
 * Reads the module path from `<repoRoot>/go.mod`; empty when absent.
 */
export async function readModulePath(repoRoot: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(path.join(repoRoot, 'go.mod'), 'utf-8');
  } catch {
    return '';
  }
  const match = content.match(/^module\s+("?)([^"\s]+)\1\s*$/m);
  return match ? match[2] : '';
}

export function isTestFile(file: string): boolean {
  return file.endsWith('_test.go');
}

/** Every `.go` file in the tree, test files included */
export function allGoFiles(tree: GoSourceTree): string[] {
  return tree.packages.flatMap((p) => [...p.sourceFiles, ...p.testFiles]).sort();
}

/** Packages that carry at least one test file */
export function testPackages(tree: GoSourceTree): GoPackage[] {
  return tree.packages.filter((p) => p.testFiles.length > 0);
}
