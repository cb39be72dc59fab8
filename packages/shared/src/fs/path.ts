import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes, which is the standard for precheck.
 * Coverage scopes and `per_dir` keys are always POSIX paths.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Returns the POSIX directory of a repository-relative file, `.` for files at the root.
 */
export function directoryOf(file: string): string {
  return path.posix.dirname(normalizePath(file));
}

/**
 * Checks whether `dir` is a valid repository-relative directory key:
 * POSIX separators, already normalized, no leading `/`, no `..` element.
 * The repository root is `.`.
 */
export function isValidDirectoryKey(dir: string): boolean {
  if (dir === '.') return true;
  if (dir.length === 0 || dir.includes('\\') || dir.startsWith('/') || dir.endsWith('/')) {
    return false;
  }
  if (path.posix.normalize(dir) !== dir) return false;
  return !dir.split('/').includes('..');
}

/**
 * Turns a repository-relative directory into a Go package argument (`./a/b`, or `.`).
 */
export function toPackageArg(dir: string): string {
  return dir === '.' ? '.' : `./${dir}`;
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}
