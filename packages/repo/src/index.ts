import * as fs from 'fs/promises';
import * as path from 'path';
import { UsageError } from '@precheck/shared';

export * from './scanner';

/**
 * Finds the repository root starting from the current directory.
 * Heuristics:
 * 1. Nearest parent containing .git
 * 2. Nearest parent containing go.mod
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const start = path.resolve(cwd);

  const gitRoot = await findUpwards(start, '.git');
  if (gitRoot) return gitRoot;

  const moduleRoot = await findUpwards(start, 'go.mod');
  if (moduleRoot) return moduleRoot;

  throw new UsageError(
    `Could not detect repository root from ${cwd}. Ensure you are inside a git repository or a Go module.`,
  );
}

async function findUpwards(start: string, marker: string): Promise<string | undefined> {
  const root = path.parse(start).root;
  let currentDir = start;

  while (true) {
    try {
      await fs.access(path.join(currentDir, marker));
      return currentDir;
    } catch {
      // keep climbing
    }

    if (currentDir === root) {
      return undefined;
    }
    currentDir = path.dirname(currentDir);
  }
}
