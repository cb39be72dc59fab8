import { SilentLogger } from '@precheck/shared';
import type { CommandExecutor } from '@precheck/exec';
import type { GoPackage, GoSourceTree } from '@precheck/repo';
import type { CheckContext } from '../checks';
import { GoGetFetcher, PrerequisiteVerifier } from '../prereq';

export const demoPackages: GoPackage[] = [
  { dir: '.', sourceFiles: ['main.go'], testFiles: [] },
  { dir: 'pkg/a', sourceFiles: ['pkg/a/a.go'], testFiles: ['pkg/a/a_test.go'] },
];

export function goTree(packages: GoPackage[] = demoPackages): GoSourceTree {
  return { repoRoot: '/repo', modulePath: 'example.com/demo', packages };
}

export function checkContext(
  executor: CommandExecutor,
  overrides: Partial<CheckContext> = {},
): CheckContext {
  return {
    repoRoot: '/repo',
    tree: goTree(),
    executor,
    prerequisites: new PrerequisiteVerifier(executor, new GoGetFetcher(executor)),
    logger: new SilentLogger(),
    signal: new AbortController().signal,
    concurrency: 2,
    ...overrides,
  };
}
