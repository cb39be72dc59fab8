import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { UsageError } from '@precheck/shared';
import type { ModeName } from '@precheck/shared';
import { OutputRenderer } from '../output/renderer';
import type { CliContext, GlobalOptions } from '../context';
import { installPrerequisites, renderPrerequisites } from './prereq';

/** Git hook name and the mode it runs */
export const HOOKS: ReadonlyArray<[hook: string, mode: ModeName]> = [
  ['pre-commit', 'pre-commit'],
  ['pre-push', 'pre-push'],
];

export function hookScript(mode: ModeName): string {
  return `#!/bin/sh\n# Installed by precheck.\nexec precheck run ${mode}\n`;
}

export async function installHooks(repoRoot: string): Promise<string[]> {
  const hooksDir = path.join(repoRoot, '.git', 'hooks');
  try {
    const stat = await fs.stat(path.join(repoRoot, '.git'));
    if (!stat.isDirectory()) throw new Error('.git is not a directory');
  } catch (error) {
    throw new UsageError(`${repoRoot} is not a git checkout; cannot install hooks`, {
      cause: error,
    });
  }

  await fs.mkdir(hooksDir, { recursive: true });
  const written: string[] = [];
  for (const [hook, mode] of HOOKS) {
    const file = path.join(hooksDir, hook);
    await fs.writeFile(file, hookScript(mode), { mode: 0o755 });
    await fs.chmod(file, 0o755);
    written.push(file);
  }
  return written;
}

export function registerInstallCommand(program: Command, ctx: CliContext) {
  program
    .command('install')
    .description('Install the git hooks and the tools the checks need')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const repoRoot = await ctx.findRepoRoot();
      const hooks = await installHooks(repoRoot);
      const outcomes = await installPrerequisites(ctx, globalOpts, repoRoot);

      if (globalOpts.json) {
        renderer.json({ hooks, prerequisites: outcomes });
      } else {
        hooks.forEach((hook) => renderer.log(`Installed ${hook}`));
        renderPrerequisites(renderer, outcomes);
      }
      if (outcomes.some((o) => o.status === 'unavailable')) {
        process.exitCode = 1;
      }
    });
}
