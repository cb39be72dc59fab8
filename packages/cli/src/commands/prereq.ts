import { Command } from 'commander';
import { ConsoleLogger, expandModeChecks } from '@precheck/shared';
import type { CheckPrerequisite, Config } from '@precheck/shared';
import { GoGetFetcher, PrerequisiteVerifier, collectPrerequisites } from '@precheck/core';
import type { PrerequisiteOutcome } from '@precheck/core';
import { OutputRenderer } from '../output/renderer';
import { printTable } from '../output';
import { loadConfig } from '../context';
import type { CliContext, GlobalOptions } from '../context';

/** Every distinct prerequisite needed by any configured mode */
export function configuredPrerequisites(config: Config): CheckPrerequisite[] {
  const defs = Object.values(config.modes).flatMap((mode) => (mode ? expandModeChecks(mode) : []));
  return collectPrerequisites(defs);
}

/**
 * Probes and installs the prerequisites of every mode. Resolves to the
 * outcomes; the caller decides how to report them.
 */
export async function installPrerequisites(
  ctx: CliContext,
  opts: GlobalOptions,
  repoRoot: string,
): Promise<PrerequisiteOutcome[]> {
  const { config } = loadConfig(ctx, opts, repoRoot);
  const executor = ctx.createExecutor(repoRoot);
  const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor, repoRoot), {
    cwd: repoRoot,
    logger: new ConsoleLogger({ verbose: opts.verbose }),
  });

  const outcomes: PrerequisiteOutcome[] = [];
  for (const prerequisite of configuredPrerequisites(config)) {
    outcomes.push(await verifier.ensure(prerequisite));
  }
  return outcomes;
}

export function renderPrerequisites(renderer: OutputRenderer, outcomes: PrerequisiteOutcome[]) {
  if (outcomes.length === 0) {
    renderer.log('No prerequisites needed.');
    return;
  }
  printTable(
    outcomes.map((o) => ({
      tool: o.prerequisite.help_command[0],
      status: o.status,
      url: o.prerequisite.url || '-',
    })),
    { head: ['Tool', 'Status', 'URL'] },
  );
  for (const o of outcomes.filter((o) => o.status === 'unavailable')) {
    renderer.error(o.detail);
  }
}

export function registerPrereqCommand(program: Command, ctx: CliContext) {
  program
    .command('prereq')
    .description('Check and install the tools the configured checks need')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const repoRoot = await ctx.findRepoRoot();
      const outcomes = await installPrerequisites(ctx, globalOpts, repoRoot);

      if (globalOpts.json) {
        renderer.json({ prerequisites: outcomes });
      } else {
        renderPrerequisites(renderer, outcomes);
      }
      if (outcomes.some((o) => o.status === 'unavailable')) {
        process.exitCode = 1;
      }
    });
}
