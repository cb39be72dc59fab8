import { Command } from 'commander';
import { MODE_NAMES, expandModeChecks } from '@precheck/shared';
import { OutputRenderer } from '../output/renderer';
import { printTable } from '../output';
import { loadConfig } from '../context';
import type { CliContext, GlobalOptions } from '../context';

export function registerInfoCommand(program: Command, ctx: CliContext) {
  program
    .command('info')
    .description('Show the effective configuration and the checks of each mode')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const repoRoot = await ctx.findRepoRoot();
      const { config, source } = loadConfig(ctx, globalOpts, repoRoot);

      const modes = MODE_NAMES.flatMap((name) => {
        const mode = config.modes[name];
        if (!mode) return [];
        return [
          {
            mode: name,
            checks: expandModeChecks(mode).map((d) => d.name),
            maxDuration: mode.max_duration,
          },
        ];
      });

      if (globalOpts.json) {
        renderer.json({ version: ctx.version, repoRoot, source: source ?? null, config });
        return;
      }

      renderer.log(`precheck ${ctx.version}`);
      renderer.log(`Repository: ${repoRoot}`);
      renderer.log(`Config: ${source ?? 'built-in default'}`);
      if (modes.length === 0) {
        renderer.log('No modes configured.');
        return;
      }
      printTable(
        modes.map((m) => ({
          mode: m.mode,
          checks: m.checks.join(', ') || '-',
          budget: m.maxDuration > 0 ? `${m.maxDuration}s` : 'none',
        })),
        { head: ['Mode', 'Checks', 'Budget'] },
      );
    });
}
