import { Command } from 'commander';
import { ConsoleLogger, MODE_NAMES, UsageError } from '@precheck/shared';
import type { ModeName } from '@precheck/shared';
import { ModeRunner, defaultConcurrency } from '@precheck/core';
import { OutputRenderer } from '../output/renderer';
import { loadConfig } from '../context';
import type { CliContext, GlobalOptions } from '../context';

interface RunOptions {
  concurrency?: string;
}

export function parseModeName(value: string): ModeName {
  const mode = MODE_NAMES.find((m) => m === value);
  if (!mode) {
    throw new UsageError(`Unknown mode "${value}". Expected one of: ${MODE_NAMES.join(', ')}`);
  }
  return mode;
}

export function parseConcurrency(value: string | undefined, source: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${source} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function registerRunCommand(program: Command, ctx: CliContext) {
  program
    .command('run')
    .argument('[mode]', `Mode to run: ${MODE_NAMES.join(', ')}`, 'pre-commit')
    .description('Run the checks of a mode')
    .option('--concurrency <n>', 'Maximum checks run at once (default: CPU count)')
    .action(async (modeArg: string, options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json, !!globalOpts.verbose);

      const mode = parseModeName(modeArg);
      const concurrency =
        parseConcurrency(options.concurrency, '--concurrency') ??
        parseConcurrency(ctx.env.PRECHECK_CONCURRENCY, 'PRECHECK_CONCURRENCY') ??
        defaultConcurrency();

      const repoRoot = await ctx.findRepoRoot();
      const { config, source } = loadConfig(ctx, globalOpts, repoRoot);
      if (globalOpts.verbose) {
        renderer.log(`Using ${source ?? 'built-in default configuration'}`);
      }

      const runner = new ModeRunner({
        repoRoot,
        executor: ctx.createExecutor(repoRoot),
        logger: new ConsoleLogger({ verbose: globalOpts.verbose }),
        concurrency,
      });
      const report = await runner.run(mode, config);

      renderer.renderModeReport(report);
      if (report.status !== 'passed') {
        process.exitCode = 1;
      }
    });
}
