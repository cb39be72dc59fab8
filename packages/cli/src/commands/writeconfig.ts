import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { UsageError } from '@precheck/shared';
import { CONFIG_FILE_NAME, renderDefaultConfig } from '@precheck/core';
import { OutputRenderer } from '../output/renderer';
import type { CliContext, GlobalOptions } from '../context';

interface WriteConfigOptions {
  force?: boolean;
}

export function registerWriteConfigCommand(program: Command, ctx: CliContext) {
  program
    .command('writeconfig')
    .argument('[path]', `Destination (default: <repo>/${CONFIG_FILE_NAME})`)
    .description('Write the default configuration to a file')
    .option('--force', 'Overwrite an existing file')
    .action(async (target: string | undefined, options: WriteConfigOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const file = target ? path.resolve(target) : path.join(await ctx.findRepoRoot(), CONFIG_FILE_NAME);

      const exists = await fs
        .access(file)
        .then(() => true)
        .catch(() => false);
      if (exists && !options.force) {
        throw new UsageError(`${file} already exists. Use --force to overwrite it.`);
      }

      await fs.writeFile(file, renderDefaultConfig(ctx.version), 'utf8');
      if (globalOpts.json) {
        renderer.json({ written: file });
      } else {
        renderer.log(`Wrote ${file}`);
      }
    });
}
