import { Command } from 'commander';
import { registerRunCommand } from './commands/run';
import { registerPrereqCommand } from './commands/prereq';
import { registerInstallCommand } from './commands/install';
import { registerWriteConfigCommand } from './commands/writeconfig';
import { registerInfoCommand } from './commands/info';
import type { CliContext } from './context';

export const name = '@precheck/cli';

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('precheck')
    .description('Runs Go build, format, lint, test and coverage checks for a repository')
    .version(ctx.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRunCommand(program, ctx);
  registerPrereqCommand(program, ctx);
  registerInstallCommand(program, ctx);
  registerWriteConfigCommand(program, ctx);
  registerInfoCommand(program, ctx);

  return program;
}
