import type { CustomOptions } from '@precheck/shared';
import { execute } from './types';
import type { CheckContext, CheckOutcome } from './types';

/**
 * Runs a user-defined command. Its exit code only matters when
 * `check_exit_code` is set; output is passed through verbatim.
 */
export async function runCustom(options: CustomOptions, ctx: CheckContext): Promise<CheckOutcome> {
  const result = await execute(ctx, options.command);
  const passed = !options.check_exit_code || result.exitCode === 0;
  return { passed, detail: result.output };
}
