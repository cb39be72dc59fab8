import type { Logger } from '@precheck/shared';
import type { CommandExecutor, CommandResult } from '@precheck/exec';
import type { GoSourceTree } from '@precheck/repo';
import type { CoverageReport, CoverageReporter } from '../coverage';
import type { PrerequisiteVerifier } from '../prereq';

/**
 * Everything a check needs for one run. The signal aborts when the mode's
 * budget runs out.
 */
export interface CheckContext {
  repoRoot: string;
  tree: GoSourceTree;
  executor: CommandExecutor;
  prerequisites: PrerequisiteVerifier;
  logger: Logger;
  signal: AbortSignal;
  /** Upper bound on processes a single check may run at once */
  concurrency: number;
  reporter?: CoverageReporter;
}

export interface CheckOutcome {
  passed: boolean;
  /** Tool output or a failure summary */
  detail: string;
  coverage?: CoverageReport;
}

export function execute(ctx: CheckContext, argv: readonly string[]): Promise<CommandResult> {
  return ctx.executor.execute({ argv, cwd: ctx.repoRoot, signal: ctx.signal });
}
