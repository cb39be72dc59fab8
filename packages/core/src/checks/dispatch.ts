import type { CheckDefinition } from '@precheck/shared';
import { prerequisitesOf } from '../prereq';
import { runCoverage } from './coverage';
import { runCustom } from './custom';
import {
  runBuild,
  runErrcheck,
  runGofmt,
  runGoimports,
  runGolint,
  runGovet,
  runTest,
} from './native';
import type { CheckContext, CheckOutcome } from './types';

/**
 * Ensures a check's prerequisites, then runs it.
 * Launch failures and cancellation surface as rejections.
 */
export async function runCheck(def: CheckDefinition, ctx: CheckContext): Promise<CheckOutcome> {
  const prerequisites = await ctx.prerequisites.ensureAll(prerequisitesOf(def), ctx.signal);
  const missing = prerequisites.outcomes.find((o) => o.status === 'unavailable');
  if (missing) {
    const command = missing.prerequisite.help_command.join(' ');
    return { passed: false, detail: `prerequisite unavailable: ${command}\n${missing.detail}` };
  }

  switch (def.kind) {
    case 'build':
      return runBuild(def.options, ctx);
    case 'gofmt':
      return runGofmt(ctx);
    case 'test':
      return runTest(def.options, ctx);
    case 'errcheck':
      return runErrcheck(def.options, ctx);
    case 'goimports':
      return runGoimports(ctx);
    case 'golint':
      return runGolint(def.options, ctx);
    case 'govet':
      return runGovet(def.options, ctx);
    case 'coverage':
      return runCoverage(def.options, ctx);
    case 'custom':
      return runCustom(def.options, ctx);
    default: {
      const exhaustive: never = def;
      throw new Error(`Unknown check kind: ${JSON.stringify(exhaustive)}`);
    }
  }
}
