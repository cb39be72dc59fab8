import nodeFs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CancelledError, isCancellation, mapWithConcurrency, toPackageArg } from '@precheck/shared';
import type { CoverageOptions } from '@precheck/shared';
import { testPackages } from '@precheck/repo';
import type { GoSourceTree } from '@precheck/repo';
import {
  CoverageAggregator,
  createImportPathResolver,
  describeCoverage,
  parseCoverProfile,
} from '../coverage';
import type { CoverageSample } from '../coverage';
import { execute } from './types';
import type { CheckContext, CheckOutcome } from './types';

function importPathOf(tree: GoSourceTree, dir: string): string {
  if (!tree.modulePath) return toPackageArg(dir);
  return dir === '.' ? tree.modulePath : `${tree.modulePath}/${dir}`;
}

async function readProfile(file: string): Promise<string> {
  try {
    return await nodeFs.readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

/**
 * Runs the tests of every package that has some with a cover profile, waits
 * for all of them, then aggregates and judges the merged profiles. With
 * `use_global_inference` each run instruments every package so cross-package
 * coverage is credited.
 */
export async function runCoverage(
  options: CoverageOptions,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  const { packages } = ctx.tree;
  const tested = testPackages(ctx.tree);
  if (tested.length === 0) {
    return { passed: true, detail: 'no test files' };
  }

  const workDir = await nodeFs.mkdtemp(path.join(os.tmpdir(), 'precheck-cover-'));
  try {
    const coverpkg = options.use_global_inference
      ? [`-coverpkg=${packages.map((p) => importPathOf(ctx.tree, p.dir)).join(',')}`]
      : [];

    const runs = await mapWithConcurrency(tested, ctx.concurrency, async (pkg, index) => {
      const profile = path.join(workDir, `${index}.out`);
      const result = await execute(ctx, [
        'go',
        'test',
        '-covermode=count',
        `-coverprofile=${profile}`,
        ...coverpkg,
        toPackageArg(pkg.dir),
      ]);
      return { pkg, profile, result };
    });

    if (ctx.signal.aborted) {
      throw new CancelledError('Coverage cancelled');
    }

    const failed = runs.filter((r) => r.result.exitCode !== 0);
    if (failed.length > 0) {
      return { passed: false, detail: failed.map((r) => r.result.output).join('\n') };
    }

    const resolve = createImportPathResolver(ctx.tree.modulePath);
    const samples: CoverageSample[] = [];
    for (const run of runs) {
      samples.push({
        testedPackage: run.pkg.dir,
        blocks: parseCoverProfile(await readProfile(run.profile), resolve),
      });
    }

    const report = new CoverageAggregator(options).aggregate(samples);

    if (options.use_coveralls && ctx.reporter) {
      try {
        await ctx.reporter.report(report, ctx.signal);
      } catch (error) {
        if (isCancellation(error)) throw error;
        const message = error instanceof Error ? error.message : String(error);
        await ctx.logger.warn(`Coverage upload failed: ${message}`);
      }
    }

    return { passed: report.passed, detail: describeCoverage(report), coverage: report };
  } finally {
    await nodeFs.rm(workDir, { recursive: true, force: true });
  }
}
