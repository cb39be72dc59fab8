import { toPackageArg } from '@precheck/shared';
import type {
  BuildOptions,
  ErrcheckOptions,
  GolintOptions,
  GovetOptions,
  TestOptions,
} from '@precheck/shared';
import { allGoFiles, testPackages } from '@precheck/repo';
import { execute } from './types';
import type { CheckContext, CheckOutcome } from './types';

const NO_PACKAGES: CheckOutcome = { passed: true, detail: 'no Go packages' };

function packageArgs(ctx: CheckContext): string[] {
  return ctx.tree.packages.map((p) => toPackageArg(p.dir));
}

function outputLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((l) => l.trimEnd())
    .filter((l) => l.length > 0);
}

/** Drops lines containing any blacklisted fragment */
export function filterBlacklisted(lines: readonly string[], blacklist: readonly string[]): string[] {
  return lines.filter((line) => !blacklist.some((entry) => entry && line.includes(entry)));
}

export async function runBuild(options: BuildOptions, ctx: CheckContext): Promise<CheckOutcome> {
  const result = await execute(ctx, ['go', 'build', ...options.extra_args, './...']);
  return { passed: result.exitCode === 0, detail: result.output };
}

export async function runTest(options: TestOptions, ctx: CheckContext): Promise<CheckOutcome> {
  const packages = testPackages(ctx.tree).map((p) => toPackageArg(p.dir));
  if (packages.length === 0) {
    return { passed: true, detail: 'no test files' };
  }
  const result = await execute(ctx, ['go', 'test', ...options.extra_args, ...packages]);
  return { passed: result.exitCode === 0, detail: result.output };
}

async function listUnformatted(
  ctx: CheckContext,
  argv: readonly string[],
  fix: string,
): Promise<CheckOutcome> {
  const files = allGoFiles(ctx.tree);
  if (files.length === 0) {
    return { passed: true, detail: 'no Go files' };
  }
  const result = await execute(ctx, [...argv, ...files]);
  if (result.exitCode !== 0) {
    return { passed: false, detail: result.output };
  }
  const listed = outputLines(result.output);
  if (listed.length === 0) {
    return { passed: true, detail: '' };
  }
  return {
    passed: false,
    detail: `These files are improperly formatted, run \`${fix}\`:\n${listed.join('\n')}`,
  };
}

export function runGofmt(ctx: CheckContext): Promise<CheckOutcome> {
  return listUnformatted(ctx, ['gofmt', '-l', '-s'], 'gofmt -s -w');
}

export function runGoimports(ctx: CheckContext): Promise<CheckOutcome> {
  return listUnformatted(ctx, ['goimports', '-l'], 'goimports -w');
}

export async function runErrcheck(
  options: ErrcheckOptions,
  ctx: CheckContext,
): Promise<CheckOutcome> {
  const packages = packageArgs(ctx);
  if (packages.length === 0) return NO_PACKAGES;
  const ignore = options.ignores ? ['-ignore', options.ignores] : [];
  const result = await execute(ctx, ['errcheck', ...ignore, ...packages]);
  return { passed: result.exitCode === 0, detail: result.output };
}

/** golint exits 0 even with findings, so every unfiltered line fails the check */
export async function runGolint(options: GolintOptions, ctx: CheckContext): Promise<CheckOutcome> {
  const packages = packageArgs(ctx);
  if (packages.length === 0) return NO_PACKAGES;
  const result = await execute(ctx, ['golint', ...packages]);
  const findings = filterBlacklisted(outputLines(result.output), options.blacklist);
  return { passed: findings.length === 0, detail: findings.join('\n') };
}

export async function runGovet(options: GovetOptions, ctx: CheckContext): Promise<CheckOutcome> {
  const packages = packageArgs(ctx);
  if (packages.length === 0) return NO_PACKAGES;
  const result = await execute(ctx, ['go', 'vet', ...packages]);
  // `# pkg` headers and the trailing exit status carry no finding of their own.
  const lines = outputLines(result.output).filter(
    (l) => !l.startsWith('#') && !/^exit status \d+$/.test(l),
  );
  const findings = filterBlacklisted(lines, options.blacklist);
  return { passed: findings.length === 0, detail: findings.join('\n') };
}
