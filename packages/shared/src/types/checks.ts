import type { Mode, ModeChecks } from '../config/schema';

/**
 * The closed set of execution modes.
 */
export const MODE_NAMES = ['pre-commit', 'pre-push', 'continuous-integration', 'lint'] as const;
export type ModeName = (typeof MODE_NAMES)[number];

/**
 * The closed set of check kinds, in the order checks are listed for a mode.
 */
export const CHECK_KINDS = [
  'build',
  'gofmt',
  'test',
  'errcheck',
  'goimports',
  'golint',
  'govet',
  'coverage',
  'custom',
] as const;
export type CheckKind = (typeof CHECK_KINDS)[number];

/**
 * Option record type for each check kind, as validated by the config schema.
 */
export type CheckOptionsMap = {
  [K in CheckKind]: NonNullable<ModeChecks[K]>[number];
};

export type BuildOptions = CheckOptionsMap['build'];
export type GofmtOptions = CheckOptionsMap['gofmt'];
export type TestOptions = CheckOptionsMap['test'];
export type ErrcheckOptions = CheckOptionsMap['errcheck'];
export type GoimportsOptions = CheckOptionsMap['goimports'];
export type GolintOptions = CheckOptionsMap['golint'];
export type GovetOptions = CheckOptionsMap['govet'];
export type CoverageOptions = CheckOptionsMap['coverage'];
export type CustomOptions = CheckOptionsMap['custom'];

/**
 * One configured check of a given kind.
 */
export interface CheckDefinitionOf<K extends CheckKind> {
  kind: K;
  /** Display name, unique within a mode */
  name: string;
  options: CheckOptionsMap[K];
}

/**
 * Tagged union of every check kind, keyed by `kind`.
 */
export type CheckDefinition = { [K in CheckKind]: CheckDefinitionOf<K> }[CheckKind];

export type CheckStatus = 'passed' | 'failed' | 'cancelled';
export type ModeStatus = 'passed' | 'failed' | 'timeout';

function labels(kind: CheckKind, count: number): string[] {
  return Array.from({ length: count }, (_, i) => (i === 0 ? kind : `${kind}#${i + 1}`));
}

/**
 * Flattens a mode's `checks` mapping into check definitions, in `CHECK_KINDS` order
 * and declaration order within a kind. Repeated kinds are named `test`, `test#2`, ...;
 * custom checks use their display name.
 */
export function expandModeChecks(mode: Mode): CheckDefinition[] {
  const { checks } = mode;
  const defs: CheckDefinition[] = [];

  const build = checks.build ?? [];
  labels('build', build.length).forEach((name, i) =>
    defs.push({ kind: 'build', name, options: build[i] }),
  );
  const gofmt = checks.gofmt ?? [];
  labels('gofmt', gofmt.length).forEach((name, i) =>
    defs.push({ kind: 'gofmt', name, options: gofmt[i] }),
  );
  const test = checks.test ?? [];
  labels('test', test.length).forEach((name, i) =>
    defs.push({ kind: 'test', name, options: test[i] }),
  );
  const errcheck = checks.errcheck ?? [];
  labels('errcheck', errcheck.length).forEach((name, i) =>
    defs.push({ kind: 'errcheck', name, options: errcheck[i] }),
  );
  const goimports = checks.goimports ?? [];
  labels('goimports', goimports.length).forEach((name, i) =>
    defs.push({ kind: 'goimports', name, options: goimports[i] }),
  );
  const golint = checks.golint ?? [];
  labels('golint', golint.length).forEach((name, i) =>
    defs.push({ kind: 'golint', name, options: golint[i] }),
  );
  const govet = checks.govet ?? [];
  labels('govet', govet.length).forEach((name, i) =>
    defs.push({ kind: 'govet', name, options: govet[i] }),
  );
  const coverage = checks.coverage ?? [];
  labels('coverage', coverage.length).forEach((name, i) =>
    defs.push({ kind: 'coverage', name, options: coverage[i] }),
  );

  const seen = new Map<string, number>();
  for (const options of checks.custom ?? []) {
    const n = (seen.get(options.display_name) ?? 0) + 1;
    seen.set(options.display_name, n);
    const name = n === 1 ? options.display_name : `${options.display_name}#${n}`;
    defs.push({ kind: 'custom', name, options });
  }

  return defs;
}
