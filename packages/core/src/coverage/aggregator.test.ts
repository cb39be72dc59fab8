import { describe, it, expect } from 'vitest';
import { CoverageOptionsSchema } from '@precheck/shared';
import type { CoverageOptions } from '@precheck/shared';
import { CoverageAggregator, evaluateBand, resolveDirectoryBand } from './aggregator';
import type { CoverageBlock, CoverageSample } from './types';

function options(input: Partial<CoverageOptions> = {}): CoverageOptions {
  return CoverageOptionsSchema.parse(input);
}

let line = 1;
function block(file: string, statements: number, count: number): CoverageBlock {
  const start = line++;
  return { file, startLine: start, startCol: 1, endLine: start, endCol: 10, statements, count };
}

describe('resolveDirectoryBand', () => {
  const opts = options({
    per_dir_default: { min_coverage: 70, max_coverage: 100 },
    per_dir: {
      exempt: { min_coverage: 0, max_coverage: 0 },
      strict: { min_coverage: 90, max_coverage: 0 },
      inherit: null,
    },
  });

  it('prefers an explicit override', () => {
    expect(resolveDirectoryBand('strict', opts)).toEqual({
      kind: 'enforced',
      source: 'override',
      settings: { min_coverage: 90, max_coverage: 0 },
    });
  });

  it('treats a {0, 0} override as exempt', () => {
    expect(resolveDirectoryBand('exempt', opts)).toEqual({ kind: 'exempt', source: 'override' });
  });

  it('falls back to the default for null and unlisted directories', () => {
    const expected = {
      kind: 'enforced',
      source: 'default',
      settings: { min_coverage: 70, max_coverage: 100 },
    };
    expect(resolveDirectoryBand('inherit', opts)).toEqual(expected);
    expect(resolveDirectoryBand('other', opts)).toEqual(expected);
  });

  it('ignores inherited object keys when looking up overrides', () => {
    expect(resolveDirectoryBand('constructor', opts)).toEqual({
      kind: 'enforced',
      source: 'default',
      settings: { min_coverage: 70, max_coverage: 100 },
    });
  });

  it('exempts everything when the default band is {0, 0}', () => {
    expect(resolveDirectoryBand('x', options())).toEqual({ kind: 'exempt', source: 'default' });
  });
});

describe('evaluateBand', () => {
  const band = (min: number, max: number) =>
    ({ kind: 'enforced', source: 'default', settings: { min_coverage: min, max_coverage: max } }) as const;

  it('passes inclusive bounds', () => {
    expect(evaluateBand(70, band(70, 80))).toBe('pass');
    expect(evaluateBand(80, band(70, 80))).toBe('pass');
  });

  it('flags values outside the band', () => {
    expect(evaluateBand(69.9, band(70, 80))).toBe('below-min');
    expect(evaluateBand(80.1, band(70, 80))).toBe('above-max');
  });

  it('leaves the band open above when max is 0', () => {
    for (let pct = 50; pct <= 100; pct += 10) {
      expect(evaluateBand(pct, band(50, 0))).toBe('pass');
    }
  });

  it('never fails an exempt band', () => {
    for (let pct = 0; pct <= 100; pct += 25) {
      expect(evaluateBand(pct, { kind: 'exempt', source: 'override' })).toBe('exempt');
    }
  });
});

describe('CoverageAggregator', () => {
  it('judges the global and per-directory scopes', () => {
    const samples: CoverageSample[] = [
      { testedPackage: 'pkgA', blocks: [block('pkgA/a.go', 8, 1), block('pkgA/a.go', 2, 0)] },
      { testedPackage: 'pkgB', blocks: [block('pkgB/b.go', 5, 0)] },
    ];
    const aggregator = new CoverageAggregator(
      options({
        global: { min_coverage: 50, max_coverage: 100 },
        per_dir_default: { min_coverage: 70, max_coverage: 100 },
        per_dir: { pkgB: { min_coverage: 0, max_coverage: 0 } },
      }),
    );

    const report = aggregator.aggregate(samples);

    expect(report.global.covered).toBe(8);
    expect(report.global.total).toBe(15);
    expect(report.global.percentage.toFixed(1)).toBe('53.3');
    expect(report.global.verdict).toBe('pass');
    expect(report.directories.map((d) => [d.scope, d.percentage, d.verdict])).toEqual([
      ['pkgA', 80, 'pass'],
      ['pkgB', 0, 'exempt'],
    ]);
    expect(report.failures).toEqual([]);
    expect(report.passed).toBe(true);
  });

  it('fails when a directory falls below its band', () => {
    const report = new CoverageAggregator(
      options({ per_dir_default: { min_coverage: 90, max_coverage: 0 } }),
    ).aggregate([{ testedPackage: 'a', blocks: [block('a/a.go', 1, 1), block('a/a.go', 1, 0)] }]);

    expect(report.passed).toBe(false);
    expect(report.failures.map((f) => [f.scope, f.verdict])).toEqual([['a', 'below-min']]);
  });

  it('judges a directory named like an object key against the default band', () => {
    const report = new CoverageAggregator(
      options({ per_dir_default: { min_coverage: 70, max_coverage: 100 } }),
    ).aggregate([{ testedPackage: 'constructor', blocks: [block('constructor/c.go', 10, 0)] }]);

    expect(report.directories.map((d) => [d.scope, d.percentage, d.verdict])).toEqual([
      ['constructor', 0, 'below-min'],
    ]);
    expect(report.passed).toBe(false);
  });

  it('credits cross-package coverage only with global inference', () => {
    // Tests in `a` exercise code in `b`; `b` has no tests of its own.
    const samples: CoverageSample[] = [
      { testedPackage: 'a', blocks: [block('a/a.go', 2, 1), block('b/b.go', 4, 3)] },
    ];
    const band = { per_dir_default: { min_coverage: 50, max_coverage: 0 } };

    const withoutInference = new CoverageAggregator(options(band)).aggregate(samples);
    const withInference = new CoverageAggregator(
      options({ ...band, use_global_inference: true }),
    ).aggregate(samples);

    expect(withoutInference.directories.map((d) => d.scope)).toEqual(['a']);
    expect(withInference.directories.map((d) => [d.scope, d.percentage])).toEqual([
      ['a', 100],
      ['b', 100],
    ]);
    expect(withoutInference.global).toEqual(withInference.global);
  });

  it('merges blocks reported by several test runs', () => {
    const shared = block('lib/lib.go', 4, 0);
    const samples: CoverageSample[] = [
      { testedPackage: 'lib', blocks: [shared] },
      { testedPackage: 'cmd', blocks: [{ ...shared, count: 1 }, block('cmd/main.go', 1, 1)] },
    ];

    const report = new CoverageAggregator(options()).aggregate(samples);

    expect(report.global.covered).toBe(5);
    expect(report.global.total).toBe(5);
  });

  it('reports an empty tree at 0% without judging it', () => {
    const report = new CoverageAggregator(
      options({ global: { min_coverage: 50, max_coverage: 0 } }),
    ).aggregate([]);

    expect(report.global).toMatchObject({ percentage: 0, verdict: 'exempt' });
    expect(report.directories).toEqual([]);
    expect(report.passed).toBe(true);
  });

  it('records per-line hits for reporting', () => {
    const report = new CoverageAggregator(options()).aggregate([
      {
        testedPackage: 'x',
        blocks: [
          { file: 'x/x.go', startLine: 3, startCol: 1, endLine: 4, endCol: 2, statements: 2, count: 5 },
          { file: 'x/x.go', startLine: 4, startCol: 3, endLine: 6, endCol: 2, statements: 1, count: 0 },
        ],
      },
    ]);

    expect(report.files).toEqual([
      {
        file: 'x/x.go',
        lines: [
          { line: 3, hits: 5 },
          { line: 4, hits: 5 },
          { line: 5, hits: 0 },
          { line: 6, hits: 0 },
        ],
      },
    ]);
  });
});
