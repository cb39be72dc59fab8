import { directoryOf } from '@precheck/shared';
import type { CoverageOptions, CoverageSettings } from '@precheck/shared';
import { mergeBlocks } from './profile';
import type {
  BandVerdict,
  CoverageBlock,
  CoverageReport,
  CoverageSample,
  FileCoverage,
  ResolvedBand,
  ScopeCoverage,
} from './types';

export const GLOBAL_SCOPE = 'global';

interface Tally {
  covered: number;
  total: number;
}

function tally(blocks: readonly CoverageBlock[]): Tally {
  let covered = 0;
  let total = 0;
  for (const block of blocks) {
    total += block.statements;
    if (block.count > 0) covered += block.statements;
  }
  return { covered, total };
}

function percentageOf({ covered, total }: Tally): number {
  return total === 0 ? 0 : (covered * 100) / total;
}

function isExempt(settings: CoverageSettings): boolean {
  return settings.min_coverage === 0 && settings.max_coverage === 0;
}

/**
 * Picks the band a directory is judged against: an explicit `per_dir` entry
 * wins, a `null` entry falls through to `per_dir_default`, and a `{0, 0}`
 * band exempts the directory.
 */
export function resolveDirectoryBand(dir: string, options: CoverageOptions): ResolvedBand {
  const override = Object.hasOwn(options.per_dir, dir) ? options.per_dir[dir] : undefined;
  if (override) {
    return isExempt(override)
      ? { kind: 'exempt', source: 'override' }
      : { kind: 'enforced', source: 'override', settings: override };
  }
  const fallback = options.per_dir_default;
  return isExempt(fallback)
    ? { kind: 'exempt', source: 'default' }
    : { kind: 'enforced', source: 'default', settings: fallback };
}

/**
 * Judges a percentage against a band. `max_coverage: 0` leaves it unbounded above.
 */
export function evaluateBand(percentage: number, band: ResolvedBand): BandVerdict {
  if (band.kind === 'exempt') return 'exempt';
  const { min_coverage, max_coverage } = band.settings;
  if (percentage < min_coverage) return 'below-min';
  if (max_coverage > 0 && percentage > max_coverage) return 'above-max';
  return 'pass';
}

function scope(name: string, counts: Tally, band: ResolvedBand): ScopeCoverage {
  const percentage = percentageOf(counts);
  return { scope: name, ...counts, percentage, band, verdict: evaluateBand(percentage, band) };
}

function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function lineHits(blocks: readonly CoverageBlock[]): FileCoverage[] {
  return [...groupBy(blocks, (b) => b.file)]
    .map(([file, fileBlocks]) => {
      const hits = new Map<number, number>();
      for (const block of fileBlocks) {
        if (block.statements === 0) continue;
        for (let line = block.startLine; line <= block.endLine; line++) {
          hits.set(line, Math.max(hits.get(line) ?? 0, block.count));
        }
      }
      const lines = [...hits]
        .map(([line, count]) => ({ line, hits: count }))
        .sort((a, b) => a.line - b.line);
      return { file, lines };
    })
    .sort((a, b) => a.file.localeCompare(b.file));
}

/**
 * Turns coverage samples into per-directory and global verdicts.
 *
 * The global scope always merges every sample. Per directory, with
 * `use_global_inference` a directory counts coverage from every package's
 * tests; without it only the directory's own test run is credited.
 */
export class CoverageAggregator {
  constructor(private readonly options: CoverageOptions) {}

  aggregate(samples: readonly CoverageSample[]): CoverageReport {
    const all = mergeBlocks(samples.flatMap((s) => s.blocks));

    const globalCounts = tally(all);
    const globalBand: ResolvedBand =
      globalCounts.total === 0
        ? { kind: 'exempt', source: 'global' }
        : { kind: 'enforced', source: 'global', settings: this.options.global };
    const global = scope(GLOBAL_SCOPE, globalCounts, globalBand);

    const directories = [...this.blocksPerDirectory(samples, all)]
      .map(([dir, blocks]) => ({ dir, counts: tally(blocks) }))
      .filter(({ counts }) => counts.total > 0)
      .sort((a, b) => a.dir.localeCompare(b.dir))
      .map(({ dir, counts }) => scope(dir, counts, resolveDirectoryBand(dir, this.options)));

    const failures = [global, ...directories].filter(
      (s) => s.verdict === 'below-min' || s.verdict === 'above-max',
    );

    return {
      global,
      directories,
      failures,
      passed: failures.length === 0,
      files: lineHits(all),
    };
  }

  private blocksPerDirectory(
    samples: readonly CoverageSample[],
    all: CoverageBlock[],
  ): Map<string, CoverageBlock[]> {
    if (this.options.use_global_inference) {
      return groupBy(all, (b) => directoryOf(b.file));
    }

    const perDir = new Map<string, CoverageBlock[]>();
    for (const [dir, dirSamples] of groupBy(samples, (s) => s.testedPackage)) {
      const own = dirSamples.flatMap((s) => s.blocks.filter((b) => directoryOf(b.file) === dir));
      perDir.set(dir, mergeBlocks(own));
    }
    return perDir;
  }
}
