import type { CoverageSettings } from '@precheck/shared';

/**
 * One instrumented statement block from a cover profile.
 */
export interface CoverageBlock {
  /** Repository-relative POSIX file path */
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
  statements: number;
  /** Hit count; 0 means never executed */
  count: number;
}

/**
 * The blocks reported by one `go test` run, tagged with the package it tested.
 */
export interface CoverageSample {
  /** Repository-relative directory of the package under test */
  testedPackage: string;
  blocks: CoverageBlock[];
}

export type BandSource = 'global' | 'override' | 'default';

export type ResolvedBand =
  | { kind: 'exempt'; source: BandSource }
  | { kind: 'enforced'; source: BandSource; settings: CoverageSettings };

export type BandVerdict = 'pass' | 'exempt' | 'below-min' | 'above-max';

export interface ScopeCoverage {
  /** `global`, or a repository-relative directory */
  scope: string;
  covered: number;
  total: number;
  /** 0 when `total` is 0 */
  percentage: number;
  band: ResolvedBand;
  verdict: BandVerdict;
}

export interface LineHits {
  line: number;
  hits: number;
}

export interface FileCoverage {
  file: string;
  /** Sorted by line */
  lines: LineHits[];
}

export interface CoverageReport {
  global: ScopeCoverage;
  /** Directories with at least one statement, sorted */
  directories: ScopeCoverage[];
  /** Scopes whose verdict is `below-min` or `above-max` */
  failures: ScopeCoverage[];
  passed: boolean;
  files: FileCoverage[];
}
