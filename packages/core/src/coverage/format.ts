import type { CoverageReport, ScopeCoverage } from './types';

export function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatScope(scope: ScopeCoverage): string {
  const base = `${scope.scope}: ${formatPercentage(scope.percentage)} (${scope.covered}/${scope.total})`;
  const { band } = scope;
  if (band.kind === 'exempt') {
    return scope.verdict === 'exempt' && scope.scope !== 'global' ? `${base} exempt` : base;
  }
  switch (scope.verdict) {
    case 'below-min':
      return `${base} below min ${formatPercentage(band.settings.min_coverage)}`;
    case 'above-max':
      return `${base} above max ${formatPercentage(band.settings.max_coverage)}`;
    default:
      return base;
  }
}

/** One line per scope, global first */
export function describeCoverage(report: CoverageReport): string {
  return [report.global, ...report.directories].map(formatScope).join('\n');
}
