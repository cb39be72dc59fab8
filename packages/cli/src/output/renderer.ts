import pc from 'picocolors';
import type { CheckStatus } from '@precheck/shared';
import type { CheckReport, ModeReport } from '@precheck/core';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

const ICONS: Record<CheckStatus, string> = {
  passed: pc.green('✔'),
  failed: pc.red('✖'),
  cancelled: pc.yellow('⊘'),
};

function indent(text: string, prefix = '      '): string {
  return text
    .trimEnd()
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

export class OutputRenderer {
  constructor(
    private isJson: boolean,
    private verbose = false,
  ) {}

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  renderModeReport(report: ModeReport): void {
    if (this.isJson) {
      this.json(report);
      return;
    }

    const budget = report.maxDurationMs > 0 ? ` (budget ${seconds(report.maxDurationMs)})` : '';
    const elapsed = `in ${seconds(report.durationMs)}${budget}`;
    switch (report.status) {
      case 'passed':
        console.log(pc.green(`✅ ${report.mode} passed ${elapsed}`));
        break;
      case 'failed':
        console.log(pc.red(`❌ ${report.mode} failed ${elapsed}`));
        break;
      case 'timeout':
        console.log(pc.red(`⏱ ${report.mode} exceeded its budget ${elapsed}`));
        break;
    }

    for (const check of report.checks) {
      this.renderCheck(check);
    }
  }

  private renderCheck(check: CheckReport): void {
    const timing = check.status === 'cancelled' ? pc.gray('cancelled') : seconds(check.durationMs);
    console.log(`  ${ICONS[check.status]} ${check.name.padEnd(16)} ${timing}`);
    const showDetail = check.status === 'failed' || (this.verbose && check.status === 'passed');
    if (showDetail && check.detail.trim()) {
      console.log(indent(check.detail));
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(message);
    }
  }

  error(message: string): void {
    if (this.isJson) {
      console.log(JSON.stringify({ error: { message } }));
    } else {
      console.error(pc.red(`Error: ${message}`));
    }
  }
}
