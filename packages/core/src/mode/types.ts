import type { CheckKind, CheckStatus, ModeName, ModeStatus } from '@precheck/shared';
import type { CoverageReport } from '../coverage';

export interface CheckReport {
  name: string;
  kind: CheckKind;
  status: CheckStatus;
  durationMs: number;
  detail: string;
  coverage?: CoverageReport;
}

export interface ModeReport {
  runId: string;
  mode: ModeName;
  status: ModeStatus;
  durationMs: number;
  /** 0 when the mode has no budget */
  maxDurationMs: number;
  /** In definition order */
  checks: CheckReport[];
}
