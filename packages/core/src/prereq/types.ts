import type { CheckPrerequisite } from '@precheck/shared';

export type PrerequisiteStatus = 'present' | 'installed' | 'unavailable';

export interface PrerequisiteOutcome {
  prerequisite: CheckPrerequisite;
  status: PrerequisiteStatus;
  /** Fetch output or probe failure, empty when present */
  detail: string;
}

export interface FetchResult {
  ok: boolean;
  output: string;
}

/**
 * Installs a missing tool from its import URL.
 */
export interface PackageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult>;
}
