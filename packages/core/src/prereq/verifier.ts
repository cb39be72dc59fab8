import { ProcessError, SilentLogger } from '@precheck/shared';
import type { CheckPrerequisite, Logger } from '@precheck/shared';
import type { CommandExecutor } from '@precheck/exec';
import { prerequisiteKey } from './builtin';
import type { PackageFetcher, PrerequisiteOutcome } from './types';

export interface PrerequisiteVerifierOptions {
  cwd?: string;
  logger?: Logger;
  runId?: string;
}

export interface EnsureAllResult {
  ok: boolean;
  outcomes: PrerequisiteOutcome[];
}

/**
 * Probes external tools and installs missing ones at most once per verifier.
 * A launch failure of the probe counts as absence; cancellation propagates.
 */
export class PrerequisiteVerifier {
  private readonly logger: Logger;
  private readonly pending = new Map<string, Promise<PrerequisiteOutcome>>();

  constructor(
    private readonly executor: CommandExecutor,
    private readonly fetcher: PackageFetcher,
    private readonly options: PrerequisiteVerifierOptions = {},
  ) {
    this.logger = options.logger ?? new SilentLogger();
  }

  async isPresent(prerequisite: CheckPrerequisite, signal?: AbortSignal): Promise<boolean> {
    try {
      const result = await this.executor.execute({
        argv: prerequisite.help_command,
        cwd: this.options.cwd,
        signal,
      });
      return result.exitCode === prerequisite.expected_exit_code;
    } catch (error) {
      if (error instanceof ProcessError) return false;
      throw error;
    }
  }

  /**
   * Probes, and when absent fetches `url` once and probes again.
   * Concurrent calls for the same prerequisite share one attempt.
   */
  ensure(prerequisite: CheckPrerequisite, signal?: AbortSignal): Promise<PrerequisiteOutcome> {
    const key = prerequisiteKey(prerequisite);
    let outcome = this.pending.get(key);
    if (!outcome) {
      outcome = this.probeAndInstall(prerequisite, signal);
      this.pending.set(key, outcome);
    }
    return outcome;
  }

  /** Ensures each prerequisite in order, stopping at the first unavailable one */
  async ensureAll(
    prerequisites: readonly CheckPrerequisite[],
    signal?: AbortSignal,
  ): Promise<EnsureAllResult> {
    const outcomes: PrerequisiteOutcome[] = [];
    for (const prerequisite of prerequisites) {
      const outcome = await this.ensure(prerequisite, signal);
      outcomes.push(outcome);
      if (outcome.status === 'unavailable') {
        return { ok: false, outcomes };
      }
    }
    return { ok: true, outcomes };
  }

  private async probeAndInstall(
    prerequisite: CheckPrerequisite,
    signal?: AbortSignal,
  ): Promise<PrerequisiteOutcome> {
    if (await this.isPresent(prerequisite, signal)) {
      return { prerequisite, status: 'present', detail: '' };
    }

    const command = prerequisite.help_command.join(' ');
    if (!prerequisite.url) {
      return { prerequisite, status: 'unavailable', detail: `${command}: not found` };
    }

    await this.logger.info(`Installing ${prerequisite.url}`);
    const fetched = await this.fetcher.fetch(prerequisite.url, signal);
    if (!fetched.ok) {
      return {
        prerequisite,
        status: 'unavailable',
        detail: `go get ${prerequisite.url} failed\n${fetched.output}`.trimEnd(),
      };
    }

    if (!(await this.isPresent(prerequisite, signal))) {
      return {
        prerequisite,
        status: 'unavailable',
        detail: `${command}: still missing after go get ${prerequisite.url}`,
      };
    }

    await this.logger.log({
      type: 'PrerequisiteInstalled',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: this.options.runId ?? 'prereq',
      payload: { helpCommand: [...prerequisite.help_command], url: prerequisite.url },
    });
    return { prerequisite, status: 'installed', detail: fetched.output };
  }
}
