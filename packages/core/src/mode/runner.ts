import os from 'node:os';
import {
  SilentLogger,
  expandModeChecks,
  isCancellation,
  mapWithConcurrency,
} from '@precheck/shared';
import type {
  CheckDefinition,
  CheckStatus,
  Config,
  Logger,
  ModeName,
  ModeStatus,
  PrecheckEvent,
  PrecheckEventBody,
} from '@precheck/shared';
import type { CommandExecutor } from '@precheck/exec';
import { GoPackageScanner } from '@precheck/repo';
import { runCheck } from '../checks';
import type { CheckContext } from '../checks';
import { CoverallsReporter } from '../coverage';
import type { CoverageReporter } from '../coverage';
import { GoGetFetcher, PrerequisiteVerifier } from '../prereq';
import type { PackageFetcher } from '../prereq';
import type { CheckReport, ModeReport } from './types';

export interface ModeRunnerOptions {
  repoRoot: string;
  executor: CommandExecutor;
  fetcher?: PackageFetcher;
  reporter?: CoverageReporter;
  logger?: Logger;
  /** Maximum checks in flight; defaults to the CPU count */
  concurrency?: number;
  scanner?: Pick<GoPackageScanner, 'scan'>;
  now?: () => number;
}

export interface ModeRunOptions {
  /** Aborting it cancels the run like an expired budget, without the timeout status */
  signal?: AbortSignal;
  runId?: string;
}

export function defaultConcurrency(): number {
  return Math.max(1, os.cpus().length);
}

/**
 * Runs all checks of a mode concurrently under one wall-clock budget.
 *
 * When the budget expires every in-flight check is aborted and reported as
 * `cancelled` along with those not yet started, and the mode ends in `timeout`.
 */
export class ModeRunner {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly scanner: Pick<GoPackageScanner, 'scan'>;
  private readonly fetcher: PackageFetcher;
  private readonly reporter: CoverageReporter;
  private readonly now: () => number;

  constructor(private readonly options: ModeRunnerOptions) {
    this.logger = options.logger ?? new SilentLogger();
    this.concurrency = options.concurrency ?? defaultConcurrency();
    this.scanner = options.scanner ?? new GoPackageScanner();
    this.fetcher = options.fetcher ?? new GoGetFetcher(options.executor, options.repoRoot);
    this.reporter = options.reporter ?? new CoverallsReporter({ repoRoot: options.repoRoot });
    this.now = options.now ?? Date.now;
  }

  async run(modeName: ModeName, config: Config, runOptions: ModeRunOptions = {}): Promise<ModeReport> {
    const runId = runOptions.runId ?? Date.now().toString();
    const mode = config.modes[modeName];
    const definitions = mode ? expandModeChecks(mode) : [];
    const maxDurationMs = mode ? Math.round(mode.max_duration * 1000) : 0;
    const logger = this.logger.child({ mode: modeName });

    if (!mode) {
      await logger.warn(`Mode ${modeName} is not configured; nothing to run`);
    }

    const emit = async (body: PrecheckEventBody) => {
      const event: PrecheckEvent = {
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId,
        ...body,
      };
      await logger.log(event);
    };

    const start = this.now();
    await emit({
      type: 'ModeStarted',
      payload: { mode: modeName, checkCount: definitions.length, maxDurationMs },
    });

    const controller = new AbortController();
    let timedOut = false;
    const timer =
      maxDurationMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, maxDurationMs)
        : undefined;
    const onExternalAbort = () => controller.abort();
    runOptions.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (runOptions.signal?.aborted) controller.abort();

    let checks: CheckReport[] = [];
    try {
      const tree = await this.scanner.scan(this.options.repoRoot, {
        ignorePatterns: config.ignore_patterns,
      });
      const ctx: CheckContext = {
        repoRoot: this.options.repoRoot,
        tree,
        executor: this.options.executor,
        prerequisites: new PrerequisiteVerifier(this.options.executor, this.fetcher, {
          cwd: this.options.repoRoot,
          logger,
          runId,
        }),
        logger,
        signal: controller.signal,
        concurrency: this.concurrency,
        reporter: this.reporter,
      };

      checks = await mapWithConcurrency(definitions, this.concurrency, (def) =>
        this.runOne(def, ctx, emit),
      );
    } finally {
      clearTimeout(timer);
      runOptions.signal?.removeEventListener('abort', onExternalAbort);
    }

    const durationMs = this.now() - start;
    if (maxDurationMs > 0 && durationMs > maxDurationMs) {
      timedOut = true;
    }

    const failedChecks = checks.filter((c) => c.status !== 'passed').map((c) => c.name);
    const status: ModeStatus = timedOut ? 'timeout' : failedChecks.length > 0 ? 'failed' : 'passed';

    await emit({
      type: 'ModeFinished',
      payload: { mode: modeName, status, durationMs, failedChecks },
    });

    return { runId, mode: modeName, status, durationMs, maxDurationMs, checks };
  }

  private async runOne(
    def: CheckDefinition,
    ctx: CheckContext,
    emit: (body: PrecheckEventBody) => Promise<void>,
  ): Promise<CheckReport> {
    const base = { name: def.name, kind: def.kind };
    if (ctx.signal.aborted) {
      return { ...base, status: 'cancelled', durationMs: 0, detail: 'not started' };
    }

    await emit({ type: 'CheckStarted', payload: base });
    const start = this.now();

    let status: CheckStatus;
    let detail: string;
    let coverage: CheckReport['coverage'];
    try {
      const outcome = await runCheck(def, ctx);
      status = outcome.passed ? 'passed' : 'failed';
      detail = outcome.detail;
      coverage = outcome.coverage;
    } catch (error) {
      if (!isCancellation(error) && !ctx.signal.aborted) {
        await ctx.logger.debug(
          `Check ${def.name} errored: ${error instanceof Error ? error.stack ?? error.message : String(error)}`,
        );
      }
      status = 'failed';
      detail = error instanceof Error ? error.message : String(error);
    }

    // An abort supersedes whatever the check concluded on its way out.
    if (ctx.signal.aborted) {
      status = 'cancelled';
    }

    const durationMs = this.now() - start;
    await emit({ type: 'CheckFinished', payload: { ...base, status, durationMs } });
    return { ...base, status, durationMs, detail, ...(coverage ? { coverage } : {}) };
  }
}
