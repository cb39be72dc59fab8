import { createHash } from 'node:crypto';
import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { ReportingError } from '@precheck/shared';
import type { CoverageReport } from './types';

export const COVERALLS_ENDPOINT = 'https://coveralls.io/api/v1/jobs';

/**
 * Sends an aggregated report to an external coverage service.
 */
export interface CoverageReporter {
  report(report: CoverageReport, signal?: AbortSignal): Promise<void>;
}

export interface CoverallsReporterOptions {
  repoRoot: string;
  env?: NodeJS.ProcessEnv;
  fetchFn?: typeof fetch;
  endpoint?: string;
  readFile?: (file: string) => Promise<string>;
}

interface CoverallsSourceFile {
  name: string;
  source_digest: string;
  coverage: Array<number | null>;
}

interface CoverallsJob {
  service_name: string;
  service_job_id: string;
  repo_token?: string;
  source_files: CoverallsSourceFile[];
}

/**
 * Uploads line coverage to coveralls.io.
 * Credentials come from COVERALLS_REPO_TOKEN, or the CI service's job id.
 */
export class CoverallsReporter implements CoverageReporter {
  private readonly env: NodeJS.ProcessEnv;
  private readonly fetchFn: typeof fetch;
  private readonly endpoint: string;
  private readonly readFile: (file: string) => Promise<string>;

  constructor(private readonly options: CoverallsReporterOptions) {
    this.env = options.env ?? process.env;
    this.fetchFn = options.fetchFn ?? fetch;
    this.endpoint = options.endpoint ?? COVERALLS_ENDPOINT;
    this.readFile = options.readFile ?? ((file) => nodeFs.readFile(file, 'utf-8'));
  }

  async buildJob(report: CoverageReport): Promise<CoverallsJob> {
    const token = this.env.COVERALLS_REPO_TOKEN;
    const service = this.detectService();
    if (!token && !service.jobId) {
      throw new ReportingError(
        'Coveralls upload needs COVERALLS_REPO_TOKEN or a supported CI environment',
      );
    }

    const sourceFiles: CoverallsSourceFile[] = [];
    for (const file of report.files) {
      let source: string;
      try {
        source = await this.readFile(path.join(this.options.repoRoot, file.file));
      } catch (error) {
        throw new ReportingError(`Cannot read ${file.file} for coverage upload`, { cause: error });
      }
      const lineCount = source.split('\n').length;
      const coverage = new Array<number | null>(lineCount).fill(null);
      for (const { line, hits } of file.lines) {
        if (line >= 1 && line <= lineCount) coverage[line - 1] = hits;
      }
      sourceFiles.push({
        name: file.file,
        source_digest: createHash('md5').update(source).digest('hex'),
        coverage,
      });
    }

    return {
      service_name: service.name,
      service_job_id: service.jobId,
      ...(token ? { repo_token: token } : {}),
      source_files: sourceFiles,
    };
  }

  async report(report: CoverageReport, signal?: AbortSignal): Promise<void> {
    const job = await this.buildJob(report);

    const form = new FormData();
    form.append(
      'json_file',
      new Blob([JSON.stringify(job)], { type: 'application/json' }),
      'coverage.json',
    );

    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, { method: 'POST', body: form, signal });
    } catch (error) {
      throw new ReportingError('Coveralls upload failed', { cause: error });
    }

    if (!response.ok) {
      throw new ReportingError(`Coveralls responded with HTTP ${response.status}`, {
        details: await response.text(),
      });
    }
  }

  private detectService(): { name: string; jobId: string } {
    if (this.env.TRAVIS_JOB_ID) {
      return { name: 'travis-ci', jobId: this.env.TRAVIS_JOB_ID };
    }
    if (this.env.GITHUB_RUN_ID) {
      return { name: 'github', jobId: this.env.GITHUB_RUN_ID };
    }
    return { name: 'precheck', jobId: '' };
  }
}
