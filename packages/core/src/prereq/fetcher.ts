import { ProcessError } from '@precheck/shared';
import type { CommandExecutor } from '@precheck/exec';
import type { FetchResult, PackageFetcher } from './types';

/**
 * Fetches tools with `go get <url>`.
 */
export class GoGetFetcher implements PackageFetcher {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly cwd?: string,
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    try {
      const result = await this.executor.execute({ argv: ['go', 'get', url], cwd: this.cwd, signal });
      return { ok: result.exitCode === 0, output: result.output };
    } catch (error) {
      if (error instanceof ProcessError) {
        return { ok: false, output: error.message };
      }
      throw error;
    }
  }
}
