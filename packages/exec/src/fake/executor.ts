import { CancelledError } from '@precheck/shared';
import type { CommandExecutor, CommandRequest, CommandResult } from '../runner/types';

export type FakeResponse = (Partial<CommandResult> & { delayMs?: number }) | Error;
export type FakeHandler = (req: CommandRequest) => FakeResponse | Promise<FakeResponse>;

function wait(ms: number, signal: AbortSignal | undefined, display: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(`Cancelled: ${display}`));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(`Cancelled: ${display}`));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * In-process executor driven by a handler, for tests and dry runs.
 * Records every argv it receives in `calls`. A response carrying `delayMs`
 * waits that long and honours the request's abort signal meanwhile.
 */
export class FakeCommandExecutor implements CommandExecutor {
  readonly calls: string[][] = [];

  constructor(private readonly handler: FakeHandler = () => ({})) {}

  async execute(req: CommandRequest): Promise<CommandResult> {
    const display = req.argv.join(' ');
    this.calls.push([...req.argv]);
    if (req.signal?.aborted) {
      throw new CancelledError(`Cancelled before start: ${display}`);
    }

    const response = await this.handler(req);
    if (response instanceof Error) {
      throw response;
    }

    const { delayMs, ...result } = response;
    if (delayMs) {
      await wait(delayMs, req.signal, display);
    }

    return { exitCode: 0, output: '', durationMs: delayMs ?? 0, truncated: false, ...result };
  }
}
