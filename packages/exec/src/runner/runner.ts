import { spawn, spawnSync } from 'child_process';
import { CancelledError, ProcessError, isWindows } from '@precheck/shared';
import type { CommandExecutor, CommandRequest, CommandResult } from './types';

export const DEFAULT_MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

function killProcessTree(pid: number, signal: NodeJS.Signals | number = 'SIGTERM') {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // The negative PID addresses the process group; the child was spawned detached.
    try {
      process.kill(-pid, signal);
    } catch {
      // Already gone.
    }
  }
}

/**
 * Runs commands as real subprocesses.
 */
export class ProcessExecutor implements CommandExecutor {
  constructor(private readonly defaults: { cwd?: string; maxOutputBytes?: number } = {}) {}

  execute(req: CommandRequest): Promise<CommandResult> {
    const [bin, ...args] = req.argv;
    if (!bin) {
      return Promise.reject(new ProcessError('Cannot run an empty command'));
    }

    const display = req.argv.join(' ');
    if (req.signal?.aborted) {
      return Promise.reject(new CancelledError(`Cancelled before start: ${display}`));
    }

    const maxOutputBytes =
      req.maxOutputBytes ?? this.defaults.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const chunks: Buffer[] = [];
    let capturedBytes = 0;
    let truncated = false;

    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      let aborted = false;

      const child = spawn(bin, args, {
        cwd: req.cwd ?? this.defaults.cwd ?? process.cwd(),
        env: { ...process.env, ...req.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows(),
      });

      const onAbort = () => {
        aborted = true;
        if (child.pid) {
          killProcessTree(child.pid, 'SIGTERM');
        }
      };
      req.signal?.addEventListener('abort', onAbort, { once: true });

      const capture = (chunk: Buffer) => {
        if (truncated) return;
        const room = maxOutputBytes - capturedBytes;
        if (chunk.length > room) {
          chunks.push(chunk.subarray(0, Math.max(0, room)));
          capturedBytes = maxOutputBytes;
          truncated = true;
          return;
        }
        chunks.push(chunk);
        capturedBytes += chunk.length;
      };

      child.stdout?.on('data', capture);
      child.stderr?.on('data', capture);

      const finish = () => {
        settled = true;
        req.signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (err) => {
        if (settled) return;
        finish();
        reject(
          new ProcessError(`Failed to start process: ${err.message}`, {
            cause: err,
            details: { argv: [...req.argv] },
          }),
        );
      });

      child.on('close', (code) => {
        if (settled) return;
        finish();

        if (aborted) {
          reject(new CancelledError(`Cancelled: ${display}`));
          return;
        }

        let output = Buffer.concat(chunks).toString('utf8');
        if (truncated) {
          output += '\n[Output truncated due to limit]\n';
        }

        resolve({
          exitCode: code ?? -1,
          output,
          durationMs: Date.now() - start,
          truncated,
        });
      });
    });
  }
}
