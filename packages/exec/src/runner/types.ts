export interface CommandRequest {
  /** Program followed by its arguments; never interpreted by a shell */
  argv: readonly string[];
  cwd?: string;
  /** Extra environment variables, layered over the parent environment */
  env?: Record<string, string>;
  /** Aborting kills the whole process tree and rejects with CancelledError */
  signal?: AbortSignal;
  /** Cap on captured output in bytes; the process keeps running past it */
  maxOutputBytes?: number;
}

export interface CommandResult {
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
  durationMs: number;
  truncated: boolean;
}

/**
 * The narrow capability every check uses to run external programs.
 *
 * `execute` resolves for any process that started, whatever its exit code.
 * It rejects with `ProcessError` when the program cannot be launched and with
 * `CancelledError` when the request's signal aborts.
 */
export interface CommandExecutor {
  execute(req: CommandRequest): Promise<CommandResult>;
}
