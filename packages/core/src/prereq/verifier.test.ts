import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { CancelledError, ProcessError } from '@precheck/shared';
import type { CheckPrerequisite, Logger } from '@precheck/shared';
import { FakeCommandExecutor } from '@precheck/exec';
import { PrerequisiteVerifier } from './verifier';
import { GoGetFetcher } from './fetcher';
import { collectPrerequisites, prerequisitesOf } from './builtin';

const golint: CheckPrerequisite = {
  help_command: ['golint', '-h'],
  expected_exit_code: 2,
  url: 'github.com/golang/lint/golint',
};

function recordingLogger(): Logger & { log: Mock } {
  const logger: Logger & { log: Mock } = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('PrerequisiteVerifier', () => {
  it('reports a tool whose probe exits as expected as present', async () => {
    const executor = new FakeCommandExecutor(() => ({ exitCode: 2 }));
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    const outcome = await verifier.ensure(golint);

    expect(outcome.status).toBe('present');
    expect(executor.calls).toEqual([['golint', '-h']]);
  });

  it('treats a launch failure as absence', async () => {
    const executor = new FakeCommandExecutor(() => new ProcessError('Failed to start process'));
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    await expect(verifier.isPresent(golint)).resolves.toBe(false);
  });

  it('propagates cancellation from the probe', async () => {
    const executor = new FakeCommandExecutor(() => new CancelledError('Cancelled'));
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    await expect(verifier.isPresent(golint)).rejects.toBeInstanceOf(CancelledError);
  });

  it('fetches a missing tool exactly once and logs the install', async () => {
    let installed = false;
    const executor = new FakeCommandExecutor((req) => {
      if (req.argv[0] === 'go') {
        installed = true;
        return { exitCode: 0 };
      }
      if (!installed) return new ProcessError('Failed to start process');
      return { exitCode: 2 };
    });
    const logger = recordingLogger();
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor), {
      logger,
      runId: 'run-1',
    });

    const [first, second] = await Promise.all([verifier.ensure(golint), verifier.ensure(golint)]);

    expect(first.status).toBe('installed');
    expect(second).toBe(first);
    expect(executor.calls).toEqual([
      ['golint', '-h'],
      ['go', 'get', 'github.com/golang/lint/golint'],
      ['golint', '-h'],
    ]);
    expect(logger.log).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'PrerequisiteInstalled',
        runId: 'run-1',
        payload: { helpCommand: ['golint', '-h'], url: 'github.com/golang/lint/golint' },
      }),
    );
  });

  it('reports a failed fetch as unavailable', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'go' ? { exitCode: 1, output: 'no network\n' } : { exitCode: 127 },
    );
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    const outcome = await verifier.ensure(golint);

    expect(outcome).toEqual({
      prerequisite: golint,
      status: 'unavailable',
      detail: 'go get github.com/golang/lint/golint failed\nno network',
    });
  });

  it('reports a tool still missing after a successful fetch as unavailable', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'go' ? { exitCode: 0 } : { exitCode: 127 },
    );
    const logger = recordingLogger();
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor), { logger });

    const outcome = await verifier.ensure(golint);

    expect(outcome).toEqual({
      prerequisite: golint,
      status: 'unavailable',
      detail: 'golint -h: still missing after go get github.com/golang/lint/golint',
    });
    expect(executor.calls).toEqual([
      ['golint', '-h'],
      ['go', 'get', 'github.com/golang/lint/golint'],
      ['golint', '-h'],
    ]);
    expect(logger.log).not.toHaveBeenCalled();
  });

  it('keeps prerequisites that share a probe but expect different exit codes apart', async () => {
    const executor = new FakeCommandExecutor(() => ({ exitCode: 0 }));
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    const zero = await verifier.ensure({ help_command: ['tool'], expected_exit_code: 0, url: '' });
    const two = await verifier.ensure({ help_command: ['tool'], expected_exit_code: 2, url: '' });

    expect(zero.status).toBe('present');
    expect(two).toMatchObject({ status: 'unavailable', detail: 'tool: not found' });
    expect(executor.calls).toEqual([['tool'], ['tool']]);
  });

  it('does not fetch when no url is configured', async () => {
    const executor = new FakeCommandExecutor(() => ({ exitCode: 1 }));
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    const outcome = await verifier.ensure({ help_command: ['mytool'], expected_exit_code: 0, url: '' });

    expect(outcome).toMatchObject({ status: 'unavailable', detail: 'mytool: not found' });
    expect(executor.calls).toEqual([['mytool']]);
  });

  it('ensureAll stops at the first unavailable prerequisite', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'a' ? { exitCode: 1 } : { exitCode: 0 },
    );
    const verifier = new PrerequisiteVerifier(executor, new GoGetFetcher(executor));

    const result = await verifier.ensureAll([
      { help_command: ['b'], expected_exit_code: 0, url: '' },
      { help_command: ['a'], expected_exit_code: 0, url: '' },
      { help_command: ['c'], expected_exit_code: 0, url: '' },
    ]);

    expect(result.ok).toBe(false);
    expect(result.outcomes.map((o) => o.status)).toEqual(['present', 'unavailable']);
    expect(executor.calls).toEqual([['b'], ['a']]);
  });
});

describe('builtin prerequisites', () => {
  it('maps native kinds to their tools and custom checks to their own list', () => {
    const own: CheckPrerequisite = { help_command: ['x'], expected_exit_code: 0, url: '' };

    expect(prerequisitesOf({ kind: 'build', name: 'build', options: { extra_args: [] } })).toEqual([]);
    expect(prerequisitesOf({ kind: 'golint', name: 'golint', options: { blacklist: [] } })).toEqual([
      golint,
    ]);
    expect(
      prerequisitesOf({
        kind: 'custom',
        name: 'c',
        options: {
          display_name: 'c',
          description: '',
          command: ['x'],
          check_exit_code: false,
          prerequisites: [own],
        },
      }),
    ).toEqual([own]);
  });

  it('collects distinct prerequisites across checks', () => {
    const list = collectPrerequisites([
      { kind: 'golint', name: 'golint', options: { blacklist: [] } },
      { kind: 'golint', name: 'golint#2', options: { blacklist: ['x'] } },
      { kind: 'errcheck', name: 'errcheck', options: { ignores: '' } },
    ]);

    expect(list.map((p) => p.help_command[0])).toEqual(['golint', 'errcheck']);
  });

  it('keeps same-probe prerequisites with different install sources', () => {
    const fork: CheckPrerequisite = { ...golint, url: 'example.com/fork/golint' };
    const list = collectPrerequisites([
      { kind: 'golint', name: 'golint', options: { blacklist: [] } },
      {
        kind: 'custom',
        name: 'lint-fork',
        options: {
          display_name: 'lint-fork',
          description: '',
          command: ['golint', './...'],
          check_exit_code: true,
          prerequisites: [fork, golint],
        },
      },
    ]);

    expect(list).toEqual([golint, fork]);
  });
});
