import { describe, it, expect } from 'vitest';
import { CancelledError, ProcessError } from '@precheck/shared';
import { FakeCommandExecutor } from '@precheck/exec';
import { checkContext } from '../__fixtures__/test-context';
import { runCheck } from './dispatch';

describe('runCheck', () => {
  it('fails a check whose prerequisite cannot be installed', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'go'
        ? { exitCode: 1, output: 'cannot fetch' }
        : new ProcessError('Failed to start process'),
    );

    const outcome = await runCheck(
      { kind: 'golint', name: 'golint', options: { blacklist: [] } },
      checkContext(executor),
    );

    expect(outcome).toEqual({
      passed: false,
      detail:
        'prerequisite unavailable: golint -h\ngo get github.com/golang/lint/golint failed\ncannot fetch',
    });
    expect(executor.calls).toEqual([
      ['golint', '-h'],
      ['go', 'get', 'github.com/golang/lint/golint'],
    ]);
  });

  it('runs a custom check after its prerequisites', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'mytool' && req.argv[1] === '--help' ? { exitCode: 0 } : { output: 'fine' },
    );

    const outcome = await runCheck(
      {
        kind: 'custom',
        name: 'mine',
        options: {
          display_name: 'mine',
          description: '',
          command: ['mytool', 'run'],
          check_exit_code: true,
          prerequisites: [{ help_command: ['mytool', '--help'], expected_exit_code: 0, url: '' }],
        },
      },
      checkContext(executor),
    );

    expect(outcome).toEqual({ passed: true, detail: 'fine' });
    expect(executor.calls).toEqual([
      ['mytool', '--help'],
      ['mytool', 'run'],
    ]);
  });

  it('fails a custom check whose tool is still missing after installation', async () => {
    const executor = new FakeCommandExecutor((req) =>
      req.argv[0] === 'go' ? { exitCode: 0 } : { exitCode: 127 },
    );

    const outcome = await runCheck(
      {
        kind: 'custom',
        name: 'mine',
        options: {
          display_name: 'mine',
          description: '',
          command: ['mytool', 'run'],
          check_exit_code: true,
          prerequisites: [
            { help_command: ['mytool', '--help'], expected_exit_code: 0, url: 'example.com/mytool' },
          ],
        },
      },
      checkContext(executor),
    );

    expect(outcome).toEqual({
      passed: false,
      detail:
        `prerequisite unavailable: mytool --help
mytool --help: still missing after go get example.com/mytool`,
    });
    expect(executor.calls).toEqual([
      ['mytool', '--help'],
      ['go', 'get', 'example.com/mytool'],
      ['mytool', '--help'],
    ]);
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const executor = new FakeCommandExecutor();

    await expect(
      runCheck(
        { kind: 'build', name: 'build', options: { extra_args: [] } },
        checkContext(executor, { signal: controller.signal }),
      ),
    ).rejects.toBeInstanceOf(CancelledError);
  });
});
