import { describe, it, expect } from 'vitest';
import { CancelledError } from '@precheck/shared';
import { FakeCommandExecutor } from './executor';

describe('FakeCommandExecutor', () => {
  it('records calls and fills result defaults', async () => {
    const executor = new FakeCommandExecutor(() => ({ exitCode: 2 }));
    const result = await executor.execute({ argv: ['tool', '-help'] });

    expect(result).toEqual({ exitCode: 2, output: '', durationMs: 0, truncated: false });
    expect(executor.calls).toEqual([['tool', '-help']]);
  });

  it('throws errors returned by the handler', async () => {
    const executor = new FakeCommandExecutor(() => new Error('launch failed'));
    await expect(executor.execute({ argv: ['x'] })).rejects.toThrow('launch failed');
  });

  it('honours abort while delayed', async () => {
    const controller = new AbortController();
    const executor = new FakeCommandExecutor(() => ({ delayMs: 10_000 }));
    const promise = executor.execute({ argv: ['slow'], signal: controller.signal });

    controller.abort();
    await expect(promise).rejects.toThrow(CancelledError);
  });
});
