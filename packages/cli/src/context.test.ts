import { describe, it, expect } from 'vitest';
import { ProcessExecutor } from '@precheck/exec';
import { defaultContext, packageVersion } from './context';

describe('context', () => {
  it('reads the package version', () => {
    expect(packageVersion()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('runs real processes by default', () => {
    const ctx = defaultContext('1.0.0');
    expect(ctx.version).toBe('1.0.0');
    expect(ctx.createExecutor('/repo')).toBeInstanceOf(ProcessExecutor);
  });
});
