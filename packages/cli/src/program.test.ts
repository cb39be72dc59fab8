import { describe, it, expect } from 'vitest';
import { createProgram, name } from './program';
import { createTestRepo, testContext } from './__fixtures__/cli-context';

describe('cli program', () => {
  it('exports name', () => {
    expect(name).toBe('@precheck/cli');
  });

  it('registers every command', () => {
    const repo = createTestRepo();
    try {
      const program = createProgram(testContext(repo));
      expect(program.name()).toBe('precheck');
      expect(program.version()).toBe('0.5.0');
      expect(program.commands.map((c) => c.name())).toEqual([
        'run',
        'prereq',
        'install',
        'writeconfig',
        'info',
      ]);
    } finally {
      repo.cleanup();
    }
  });
});
