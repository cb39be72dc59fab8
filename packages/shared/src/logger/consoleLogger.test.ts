import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, SilentLogger } from './consoleLogger';
import type { ModeStarted } from '../types/events';

const event: ModeStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'ModeStarted',
  payload: { mode: 'pre-commit', checkCount: 3, maxDurationMs: 5000 },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints events as JSON only when verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).log(event);
    expect(debugSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('hides debug output when not verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ mode: 'pre-push' }).child({ check: 'coverage' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[mode=pre-push check=coverage] hello');

    logger.child({ check: 'golint' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[check=golint] warn');
  });
});

describe('SilentLogger', () => {
  it('writes nothing and returns itself as child', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new SilentLogger();
    logger.info('x');
    expect(logger.child({ a: 1 })).toBe(logger);
    expect(infoSpy).not.toHaveBeenCalled();
    infoSpy.mockRestore();
  });
});
