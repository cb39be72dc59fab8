import { readFileSync } from 'fs';
import os from 'os';
import { ProcessExecutor } from '@precheck/exec';
import type { CommandExecutor } from '@precheck/exec';
import { findRepoRoot } from '@precheck/repo';
import { ConfigLoader } from '@precheck/core';
import type { LoadedConfig } from '@precheck/core';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/**
 * What commands need from the outside world.
 */
export interface CliContext {
  version: string;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  findRepoRoot: () => Promise<string>;
  createExecutor: (repoRoot: string) => CommandExecutor;
}

export function defaultContext(version: string): CliContext {
  return {
    version,
    env: process.env,
    homeDir: os.homedir(),
    findRepoRoot: () => findRepoRoot(),
    createExecutor: (repoRoot) => new ProcessExecutor({ cwd: repoRoot }),
  };
}

export function loadConfig(ctx: CliContext, opts: GlobalOptions, repoRoot: string): LoadedConfig {
  return ConfigLoader.load({
    configPath: opts.config,
    repoRoot,
    homeDir: ctx.homeDir,
    toolVersion: ctx.version,
  });
}

/** The CLI package's own version, checked against a config's `min_version` */
export function packageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}
