import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema } from '@precheck/shared';
import type { Config } from '@precheck/shared';
import { defaultConfig } from './defaults';

export const CONFIG_FILE_NAME = 'precheck.yml';

export interface ConfigOptions {
  /** Explicit --config path; must exist */
  configPath?: string;
  repoRoot?: string;
  homeDir?: string;
  /** Running tool version, checked against `min_version` */
  toolVersion: string;
}

export interface LoadedConfig {
  config: Config;
  /** File the config came from, undefined for the built-in default */
  source: string | undefined;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Compares dotted numeric versions; missing components count as 0.
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((n) => Number.parseInt(n, 10) || 0);
  const right = b.split('.').map((n) => Number.parseInt(n, 10) || 0);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export class ConfigLoader {
  static loadYaml(filePath: string): unknown {
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      return yaml.load(content) ?? {};
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
    }
  }

  static parse(raw: unknown, source: string): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed (${source}):\n${issues}`);
    }
    return result.data;
  }

  static checkMinVersion(config: Config, toolVersion: string, source: string): void {
    if (config.min_version && compareVersions(toolVersion, config.min_version) < 0) {
      throw new ConfigError(
        `${source} requires precheck ${config.min_version} or newer, this is ${toolVersion}`,
      );
    }
  }

  /** Candidate files in lookup order, first existing one wins */
  static candidates(options: Omit<ConfigOptions, 'toolVersion'>): string[] {
    const repoRoot = options.repoRoot ?? process.cwd();
    const homeDir = options.homeDir ?? os.homedir();
    return [path.join(repoRoot, CONFIG_FILE_NAME), path.join(homeDir, '.config', CONFIG_FILE_NAME)];
  }

  static load(options: ConfigOptions): LoadedConfig {
    let source: string | undefined;
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      source = options.configPath;
    } else {
      source = this.candidates(options).find((candidate) => fs.existsSync(candidate));
    }

    if (!source) {
      return { config: deepFreeze(defaultConfig(options.toolVersion)), source: undefined };
    }

    const config = this.parse(this.loadYaml(source), source);
    this.checkMinVersion(config, options.toolVersion, source);
    return { config: deepFreeze(config), source };
  }
}
