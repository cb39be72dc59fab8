import yaml from 'js-yaml';
import { ConfigSchema, DEFAULT_IGNORE_PATTERNS } from '@precheck/shared';
import type { Config, ConfigInput } from '@precheck/shared';

/**
 * The configuration used when no file is found, and written by `writeconfig`.
 */
export function defaultConfigInput(toolVersion: string): ConfigInput {
  return {
    min_version: toolVersion,
    modes: {
      'continuous-integration': {
        checks: {
          build: [{ extra_args: [] }],
          coverage: [
            {
              use_global_inference: false,
              use_coveralls: false,
              global: { min_coverage: 50, max_coverage: 100 },
              per_dir_default: { min_coverage: 0, max_coverage: 0 },
              per_dir: {},
            },
          ],
          gofmt: [{}],
          goimports: [{}],
          test: [{ extra_args: ['-v', '-race'] }],
        },
        max_duration: 120,
      },
      lint: {
        checks: {
          errcheck: [{ ignores: 'Close' }],
          golint: [{ blacklist: [] }],
          govet: [{ blacklist: [' composite literal uses unkeyed fields'] }],
        },
        max_duration: 15,
      },
      'pre-commit': {
        checks: {
          build: [{ extra_args: [] }],
          gofmt: [{}],
          test: [{ extra_args: ['-short'] }],
        },
        max_duration: 5,
      },
      'pre-push': {
        checks: {
          coverage: [
            {
              use_global_inference: false,
              use_coveralls: false,
              global: { min_coverage: 50, max_coverage: 100 },
              per_dir_default: { min_coverage: 0, max_coverage: 0 },
              per_dir: {},
            },
          ],
          goimports: [{}],
          test: [{ extra_args: ['-v', '-race'] }],
        },
        max_duration: 15,
      },
    },
    ignore_patterns: [...DEFAULT_IGNORE_PATTERNS],
  };
}

export function defaultConfig(toolVersion: string): Config {
  return ConfigSchema.parse(defaultConfigInput(toolVersion));
}

const HEADER = `# precheck configuration.
# Modes: pre-commit, pre-push, continuous-integration, lint.
# max_duration is the wall-clock budget of a whole mode, in seconds (0 = none).
# Custom checks look like:
#   custom:
#     - display_name: spelling
#       command: [misspell, -error, .]
#       check_exit_code: true
#       prerequisites:
#         - help_command: [misspell, -h]
#           expected_exit_code: 2
#           url: github.com/client9/misspell/cmd/misspell
`;

export function renderConfig(config: ConfigInput): string {
  return `${HEADER}\n${yaml.dump(config, { lineWidth: 100, noRefs: true })}`;
}

export function renderDefaultConfig(toolVersion: string): string {
  return renderConfig(defaultConfigInput(toolVersion));
}
