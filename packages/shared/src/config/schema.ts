import { z } from 'zod';
import { MODE_NAMES } from '../types/checks';
import { isValidDirectoryKey } from '../fs/path';

export const ModeNameSchema = z.enum(MODE_NAMES);

export const DEFAULT_IGNORE_PATTERNS = ['.*', '_*', '*.pb.go'];

const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

/**
 * An external tool a check needs before it can run. `help_command` must be fast
 * and side-effect free; when it does not exit with `expected_exit_code`,
 * `go get <url>` is attempted once.
 */
export const CheckPrerequisiteSchema = z
  .object({
    help_command: z.array(z.string().min(1)).min(1, 'help_command must not be empty'),
    expected_exit_code: z.number().int().default(0),
    url: z.string().default(''),
  })
  .strict();

/**
 * A coverage band in percent. `max_coverage: 0` leaves the band unbounded above;
 * `{ min_coverage: 0, max_coverage: 0 }` on a directory disables enforcement.
 */
export const CoverageSettingsSchema = z
  .object({
    min_coverage: z.number().min(0).max(100).default(0),
    max_coverage: z.number().min(0).max(100).default(0),
  })
  .strict()
  .refine((s) => s.max_coverage === 0 || s.min_coverage <= s.max_coverage, {
    message: 'min_coverage must not exceed max_coverage',
    path: ['min_coverage'],
  });

const ExtraArgsSchema = z.array(z.string()).default([]);
const BlacklistSchema = z.array(z.string()).default([]);

export const BuildOptionsSchema = z.object({ extra_args: ExtraArgsSchema }).strict();
export const GofmtOptionsSchema = z.object({}).strict();
export const TestOptionsSchema = z.object({ extra_args: ExtraArgsSchema }).strict();
export const ErrcheckOptionsSchema = z.object({ ignores: z.string().default('') }).strict();
export const GoimportsOptionsSchema = z.object({}).strict();
export const GolintOptionsSchema = z.object({ blacklist: BlacklistSchema }).strict();
export const GovetOptionsSchema = z.object({ blacklist: BlacklistSchema }).strict();

export const CoverageOptionsSchema = z
  .object({
    use_global_inference: z.boolean().default(false),
    use_coveralls: z.boolean().default(false),
    global: CoverageSettingsSchema.default({ min_coverage: 0, max_coverage: 0 }),
    per_dir_default: CoverageSettingsSchema.default({ min_coverage: 0, max_coverage: 0 }),
    per_dir: z
      .record(
        z.string().refine(isValidDirectoryKey, {
          message: "per_dir keys must be POSIX paths relative to the repository root ('.' is the root)",
        }),
        CoverageSettingsSchema.nullable(),
      )
      .default({}),
  })
  .strict();

export const CustomOptionsSchema = z
  .object({
    display_name: z.string().min(1, 'display_name is required'),
    description: z.string().default(''),
    command: z.array(z.string().min(1)).min(1, 'command must not be empty'),
    check_exit_code: z.boolean().default(false),
    prerequisites: z.array(CheckPrerequisiteSchema).default([]),
  })
  .strict();

export const ChecksSchema = z
  .object({
    build: z.array(BuildOptionsSchema).optional(),
    gofmt: z.array(GofmtOptionsSchema).optional(),
    test: z.array(TestOptionsSchema).optional(),
    errcheck: z.array(ErrcheckOptionsSchema).optional(),
    goimports: z.array(GoimportsOptionsSchema).optional(),
    golint: z.array(GolintOptionsSchema).optional(),
    govet: z.array(GovetOptionsSchema).optional(),
    coverage: z.array(CoverageOptionsSchema).optional(),
    custom: z.array(CustomOptionsSchema).optional(),
  })
  .strict();

export const ModeSchema = z
  .object({
    checks: ChecksSchema.default({}),
    max_duration: z.number().min(0, 'max_duration must be non-negative').default(0),
  })
  .strict();

export const ConfigSchema = z
  .object({
    min_version: z
      .string()
      .refine((v) => v === '' || SEMVER_PATTERN.test(v), {
        message: 'min_version must be a semantic version (MAJOR.MINOR.PATCH)',
      })
      .default(''),
    modes: z.record(ModeNameSchema, ModeSchema).default({}),
    ignore_patterns: z.array(z.string()).default(DEFAULT_IGNORE_PATTERNS),
  })
  .strict();

export type CheckPrerequisite = z.infer<typeof CheckPrerequisiteSchema>;
export type CoverageSettings = z.infer<typeof CoverageSettingsSchema>;
export type ModeChecks = z.infer<typeof ChecksSchema>;
export type Mode = z.infer<typeof ModeSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** The shape accepted from YAML, before defaults are applied */
export type ConfigInput = z.input<typeof ConfigSchema>;
