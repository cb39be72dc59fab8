import type { CheckDefinition, CheckKind, CheckPrerequisite } from '@precheck/shared';

/**
 * Tools the native checks shell out to beyond the go toolchain itself.
 * Each prints usage and exits 2 on `-h`.
 */
export const BUILTIN_PREREQUISITES: Partial<Record<CheckKind, CheckPrerequisite[]>> = {
  errcheck: [
    { help_command: ['errcheck', '-h'], expected_exit_code: 2, url: 'github.com/kisielk/errcheck' },
  ],
  goimports: [
    {
      help_command: ['goimports', '-h'],
      expected_exit_code: 2,
      url: 'golang.org/x/tools/cmd/goimports',
    },
  ],
  golint: [
    { help_command: ['golint', '-h'], expected_exit_code: 2, url: 'github.com/golang/lint/golint' },
  ],
};

/** Identity of a prerequisite: its probe, the exit code it expects and where it installs from */
export function prerequisiteKey(prerequisite: CheckPrerequisite): string {
  return JSON.stringify([
    prerequisite.help_command,
    prerequisite.expected_exit_code,
    prerequisite.url,
  ]);
}

export function prerequisitesOf(def: CheckDefinition): CheckPrerequisite[] {
  if (def.kind === 'custom') {
    return def.options.prerequisites;
  }
  return BUILTIN_PREREQUISITES[def.kind] ?? [];
}

/** Every distinct prerequisite a set of checks needs */
export function collectPrerequisites(defs: readonly CheckDefinition[]): CheckPrerequisite[] {
  const seen = new Map<string, CheckPrerequisite>();
  for (const def of defs) {
    for (const prerequisite of prerequisitesOf(def)) {
      const key = prerequisiteKey(prerequisite);
      if (!seen.has(key)) seen.set(key, prerequisite);
    }
  }
  return [...seen.values()];
}
