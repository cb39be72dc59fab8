import { CoverageError, normalizePath } from '@precheck/shared';
import type { CoverageBlock } from './types';

const BLOCK_LINE = /^(.+):(\d+)\.(\d+),(\d+)\.(\d+) (\d+) (\d+)$/;

/**
 * Maps the import-path-qualified file names found in a cover profile back to
 * repository-relative paths, using the module path from go.mod.
 */
export function createImportPathResolver(modulePath: string): (file: string) => string {
  const prefix = modulePath ? `${modulePath}/` : '';
  return (file) => {
    const normalized = normalizePath(file);
    if (prefix && normalized.startsWith(prefix)) {
      return normalized.slice(prefix.length);
    }
    return normalized;
  };
}

/**
 * Parses the text written by `go test -coverprofile`.
 *
 * ```
 * mode: count
 * example.com/demo/a/a.go:3.14,5.2 2 1
 * ```
 */
export function parseCoverProfile(
  content: string,
  resolveFile: (file: string) => string = (f) => f,
): CoverageBlock[] {
  const blocks: CoverageBlock[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('mode:')) return;

    const match = BLOCK_LINE.exec(line);
    if (!match) {
      throw new CoverageError(`Malformed cover profile line ${index + 1}: ${line}`);
    }

    blocks.push({
      file: resolveFile(match[1]),
      startLine: Number(match[2]),
      startCol: Number(match[3]),
      endLine: Number(match[4]),
      endCol: Number(match[5]),
      statements: Number(match[6]),
      count: Number(match[7]),
    });
  });

  return blocks;
}

function blockKey(block: CoverageBlock): string {
  return `${block.file}:${block.startLine}.${block.startCol},${block.endLine}.${block.endCol}`;
}

/**
 * Merges blocks reported by several runs: each block's statements count once,
 * and its hit counts add up.
 */
export function mergeBlocks(blocks: Iterable<CoverageBlock>): CoverageBlock[] {
  const merged = new Map<string, CoverageBlock>();
  for (const block of blocks) {
    const key = blockKey(block);
    const existing = merged.get(key);
    if (existing) {
      existing.count += block.count;
    } else {
      merged.set(key, { ...block });
    }
  }
  return [...merged.values()];
}
