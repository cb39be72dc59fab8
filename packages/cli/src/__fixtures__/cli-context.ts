import fs from 'fs';
import os from 'os';
import path from 'path';
import { FakeCommandExecutor } from '@precheck/exec';
import type { FakeHandler } from '@precheck/exec';
import type { CliContext } from '../context';

export interface TestRepo {
  root: string;
  home: string;
  cleanup: () => void;
}

/** A throwaway Go repository with a single package at its root */
export function createTestRepo(files: Record<string, string> = {}): TestRepo {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'precheck-cli-'));
  const root = path.join(tmp, 'repo');
  const home = path.join(tmp, 'home');
  fs.mkdirSync(root);
  fs.mkdirSync(home);
  const all: Record<string, string> = {
    'go.mod': 'module example.com/demo\n',
    'main.go': 'package main\n\nfunc main() {}\n',
    ...files,
  };
  for (const [file, content] of Object.entries(all)) {
    fs.mkdirSync(path.dirname(path.join(root, file)), { recursive: true });
    fs.writeFileSync(path.join(root, file), content);
  }
  return { root, home, cleanup: () => fs.rmSync(tmp, { recursive: true, force: true }) };
}

export function testContext(
  repo: TestRepo,
  handler: FakeHandler = () => ({}),
  env: NodeJS.ProcessEnv = {},
): CliContext & { executor: FakeCommandExecutor } {
  const executor = new FakeCommandExecutor(handler);
  return {
    version: '0.5.0',
    env,
    homeDir: repo.home,
    findRepoRoot: async () => repo.root,
    createExecutor: () => executor,
    executor,
  };
}
