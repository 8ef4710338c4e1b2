/**
 * Git discovery
 *
 * Finds the repository by walking up to a `.git` directory and reads the
 * branch straight from HEAD. Only the change count needs the git binary.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, join } from 'path';
import { runCommand } from './fields.js';
import type { CommandRunner } from './fields.js';
import type { GitInfo } from '../shared/types.js';

/** Nearest `.git` directory at or above `startDir`, or null. */
export function findGitDir(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    const gitDir = join(dir, '.git');
    try {
      if (existsSync(gitDir) && statSync(gitDir).isDirectory()) {
        return gitDir;
      }
    } catch {
      return null;
    }

    const parent = dirname(dir);
    if (parent === dir || parent === '/') return null;
    dir = parent;
  }
}

/**
 * Branch name from HEAD contents; a detached HEAD shows the short hash.
 */
export function parseHead(content: string): string | null {
  const head = content.trim();
  const prefix = 'ref: refs/heads/';
  if (head.startsWith(prefix)) return head.slice(prefix.length);
  if (head.length >= 7) return head.slice(0, 7);
  return null;
}

/** Number of lines in `git status --porcelain`; 0 when git fails. */
export function countChanges(dir: string, runner: CommandRunner, timeoutMs?: number): number {
  const output = runner('git', ['status', '--porcelain'], { cwd: dir, timeoutMs });
  if (output === null) return 0;
  const trimmed = output.trim();
  return trimmed === '' ? 0 : trimmed.split('\n').length;
}

export function getGitInfo(
  dir: string,
  runner: CommandRunner = runCommand,
  timeoutMs?: number
): GitInfo | null {
  const gitDir = findGitDir(dir);
  if (!gitDir) return null;

  let head: string;
  try {
    head = readFileSync(join(gitDir, 'HEAD'), 'utf-8');
  } catch {
    return null;
  }

  const branch = parseHead(head);
  if (!branch) return null;

  return { branch, changes: countChanges(dir, runner, timeoutMs) };
}
