import path from 'node:path';
import { run } from '../lib/process.js';
import type { ToolResult } from '../types/common.js';

export async function clone(url: string, dest: string): Promise<ToolResult> {
  return run('git', ['clone', url, dest]);
}

/** Top-level directory of the checkout containing `dir`, or undefined outside git. */
export async function getRepoRoot(dir: string): Promise<string | undefined> {
  const result = await run('git', ['rev-parse', '--show-toplevel'], { cwd: dir });
  return result.ok ? result.stdout.trim() : undefined;
}

export async function getCurrentBranch(repoPath: string): Promise<string | undefined> {
  const result = await run('git', ['branch', '--show-current'], { cwd: repoPath });
  const branch = result.stdout.trim();
  return result.ok && branch ? branch : undefined;
}

/** True when `branch` exists locally or as `origin/<branch>`. */
export async function branchExists(repoPath: string, branch: string): Promise<boolean> {
  const local = await run('git', ['rev-parse', '--verify', '--quiet', branch], { cwd: repoPath });
  if (local.ok) return true;
  const remote = await run('git', ['rev-parse', '--verify', '--quiet', `origin/${branch}`], { cwd: repoPath });
  return remote.ok;
}

export async function createBranch(repoPath: string, branch: string, base?: string): Promise<ToolResult> {
  const args = ['branch', branch];
  if (base) args.push(base);
  return run('git', args, { cwd: repoPath });
}

/**
 * `git worktree add <path> <branch>`, or with `forceBranch`
 * `git worktree add -B <branch> <path>`, which creates or resets the branch
 * at the new worktree.
 */
export async function worktreeAdd(
  repoPath: string,
  wtPath: string,
  branch: string,
  options: { forceBranch?: boolean } = {},
): Promise<ToolResult> {
  const args = options.forceBranch
    ? ['worktree', 'add', '-B', branch, wtPath]
    : ['worktree', 'add', wtPath, branch];
  return run('git', args, { cwd: repoPath });
}

export async function worktreeRemove(
  repoPath: string,
  wtPath: string,
  options: { force?: boolean } = {},
): Promise<ToolResult> {
  const args = ['worktree', 'remove', wtPath];
  if (options.force) args.push('--force');
  return run('git', args, { cwd: repoPath });
}

export async function worktreePrune(repoPath: string): Promise<ToolResult> {
  return run('git', ['worktree', 'prune'], { cwd: repoPath });
}

export async function status(wtPath: string): Promise<ToolResult> {
  return run('git', ['status', '--porcelain'], { cwd: wtPath });
}

/** Porcelain status lines, one per changed path. */
export function parseStatus(stdout: string): string[] {
  return stdout.split('\n').filter((line) => line.trim() !== '');
}

export async function diff(
  wtPath: string,
  options: { cached?: boolean; stat?: boolean; range?: string } = {},
): Promise<ToolResult> {
  const args = ['diff'];
  if (options.cached) args.push('--cached');
  if (options.stat) args.push('--stat');
  if (options.range) args.push(options.range);
  return run('git', args, { cwd: wtPath });
}

export async function untrackedFiles(wtPath: string): Promise<string[]> {
  const result = await run('git', ['ls-files', '--others', '--exclude-standard'], { cwd: wtPath });
  if (!result.ok) return [];
  return result.stdout.split('\n').filter(Boolean);
}

export async function push(wtPath: string, branch: string, remote = 'origin'): Promise<ToolResult> {
  return run('git', ['push', remote, branch], { cwd: wtPath });
}

export async function log(
  wtPath: string,
  options: { oneline?: boolean; count?: number; range?: string } = {},
): Promise<ToolResult> {
  const args = ['log'];
  if (options.oneline) args.push('--oneline');
  if (options.count) args.push('-n', String(options.count));
  if (options.range) args.push(options.range);
  return run('git', args, { cwd: wtPath });
}

/** Number of commits in `range`; 0 when git fails (e.g. the branch was never pushed). */
export async function revListCount(wtPath: string, range: string): Promise<number> {
  const result = await run('git', ['rev-list', '--count', range], { cwd: wtPath });
  if (!result.ok) return 0;
  const count = Number.parseInt(result.stdout.trim(), 10);
  return Number.isNaN(count) ? 0 : count;
}

/**
 * The repository's shared git directory. For a linked worktree this is the
 * main checkout's .git, which holds info/exclude.
 */
export async function commonGitDir(wtPath: string): Promise<string | undefined> {
  const result = await run('git', ['rev-parse', '--git-common-dir'], { cwd: wtPath });
  const dir = result.stdout.trim();
  if (!result.ok || !dir) return undefined;
  return path.resolve(wtPath, dir);
}

export async function remoteUrl(repoPath: string, remote = 'origin'): Promise<string | undefined> {
  const result = await run('git', ['remote', 'get-url', remote], { cwd: repoPath });
  const url = result.stdout.trim();
  return result.ok && url ? url : undefined;
}
