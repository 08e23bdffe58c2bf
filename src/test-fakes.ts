import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CommandFailedError } from './lib/errors.js';
import { pathExists } from './lib/fs.js';
import type { ToolResult } from './types/common.js';
import type { Repo } from './types/config.js';

function ok(stdout = ''): ToolResult {
  return { ok: true, exitCode: 0, stdout, stderr: '' };
}

function fail(stderr: string): ToolResult {
  return { ok: false, exitCode: 128, stdout: '', stderr };
}

interface FakeSession {
  cwd: string;
  command: string[];
}

/** In-memory tmux server. Swap it in with `vi.mock('<path>/tmux.js', ...)`. */
export const fakeTmux = {
  sessions: new Map<string, FakeSession>(),
  reset(): void {
    this.sessions.clear();
  },
};

export const fakeTmuxModule = {
  async checkTmux(): Promise<void> {},
  isInsideTmux(): boolean {
    return false;
  },
  async newSession(name: string, cwd: string, command: string[] = []): Promise<void> {
    if (fakeTmux.sessions.has(name)) {
      throw new CommandFailedError(`Failed to create tmux session ${name}`, `duplicate session: ${name}`);
    }
    fakeTmux.sessions.set(name, { cwd, command });
  },
  async killSession(name: string): Promise<void> {
    fakeTmux.sessions.delete(name);
  },
  async listSessions(): Promise<string[]> {
    return [...fakeTmux.sessions.keys()];
  },
  async sessionExists(name: string): Promise<boolean> {
    return fakeTmux.sessions.has(name);
  },
  async capturePane(name: string): Promise<string> {
    return `output of ${name}\n`;
  },
  async attachSession(): Promise<number> {
    return 0;
  },
};

/**
 * Git stand-in backed by the real filesystem: worktrees are plain directories,
 * branches and checkouts are tracked in memory.
 */
export const fakeGit = {
  branches: new Set<string>(['main']),
  /** branch -> worktree path it is checked out in */
  checkedOut: new Map<string, string>(),
  dirty: new Set<string>(),
  pushed: [] as string[],
  reset(): void {
    this.branches = new Set(['main']);
    this.checkedOut.clear();
    this.dirty.clear();
    this.pushed = [];
  },
};

export const fakeGitModule = {
  async clone(url: string, dest: string): Promise<ToolResult> {
    if (url.includes('missing')) return fail(`fatal: repository '${url}' not found`);
    await fs.mkdir(dest, { recursive: true });
    return ok();
  },
  async getRepoRoot(dir: string): Promise<string | undefined> {
    return (await pathExists(path.join(dir, '.git'))) ? dir : undefined;
  },
  async getCurrentBranch(): Promise<string | undefined> {
    return 'main';
  },
  async branchExists(_repoPath: string, branch: string): Promise<boolean> {
    return fakeGit.branches.has(branch);
  },
  async createBranch(_repoPath: string, branch: string): Promise<ToolResult> {
    fakeGit.branches.add(branch);
    return ok();
  },
  async worktreeAdd(
    _repoPath: string,
    wtPath: string,
    branch: string,
    options: { forceBranch?: boolean } = {},
  ): Promise<ToolResult> {
    if (branch.startsWith('invalid/')) return fail(`fatal: '${branch}' is not a valid branch name`);
    if (await pathExists(wtPath)) return fail(`fatal: '${wtPath}' already exists`);
    if (!options.forceBranch && !fakeGit.branches.has(branch)) {
      return fail(`fatal: invalid reference: ${branch}`);
    }
    // Registrations survive a deleted directory until `worktree prune`
    const holder = fakeGit.checkedOut.get(branch);
    if (holder === wtPath && !options.forceBranch) {
      return fail(`fatal: '${wtPath}' is a missing but already registered worktree`);
    }
    if (holder) return fail(`fatal: '${branch}' is already checked out at '${holder}'`);
    await fs.mkdir(wtPath, { recursive: true });
    await fs.writeFile(path.join(wtPath, 'README.md'), '# demo\n');
    fakeGit.branches.add(branch);
    fakeGit.checkedOut.set(branch, wtPath);
    return ok();
  },
  async worktreeRemove(_repoPath: string, wtPath: string): Promise<ToolResult> {
    if (!(await pathExists(wtPath))) return fail(`fatal: '${wtPath}' is not a working tree`);
    if (wtPath.includes('locked')) return fail('fatal: cannot remove a locked working tree');
    await fs.rm(wtPath, { recursive: true, force: true });
    for (const [branch, holder] of fakeGit.checkedOut) {
      if (holder === wtPath) fakeGit.checkedOut.delete(branch);
    }
    return ok();
  },
  async worktreePrune(): Promise<ToolResult> {
    for (const [branch, holder] of fakeGit.checkedOut) {
      if (!(await pathExists(holder))) fakeGit.checkedOut.delete(branch);
    }
    return ok();
  },
  async status(wtPath: string): Promise<ToolResult> {
    return ok(fakeGit.dirty.has(wtPath) ? ' M README.md\n' : '');
  },
  async push(_wtPath: string, branch: string): Promise<ToolResult> {
    fakeGit.pushed.push(branch);
    return { ok: true, exitCode: 0, stdout: '', stderr: `To github.com:acme/demo.git\n * [new branch] ${branch} -> ${branch}` };
  },
  async commonGitDir(): Promise<string | undefined> {
    return undefined;
  },
  async remoteUrl(): Promise<string | undefined> {
    return undefined;
  },
};

/** A temporary tool home with one registered repo, written straight to config.json. */
export async function createTestHome(repoName = 'demo'): Promise<{ home: string; repo: Repo }> {
  const home = await fs.mkdtemp(path.join(os.tmpdir(), 'adeck-test-'));
  const repoDir = path.join(home, 'repos', repoName);
  await fs.mkdir(repoDir, { recursive: true });
  const repo: Repo = {
    name: repoName,
    path: repoDir,
    sourceUrl: `git@github.com:acme/${repoName}.git`,
    addedAt: '2026-01-01T00:00:00.000Z',
  };
  const config = { repos: { [repoName]: repo }, agents: {}, archives: {} };
  await fs.writeFile(path.join(home, 'config.json'), JSON.stringify(config, null, 2) + '\n');
  return { home, repo };
}
