import { describe, test, expect, vi, beforeEach } from 'vitest';

vi.mock('../lib/fs.js', () => ({
  pathExists: vi.fn(),
}));

vi.mock('./git.js', () => ({
  worktreeRemove: vi.fn(),
  worktreePrune: vi.fn(),
}));

import { pathExists } from '../lib/fs.js';
import { worktreePrune, worktreeRemove } from './git.js';
import { removeAgentWorktree } from './cleanup.js';
import { CommandFailedError } from '../lib/errors.js';

const target = { repoPath: '/repos/demo', worktreePath: '/worktrees/demo-main-101500' };

beforeEach(() => {
  vi.clearAllMocks();
});

describe('removeAgentWorktree', () => {
  test('given an existing worktree, should remove it with --force', async () => {
    vi.mocked(pathExists).mockResolvedValue(true);
    vi.mocked(worktreeRemove).mockResolvedValue({ ok: true, exitCode: 0, stdout: '', stderr: '' });

    const actual = await removeAgentWorktree(target);

    expect(actual).toBe('removed');
    expect(worktreeRemove).toHaveBeenCalledWith('/repos/demo', '/worktrees/demo-main-101500', { force: true });
  });

  test('given the directory is gone, should prune instead', async () => {
    vi.mocked(pathExists).mockResolvedValue(false);
    vi.mocked(worktreePrune).mockResolvedValue({ ok: true, exitCode: 0, stdout: '', stderr: '' });

    const actual = await removeAgentWorktree(target);

    expect(actual).toBe('pruned');
    expect(worktreeRemove).not.toHaveBeenCalled();
    expect(worktreePrune).toHaveBeenCalledWith('/repos/demo');
  });

  test('given git refuses, should throw with its stderr', async () => {
    vi.mocked(pathExists).mockResolvedValue(true);
    vi.mocked(worktreeRemove).mockResolvedValue({
      ok: false,
      exitCode: 128,
      stdout: '',
      stderr: "fatal: '/worktrees/demo-main-101500' is not a working tree",
    });

    await expect(removeAgentWorktree(target)).rejects.toThrow(CommandFailedError);
  });
});
