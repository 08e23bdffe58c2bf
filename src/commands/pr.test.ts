import { beforeEach, describe, expect, test, vi } from 'vitest';

vi.mock('../core/config.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../core/config.js')>()),
  loadConfig: vi.fn(),
}));

vi.mock('../core/pr.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../core/pr.js')>()),
  checkGh: vi.fn(),
  createPr: vi.fn(),
  viewPr: vi.fn(),
  mergePr: vi.fn(),
}));

vi.mock('../core/git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../core/git.js')>()),
  status: vi.fn(),
}));

vi.mock('../core/reconcile.js', () => ({
  listActiveAgents: vi.fn(),
}));

vi.mock('../lib/paths.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/paths.js')>()),
  resolveHome: () => '/tmp/adeck-home',
}));

vi.mock('../lib/output.js', () => ({
  output: vi.fn(),
  success: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

import { prCreateCommand, prMergeCommand } from './pr.js';
import { loadConfig } from '../core/config.js';
import { checkGh, createPr, mergePr } from '../core/pr.js';
import { status } from '../core/git.js';
import { listActiveAgents } from '../core/reconcile.js';
import { success, warn } from '../lib/output.js';
import { InvalidArgsError } from '../lib/errors.js';
import { keyed, makeAgent, makeConfig } from '../test-fixtures.js';

const agent = makeAgent();

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(loadConfig).mockResolvedValue(makeConfig({ agents: keyed(agent) }));
  vi.mocked(listActiveAgents).mockResolvedValue([{ ...agent, ordinal: 1 }]);
  vi.mocked(status).mockResolvedValue({ ok: true, exitCode: 0, stdout: '', stderr: '' });
});

describe('prCreateCommand', () => {
  test('given a clean worktree, should create the PR from the worktree without warning', async () => {
    vi.mocked(createPr).mockResolvedValue('https://github.com/acme/webapp/pull/7');

    await prCreateCommand('1', { base: 'main', draft: true });

    expect(checkGh).toHaveBeenCalled();
    expect(createPr).toHaveBeenCalledWith(agent, { base: 'main', draft: true });
    expect(warn).not.toHaveBeenCalled();
    expect(success).toHaveBeenCalledWith('PR created: https://github.com/acme/webapp/pull/7');
  });

  test('given uncommitted changes, should warn and still create the PR', async () => {
    vi.mocked(status).mockResolvedValue({ ok: true, exitCode: 0, stdout: ' M src/app.ts\n', stderr: '' });
    vi.mocked(createPr).mockResolvedValue('https://github.com/acme/webapp/pull/8');

    await prCreateCommand('1', {});

    expect(warn).toHaveBeenCalledWith('Worktree has uncommitted changes; they will not be part of the PR.');
    expect(createPr).toHaveBeenCalled();
  });
});

describe('prMergeCommand', () => {
  test('given two strategies, should refuse before talking to gh', async () => {
    await expect(prMergeCommand('1', { squash: true, rebase: true })).rejects.toThrow(InvalidArgsError);
    expect(checkGh).not.toHaveBeenCalled();
  });

  test('given squash and delete-branch, should pass them to the merge', async () => {
    vi.mocked(mergePr).mockResolvedValue('');

    await prMergeCommand('1', { squash: true, deleteBranch: true });

    expect(mergePr).toHaveBeenCalledWith(agent, { strategy: 'squash', deleteBranch: true, auto: undefined });
    expect(success).toHaveBeenCalledWith('Merged PR for feature/auth');
  });
});
