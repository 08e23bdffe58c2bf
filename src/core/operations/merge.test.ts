import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';

vi.mock('../tmux.js', async () => (await import('../../test-fakes.js')).fakeTmuxModule);
vi.mock('../git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../git.js')>()),
  ...(await import('../../test-fakes.js')).fakeGitModule,
}));

import { performMerge } from './merge.js';
import { performSpawn } from './spawn.js';
import { DEFAULT_SETTINGS } from '../settings.js';
import { createTestHome, fakeGit, fakeTmux } from '../../test-fakes.js';
import { DirtyWorktreeError } from '../../lib/errors.js';
import type { AgentRecord } from '../../types/config.js';

let home: string;
let agent: AgentRecord;

beforeEach(async () => {
  fakeTmux.reset();
  fakeGit.reset();
  ({ home } = await createTestHome('demo'));
  ({ agent } = await performSpawn({
    home,
    repoName: 'demo',
    branch: 'feature-x',
    agentType: 'claude',
    launch: DEFAULT_SETTINGS.agents.claude,
    autoAccept: false,
  }));
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

describe('performMerge', () => {
  test('given a clean worktree, should push the branch to origin', async () => {
    const actual = await performMerge({ home, sessionKey: agent.sessionKey });

    expect(fakeGit.pushed).toEqual(['feature-x']);
    expect(actual.dirty).toBe(false);
    expect(actual.output).toBe('To github.com:acme/demo.git\n * [new branch] feature-x -> feature-x');
  });

  test('given uncommitted changes, should refuse without pushing', async () => {
    fakeGit.dirty.add(agent.worktreePath);

    await expect(performMerge({ home, sessionKey: agent.sessionKey })).rejects.toThrow(DirtyWorktreeError);

    expect(fakeGit.pushed).toEqual([]);
  });

  test('given uncommitted changes and force, should push anyway', async () => {
    fakeGit.dirty.add(agent.worktreePath);

    const actual = await performMerge({ home, sessionKey: agent.sessionKey, force: true });

    expect(actual.dirty).toBe(true);
    expect(fakeGit.pushed).toEqual(['feature-x']);
  });
});
