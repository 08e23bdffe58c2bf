import { describe, test, expect, vi, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs/promises';

vi.mock('../tmux.js', async () => (await import('../../test-fakes.js')).fakeTmuxModule);
vi.mock('../git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../git.js')>()),
  ...(await import('../../test-fakes.js')).fakeGitModule,
}));

import { performSpawn } from './spawn.js';
import { performKill } from './kill.js';
import { loadConfig } from '../config.js';
import { listActiveAgents } from '../reconcile.js';
import { resolveIdentifier } from '../resolve.js';
import { DEFAULT_SETTINGS } from '../settings.js';
import { createTestHome, fakeGit, fakeTmux } from '../../test-fakes.js';

let home: string;

beforeAll(async () => {
  fakeTmux.reset();
  fakeGit.reset();
  ({ home } = await createTestHome('demo'));
});

afterAll(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

describe('spawn, list and kill by ordinal', () => {
  let worktreePath = '';

  test('given an empty home, spawning demo/feature-x should record exactly one agent', async () => {
    const { agent } = await performSpawn({
      home,
      repoName: 'demo',
      branch: 'feature-x',
      agentType: 'claude',
      launch: DEFAULT_SETTINGS.agents.claude,
      autoAccept: false,
    });
    worktreePath = agent.worktreePath;

    const keys = Object.keys((await loadConfig(home)).agents);

    expect(keys).toHaveLength(1);
    expect(keys[0]).toContain('demo');
    expect(keys[0]).toContain('feature-x');
  });

  test('should list the agent as ordinal 1', async () => {
    const view = await listActiveAgents(await loadConfig(home));

    expect(view.map((agent) => agent.ordinal)).toEqual([1]);
  });

  test('killing ordinal 1 with cleanup should remove the record and the worktree', async () => {
    const config = await loadConfig(home);
    const key = resolveIdentifier('1', await listActiveAgents(config));

    await performKill({ home, sessionKey: key, cleanup: true });

    expect((await loadConfig(home)).agents).toEqual({});
    await expect(fs.access(worktreePath)).rejects.toThrow();
    expect(await listActiveAgents(await loadConfig(home))).toEqual([]);
  });
});
