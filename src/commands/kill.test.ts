import { beforeEach, describe, expect, test, vi } from 'vitest';

vi.mock('../core/config.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../core/config.js')>()),
  loadConfig: vi.fn(),
}));

vi.mock('../core/reconcile.js', () => ({
  listActiveAgents: vi.fn(),
}));

vi.mock('../core/operations/kill.js', () => ({
  performKill: vi.fn(),
  performKillAll: vi.fn(),
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

import { killAllCommand, killCommand } from './kill.js';
import { loadConfig } from '../core/config.js';
import { listActiveAgents } from '../core/reconcile.js';
import { performKill, performKillAll } from '../core/operations/kill.js';
import { info, success, warn } from '../lib/output.js';
import { toSessionKey } from '../lib/session-key.js';
import { keyed, makeAgent, makeConfig } from '../test-fixtures.js';

const agent = makeAgent();

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(loadConfig).mockResolvedValue(makeConfig({ agents: keyed(agent) }));
  vi.mocked(listActiveAgents).mockResolvedValue([{ ...agent, ordinal: 1 }]);
});

describe('killCommand', () => {
  test('given an ordinal and --cleanup, should kill that agent and remove its worktree', async () => {
    vi.mocked(performKill).mockResolvedValue({ sessionKey: agent.sessionKey, recorded: true, worktree: 'removed' });

    await killCommand('1', { cleanup: true });

    expect(performKill).toHaveBeenCalledWith({ home: '/tmp/adeck-home', sessionKey: agent.sessionKey, cleanup: true });
    expect(success).toHaveBeenCalledWith('Removed worktree');
  });

  test('given a name with no record, should still report the session killed', async () => {
    const key = toSessionKey('adeck-stray-120000');
    vi.mocked(performKill).mockResolvedValue({ sessionKey: key, recorded: false });

    await killCommand('stray-120000', {});

    expect(performKill).toHaveBeenCalledWith({ home: '/tmp/adeck-home', sessionKey: key, cleanup: undefined });
    expect(success).toHaveBeenCalledWith('Killed session: adeck-stray-120000');
    expect(info).toHaveBeenCalledWith('No record was tracked for this session.');
  });
});

describe('killAllCommand', () => {
  test('given per-agent warnings, should print each and the total', async () => {
    vi.mocked(performKillAll).mockResolvedValue({
      killed: [agent.sessionKey],
      keptWorktrees: [],
      warnings: ['Failed to remove worktree /tmp/locked'],
    });

    await killAllCommand({ cleanup: true });

    expect(warn).toHaveBeenCalledWith('Failed to remove worktree /tmp/locked');
    expect(success).toHaveBeenCalledWith('Killed 1 agent(s)');
  });

  test('given an agent whose session had ended, should say its worktree was kept', async () => {
    vi.mocked(performKillAll).mockResolvedValue({
      killed: [agent.sessionKey],
      keptWorktrees: [agent.sessionKey],
      warnings: [],
    });

    await killAllCommand({ cleanup: true });

    expect(info).toHaveBeenCalledWith(
      'Session adeck-webapp-feature-auth-101500 had already ended; kept its worktree',
    );
  });
});
