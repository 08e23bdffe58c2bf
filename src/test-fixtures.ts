import { toSessionKey } from './lib/session-key.js';
import type { AgentRecord, ArchiveRecord, Config, Repo } from './types/config.js';

export function makeRepo(overrides?: Partial<Repo>): Repo {
  return {
    name: 'webapp',
    path: '/tmp/adeck-home/repos/webapp',
    sourceUrl: 'git@github.com:acme/webapp.git',
    addedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeAgent(overrides?: Partial<AgentRecord>): AgentRecord {
  return {
    sessionKey: toSessionKey('adeck-webapp-feature-auth-101500'),
    repoName: 'webapp',
    repoPath: '/tmp/adeck-home/repos/webapp',
    branch: 'feature/auth',
    worktreePath: '/tmp/adeck-home/worktrees/webapp-feature-auth-101500',
    task: 'Add login form',
    agentType: 'claude',
    startedAt: '2026-01-01T10:15:00.000Z',
    ...overrides,
  };
}

export function makeArchive(overrides?: Partial<ArchiveRecord>): ArchiveRecord {
  return {
    ...makeAgent(),
    archivedAt: '2026-01-02T09:00:00.000Z',
    ...overrides,
  };
}

/** Key a list of records by their session key, preserving order. */
export function keyed<T extends AgentRecord>(...records: T[]): Record<string, T> {
  const map: Record<string, T> = {};
  for (const record of records) map[record.sessionKey] = record;
  return map;
}

export function makeConfig(overrides?: Partial<Config>): Config {
  return {
    repos: { webapp: makeRepo() },
    agents: {},
    archives: {},
    ...overrides,
  };
}
