import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';

vi.mock('../git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../git.js')>()),
  ...(await import('../../test-fakes.js')).fakeGitModule,
}));

import { addDir, addRepo, removeRepo } from './repo.js';
import { loadConfig, saveConfig } from '../config.js';
import { createTestHome } from '../../test-fakes.js';
import { makeAgent, makeArchive } from '../../test-fixtures.js';
import { toSessionKey } from '../../lib/session-key.js';
import {
  CommandFailedError,
  InvalidArgsError,
  RepoExistsError,
  RepoInUseError,
  RepoNotFoundError,
} from '../../lib/errors.js';

const now = new Date('2026-03-01T12:00:00.000Z');
let home: string;

beforeEach(async () => {
  ({ home } = await createTestHome('demo'));
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

describe('addRepo', () => {
  test('given a clone URL, should clone under repos/ and register it by its URL name', async () => {
    const repo = await addRepo({ home, url: 'https://github.com/acme/billing-api.git', now });

    const expected = {
      name: 'billing-api',
      path: path.join(home, 'repos', 'billing-api'),
      sourceUrl: 'https://github.com/acme/billing-api.git',
      addedAt: '2026-03-01T12:00:00.000Z',
    };

    expect(repo).toEqual(expected);
    expect((await loadConfig(home)).repos['billing-api']).toEqual(expected);
  });

  test('given --name, should use it instead of the URL name', async () => {
    const repo = await addRepo({ home, url: 'git@github.com:acme/api.git', name: 'api-v2' });

    expect(repo.path).toBe(path.join(home, 'repos', 'api-v2'));
  });

  test('given a name already registered, should throw RepoExistsError', async () => {
    await expect(addRepo({ home, url: 'git@github.com:acme/demo.git' })).rejects.toThrow(RepoExistsError);
  });

  test('given git clone fails, should surface its error and register nothing', async () => {
    const attempt = addRepo({ home, url: 'https://github.com/acme/missing.git' });

    await expect(attempt).rejects.toThrow(CommandFailedError);
    await expect(attempt).rejects.toThrow(
      "Failed to clone: fatal: repository 'https://github.com/acme/missing.git' not found",
    );

    expect(Object.keys((await loadConfig(home)).repos)).toEqual(['demo']);
  });

  test('given a name that cannot be a directory name, should throw InvalidArgsError', async () => {
    await expect(addRepo({ home, url: 'x', name: '../escape' })).rejects.toThrow(InvalidArgsError);
  });
});

describe('addDir', () => {
  test('given a local checkout, should register it in place', async () => {
    const checkout = path.join(home, 'elsewhere', 'tools');
    await fs.mkdir(path.join(checkout, '.git'), { recursive: true });

    const repo = await addDir({ home, dir: checkout, now });

    expect(repo).toEqual({ name: 'tools', path: checkout, sourceUrl: checkout, addedAt: '2026-03-01T12:00:00.000Z' });
  });

  test('given a directory outside git, should throw InvalidArgsError', async () => {
    await expect(addDir({ home, dir: path.join(home, 'worktrees') })).rejects.toThrow(InvalidArgsError);
  });
});

describe('removeRepo', () => {
  test('given an unreferenced repo, should unregister it and leave the clone', async () => {
    const removed = await removeRepo({ home, name: 'demo' });

    expect(removed.name).toBe('demo');
    expect((await loadConfig(home)).repos).toEqual({});
    await expect(fs.access(removed.path)).resolves.toBeUndefined();
  });

  test('given an agent and an archive using the repo, should refuse and name both', async () => {
    const config = await loadConfig(home);
    const active = makeAgent({ sessionKey: toSessionKey('adeck-active'), repoName: 'demo' });
    const archived = makeArchive({ sessionKey: toSessionKey('adeck-archived'), repoName: 'demo' });
    config.agents[active.sessionKey] = active;
    config.archives[archived.sessionKey] = archived;
    await saveConfig(home, config);

    const attempt = removeRepo({ home, name: 'demo' });

    await expect(attempt).rejects.toThrow(RepoInUseError);
    await expect(attempt).rejects.toThrow('  adeck-active\n  adeck-archived');
  });

  test('given an unknown repo, should throw RepoNotFoundError', async () => {
    await expect(removeRepo({ home, name: 'ghost' })).rejects.toThrow(RepoNotFoundError);
  });
});
