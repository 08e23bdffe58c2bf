import { describe, test, expect, vi, beforeEach } from 'vitest';

vi.mock('../lib/process.js', () => ({
  commandExists: vi.fn(),
}));

import { commandExists } from '../lib/process.js';
import { findMissing, requireDependencies } from './deps.js';
import { MissingDependencyError } from '../lib/errors.js';

const mockedCommandExists = vi.mocked(commandExists);

beforeEach(() => {
  vi.clearAllMocks();
});

describe('findMissing', () => {
  test('given some commands absent, should return them in order', async () => {
    mockedCommandExists.mockImplementation(async (command) => command === 'git');

    const actual = await findMissing(['git', 'tmux', 'claude']);
    const expected = ['tmux', 'claude'];

    expect(actual).toEqual(expected);
  });
});

describe('requireDependencies', () => {
  test('given a missing command, should throw MissingDependencyError with exit code 1', async () => {
    mockedCommandExists.mockResolvedValue(false);

    const attempt = requireDependencies(['tmux']);

    await expect(attempt).rejects.toThrow(MissingDependencyError);
    await expect(attempt).rejects.toMatchObject({ exitCode: 1, missing: ['tmux'] });
  });

  test('given everything installed, should resolve', async () => {
    mockedCommandExists.mockResolvedValue(true);

    await expect(requireDependencies(['git', 'tmux'])).resolves.toBeUndefined();
  });
});
