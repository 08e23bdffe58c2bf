import { beforeEach, describe, expect, test, vi } from 'vitest';

vi.mock('../core/git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../core/git.js')>()),
  status: vi.fn(),
  revListCount: vi.fn(),
}));

import { agentStatus } from './status.js';
import { revListCount, status } from '../core/git.js';
import { makeAgent } from '../test-fixtures.js';

const agent = { ...makeAgent(), ordinal: 1 };

beforeEach(() => {
  vi.clearAllMocks();
});

describe('agentStatus', () => {
  test('given changed files and unpushed commits, should count both', async () => {
    vi.mocked(status).mockResolvedValue({ ok: true, exitCode: 0, stdout: ' M a.ts\n?? b.ts\n', stderr: '' });
    vi.mocked(revListCount).mockResolvedValue(3);

    const actual = await agentStatus(agent);
    const expected = { changes: 2, commitsAhead: 3 };

    expect(actual).toEqual(expected);
    expect(revListCount).toHaveBeenCalledWith(agent.worktreePath, 'origin/feature/auth..HEAD');
  });

  test('given git status fails, should report zero changes', async () => {
    vi.mocked(status).mockResolvedValue({ ok: false, exitCode: 128, stdout: '', stderr: 'fatal: not a git repository' });
    vi.mocked(revListCount).mockResolvedValue(0);

    const actual = await agentStatus(agent);

    expect(actual).toEqual({ changes: 0, commitsAhead: 0 });
  });
});
