import { CommandFailedError } from '../lib/errors.js';
import { debug } from '../lib/output.js';
import { pathExists } from '../lib/fs.js';
import { worktreePrune, worktreeRemove } from './git.js';
import type { AgentRecord } from '../types/config.js';

export type WorktreeCleanup = 'removed' | 'pruned';

/**
 * Forcibly remove an agent's worktree. When the directory is already gone,
 * only the stale registration is pruned from the repository.
 */
export async function removeAgentWorktree(
  agent: Pick<AgentRecord, 'repoPath' | 'worktreePath'>,
): Promise<WorktreeCleanup> {
  if (!(await pathExists(agent.worktreePath))) {
    const pruned = await worktreePrune(agent.repoPath);
    if (!pruned.ok) debug(`git worktree prune failed: ${pruned.stderr}`);
    return 'pruned';
  }

  const result = await worktreeRemove(agent.repoPath, agent.worktreePath, { force: true });
  if (!result.ok) {
    throw new CommandFailedError(`Failed to remove worktree ${agent.worktreePath}`, result.stderr);
  }
  return 'removed';
}
