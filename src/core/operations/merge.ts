import { loadConfig, requireAgent } from '../config.js';
import * as git from '../git.js';
import { CommandFailedError, DirtyWorktreeError } from '../../lib/errors.js';
import type { SessionKey } from '../../lib/session-key.js';

export interface MergeInput {
  home: string;
  sessionKey: SessionKey;
  force?: boolean;
}

export interface MergeResult {
  sessionKey: SessionKey;
  branch: string;
  /** Uncommitted changes were present and pushed past with `force`. */
  dirty: boolean;
  output: string;
}

/** Push the agent's branch to origin. Refuses a dirty worktree unless forced. */
export async function performMerge(input: MergeInput): Promise<MergeResult> {
  const config = await loadConfig(input.home);
  const agent = requireAgent(config, input.sessionKey);

  const status = await git.status(agent.worktreePath);
  if (!status.ok) {
    throw new CommandFailedError(`Failed to read status of ${agent.worktreePath}`, status.stderr);
  }
  const dirty = git.parseStatus(status.stdout).length > 0;
  if (dirty && !input.force) throw new DirtyWorktreeError(agent.worktreePath);

  const pushed = await git.push(agent.worktreePath, agent.branch);
  if (!pushed.ok) {
    throw new CommandFailedError(`Failed to push ${agent.branch}`, pushed.stderr);
  }

  // git reports push progress on stderr
  return {
    sessionKey: input.sessionKey,
    branch: agent.branch,
    dirty,
    output: [pushed.stdout.trim(), pushed.stderr].filter(Boolean).join('\n'),
  };
}
