import { loadConfig, updateConfig } from '../config.js';
import { removeAgentWorktree, type WorktreeCleanup } from '../cleanup.js';
import * as tmux from '../tmux.js';
import { listActiveSessions } from '../observer.js';
import { errorMessage } from '../../lib/errors.js';
import type { SessionKey } from '../../lib/session-key.js';

export interface KillInput {
  home: string;
  sessionKey: SessionKey;
  cleanup?: boolean;
}

export interface KillResult {
  sessionKey: SessionKey;
  /** False when no record existed; the session kill still ran. */
  recorded: boolean;
  worktree?: WorktreeCleanup;
}

/** Kill one agent. Killing a session that is already gone succeeds. */
export async function performKill(input: KillInput): Promise<KillResult> {
  const { home, sessionKey } = input;
  const config = await loadConfig(home);
  const agent = config.agents[sessionKey];

  await tmux.killSession(sessionKey);

  if (!agent) return { sessionKey, recorded: false };

  const worktree = input.cleanup ? await removeAgentWorktree(agent) : undefined;

  await updateConfig(home, (latest) => {
    delete latest.agents[sessionKey];
    return latest;
  });

  return { sessionKey, recorded: true, ...(worktree ? { worktree } : {}) };
}

export interface KillAllInput {
  home: string;
  cleanup?: boolean;
}

export interface KillAllResult {
  killed: SessionKey[];
  /** Agents whose session had already ended; their worktrees stay for inspection. */
  keptWorktrees: SessionKey[];
  warnings: string[];
}

/**
 * Kill every recorded agent. With `cleanup`, only agents whose session was
 * still live lose their worktree. Per-agent failures become warnings, and all
 * the processed records are dropped in a single update.
 */
export async function performKillAll(input: KillAllInput): Promise<KillAllResult> {
  const config = await loadConfig(input.home);
  const live = input.cleanup ? await listActiveSessions() : new Set<SessionKey>();
  const killed: SessionKey[] = [];
  const keptWorktrees: SessionKey[] = [];
  const warnings: string[] = [];

  for (const agent of Object.values(config.agents)) {
    try {
      await tmux.killSession(agent.sessionKey);
      if (input.cleanup) {
        if (live.has(agent.sessionKey)) {
          await removeAgentWorktree(agent);
        } else {
          keptWorktrees.push(agent.sessionKey);
        }
      }
    } catch (err) {
      warnings.push(`${agent.sessionKey}: ${errorMessage(err)}`);
    }
    killed.push(agent.sessionKey);
  }

  if (killed.length > 0) {
    await updateConfig(input.home, (latest) => {
      for (const key of killed) delete latest.agents[key];
      return latest;
    });
  }

  return { killed, keptWorktrees, warnings };
}
