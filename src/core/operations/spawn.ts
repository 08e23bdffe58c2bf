import path from 'node:path';
import { loadConfig, requireRepo, updateConfig, assertSessionKeyFree } from '../config.js';
import { freshWorktreePath, provisionWorkspace } from '../provision.js';
import { buildAgentCommand } from '../launch.js';
import * as tmux from '../tmux.js';
import { sessionKeyFor } from '../../lib/session-key.js';
import type { LinkOutcome } from '../env.js';
import type { AgentRecord, AgentType } from '../../types/config.js';
import type { AgentLaunchConfig, ShareSettings } from '../../types/settings.js';

export interface SpawnInput {
  home: string;
  repoName: string;
  branch: string;
  task?: string;
  agentType: AgentType;
  launch: AgentLaunchConfig;
  autoAccept: boolean;
  label?: string;
  share?: ShareSettings;
  now?: Date;
}

export interface SpawnResult {
  agent: AgentRecord;
  createdBranch: boolean;
  links: LinkOutcome[];
}

/**
 * Provision a worktree, start the agent in a new tmux session rooted there,
 * and record it. Nothing is recorded unless every step succeeded; a worktree
 * git already created is left in place when a later step fails.
 */
export async function performSpawn(input: SpawnInput): Promise<SpawnResult> {
  const { home, branch } = input;
  const now = input.now ?? new Date();
  const task = input.task ?? '';

  const config = await loadConfig(home);
  const repo = requireRepo(config, input.repoName);

  const wtPath = await freshWorktreePath(home, repo, branch, now, config);
  const sessionKey = sessionKeyFor(path.basename(wtPath));
  assertSessionKeyFree(config, sessionKey);

  const workspace = await provisionWorkspace({
    home,
    repo,
    branch,
    worktreePath: wtPath,
    share: input.share,
  });

  await tmux.newSession(sessionKey, wtPath, buildAgentCommand(input.launch, task, input.autoAccept));

  const agent: AgentRecord = {
    sessionKey,
    repoName: repo.name,
    repoPath: repo.path,
    branch,
    worktreePath: wtPath,
    task,
    agentType: input.agentType,
    ...(input.label ? { label: input.label } : {}),
    startedAt: now.toISOString(),
  };

  await updateConfig(home, (latest) => {
    assertSessionKeyFree(latest, sessionKey);
    latest.agents[sessionKey] = agent;
    return latest;
  });

  return { agent, createdBranch: workspace.createdBranch, links: workspace.links };
}
