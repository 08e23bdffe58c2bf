import type { SessionKey } from '../lib/session-key.js';

export type AgentType = 'claude' | 'codex';

export const AGENT_TYPES: readonly AgentType[] = ['claude', 'codex'];

export interface Repo {
  name: string;
  path: string;
  sourceUrl: string;
  addedAt: string;
}

/** An active workspace: one worktree, one tmux session, one agent. */
export interface AgentRecord {
  sessionKey: SessionKey;
  repoName: string;
  /** Repo path at spawn time, so the record survives the repo being unregistered. */
  repoPath: string;
  branch: string;
  worktreePath: string;
  task: string;
  agentType: AgentType;
  label?: string;
  startedAt: string;
}

export interface ArchiveRecord extends AgentRecord {
  archivedAt: string;
  notes?: string;
}

/**
 * The persisted aggregate in config.json. `agents` and `archives` are keyed by
 * the record's own `sessionKey`; a key never appears in both maps.
 */
export interface Config {
  repos: Record<string, Repo>;
  agents: Record<string, AgentRecord>;
  archives: Record<string, ArchiveRecord>;
}
