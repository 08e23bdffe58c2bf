import { resolveIdentifier } from '../core/resolve.js';
import { listActiveAgents, type ActiveAgent } from '../core/reconcile.js';
import { ArchiveNotFoundError, InvalidArgsError } from '../lib/errors.js';
import { pick } from '../lib/interactive.js';
import type { SessionKey } from '../lib/session-key.js';
import type { ArchiveRecord, Config, Repo } from '../types/config.js';

export function describeAgent(agent: ActiveAgent): string {
  const label = agent.label ? ` [${agent.label}]` : '';
  return `${agent.repoName}:${agent.branch}${label}  ${agent.sessionKey}`;
}

/**
 * Session key for `token`, or an interactive pick among the active agents
 * when no token was given.
 */
export async function selectAgent(
  config: Config,
  token: string | undefined,
  title: string,
  label?: string,
): Promise<SessionKey> {
  const view = await listActiveAgents(config, { label });
  if (token !== undefined) return resolveIdentifier(token, view);

  if (view.length === 0) throw new InvalidArgsError('No active agents.');
  const chosen = await pick(title, view, describeAgent);
  return chosen.sessionKey;
}

/** Archives in insertion order, addressed by 1-based number or session name. */
export function archiveList(config: Config): ArchiveRecord[] {
  return Object.values(config.archives);
}

export async function selectArchive(config: Config, token: string | undefined): Promise<SessionKey> {
  const archives = archiveList(config);
  if (token !== undefined) {
    return resolveIdentifier(token, archives, (t) => new ArchiveNotFoundError(t));
  }

  if (archives.length === 0) throw new InvalidArgsError('No archived workspaces.');
  const chosen = await pick('Select archive to restore:', archives, (a) => `${a.repoName}:${a.branch}  ${a.archivedAt}`);
  return chosen.sessionKey;
}

export async function selectRepo(config: Config, title: string): Promise<Repo> {
  const repos = Object.values(config.repos);
  if (repos.length === 0) throw new InvalidArgsError("No repositories. Use 'adeck add-repo <url>' first.");
  return pick(title, repos, (repo) => `${repo.name}  ${repo.path}`);
}
