import { loadConfig, requireAgent, updateConfig } from '../config.js';
import { removeAgentWorktree, type WorktreeCleanup } from '../cleanup.js';
import { readNotes } from '../context.js';
import * as tmux from '../tmux.js';
import { SessionKeyConflictError } from '../../lib/errors.js';
import type { SessionKey } from '../../lib/session-key.js';
import type { ArchiveRecord } from '../../types/config.js';

export interface ArchiveInput {
  home: string;
  sessionKey: SessionKey;
  keepWorktree?: boolean;
  now?: Date;
}

export interface ArchiveResult {
  archive: ArchiveRecord;
  worktree?: WorktreeCleanup;
}

/**
 * Stop an agent and move its record to `archives`, keeping any notes from
 * `.context/notes.md` so a restore can put them back.
 */
export async function performArchive(input: ArchiveInput): Promise<ArchiveResult> {
  const { home, sessionKey } = input;
  const config = await loadConfig(home);
  const agent = requireAgent(config, sessionKey);
  if (config.archives[sessionKey]) throw new SessionKeyConflictError(sessionKey, 'archives');

  await tmux.killSession(sessionKey);

  const notes = await readNotes(agent.worktreePath);
  const worktree = input.keepWorktree ? undefined : await removeAgentWorktree(agent);

  const archive: ArchiveRecord = {
    ...agent,
    archivedAt: (input.now ?? new Date()).toISOString(),
    ...(notes ? { notes } : {}),
  };

  await updateConfig(home, (latest) => {
    if (latest.archives[sessionKey]) throw new SessionKeyConflictError(sessionKey, 'archives');
    delete latest.agents[sessionKey];
    latest.archives[sessionKey] = archive;
    return latest;
  });

  return { archive, ...(worktree ? { worktree } : {}) };
}
