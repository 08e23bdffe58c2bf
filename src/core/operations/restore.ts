import path from 'node:path';
import { loadConfig, updateConfig, assertSessionKeyFree } from '../config.js';
import { provisionWorkspace } from '../provision.js';
import { removeAgentWorktree } from '../cleanup.js';
import { ensureContextDir, writeNotes } from '../context.js';
import * as tmux from '../tmux.js';
import { worktreePath as worktreePathFor } from '../../lib/paths.js';
import { pathExists } from '../../lib/fs.js';
import { ArchiveNotFoundError, RepoNotFoundError, SessionKeyConflictError } from '../../lib/errors.js';
import type { SessionKey } from '../../lib/session-key.js';
import type { AgentRecord, ArchiveRecord, Repo } from '../../types/config.js';
import type { ShareSettings } from '../../types/settings.js';

export interface RestoreInput {
  home: string;
  sessionKey: SessionKey;
  /** Rebuild the worktree even when it still exists. */
  recreate?: boolean;
  share?: ShareSettings;
}

export interface RestoreResult {
  agent: AgentRecord;
  reprovisioned: boolean;
  /** A session with this name was already running; it was left as is. */
  sessionExisted: boolean;
}

function repoFor(archive: ArchiveRecord, registered: Repo | undefined): Repo {
  if (registered) return registered;
  if (!archive.repoPath) throw new RepoNotFoundError(archive.repoName);
  return { name: archive.repoName, path: archive.repoPath, sourceUrl: '', addedAt: '' };
}

/**
 * Bring an archived workspace back: rebuild the worktree if it is gone (or
 * `recreate` is set), put the notes back, start a shell session in it and move
 * the record back to `agents`.
 */
export async function performRestore(input: RestoreInput): Promise<RestoreResult> {
  const { home, sessionKey } = input;
  const config = await loadConfig(home);
  const archive = config.archives[sessionKey];
  if (!archive) throw new ArchiveNotFoundError(sessionKey);
  if (config.agents[sessionKey]) throw new SessionKeyConflictError(sessionKey, 'agents');

  const repo = repoFor(archive, config.repos[archive.repoName]);
  let wtPath = archive.worktreePath;
  const present = await pathExists(wtPath);
  let reprovisioned = false;

  if (!present || input.recreate) {
    if (present) {
      await removeAgentWorktree({ repoPath: repo.path, worktreePath: wtPath });
    }
    if (!(await pathExists(path.dirname(wtPath)))) {
      wtPath = worktreePathFor(home, path.basename(wtPath));
    }
    await provisionWorkspace({ home, repo, branch: archive.branch, worktreePath: wtPath, share: input.share });
    reprovisioned = true;
  } else {
    await ensureContextDir(wtPath);
  }

  if (archive.notes) await writeNotes(wtPath, archive.notes);

  const sessionExisted = await tmux.sessionExists(sessionKey);
  if (!sessionExisted) await tmux.newSession(sessionKey, wtPath);

  const { archivedAt: _archivedAt, notes: _notes, ...record } = archive;
  const agent: AgentRecord = { ...record, repoPath: repo.path, worktreePath: wtPath };

  await updateConfig(home, (latest) => {
    if (!latest.archives[sessionKey]) throw new ArchiveNotFoundError(sessionKey);
    delete latest.archives[sessionKey];
    assertSessionKeyFree(latest, sessionKey);
    latest.agents[sessionKey] = agent;
    return latest;
  });

  return { agent, reprovisioned, sessionExisted };
}
