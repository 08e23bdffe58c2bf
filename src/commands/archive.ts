import { loadConfig } from '../core/config.js';
import { loadSettings } from '../core/settings.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveIdentifier } from '../core/resolve.js';
import { performArchive } from '../core/operations/archive.js';
import { performRestore } from '../core/operations/restore.js';
import { requireDependencies } from '../core/deps.js';
import { resolveHome } from '../lib/paths.js';
import { output, paint, success, info, warn } from '../lib/output.js';
import { archiveList, selectAgent, selectArchive } from './select.js';
import { resolveShare, type ShareFlags } from './spawn.js';

export interface ArchiveOptions {
  keepWorktree?: boolean;
  json?: boolean;
}

export async function archiveCommand(target: string | undefined, options: ArchiveOptions): Promise<void> {
  const home = resolveHome();
  const config = await loadConfig(home);
  const sessionKey = target === undefined
    ? await selectAgent(config, undefined, 'Select agent to archive:')
    : resolveIdentifier(target, await listActiveAgents(config));

  if (!options.keepWorktree && !options.json) info('Removing worktree...');
  const result = await performArchive({ home, sessionKey, keepWorktree: options.keepWorktree });

  if (options.json) {
    output({ success: true, ...result }, true);
    return;
  }
  success(`Archived ${sessionKey}`);
  if (result.archive.notes) info('Saved notes from .context/notes.md');
}

export interface ArchivesOptions {
  json?: boolean;
}

export async function archivesCommand(options: ArchivesOptions): Promise<void> {
  const config = await loadConfig(resolveHome());

  if (options.json) {
    output(config.archives, true);
    return;
  }

  const archives = archiveList(config);
  if (archives.length === 0) {
    console.log(paint('No archived workspaces.', 'dim'));
    return;
  }

  console.log(paint('\nArchived workspaces', 'bold'));
  archives.forEach((archive, i) => {
    console.log(`  [${i + 1}] ${paint(archive.repoName, 'cyan')}:${paint(archive.branch, 'yellow')}  ${archive.archivedAt}`);
  });
}

export interface RestoreOptions extends ShareFlags {
  recreate?: boolean;
  json?: boolean;
}

export async function restoreCommand(target: string | undefined, options: RestoreOptions): Promise<void> {
  await requireDependencies(['git', 'tmux']);
  const home = resolveHome();
  const settings = await loadSettings(home);
  const sessionKey = await selectArchive(await loadConfig(home), target);

  const result = await performRestore({
    home,
    sessionKey,
    recreate: options.recreate,
    share: resolveShare(settings.share, options),
  });

  if (options.json) {
    output({ success: true, ...result }, true);
    return;
  }

  if (result.reprovisioned) info('Recreated worktree');
  if (result.sessionExisted) warn(`Session already exists: ${sessionKey}`);
  success(`Restored ${sessionKey}`);
  console.log(`  Workspace: ${result.agent.worktreePath}`);
}
