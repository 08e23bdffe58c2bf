import fs from 'node:fs/promises';
import path from 'node:path';
import { worktreePath as worktreePathFor } from '../lib/paths.js';
import { collisionSuffix, timeStamp } from '../lib/id.js';
import { slugify } from '../lib/name.js';
import { CommandFailedError, WorktreeCreateError } from '../lib/errors.js';
import { debug } from '../lib/output.js';
import { pathExists } from '../lib/fs.js';
import { sessionKeyFor } from '../lib/session-key.js';
import * as git from './git.js';
import { ensureContextDir } from './context.js';
import { linkSharedPaths, type LinkOutcome } from './env.js';
import type { Config, Repo } from '../types/config.js';
import type { ShareSettings } from '../types/settings.js';

export function worktreeDirName(repoName: string, branch: string, now: Date = new Date()): string {
  return [slugify(repoName), slugify(branch), timeStamp(now)].filter(Boolean).join('-');
}

/** Session keys and worktree names already spoken for in the config. */
export type RecordedKeys = Pick<Config, 'agents' | 'archives'>;

function isTaken(dirName: string, recorded: RecordedKeys | undefined): boolean {
  if (!recorded) return false;
  const key = sessionKeyFor(dirName);
  return key in recorded.agents || key in recorded.archives;
}

/**
 * A worktree path under the tool home that nothing occupies yet, on disk or
 * as the session key of a recorded agent or archive.
 */
export async function freshWorktreePath(
  home: string,
  repo: Repo,
  branch: string,
  now?: Date,
  recorded?: RecordedKeys,
): Promise<string> {
  const dirName = worktreeDirName(repo.name, branch, now);
  let name = dirName;
  while (isTaken(name, recorded) || (await pathExists(worktreePathFor(home, name)))) {
    name = `${dirName}-${collisionSuffix()}`;
  }
  return worktreePathFor(home, name);
}

/**
 * Where shared files come from: the source checkout when the repo was added
 * from a local path, otherwise the managed clone.
 */
export async function sharedBasePath(repo: Repo): Promise<string> {
  if (repo.sourceUrl && path.isAbsolute(repo.sourceUrl) && (await pathExists(repo.sourceUrl))) {
    return repo.sourceUrl;
  }
  return repo.path;
}

export interface ProvisionOptions {
  home: string;
  repo: Repo;
  branch: string;
  /** Reuse this path (restore); a fresh one is derived otherwise. */
  worktreePath?: string;
  share?: ShareSettings;
}

export interface Workspace {
  worktreePath: string;
  createdBranch: boolean;
  links: LinkOutcome[];
}

/**
 * Create the branch (when it exists neither locally nor on origin) and a
 * worktree checked out to it. A failed `worktree add` is retried once with
 * `-B`; if that fails too, git's own error text is thrown and nothing is
 * recorded. A worktree that git did create is never rolled back.
 */
export async function provisionWorkspace(options: ProvisionOptions): Promise<Workspace> {
  const { repo, branch } = options;
  const wtPath = options.worktreePath ?? (await freshWorktreePath(options.home, repo, branch));

  let createdBranch = false;
  if (!(await git.branchExists(repo.path, branch))) {
    const base = await git.getCurrentBranch(repo.path);
    const created = await git.createBranch(repo.path, branch, base);
    if (!created.ok) {
      throw new CommandFailedError(`Failed to create branch ${branch}`, created.stderr);
    }
    createdBranch = true;
  }

  await fs.mkdir(path.dirname(wtPath), { recursive: true });
  // A worktree deleted by hand stays registered and blocks `worktree add`
  const pruned = await git.worktreePrune(repo.path);
  if (!pruned.ok) debug(`git worktree prune failed: ${pruned.stderr}`);

  let added = await git.worktreeAdd(repo.path, wtPath, branch);
  if (!added.ok) {
    debug(`worktree add failed (${added.stderr}); retrying with -B`);
    added = await git.worktreeAdd(repo.path, wtPath, branch, { forceBranch: true });
    if (!added.ok) throw new WorktreeCreateError(added.stderr);
  }

  await ensureContextDir(wtPath);

  const links = options.share
    ? await linkSharedPaths(await sharedBasePath(repo), wtPath, options.share)
    : [];
  for (const link of links) {
    debug(`share ${link.name}: ${link.status}${link.detail ? ` (${link.detail})` : ''}`);
  }

  return { worktreePath: wtPath, createdBranch, links };
}
