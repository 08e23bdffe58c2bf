import path from 'node:path';
import { ensureHome, loadConfig, requireRepo, updateConfig } from '../config.js';
import * as git from '../git.js';
import { repoPath as repoPathFor } from '../../lib/paths.js';
import { repoNameFromUrl } from '../../lib/name.js';
import { pathExists } from '../../lib/fs.js';
import {
  CommandFailedError,
  InvalidArgsError,
  RepoExistsError,
  RepoInUseError,
} from '../../lib/errors.js';
import type { Config, Repo } from '../../types/config.js';

// Repo names become directory names and part of session names
const REPO_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

function validateName(name: string): string {
  if (!REPO_NAME.test(name)) {
    throw new InvalidArgsError(
      `Invalid repository name '${name}'. Use letters, digits, '-' and '_'; pass --name to choose one.`,
    );
  }
  return name;
}

async function register(home: string, repo: Repo): Promise<Repo> {
  await updateConfig(home, (config) => {
    const existing = config.repos[repo.name];
    if (existing) throw new RepoExistsError(repo.name, existing.path);
    config.repos[repo.name] = repo;
    return config;
  });
  return repo;
}

export interface AddRepoInput {
  home: string;
  url: string;
  name?: string;
  now?: Date;
}

/** Clone `url` into the tool home and register it. */
export async function addRepo(input: AddRepoInput): Promise<Repo> {
  const { home, url } = input;
  const name = validateName(input.name ?? repoNameFromUrl(url));

  const config = await loadConfig(home);
  const existing = config.repos[name];
  if (existing) throw new RepoExistsError(name, existing.path);

  const dest = repoPathFor(home, name);
  if (await pathExists(dest)) throw new RepoExistsError(name, dest);

  await ensureHome(home);
  const cloned = await git.clone(url, dest);
  if (!cloned.ok) throw new CommandFailedError('Failed to clone', cloned.stderr);

  return register(home, {
    name,
    path: dest,
    sourceUrl: url,
    addedAt: (input.now ?? new Date()).toISOString(),
  });
}

export interface AddDirInput {
  home: string;
  dir: string;
  name?: string;
  now?: Date;
}

/**
 * Register an existing local checkout in place. Its origin remote becomes the
 * source URL, falling back to the checkout path.
 */
export async function addDir(input: AddDirInput): Promise<Repo> {
  const dir = path.resolve(input.dir);
  const root = await git.getRepoRoot(dir);
  if (!root) throw new InvalidArgsError(`Not a git repository: ${dir}`);

  const name = validateName(input.name ?? path.basename(root));
  const config = await loadConfig(input.home);
  const existing = config.repos[name];
  if (existing) throw new RepoExistsError(name, existing.path);

  return register(input.home, {
    name,
    path: root,
    sourceUrl: (await git.remoteUrl(root)) ?? root,
    addedAt: (input.now ?? new Date()).toISOString(),
  });
}

/** Session keys of agents and archives still pointing at `repoName`. */
export function repoReferences(config: Config, repoName: string): string[] {
  return [...Object.values(config.agents), ...Object.values(config.archives)]
    .filter((record) => record.repoName === repoName)
    .map((record) => record.sessionKey);
}

export interface RemoveRepoInput {
  home: string;
  name: string;
}

/**
 * Unregister a repo. Refused while any agent or archive references it. The
 * clone on disk is left alone.
 */
export async function removeRepo(input: RemoveRepoInput): Promise<Repo> {
  const repo = requireRepo(await loadConfig(input.home), input.name);
  await updateConfig(input.home, (config) => {
    requireRepo(config, input.name);
    const references = repoReferences(config, input.name);
    if (references.length > 0) throw new RepoInUseError(input.name, references);
    delete config.repos[input.name];
    return config;
  });
  return repo;
}
