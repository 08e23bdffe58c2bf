import { addDir, addRepo, removeRepo } from '../core/operations/repo.js';
import { requireDependencies } from '../core/deps.js';
import { resolveHome } from '../lib/paths.js';
import { info, output, success } from '../lib/output.js';

export interface AddRepoOptions {
  name?: string;
  json?: boolean;
}

export async function addRepoCommand(url: string, options: AddRepoOptions): Promise<void> {
  await requireDependencies(['git']);
  const home = resolveHome();

  if (!options.json) info(`Cloning ${url}`);
  const repo = await addRepo({ home, url, name: options.name });

  if (options.json) {
    output({ success: true, repo }, true);
    return;
  }
  success(`Added repository: ${repo.name}`);
  console.log(`  Path: ${repo.path}`);
}

export interface AddDirOptions {
  name?: string;
  json?: boolean;
}

export async function addDirCommand(dir: string | undefined, options: AddDirOptions): Promise<void> {
  await requireDependencies(['git']);
  const repo = await addDir({ home: resolveHome(), dir: dir ?? process.cwd(), name: options.name });

  if (options.json) {
    output({ success: true, repo }, true);
    return;
  }
  success(`Registered ${repo.name}: ${repo.path}`);
}

export interface RemoveRepoOptions {
  json?: boolean;
}

export async function removeRepoCommand(name: string, options: RemoveRepoOptions): Promise<void> {
  const repo = await removeRepo({ home: resolveHome(), name });

  if (options.json) {
    output({ success: true, repo }, true);
    return;
  }
  success(`Removed repository: ${repo.name}`);
  console.log(`  The clone at ${repo.path} was left on disk.`);
}
