import fs from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import { errorCode, errorMessage } from '../lib/errors.js';
import type { ShareSettings } from '../types/settings.js';

export type LinkStatus = 'linked' | 'copied' | 'skipped-present' | 'skipped-missing' | 'failed';

export interface LinkOutcome {
  name: string;
  status: LinkStatus;
  detail?: string;
}

async function statOrUndefined(file: string, follow: boolean) {
  try {
    return follow ? await fs.stat(file) : await fs.lstat(file);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return undefined;
    throw err;
  }
}

async function linkDir(basePath: string, wtPath: string, name: string): Promise<LinkOutcome> {
  const src = path.join(basePath, name);
  const dest = path.join(wtPath, name);
  try {
    const source = await statOrUndefined(src, true);
    if (!source?.isDirectory()) return { name, status: 'skipped-missing' };
    if (await statOrUndefined(dest, false)) return { name, status: 'skipped-present' };
    await fs.symlink(src, dest, 'dir');
    return { name, status: 'linked' };
  } catch (err) {
    return { name, status: 'failed', detail: errorMessage(err) };
  }
}

async function copyFile(basePath: string, wtPath: string, name: string): Promise<LinkOutcome> {
  const src = path.join(basePath, name);
  const dest = path.join(wtPath, name);
  try {
    const source = await statOrUndefined(src, true);
    if (!source?.isFile()) return { name, status: 'skipped-missing' };
    if (await statOrUndefined(dest, false)) return { name, status: 'skipped-present' };
    await fs.copyFile(src, dest, constants.COPYFILE_EXCL);
    return { name, status: 'copied' };
  } catch (err) {
    return { name, status: 'failed', detail: errorMessage(err) };
  }
}

/**
 * Share dependency directories and the .env file from `basePath` into a new
 * worktree. Never throws: every entry reports what happened to it, and
 * nothing that already exists in the worktree is replaced.
 */
export async function linkSharedPaths(
  basePath: string,
  wtPath: string,
  share: ShareSettings,
): Promise<LinkOutcome[]> {
  const outcomes: LinkOutcome[] = [];
  if (share.nodeModules) outcomes.push(await linkDir(basePath, wtPath, 'node_modules'));
  if (share.venv) outcomes.push(await linkDir(basePath, wtPath, '.venv'));
  if (share.env) outcomes.push(await copyFile(basePath, wtPath, '.env'));
  return outcomes;
}
