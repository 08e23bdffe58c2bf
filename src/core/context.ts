import fs from 'node:fs/promises';
import path from 'node:path';
import { CONTEXT_EXCLUDE_ENTRY, contextDir, notesPath } from '../lib/paths.js';
import { errorCode, errorMessage } from '../lib/errors.js';
import { debug } from '../lib/output.js';
import { commonGitDir } from './git.js';

/**
 * Create the worktree's `.context/` scratch directory and list it in the
 * repository's info/exclude so notes never get committed.
 */
export async function ensureContextDir(wtPath: string): Promise<void> {
  await fs.mkdir(contextDir(wtPath), { recursive: true });

  const gitDir = await commonGitDir(wtPath);
  if (!gitDir) {
    debug(`No git directory found for ${wtPath}; .context is not excluded`);
    return;
  }

  const excludeFile = path.join(gitDir, 'info', 'exclude');
  try {
    await appendExclude(excludeFile);
  } catch (err) {
    debug(`Could not update ${excludeFile}: ${errorMessage(err)}`);
  }
}

async function appendExclude(excludeFile: string): Promise<void> {
  let contents = '';
  try {
    contents = await fs.readFile(excludeFile, 'utf-8');
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') throw err;
  }

  const present = contents.split('\n').some((line) => line.trim() === CONTEXT_EXCLUDE_ENTRY);
  if (present) return;

  await fs.mkdir(path.dirname(excludeFile), { recursive: true });
  const separator = contents && !contents.endsWith('\n') ? '\n' : '';
  await fs.appendFile(excludeFile, `${separator}${CONTEXT_EXCLUDE_ENTRY}\n`, 'utf-8');
}

export async function readNotes(wtPath: string): Promise<string | undefined> {
  try {
    const notes = await fs.readFile(notesPath(wtPath), 'utf-8');
    return notes === '' ? undefined : notes;
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      debug(`Could not read notes in ${wtPath}: ${errorMessage(err)}`);
    }
    return undefined;
  }
}

export async function writeNotes(wtPath: string, notes: string): Promise<void> {
  await fs.mkdir(contextDir(wtPath), { recursive: true });
  await fs.writeFile(notesPath(wtPath), notes, 'utf-8');
}
