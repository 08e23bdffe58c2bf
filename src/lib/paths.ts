import os from 'node:os';
import path from 'node:path';

const HOME_DIR = '.agentdeck';
const CONTEXT_DIR = '.context';

/** Tool home: $ADECK_HOME when set, otherwise ~/.agentdeck. */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.ADECK_HOME?.trim();
  if (override) return path.resolve(override);
  return path.join(os.homedir(), HOME_DIR);
}

export function configPath(home: string): string {
  return path.join(home, 'config.json');
}

export function configBackupPath(home: string): string {
  return path.join(home, 'config.json.bak');
}

export function settingsPath(home: string): string {
  return path.join(home, 'settings.yaml');
}

export function reposDir(home: string): string {
  return path.join(home, 'repos');
}

export function repoPath(home: string, name: string): string {
  return path.join(reposDir(home), name);
}

export function worktreesDir(home: string): string {
  return path.join(home, 'worktrees');
}

export function worktreePath(home: string, dirName: string): string {
  return path.join(worktreesDir(home), dirName);
}

export function contextDir(wtPath: string): string {
  return path.join(wtPath, CONTEXT_DIR);
}

export function notesPath(wtPath: string): string {
  return path.join(contextDir(wtPath), 'notes.md');
}

/** Ignore-list entry that keeps the scratch directory out of commits. */
export const CONTEXT_EXCLUDE_ENTRY = `${CONTEXT_DIR}/`;
