import fs from 'node:fs/promises';

/** True when something (file, directory or symlink, even a dangling one) sits at `file`. */
export async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.lstat(file);
    return true;
  } catch {
    return false;
  }
}
