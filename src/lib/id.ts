import { customAlphabet } from 'nanoid';

const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789';

const shortId = customAlphabet(alphabet, 4);

/** Local wall-clock time as HHMMSS, the disambiguator in worktree names. */
export function timeStamp(now: Date = new Date()): string {
  return [now.getHours(), now.getMinutes(), now.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join('');
}

/** Extra suffix for the rare case where two spawns land in the same second. */
export function collisionSuffix(): string {
  return shortId();
}
