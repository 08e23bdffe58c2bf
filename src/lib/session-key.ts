import { InvalidSessionKeyError } from './errors.js';

/** Reserved prefix separating agentdeck's tmux sessions from everything else. */
export const SESSION_PREFIX = 'adeck-';

declare const sessionKeyBrand: unique symbol;

/** A tmux session name owned by agentdeck. Build one with `toSessionKey`. */
export type SessionKey = string & { readonly [sessionKeyBrand]: true };

// tmux rewrites '.' and ':' in session names, so keys must not contain them
const INVALID_CHARS = /[.:\s]/;

export function isSessionKey(value: string): value is SessionKey {
  return value.startsWith(SESSION_PREFIX)
    && value.length > SESSION_PREFIX.length
    && !INVALID_CHARS.test(value);
}

export function toSessionKey(value: string): SessionKey {
  if (!isSessionKey(value)) throw new InvalidSessionKeyError(value);
  return value;
}

/** Session key for a worktree directory name. */
export function sessionKeyFor(worktreeDirName: string): SessionKey {
  return toSessionKey(`${SESSION_PREFIX}${worktreeDirName}`);
}

/** Prepend the reserved prefix unless the name already carries it. */
export function withPrefix(name: string): string {
  return name.startsWith(SESSION_PREFIX) ? name : `${SESSION_PREFIX}${name}`;
}
