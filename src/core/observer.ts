import { isSessionKey, type SessionKey } from '../lib/session-key.js';
import { listSessions, sessionExists } from './tmux.js';

/** Live sessions carrying the reserved prefix. Sessions of other tools are ignored. */
export async function listActiveSessions(): Promise<Set<SessionKey>> {
  const names = await listSessions();
  return new Set(names.filter(isSessionKey));
}

export async function isSessionLive(key: string): Promise<boolean> {
  return sessionExists(key);
}
