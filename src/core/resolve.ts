import { InvalidAgentNumberError, InvalidArgsError } from '../lib/errors.js';
import { toSessionKey, withPrefix, type SessionKey } from '../lib/session-key.js';

/**
 * Map a user token to a session key. Digits are 1-based ordinals into `view`
 * and are bounds-checked against it. Names get the reserved prefix if missing
 * and are returned without checking that they exist, so a record whose session
 * died can still be addressed by name.
 */
export function resolveIdentifier(
  token: string,
  view: readonly { sessionKey: SessionKey }[],
  outOfRange: (token: string) => Error = (t) => new InvalidAgentNumberError(t),
): SessionKey {
  const trimmed = token.trim();
  if (!trimmed) throw new InvalidArgsError('An agent number or name is required.');

  if (/^\d+$/.test(trimmed)) {
    const entry = view[Number(trimmed) - 1];
    if (!entry) throw outOfRange(trimmed);
    return entry.sessionKey;
  }

  return toSessionKey(withPrefix(trimmed));
}
