import type { SessionKey } from '../lib/session-key.js';
import type { AgentRecord, Config } from '../types/config.js';
import { listActiveSessions } from './observer.js';

/** An agent whose record and live session both exist, numbered for this listing only. */
export type ActiveAgent = AgentRecord & { ordinal: number };

export interface ReconcileOptions {
  label?: string;
}

function filterByLabel(config: Config, label: string | undefined): AgentRecord[] {
  const records = Object.values(config.agents);
  return label === undefined ? records : records.filter((agent) => agent.label === label);
}

/**
 * Records whose session is live, in `config.agents` insertion order, numbered
 * 1..N. The label filter applies first, so ordinals count only matching agents.
 * Ordinals are only meaningful within the command that computed them.
 */
export function activeAgents(
  config: Config,
  sessions: ReadonlySet<SessionKey>,
  options: ReconcileOptions = {},
): ActiveAgent[] {
  return filterByLabel(config, options.label)
    .filter((agent) => sessions.has(agent.sessionKey))
    .map((agent, index) => ({ ...agent, ordinal: index + 1 }));
}

/** Records whose session has gone away: the agent no longer appears active. */
export function inactiveAgents(
  config: Config,
  sessions: ReadonlySet<SessionKey>,
  options: ReconcileOptions = {},
): AgentRecord[] {
  return filterByLabel(config, options.label).filter((agent) => !sessions.has(agent.sessionKey));
}

export async function listActiveAgents(config: Config, options: ReconcileOptions = {}): Promise<ActiveAgent[]> {
  return activeAgents(config, await listActiveSessions(), options);
}
