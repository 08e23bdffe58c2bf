import { requireAgent, updateConfig } from '../config.js';
import type { SessionKey } from '../../lib/session-key.js';
import type { AgentRecord } from '../../types/config.js';

export interface RelabelInput {
  home: string;
  sessionKey: SessionKey;
  /** Empty or undefined clears the label. */
  label?: string;
}

export async function performRelabel(input: RelabelInput): Promise<AgentRecord> {
  const config = await updateConfig(input.home, (latest) => {
    const { label: _previous, ...rest } = requireAgent(latest, input.sessionKey);
    latest.agents[input.sessionKey] = input.label ? { ...rest, label: input.label } : rest;
    return latest;
  });
  return requireAgent(config, input.sessionKey);
}
