import { loadConfig } from '../core/config.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveHome } from '../lib/paths.js';
import { InvalidArgsError } from '../lib/errors.js';
import { pick } from '../lib/interactive.js';
import { describeAgent } from './select.js';
import type { ActiveAgent } from '../core/reconcile.js';

export type PickFormat = 'number' | 'session' | 'json';

const FORMATS: readonly PickFormat[] = ['number', 'session', 'json'];

export function parsePickFormat(value: string | undefined): PickFormat {
  if (value === undefined) return 'number';
  const format = FORMATS.find((candidate) => candidate === value);
  if (!format) throw new InvalidArgsError(`Unknown format: ${value}. Available: ${FORMATS.join(', ')}`);
  return format;
}

export function formatPicked(agent: ActiveAgent, format: PickFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(agent, null, 2);
    case 'session':
      return agent.sessionKey;
    case 'number':
      return String(agent.ordinal);
  }
}

export interface PickOptions {
  format?: string;
  label?: string;
}

/** Pick an agent interactively and print it, for use in shell scripts. */
export async function pickCommand(options: PickOptions): Promise<void> {
  const format = parsePickFormat(options.format);
  const agents = await listActiveAgents(await loadConfig(resolveHome()), { label: options.label });
  if (agents.length === 0) throw new InvalidArgsError('No active agents.');

  const agent = await pick('Select agent:', agents, describeAgent);
  console.log(formatPicked(agent, format));
}
