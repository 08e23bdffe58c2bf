import { loadConfig } from '../core/config.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveIdentifier } from '../core/resolve.js';
import { performRelabel } from '../core/operations/label.js';
import { resolveHome } from '../lib/paths.js';
import { output, success } from '../lib/output.js';

export interface LabelOptions {
  json?: boolean;
}

/** Set an agent's label, or clear it when no label is given. */
export async function labelCommand(target: string, label: string | undefined, options: LabelOptions): Promise<void> {
  const home = resolveHome();
  const sessionKey = resolveIdentifier(target, await listActiveAgents(await loadConfig(home)));
  const agent = await performRelabel({ home, sessionKey, label });

  if (options.json) {
    output({ success: true, agent }, true);
    return;
  }
  success(agent.label ? `Labelled ${sessionKey}: ${agent.label}` : `Cleared label of ${sessionKey}`);
}
