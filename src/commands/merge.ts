import { loadConfig } from '../core/config.js';
import { performMerge } from '../core/operations/merge.js';
import { resolveHome } from '../lib/paths.js';
import { info, output, success, warn } from '../lib/output.js';
import { selectAgent } from './select.js';

export interface MergeOptions {
  force?: boolean;
  json?: boolean;
}

/** Push an agent's branch to origin. */
export async function mergeCommand(target: string | undefined, options: MergeOptions): Promise<void> {
  const home = resolveHome();
  const sessionKey = await selectAgent(await loadConfig(home), target, 'Select agent to push:');

  const result = await performMerge({ home, sessionKey, force: options.force });

  if (options.json) {
    output({ success: true, ...result }, true);
    return;
  }

  if (result.dirty) warn('Pushing with uncommitted changes left in the worktree.');
  if (result.output) console.log(result.output);
  success(`Pushed ${result.branch} to origin`);
  info(`Open a pull request with: adeck pr create ${sessionKey}`);
}
