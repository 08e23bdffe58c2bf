import { loadConfig } from '../core/config.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveIdentifier } from '../core/resolve.js';
import { performKill, performKillAll } from '../core/operations/kill.js';
import { resolveHome } from '../lib/paths.js';
import { output, success, info, warn } from '../lib/output.js';

export interface KillOptions {
  cleanup?: boolean;
  json?: boolean;
}

export async function killCommand(target: string, options: KillOptions): Promise<void> {
  const home = resolveHome();
  const config = await loadConfig(home);
  const sessionKey = resolveIdentifier(target, await listActiveAgents(config));

  if (options.cleanup && !options.json) info('Removing worktree...');
  const result = await performKill({ home, sessionKey, cleanup: options.cleanup });

  if (options.json) {
    output({ success: true, ...result }, true);
    return;
  }

  success(`Killed session: ${sessionKey}`);
  if (!result.recorded) {
    info('No record was tracked for this session.');
  } else if (result.worktree === 'removed') {
    success('Removed worktree');
  } else if (result.worktree === 'pruned') {
    success('Worktree was already gone; pruned its registration');
  }
}

export async function killAllCommand(options: KillOptions): Promise<void> {
  const result = await performKillAll({ home: resolveHome(), cleanup: options.cleanup });

  if (options.json) {
    output({ success: true, ...result }, true);
    return;
  }

  for (const key of result.killed) console.log(`Killed ${key}`);
  for (const message of result.warnings) warn(message);
  for (const key of result.keptWorktrees) info(`Session ${key} had already ended; kept its worktree`);
  success(`Killed ${result.killed.length} agent(s)`);
}
