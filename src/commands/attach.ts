import { loadConfig } from '../core/config.js';
import { isSessionLive } from '../core/observer.js';
import * as tmux from '../core/tmux.js';
import { resolveHome } from '../lib/paths.js';
import { AgentNotFoundError } from '../lib/errors.js';
import { selectAgent } from './select.js';

/**
 * Hand the terminal over to the agent's session. Nothing runs after this: the
 * process exits with tmux's own status once the user detaches.
 */
export async function attachCommand(target: string | undefined): Promise<never> {
  await tmux.checkTmux();
  const sessionKey = await selectAgent(await loadConfig(resolveHome()), target, 'Attach to:');
  if (!(await isSessionLive(sessionKey))) throw new AgentNotFoundError(sessionKey);

  const exitCode = await tmux.attachSession(sessionKey);
  process.exit(exitCode);
}
