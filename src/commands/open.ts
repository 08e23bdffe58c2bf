import { execa } from 'execa';
import { loadConfig, requireAgent } from '../core/config.js';
import { loadSettings } from '../core/settings.js';
import { resolveHome } from '../lib/paths.js';
import { execaEnv } from '../lib/env.js';
import { CommandFailedError, errorMessage } from '../lib/errors.js';
import { success } from '../lib/output.js';
import { selectAgent } from './select.js';

export interface OpenOptions {
  editor?: string;
}

/** First of: the flag, the settings default, $EDITOR, $VISUAL, then `code`. */
export function chooseEditor(
  flag: string | undefined,
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return flag || configured || env.EDITOR || env.VISUAL || 'code';
}

/** Start the editor detached on the worktree; it outlives this process. */
export async function launchDetached(editor: string, dir: string): Promise<void> {
  const subprocess = execa(editor, [dir], { ...execaEnv, detached: true, stdio: 'ignore' });
  // The editor's exit status is not ours to report; start failures surface below
  subprocess.catch(() => undefined);
  await new Promise<void>((resolve, reject) => {
    subprocess.once('spawn', () => resolve());
    subprocess.once('error', reject);
  }).catch((err: unknown) => {
    throw new CommandFailedError(`Could not start editor '${editor}'`, errorMessage(err));
  });
  subprocess.unref();
}

export async function openCommand(target: string | undefined, options: OpenOptions): Promise<void> {
  const home = resolveHome();
  const config = await loadConfig(home);
  const sessionKey = await selectAgent(config, target, 'Select agent to open:');
  const agent = requireAgent(config, sessionKey);

  const editor = chooseEditor(options.editor, (await loadSettings(home)).defaults.editor);
  await launchDetached(editor, agent.worktreePath);
  success(`Opened ${agent.worktreePath} in ${editor}`);
}
