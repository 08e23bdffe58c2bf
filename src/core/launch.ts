import { shellQuote } from '../lib/shell.js';
import type { AgentLaunchConfig } from '../types/settings.js';

const FINISHED_BANNER = '\\n[Agent finished. Press Enter for shell or Ctrl+D to exit]';

/**
 * Argument list the agent's tmux session runs. Without a task the agent starts
 * interactively. With one, it runs inside bash so the session stays open as a
 * shell once the agent exits; the task travels as `$1`, never through the
 * command string.
 */
export function buildAgentCommand(launch: AgentLaunchConfig, task: string, autoAccept: boolean): string[] {
  if (!task) return [launch.command];

  const runner = [launch.command, ...(autoAccept ? launch.autoAcceptArgs : launch.manualArgs)]
    .map(shellQuote)
    .join(' ');

  return [
    'bash',
    '-lc',
    `${runner} "$1"; echo "${FINISHED_BANNER}"; read; exec bash`,
    '--',
    task,
  ];
}
