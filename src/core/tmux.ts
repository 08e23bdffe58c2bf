import { execa } from 'execa';
import { CommandFailedError, TmuxNotFoundError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import { run } from '../lib/process.js';

export async function checkTmux(): Promise<void> {
  const result = await run('tmux', ['-V']);
  if (!result.ok) throw new TmuxNotFoundError();
}

export function isInsideTmux(): boolean {
  return Boolean(process.env.TMUX);
}

/**
 * Create a detached session rooted at `cwd`. With more than one word in
 * `command`, tmux executes it directly rather than through a shell.
 */
export async function newSession(name: string, cwd: string, command: string[] = []): Promise<void> {
  const result = await run('tmux', [
    'new-session',
    '-d',
    '-s', name,
    '-c', cwd,
    '-x', '220',
    '-y', '50',
    ...command,
  ]);
  if (!result.ok) {
    throw new CommandFailedError(`Failed to create tmux session ${name}`, result.stderr);
  }
}

/** Kill a session. A session (or server) that is already gone counts as killed. */
export async function killSession(name: string): Promise<void> {
  // '=' prefix for exact session name matching, avoiding tmux prefix ambiguity
  const result = await run('tmux', ['kill-session', '-t', `=${name}`]);
  if (result.ok || isTmuxNotFound(result.stderr)) return;
  throw new CommandFailedError(`Failed to kill tmux session ${name}`, result.stderr);
}

/**
 * Check if a tmux error is a benign "not found" error (target already dead/gone).
 */
export function isTmuxNotFound(stderr: string): boolean {
  const msg = stderr.toLowerCase();
  return msg.includes("can't find") ||
    msg.includes('session not found') ||
    msg.includes('no server running') ||
    msg.includes('error connecting to');
}

/** Names of all sessions on the server; empty when tmux or its server is absent. */
export async function listSessions(): Promise<string[]> {
  const result = await run('tmux', ['list-sessions', '-F', '#{session_name}']);
  if (!result.ok) return [];
  return result.stdout.split('\n').map((line) => line.trim()).filter(Boolean);
}

export async function sessionExists(name: string): Promise<boolean> {
  const result = await run('tmux', ['has-session', '-t', `=${name}`]);
  return result.ok;
}

/** Last `lines` lines of the session's active pane. */
export async function capturePane(name: string, lines: number): Promise<string> {
  const result = await run('tmux', ['capture-pane', '-p', '-t', `=${name}:`, '-S', `-${lines}`]);
  if (!result.ok) {
    throw new CommandFailedError(`Failed to read output of ${name}`, result.stderr);
  }
  return result.stdout;
}

/**
 * Hand the terminal to tmux until the user detaches. Inside tmux this switches
 * the current client instead of nesting. Resolves with tmux's exit code.
 */
export async function attachSession(name: string): Promise<number> {
  const args = isInsideTmux()
    ? ['switch-client', '-t', `=${name}`]
    : ['attach-session', '-t', `=${name}`];
  const subprocess = execa('tmux', args, { ...execaEnv, stdio: 'inherit', reject: false });

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];
  const forward = (signal: NodeJS.Signals): void => {
    subprocess.kill(signal);
  };
  for (const signal of signals) process.on(signal, forward);

  try {
    const result = await subprocess;
    return result.exitCode ?? 1;
  } finally {
    for (const signal of signals) process.off(signal, forward);
  }
}
