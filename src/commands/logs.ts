import { setTimeout as sleep } from 'node:timers/promises';
import { loadConfig } from '../core/config.js';
import * as tmux from '../core/tmux.js';
import { resolveHome } from '../lib/paths.js';
import { output, paint } from '../lib/output.js';
import { selectAgent } from './select.js';
import type { SessionKey } from '../lib/session-key.js';

export interface LogsOptions {
  lines?: number;
  follow?: boolean;
  json?: boolean;
}

const DEFAULT_LINES = 50;
const POLL_MS = 500;
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Redraw the pane whenever its content changes, until `signal` aborts. Returns
 * the number of redraws.
 */
export async function followPane(
  sessionKey: SessionKey,
  lines: number,
  signal: AbortSignal,
  write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<number> {
  let last: string | undefined;
  let redraws = 0;

  while (!signal.aborted) {
    let content: string;
    try {
      content = await tmux.capturePane(sessionKey, lines);
    } catch (err) {
      // Ctrl+C reaches the capture-pane child too
      if (signal.aborted) break;
      throw err;
    }
    if (content !== last) {
      write(`${CLEAR_SCREEN}${paint(`=== ${sessionKey} (live) ===`, 'bold')}\n\n${content}\n`);
      last = content;
      redraws++;
    }
    try {
      await sleep(POLL_MS, undefined, { signal });
    } catch (err) {
      if (signal.aborted) break;
      throw err;
    }
  }
  return redraws;
}

export async function logsCommand(target: string | undefined, options: LogsOptions): Promise<void> {
  await tmux.checkTmux();
  const sessionKey = await selectAgent(await loadConfig(resolveHome()), target, 'Show logs for:');
  const lines = options.lines ?? DEFAULT_LINES;

  if (!options.follow) {
    const content = await tmux.capturePane(sessionKey, lines);
    if (options.json) {
      output({ sessionKey, lines, output: content }, true);
    } else {
      console.log(content);
    }
    return;
  }

  console.log(paint(`Following logs for ${sessionKey} (Ctrl+C to stop)...`, 'dim'));
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once('SIGINT', stop);
  try {
    await followPane(sessionKey, lines, controller.signal);
  } finally {
    process.off('SIGINT', stop);
  }
  console.log(paint('\nStopped following.', 'dim'));
}
