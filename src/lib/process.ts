import { execa, ExecaError } from 'execa';
import { execaEnv } from './env.js';
import type { ToolResult } from '../types/common.js';

export interface RunOptions {
  cwd?: string;
  input?: string;
}

/**
 * Run a command from an argument list (never through a shell) and capture its
 * output. Non-zero exits and spawn failures resolve; they never reject.
 */
export async function run(file: string, args: string[], options: RunOptions = {}): Promise<ToolResult> {
  const result = await execa(file, args, {
    ...execaEnv,
    cwd: options.cwd,
    input: options.input,
    reject: false,
  });
  const stderr = String(result.stderr).trim();
  return {
    ok: !result.failed,
    // 127 mirrors the shell's "command not found" status for spawn failures
    exitCode: result.exitCode ?? 127,
    stdout: String(result.stdout),
    stderr: stderr || (result instanceof ExecaError ? result.shortMessage : ''),
  };
}

/** True when `command` resolves on PATH. */
export async function commandExists(command: string): Promise<boolean> {
  const result = await run('which', [command]);
  return result.ok;
}
