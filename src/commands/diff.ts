import { execa } from 'execa';
import { loadConfig, requireAgent } from '../core/config.js';
import { loadSettings } from '../core/settings.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveIdentifier } from '../core/resolve.js';
import * as git from '../core/git.js';
import { resolveHome } from '../lib/paths.js';
import { execaEnv } from '../lib/env.js';
import { CommandFailedError } from '../lib/errors.js';
import { paint, warn } from '../lib/output.js';
import type { AgentRecord } from '../types/config.js';

export interface DiffOptions {
  tool?: string;
}

async function pipeToTool(tool: string, text: string): Promise<void> {
  const result = await execa(tool, [], {
    ...execaEnv,
    input: text,
    stdout: 'inherit',
    stderr: 'inherit',
    reject: false,
  });
  // No exit code means the tool never started
  if (result.failed && result.exitCode === undefined) {
    warn(`Diff tool '${tool}' not found`);
    console.log(text);
  }
}

function section(title: string, body: string, color: 'yellow' | 'green' | 'cyan'): void {
  if (!body.trim()) return;
  console.log(paint(`\n${title}`, color));
  console.log(body.trimEnd());
}

async function showAgentDiff(agent: AgentRecord, tool: string | undefined): Promise<void> {
  const cwd = agent.worktreePath;
  console.log(paint(`\n=== ${agent.repoName}:${agent.branch} ===`, 'bold'));

  if (tool) {
    const full = await git.diff(cwd);
    if (!full.ok) throw new CommandFailedError(`Failed to diff ${cwd}`, full.stderr);
    if (full.stdout.trim()) await pipeToTool(tool, full.stdout);
    return;
  }

  const unstaged = await git.diff(cwd, { stat: true });
  if (!unstaged.ok) throw new CommandFailedError(`Failed to diff ${cwd}`, unstaged.stderr);
  section('Unstaged changes:', unstaged.stdout, 'yellow');

  const staged = await git.diff(cwd, { cached: true, stat: true });
  section('Staged changes:', staged.stdout, 'green');

  const untracked = await git.untrackedFiles(cwd);
  section('Untracked files:', untracked.map((file) => `  + ${file}`).join('\n'), 'cyan');

  const commits = await git.log(cwd, { oneline: true, count: 5, range: `origin/${agent.branch}..HEAD` });
  if (commits.ok) section('New commits:', commits.stdout, 'green');
}

/** Summarise changes for one agent, or for every active agent when none is named. */
export async function diffCommand(target: string | undefined, options: DiffOptions): Promise<void> {
  const home = resolveHome();
  const config = await loadConfig(home);
  const view = await listActiveAgents(config);
  const tool = options.tool ?? (await loadSettings(home)).defaults.diffTool;

  const agents = target === undefined
    ? view
    : [requireAgent(config, resolveIdentifier(target, view))];

  if (agents.length === 0) {
    console.log(paint('No active agents.', 'yellow'));
    return;
  }

  for (const agent of agents) {
    await showAgentDiff(agent, tool);
  }
}
