import { loadConfig, requireAgent } from '../core/config.js';
import { checkGh, createPr, mergePr, mergeStrategy, viewPr } from '../core/pr.js';
import * as git from '../core/git.js';
import { resolveHome } from '../lib/paths.js';
import { output, success, info, warn } from '../lib/output.js';
import { selectAgent } from './select.js';
import type { AgentRecord } from '../types/config.js';

async function resolveAgent(target: string | undefined, title: string): Promise<AgentRecord> {
  await checkGh();
  const config = await loadConfig(resolveHome());
  return requireAgent(config, await selectAgent(config, target, title));
}

export interface PrCreateOptions {
  base?: string;
  title?: string;
  body?: string;
  fill?: boolean;
  draft?: boolean;
  web?: boolean;
  json?: boolean;
}

export async function prCreateCommand(target: string | undefined, options: PrCreateOptions): Promise<void> {
  const agent = await resolveAgent(target, 'Create PR for:');

  const status = await git.status(agent.worktreePath);
  if (status.ok && git.parseStatus(status.stdout).length > 0) {
    warn('Worktree has uncommitted changes; they will not be part of the PR.');
  }

  if (!options.json) info(`Creating PR for ${agent.branch}`);
  const url = await createPr(agent, options);

  if (options.json) {
    output({ success: true, sessionKey: agent.sessionKey, branch: agent.branch, url }, true);
    return;
  }
  success(url ? `PR created: ${url}` : 'PR created');
}

export interface PrViewOptions {
  web?: boolean;
  json?: boolean;
}

export async function prViewCommand(target: string | undefined, options: PrViewOptions): Promise<void> {
  const agent = await resolveAgent(target, 'View PR for:');
  const text = await viewPr(agent, { web: options.web });

  if (options.json) {
    output({ sessionKey: agent.sessionKey, branch: agent.branch, output: text }, true);
    return;
  }
  if (text) console.log(text);
}

export interface PrMergeOptions {
  merge?: boolean;
  squash?: boolean;
  rebase?: boolean;
  deleteBranch?: boolean;
  auto?: boolean;
  json?: boolean;
}

export async function prMergeCommand(target: string | undefined, options: PrMergeOptions): Promise<void> {
  const strategy = mergeStrategy(options);
  const agent = await resolveAgent(target, 'Merge PR for:');
  const text = await mergePr(agent, { strategy, deleteBranch: options.deleteBranch, auto: options.auto });

  if (options.json) {
    output({ success: true, sessionKey: agent.sessionKey, branch: agent.branch, output: text }, true);
    return;
  }
  if (text) console.log(text);
  success(options.auto ? `Auto-merge enabled for ${agent.branch}` : `Merged PR for ${agent.branch}`);
}
