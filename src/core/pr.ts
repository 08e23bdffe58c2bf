import { z } from 'zod';
import { run, commandExists } from '../lib/process.js';
import {
  CommandFailedError,
  GhNotAuthenticatedError,
  GhNotFoundError,
  InvalidArgsError,
} from '../lib/errors.js';
import type { AgentRecord, Config, Repo } from '../types/config.js';

/** Verify gh is installed and logged in before any PR operation. */
export async function checkGh(): Promise<void> {
  if (!(await commandExists('gh'))) throw new GhNotFoundError();
  const auth = await run('gh', ['auth', 'status']);
  if (!auth.ok) throw new GhNotAuthenticatedError();
}

const prHeadSchema = z.object({
  headRefName: z.string().min(1),
  headRepositoryOwner: z.object({ login: z.string().min(1) }),
  headRepository: z.object({ name: z.string().min(1) }),
});

export interface PrReference {
  branch: string;
  /** `owner/name` of the repository the PR's head branch lives in. */
  fullName: string;
}

/** Look up a PR (number, URL or branch) and return its head branch and repository. */
export async function resolvePrReference(ref: string): Promise<PrReference> {
  const result = await run('gh', [
    'pr', 'view', ref,
    '--json', 'headRefName,headRepositoryOwner,headRepository',
  ]);
  if (!result.ok) throw new CommandFailedError('Failed to resolve PR via gh', result.stderr);

  let json: unknown;
  try {
    json = JSON.parse(result.stdout);
  } catch {
    throw new CommandFailedError('Unexpected gh output while resolving PR', result.stdout.trim());
  }
  const parsed = prHeadSchema.safeParse(json);
  if (!parsed.success) {
    throw new CommandFailedError('Could not determine PR branch/repo from gh output', result.stdout.trim());
  }

  const { headRefName, headRepositoryOwner, headRepository } = parsed.data;
  return {
    branch: headRefName,
    fullName: `${headRepositoryOwner.login}/${headRepository.name}`,
  };
}

/** A registered repo whose source URL contains `owner/name`, case-insensitively. */
export function findRepoByFullName(config: Config, fullName: string): Repo | undefined {
  const needle = fullName.trim().toLowerCase();
  return Object.values(config.repos).find((repo) => repo.sourceUrl.toLowerCase().includes(needle));
}

export interface CreatePrOptions {
  base?: string;
  title?: string;
  body?: string;
  fill?: boolean;
  draft?: boolean;
  web?: boolean;
}

export interface ViewPrOptions {
  web?: boolean;
}

export type MergeStrategy = 'merge' | 'squash' | 'rebase';

export interface MergePrOptions {
  strategy?: MergeStrategy;
  deleteBranch?: boolean;
  auto?: boolean;
}

export function createPrArgs(branch: string, options: CreatePrOptions): string[] {
  const args = ['pr', 'create', '--head', branch];
  if (options.base) args.push('--base', options.base);
  if (options.title) args.push('--title', options.title);
  if (options.body) args.push('--body', options.body);
  if (options.fill) args.push('--fill');
  if (options.draft) args.push('--draft');
  if (options.web) args.push('--web');
  return args;
}

export function viewPrArgs(branch: string, options: ViewPrOptions): string[] {
  const args = ['pr', 'view', branch];
  if (options.web) args.push('--web');
  return args;
}

export function mergePrArgs(branch: string, options: MergePrOptions): string[] {
  const args = ['pr', 'merge', branch];
  if (options.strategy) args.push(`--${options.strategy}`);
  if (options.deleteBranch) args.push('--delete-branch');
  if (options.auto) args.push('--auto');
  return args;
}

/** Pick the merge strategy from mutually exclusive flags. */
export function mergeStrategy(flags: { merge?: boolean; squash?: boolean; rebase?: boolean }): MergeStrategy | undefined {
  const chosen = (['merge', 'squash', 'rebase'] as const).filter((strategy) => flags[strategy]);
  if (chosen.length > 1) {
    throw new InvalidArgsError('Use only one of --merge, --squash or --rebase.');
  }
  return chosen[0];
}

async function runGh(agent: AgentRecord, args: string[], action: string): Promise<string> {
  const result = await run('gh', args, { cwd: agent.worktreePath });
  if (!result.ok) throw new CommandFailedError(action, result.stderr);
  return result.stdout.trim();
}

export async function createPr(agent: AgentRecord, options: CreatePrOptions = {}): Promise<string> {
  return runGh(agent, createPrArgs(agent.branch, options), 'PR creation failed');
}

export async function viewPr(agent: AgentRecord, options: ViewPrOptions = {}): Promise<string> {
  return runGh(agent, viewPrArgs(agent.branch, options), 'PR view failed');
}

export async function mergePr(agent: AgentRecord, options: MergePrOptions = {}): Promise<string> {
  return runGh(agent, mergePrArgs(agent.branch, options), 'PR merge failed');
}
