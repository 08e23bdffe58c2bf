import { loadConfig, requireRepo } from '../core/config.js';
import { loadSettings, resolveLaunchConfig } from '../core/settings.js';
import { performSpawn } from '../core/operations/spawn.js';
import { checkGh, findRepoByFullName, resolvePrReference } from '../core/pr.js';
import { requireDependencies } from '../core/deps.js';
import { listActiveAgents } from '../core/reconcile.js';
import { getCurrentBranch } from '../core/git.js';
import { resolveHome } from '../lib/paths.js';
import { InvalidArgsError } from '../lib/errors.js';
import { ask, confirm } from '../lib/interactive.js';
import { output, success, info, warn, paint } from '../lib/output.js';
import { selectRepo } from './select.js';
import { AGENT_TYPES, type AgentType, type Config } from '../types/config.js';
import type { Settings, ShareSettings } from '../types/settings.js';

export interface ShareFlags {
  linkNodeModules?: boolean;
  linkVenv?: boolean;
  copyEnv?: boolean;
}

export interface SpawnOptions extends ShareFlags {
  task?: string;
  agent?: string;
  autoAccept?: boolean;
  label?: string;
  fromPr?: string;
  fromBranch?: string;
  json?: boolean;
}

export function parseAgentType(value: string | undefined, settings: Settings): AgentType {
  if (value === undefined) return settings.defaults.agent;
  const agentType = AGENT_TYPES.find((candidate) => candidate === value);
  if (!agentType) {
    throw new InvalidArgsError(`Unknown agent type: ${value}. Available: ${AGENT_TYPES.join(', ')}`);
  }
  return agentType;
}

/** Flags can only switch a shared link on; settings decide the rest. */
export function resolveShare(defaults: ShareSettings, flags: ShareFlags): ShareSettings {
  return {
    nodeModules: defaults.nodeModules || (flags.linkNodeModules ?? false),
    venv: defaults.venv || (flags.linkVenv ?? false),
    env: defaults.env || (flags.copyEnv ?? false),
  };
}

async function resolveAutoAccept(
  options: SpawnOptions,
  settings: Settings,
  agentType: AgentType,
  task: string,
): Promise<boolean> {
  const decided = options.autoAccept ?? settings.defaults.autoAccept;
  if (decided !== undefined) return decided;
  if (!task) return false;

  const agentName = agentType === 'codex' ? 'Codex' : 'Claude';
  warn(`Auto-accept mode lets ${agentName} run without permission prompts.`);
  console.log(paint('It gives the agent full control to modify files and run commands.', 'red'));
  return confirm('Enable auto-accept mode?');
}

interface Target {
  repoName: string;
  branch?: string;
}

async function resolveTarget(
  config: Config,
  repoArg: string | undefined,
  branchArg: string | undefined,
  options: SpawnOptions,
): Promise<Target> {
  if (options.fromPr && options.fromBranch) {
    throw new InvalidArgsError('Use only one of --from-pr or --from-branch.');
  }

  if (options.fromPr) {
    await checkGh();
    const pr = await resolvePrReference(options.fromPr);
    const registered = findRepoByFullName(config, pr.fullName);
    if (registered) return { repoName: registered.name, branch: pr.branch };

    warn(`PR repo ${pr.fullName} is not registered. Select a repository.`);
    const repo = await selectRepo(config, 'Select repository:');
    return { repoName: repo.name, branch: pr.branch };
  }

  const branch = options.fromBranch ?? branchArg;
  if (repoArg) return { repoName: repoArg, branch };

  const repo = await selectRepo(config, 'Select repository:');
  return { repoName: repo.name, branch };
}

export async function spawnCommand(
  repoArg: string | undefined,
  branchArg: string | undefined,
  options: SpawnOptions,
): Promise<void> {
  const home = resolveHome();
  const settings = await loadSettings(home);
  const agentType = parseAgentType(options.agent, settings);
  const launch = resolveLaunchConfig(settings, agentType);

  await requireDependencies(['git', 'tmux', launch.command]);

  // Every prompt happens here, before any lock is taken
  const config = await loadConfig(home);
  const target = await resolveTarget(config, repoArg, branchArg, options);
  const repo = requireRepo(config, target.repoName);
  const branch = target.branch
    ?? await ask('Branch name', (await getCurrentBranch(repo.path)) ?? 'main');
  if (!branch) throw new InvalidArgsError('A branch name is required.');

  const task = options.task ?? '';
  const autoAccept = await resolveAutoAccept(options, settings, agentType, task);

  if (!options.json) info(`Creating workspace for ${repo.name}:${branch}`);
  const result = await performSpawn({
    home,
    repoName: repo.name,
    branch,
    task,
    agentType,
    launch,
    autoAccept,
    label: options.label,
    share: resolveShare(settings.share, options),
  });
  const { agent } = result;

  if (options.json) {
    output({ success: true, agent, createdBranch: result.createdBranch }, true);
    return;
  }

  if (result.createdBranch) info(`Created new branch: ${branch}`);

  const view = await listActiveAgents(await loadConfig(home));
  const ordinal = view.find((active) => active.sessionKey === agent.sessionKey)?.ordinal;
  const ref = ordinal === undefined ? agent.sessionKey : String(ordinal);

  success(`Agent spawned (${agentType})`);
  console.log(`  Session:   ${paint(agent.sessionKey, 'cyan')}`);
  console.log(`  Workspace: ${agent.worktreePath}`);
  console.log(`\n  ${paint(`adeck attach ${ref}`, 'yellow')}  view the agent`);
  console.log(`  ${paint('adeck status', 'yellow')}  see all agents`);
  console.log(`  ${paint(`adeck diff ${ref}`, 'yellow')}  view changes\n`);
}
