import { loadConfig } from '../core/config.js';
import { listActiveSessions } from '../core/observer.js';
import { activeAgents, inactiveAgents, type ActiveAgent } from '../core/reconcile.js';
import * as git from '../core/git.js';
import { resolveHome } from '../lib/paths.js';
import { output, paint } from '../lib/output.js';
import { preview } from './list.js';

export interface StatusOptions {
  label?: string;
  json?: boolean;
}

export interface AgentStatus {
  changes: number;
  commitsAhead: number;
}

export async function agentStatus(agent: ActiveAgent): Promise<AgentStatus> {
  const status = await git.status(agent.worktreePath);
  const changes = status.ok ? git.parseStatus(status.stdout).length : 0;
  const commitsAhead = await git.revListCount(agent.worktreePath, `origin/${agent.branch}..HEAD`);
  return { changes, commitsAhead };
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const config = await loadConfig(resolveHome());
  const sessions = await listActiveSessions();
  const agents = activeAgents(config, sessions, { label: options.label });
  const ended = inactiveAgents(config, sessions, { label: options.label });

  if (options.json) {
    const details = await Promise.all(agents.map(async (agent) => ({ ...agent, ...(await agentStatus(agent)) })));
    output({
      agents: details.map((agent) => ({
        number: agent.ordinal,
        sessionKey: agent.sessionKey,
        repo: agent.repoName,
        branch: agent.branch,
        worktreePath: agent.worktreePath,
        task: agent.task,
        label: agent.label ?? '',
        startedAt: agent.startedAt,
        changes: agent.changes,
        commitsAhead: agent.commitsAhead,
      })),
      count: agents.length,
      inactive: ended.map((agent) => agent.sessionKey),
    }, true);
    return;
  }

  if (agents.length === 0) {
    console.log(paint('\n  No active agents.\n', 'dim'));
    console.log(`  Start one with: ${paint('adeck spawn <repo> <branch>', 'cyan')}\n`);
  }

  for (const agent of agents) {
    const { changes, commitsAhead } = await agentStatus(agent);
    console.log(`\n  ${paint('*', 'green')} ${paint(`Agent #${agent.ordinal}`, 'bold')}`);
    console.log(`    Repo:      ${paint(agent.repoName, 'cyan')}`);
    console.log(`    Branch:    ${paint(agent.branch, 'yellow')}`);
    console.log(`    Workspace: ${agent.worktreePath}`);
    console.log(`    Changes:   ${changes ? paint(`${changes} files`, 'green') : paint('clean', 'dim')}`);
    console.log(`    Commits:   ${commitsAhead} ahead`);
    if (agent.label) console.log(`    Label:     ${paint(agent.label, 'blue')}`);
    if (agent.task) console.log(`    Task:      ${preview(agent.task, 60)}`);
  }

  if (ended.length > 0) {
    console.log(paint('\n  No longer appear active (session ended):', 'yellow'));
    for (const agent of ended) {
      console.log(`    ${agent.sessionKey}  ${paint(`adeck kill ${agent.sessionKey} --cleanup`, 'dim')}`);
    }
  }

  if (agents.length > 0) {
    console.log(paint('\n  ' + '─'.repeat(58), 'dim'));
    console.log(`  Total: ${paint(String(agents.length), 'bold')} agent(s) running\n`);
  }
}
