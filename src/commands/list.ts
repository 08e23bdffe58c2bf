import { loadConfig } from '../core/config.js';
import { listActiveAgents } from '../core/reconcile.js';
import { resolveHome } from '../lib/paths.js';
import { output, formatTable, paint, type Column } from '../lib/output.js';

export interface ListOptions {
  json?: boolean;
}

const TASK_PREVIEW = 50;

export function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export async function listCommand(options: ListOptions): Promise<void> {
  const config = await loadConfig(resolveHome());
  const repos = Object.values(config.repos);
  const agents = await listActiveAgents(config);

  if (options.json) {
    output({
      repos: Object.fromEntries(repos.map((repo) => [repo.name, {
        path: repo.path,
        sourceUrl: repo.sourceUrl,
        addedAt: repo.addedAt,
      }])),
      agents: agents.map((agent) => ({
        number: agent.ordinal,
        sessionKey: agent.sessionKey,
        repo: agent.repoName,
        branch: agent.branch,
        task: agent.task,
      })),
    }, true);
    return;
  }

  console.log(paint('\nRepositories', 'bold'));
  if (repos.length === 0) {
    console.log(paint("  No repositories. Use 'adeck add-repo <url>'", 'dim'));
  } else {
    const columns: Column[] = [
      { header: 'Name', key: 'name', format: (v) => paint(String(v), 'cyan') },
      { header: 'Path', key: 'path' },
    ];
    const rows = repos.map((repo) => ({ name: repo.name, path: repo.path }));
    console.log(indent(formatTable(rows, columns)));
  }

  console.log(paint('\nActive agents', 'bold'));
  if (agents.length === 0) {
    console.log(paint("  No active agents. Use 'adeck spawn <repo> <branch>'", 'dim'));
  }
  for (const agent of agents) {
    console.log(`  ${paint('*', 'green')} [${agent.ordinal}] ${paint(agent.repoName, 'cyan')}:${paint(agent.branch, 'yellow')}`);
    if (agent.task) console.log(`       task: ${preview(agent.task, TASK_PREVIEW)}`);
  }
  console.log();
}

function indent(block: string): string {
  return block.split('\n').map((line) => `  ${line}`).join('\n');
}
