#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { AdeckError } from './lib/errors.js';
import { outputError, setVerbose } from './lib/output.js';
import type { AddDirOptions, AddRepoOptions, RemoveRepoOptions } from './commands/repo.js';
import type { ListOptions } from './commands/list.js';
import type { SpawnOptions } from './commands/spawn.js';
import type { StatusOptions } from './commands/status.js';
import type { DiffOptions } from './commands/diff.js';
import type { MergeOptions } from './commands/merge.js';
import type { LogsOptions } from './commands/logs.js';
import type { KillOptions } from './commands/kill.js';
import type { PickOptions } from './commands/pick.js';
import type { ArchiveOptions, ArchivesOptions, RestoreOptions } from './commands/archive.js';
import type { OpenOptions } from './commands/open.js';
import type { LabelOptions } from './commands/label.js';
import type { PrCreateOptions, PrMergeOptions, PrViewOptions } from './commands/pr.js';

const program = new Command();

let jsonOutput = false;

program
  .name('adeck')
  .description('Run several AI coding agents side by side, each in its own git worktree and tmux session')
  .version('0.1.0')
  .option('-v, --verbose', 'Print diagnostic detail')
  .hook('preAction', (_root, actionCommand) => {
    setVerbose(program.opts().verbose === true);
    jsonOutput = actionCommand.opts().json === true;
  });

program
  .command('add-repo')
  .description('Clone a repository and register it')
  .argument('<url>', 'Git repository URL')
  .option('--name <name>', 'Custom name for the repository')
  .option('--json', 'Output as JSON')
  .action(async (url: string, options: AddRepoOptions) => {
    const { addRepoCommand } = await import('./commands/repo.js');
    await addRepoCommand(url, options);
  });

program
  .command('add-dir')
  .description('Register an existing local checkout in place')
  .argument('[dir]', 'Path inside the checkout (default: current directory)')
  .option('--name <name>', 'Custom name for the repository')
  .option('--json', 'Output as JSON')
  .action(async (dir: string | undefined, options: AddDirOptions) => {
    const { addDirCommand } = await import('./commands/repo.js');
    await addDirCommand(dir, options);
  });

program
  .command('remove-repo')
  .description('Unregister a repository (its clone stays on disk)')
  .argument('<name>', 'Repository name')
  .option('--json', 'Output as JSON')
  .action(async (name: string, options: RemoveRepoOptions) => {
    const { removeRepoCommand } = await import('./commands/repo.js');
    await removeRepoCommand(name, options);
  });

program
  .command('list')
  .description('List repositories and active agents')
  .option('--json', 'Output as JSON')
  .action(async (options: ListOptions) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(options);
  });

program
  .command('spawn')
  .description('Start an agent on a fresh worktree')
  .argument('[repo]', 'Repository name')
  .argument('[branch]', 'Branch to work on')
  .option('-t, --task <text>', 'Task for the agent')
  .option('-a, --agent <type>', 'Agent type: claude or codex')
  .option('--auto-accept', 'Let the agent run without permission prompts')
  .option('--no-auto-accept', 'Keep permission prompts on')
  .option('-l, --label <label>', 'Label for grouping agents')
  .option('--from-pr <ref>', 'Take repository and branch from a pull request')
  .option('--from-branch <branch>', 'Work on an existing branch')
  .option('--link-node-modules', 'Symlink node_modules from the repository')
  .option('--link-venv', 'Symlink .venv from the repository')
  .option('--copy-env', 'Copy .env from the repository')
  .option('--json', 'Output as JSON')
  .action(async (repo: string | undefined, branch: string | undefined, options: SpawnOptions) => {
    const { spawnCommand } = await import('./commands/spawn.js');
    await spawnCommand(repo, branch, options);
  });

program
  .command('status')
  .description('Show detailed status of active agents')
  .option('-l, --label <label>', 'Only agents with this label')
  .option('--json', 'Output as JSON')
  .action(async (options: StatusOptions) => {
    const { statusCommand } = await import('./commands/status.js');
    await statusCommand(options);
  });

program
  .command('attach')
  .description("Attach to an agent's terminal")
  .argument('[agent]', 'Agent number or session name')
  .action(async (agent: string | undefined) => {
    const { attachCommand } = await import('./commands/attach.js');
    await attachCommand(agent);
  });

program
  .command('diff')
  .description('Show changes made by agents')
  .argument('[agent]', 'Agent number or session name (default: all)')
  .option('--tool <command>', 'Pipe the full diff to this command')
  .action(async (agent: string | undefined, options: DiffOptions) => {
    const { diffCommand } = await import('./commands/diff.js');
    await diffCommand(agent, options);
  });

program
  .command('merge')
  .description("Push an agent's branch to origin")
  .argument('[agent]', 'Agent number or session name')
  .option('-f, --force', 'Push even with uncommitted changes')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: MergeOptions) => {
    const { mergeCommand } = await import('./commands/merge.js');
    await mergeCommand(agent, options);
  });

program
  .command('logs')
  .description("Show an agent's terminal output")
  .argument('[agent]', 'Agent number or session name')
  .option('-n, --lines <n>', 'Number of lines', parseCount, 50)
  .option('-f, --follow', 'Keep redrawing as the output changes')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: LogsOptions) => {
    const { logsCommand } = await import('./commands/logs.js');
    await logsCommand(agent, options);
  });

program
  .command('kill')
  .description('Kill an agent')
  .argument('<agent>', 'Agent number or session name')
  .option('-c, --cleanup', 'Also remove the worktree')
  .option('--json', 'Output as JSON')
  .action(async (agent: string, options: KillOptions) => {
    const { killCommand } = await import('./commands/kill.js');
    await killCommand(agent, options);
  });

program
  .command('killall')
  .description('Kill every recorded agent')
  .option('-c, --cleanup', 'Also remove the worktrees of agents still running')
  .option('--json', 'Output as JSON')
  .action(async (options: KillOptions) => {
    const { killAllCommand } = await import('./commands/kill.js');
    await killAllCommand(options);
  });

program
  .command('pick')
  .description('Pick an agent interactively and print it (for scripts)')
  .option('--format <format>', 'number, session or json', 'number')
  .option('-l, --label <label>', 'Only agents with this label')
  .action(async (options: PickOptions) => {
    const { pickCommand } = await import('./commands/pick.js');
    await pickCommand(options);
  });

program
  .command('archive')
  .description('Stop an agent and keep its record for later')
  .argument('[agent]', 'Agent number or session name')
  .option('--keep-worktree', 'Leave the worktree on disk')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: ArchiveOptions) => {
    const { archiveCommand } = await import('./commands/archive.js');
    await archiveCommand(agent, options);
  });

program
  .command('archives')
  .description('List archived workspaces')
  .option('--json', 'Output as JSON')
  .action(async (options: ArchivesOptions) => {
    const { archivesCommand } = await import('./commands/archive.js');
    await archivesCommand(options);
  });

program
  .command('restore')
  .description('Bring an archived workspace back')
  .argument('[archive]', 'Archive number or session name')
  .option('--recreate', 'Rebuild the worktree even if it still exists')
  .option('--link-node-modules', 'Symlink node_modules from the repository')
  .option('--link-venv', 'Symlink .venv from the repository')
  .option('--copy-env', 'Copy .env from the repository')
  .option('--json', 'Output as JSON')
  .action(async (archive: string | undefined, options: RestoreOptions) => {
    const { restoreCommand } = await import('./commands/archive.js');
    await restoreCommand(archive, options);
  });

program
  .command('open')
  .description("Open an agent's worktree in an editor")
  .argument('[agent]', 'Agent number or session name')
  .option('-e, --editor <command>', 'Editor to launch')
  .action(async (agent: string | undefined, options: OpenOptions) => {
    const { openCommand } = await import('./commands/open.js');
    await openCommand(agent, options);
  });

program
  .command('label')
  .description("Set or clear an agent's label")
  .argument('<agent>', 'Agent number or session name')
  .argument('[label]', 'New label (omit to clear)')
  .option('--json', 'Output as JSON')
  .action(async (agent: string, label: string | undefined, options: LabelOptions) => {
    const { labelCommand } = await import('./commands/label.js');
    await labelCommand(agent, label, options);
  });

const pr = program
  .command('pr')
  .description("Manage the pull request for an agent's branch");

pr.command('create')
  .description('Create a pull request')
  .argument('[agent]', 'Agent number or session name')
  .option('--base <branch>', 'Base branch')
  .option('--title <title>', 'PR title')
  .option('--body <body>', 'PR body')
  .option('--fill', 'Fill title and body from commits')
  .option('--draft', 'Create as draft')
  .option('--web', 'Open in the browser')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: PrCreateOptions) => {
    const { prCreateCommand } = await import('./commands/pr.js');
    await prCreateCommand(agent, options);
  });

pr.command('view')
  .description('Show the pull request')
  .argument('[agent]', 'Agent number or session name')
  .option('--web', 'Open in the browser')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: PrViewOptions) => {
    const { prViewCommand } = await import('./commands/pr.js');
    await prViewCommand(agent, options);
  });

pr.command('merge')
  .description('Merge the pull request')
  .argument('[agent]', 'Agent number or session name')
  .option('--merge', 'Create a merge commit')
  .option('--squash', 'Squash commits')
  .option('--rebase', 'Rebase commits')
  .option('-d, --delete-branch', 'Delete the branch after merging')
  .option('--auto', 'Merge automatically once checks pass')
  .option('--json', 'Output as JSON')
  .action(async (agent: string | undefined, options: PrMergeOptions) => {
    const { prMergeCommand } = await import('./commands/pr.js');
    await prMergeCommand(agent, options);
  });

// Error handling
program.exitOverride();

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof AdeckError) {
      outputError(err, jsonOutput);
      process.exit(err.exitCode);
    }
    if (err instanceof CommanderError) {
      // commander has already printed its message
      const routed = err.code === 'commander.helpDisplayed' || err.code === 'commander.version';
      process.exit(routed ? 0 : 1);
    }
    outputError(err, jsonOutput);
    process.exit(1);
  }
}

await main();
