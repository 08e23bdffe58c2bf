/**
 * Errors raised by agentdeck. Every error is handled at the command boundary
 * and printed as a single message; `exitCode` decides the process status.
 *
 * Handled user errors (unknown identifiers, refused operations, failed tool
 * calls) return to the prompt with status 0. Missing dependencies exit 1.
 */
export class AdeckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 0,
  ) {
    super(message);
    this.name = 'AdeckError';
  }
}

export class TmuxNotFoundError extends AdeckError {
  constructor() {
    super(
      'tmux is not installed or not in PATH. Install it with your package manager (e.g. apt install tmux).',
      'TMUX_NOT_FOUND',
      1,
    );
    this.name = 'TmuxNotFoundError';
  }
}

export class MissingDependencyError extends AdeckError {
  constructor(public readonly missing: string[]) {
    super(
      `Missing dependencies: ${missing.join(', ')}. Please install them first.`,
      'MISSING_DEPENDENCY',
      1,
    );
    this.name = 'MissingDependencyError';
  }
}

export class GhNotFoundError extends AdeckError {
  constructor() {
    super(
      'GitHub CLI (gh) is not installed or not in PATH. Install it from: https://cli.github.com/',
      'GH_NOT_FOUND',
      1,
    );
    this.name = 'GhNotFoundError';
  }
}

export class GhNotAuthenticatedError extends AdeckError {
  constructor() {
    super('GitHub CLI is not authenticated. Run: gh auth login', 'GH_NOT_AUTHENTICATED', 1);
    this.name = 'GhNotAuthenticatedError';
  }
}

export class RepoNotFoundError extends AdeckError {
  constructor(name: string) {
    super(`Repository '${name}' not found. Use 'adeck add-repo' first.`, 'REPO_NOT_FOUND');
    this.name = 'RepoNotFoundError';
  }
}

export class RepoExistsError extends AdeckError {
  constructor(name: string, repoPath: string) {
    super(`Repository '${name}' already exists at ${repoPath}`, 'REPO_EXISTS');
    this.name = 'RepoExistsError';
  }
}

export class RepoInUseError extends AdeckError {
  constructor(name: string, sessionKeys: string[]) {
    const list = sessionKeys.map((k) => `  ${k}`).join('\n');
    super(
      `Repository '${name}' is still referenced by ${sessionKeys.length} workspace(s):\n${list}\n\nKill or restore-and-kill them first.`,
      'REPO_IN_USE',
    );
    this.name = 'RepoInUseError';
  }
}

export class AgentNotFoundError extends AdeckError {
  constructor(id: string) {
    super(`Agent not found: ${id}`, 'AGENT_NOT_FOUND');
    this.name = 'AgentNotFoundError';
  }
}

export class InvalidAgentNumberError extends AdeckError {
  constructor(token: string) {
    super(`Invalid agent number: ${token}`, 'INVALID_AGENT_NUMBER');
    this.name = 'InvalidAgentNumberError';
  }
}

export class ArchiveNotFoundError extends AdeckError {
  constructor(id: string) {
    super(`Archive not found: ${id}`, 'ARCHIVE_NOT_FOUND');
    this.name = 'ArchiveNotFoundError';
  }
}

export class InvalidSessionKeyError extends AdeckError {
  constructor(raw: string) {
    super(`Invalid session name: ${raw}`, 'INVALID_SESSION_KEY');
    this.name = 'InvalidSessionKeyError';
  }
}

export class SessionKeyConflictError extends AdeckError {
  constructor(key: string, where: 'agents' | 'archives') {
    super(
      where === 'agents'
        ? `An agent named ${key} is already registered.`
        : `An archived workspace named ${key} already exists. Restore or drop it first.`,
      'SESSION_KEY_CONFLICT',
    );
    this.name = 'SessionKeyConflictError';
  }
}

export class InvalidArgsError extends AdeckError {
  constructor(message: string) {
    super(message, 'INVALID_ARGS');
    this.name = 'InvalidArgsError';
  }
}

/** A collaborator tool exited non-zero; `message` carries its own error text. */
export class CommandFailedError extends AdeckError {
  constructor(
    action: string,
    public readonly stderr: string,
  ) {
    super(stderr ? `${action}: ${stderr}` : `${action}.`, 'COMMAND_FAILED');
    this.name = 'CommandFailedError';
  }
}

export class WorktreeCreateError extends AdeckError {
  constructor(public readonly stderr: string) {
    super(`Failed to create worktree: ${stderr}`, 'WORKTREE_CREATE_FAILED');
    this.name = 'WorktreeCreateError';
  }
}

export class DirtyWorktreeError extends AdeckError {
  constructor(worktreePath: string) {
    super(
      `Uncommitted changes in worktree ${worktreePath}. Use --force to push anyway.`,
      'DIRTY_WORKTREE',
    );
    this.name = 'DirtyWorktreeError';
  }
}

export class ConfigLockError extends AdeckError {
  constructor() {
    super(
      'Could not acquire the config lock. Another adeck process may be running; retry in a moment.',
      'CONFIG_LOCK',
    );
    this.name = 'ConfigLockError';
  }
}

export class ConfigWriteError extends AdeckError {
  constructor(configFile: string) {
    super(`Could not write ${configFile}.`, 'CONFIG_WRITE');
    this.name = 'ConfigWriteError';
  }
}

export class SettingsError extends AdeckError {
  constructor(settingsFile: string, detail: string) {
    super(`Invalid settings in ${settingsFile}: ${detail}`, 'INVALID_SETTINGS');
    this.name = 'SettingsError';
  }
}

/** The `code` of a Node system error (ENOENT, EACCES, ...), if any. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
