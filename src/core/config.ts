import fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { configBackupPath, configPath, reposDir, worktreesDir } from '../lib/paths.js';
import { isSessionKey } from '../lib/session-key.js';
import {
  AgentNotFoundError,
  ConfigLockError,
  ConfigWriteError,
  RepoNotFoundError,
  SessionKeyConflictError,
  errorCode,
  errorMessage,
} from '../lib/errors.js';
import { debug, warn } from '../lib/output.js';
import type { AgentRecord, ArchiveRecord, Config, Repo } from '../types/config.js';

const repoSchema = z.object({
  name: z.string().optional(),
  path: z.string(),
  sourceUrl: z.string().default(''),
  addedAt: z.string().default(''),
});

const agentRecordSchema = z.object({
  repoName: z.string(),
  repoPath: z.string().default(''),
  branch: z.string(),
  worktreePath: z.string(),
  task: z.string().default(''),
  agentType: z.enum(['claude', 'codex']).default('claude'),
  label: z.string().optional(),
  startedAt: z.string().default(''),
});

const archiveRecordSchema = agentRecordSchema.extend({
  archivedAt: z.string().default(''),
  notes: z.string().optional(),
});

const configSchema = z.object({
  repos: z.record(repoSchema).default({}),
  agents: z.record(agentRecordSchema).default({}),
  // Files written before archiving existed have no archives key
  archives: z.record(archiveRecordSchema).default({}),
});

type ConfigDocument = z.infer<typeof configSchema>;

export function createEmptyConfig(): Config {
  return { repos: {}, agents: {}, archives: {} };
}

/** Create the tool home and its repos/worktrees directories, owner-only. */
export async function ensureHome(home: string): Promise<void> {
  for (const dir of [home, reposDir(home), worktreesDir(home)]) {
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  }
}

export function serializeConfig(config: Config): string {
  return JSON.stringify(config, null, 2) + '\n';
}

/** Parse config.json content. Returns null when it is not a valid document. */
export function parseConfig(raw: string): Config | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = configSchema.safeParse(json);
  if (!result.success) {
    debug(`config.json failed validation: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    return null;
  }
  return fromDocument(result.data);
}

function fromDocument(doc: ConfigDocument): Config {
  const config = createEmptyConfig();

  for (const [name, repo] of Object.entries(doc.repos)) {
    config.repos[name] = { ...repo, name };
  }

  for (const [key, record] of Object.entries(doc.agents)) {
    if (!isSessionKey(key)) {
      debug(`Ignoring agent entry with invalid session name: ${key}`);
      continue;
    }
    config.agents[key] = {
      ...record,
      sessionKey: key,
      repoPath: record.repoPath || config.repos[record.repoName]?.path || '',
    };
  }

  for (const [key, record] of Object.entries(doc.archives)) {
    if (!isSessionKey(key)) {
      debug(`Ignoring archive entry with invalid session name: ${key}`);
      continue;
    }
    config.archives[key] = {
      ...record,
      sessionKey: key,
      repoPath: record.repoPath || config.repos[record.repoName]?.path || '',
    };
  }

  return config;
}

/**
 * Load the persisted config. Never rejects: a missing or unreadable file gives
 * an empty config, and a corrupt file is moved aside to config.json.bak first.
 */
export async function loadConfig(home: string): Promise<Config> {
  const file = configPath(home);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      debug(`Could not read ${file}: ${errorMessage(err)}`);
    }
    return createEmptyConfig();
  }

  const config = parseConfig(raw);
  if (config) return config;

  const backup = configBackupPath(home);
  try {
    await fs.rename(file, backup);
    warn(`${file} was corrupt; moved it to ${backup} and started from an empty config`);
  } catch (err) {
    debug(`Could not move corrupt config aside: ${errorMessage(err)}`);
  }
  return createEmptyConfig();
}

/**
 * Persist the config. The live file is replaced by rename, so readers see
 * either the previous or the new document, never a partial one.
 */
export async function saveConfig(home: string, config: Config): Promise<boolean> {
  const file = configPath(home);
  try {
    await ensureHome(home);
    await writeFileAtomic(file, serializeConfig(config), { mode: 0o600 });
    return true;
  } catch (err) {
    debug(`Could not write ${file}: ${errorMessage(err)}`);
    return false;
  }
}

/**
 * Read-mutate-write under an exclusive lock. The updater sees a fresh snapshot
 * and must apply only its own change to it, so concurrent invocations touching
 * different records do not overwrite each other.
 */
export async function updateConfig(
  home: string,
  updater: (config: Config) => Config | Promise<Config>,
): Promise<Config> {
  await ensureHome(home);
  const file = configPath(home);
  let release: () => Promise<void>;

  try {
    release = await lockfile.lock(file, {
      realpath: false,
      stale: 10_000,
      retries: {
        retries: 5,
        minTimeout: 100,
        maxTimeout: 1000,
      },
    });
  } catch {
    throw new ConfigLockError();
  }

  try {
    const config = await loadConfig(home);
    const updated = await updater(config);
    if (!(await saveConfig(home, updated))) {
      throw new ConfigWriteError(file);
    }
    return updated;
  } finally {
    await release();
  }
}

export function requireRepo(config: Config, name: string): Repo {
  const repo = config.repos[name];
  if (!repo) throw new RepoNotFoundError(name);
  return repo;
}

export function requireAgent(config: Config, key: string): AgentRecord {
  const agent = config.agents[key];
  if (!agent) throw new AgentNotFoundError(key);
  return agent;
}

export function findArchive(config: Config, key: string): ArchiveRecord | undefined {
  return config.archives[key];
}

/** A key must be unused across both `agents` and `archives`. */
export function assertSessionKeyFree(config: Config, key: string): void {
  if (config.agents[key]) throw new SessionKeyConflictError(key, 'agents');
  if (config.archives[key]) throw new SessionKeyConflictError(key, 'archives');
}
