import fs from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { settingsPath } from '../lib/paths.js';
import { SettingsError, errorCode, errorMessage } from '../lib/errors.js';
import { debug } from '../lib/output.js';
import type { AgentType } from '../types/config.js';
import type { AgentLaunchConfig, Settings } from '../types/settings.js';

export const DEFAULT_SETTINGS: Settings = {
  defaults: {
    agent: 'claude',
  },
  agents: {
    claude: {
      command: 'claude',
      autoAcceptArgs: ['--dangerously-skip-permissions'],
      manualArgs: ['-p'],
    },
    codex: {
      command: 'codex',
      autoAcceptArgs: ['--full-auto'],
      manualArgs: [],
    },
  },
  share: {
    nodeModules: false,
    venv: false,
    env: false,
  },
};

const launchOverrideSchema = z.object({
  command: z.string().min(1).optional(),
  autoAcceptArgs: z.array(z.string()).optional(),
  manualArgs: z.array(z.string()).optional(),
}).strict();

const settingsFileSchema = z.object({
  defaults: z.object({
    agent: z.enum(['claude', 'codex']).optional(),
    autoAccept: z.boolean().optional(),
    diffTool: z.string().min(1).optional(),
    editor: z.string().min(1).optional(),
  }).strict().optional(),
  agents: z.object({
    claude: launchOverrideSchema.optional(),
    codex: launchOverrideSchema.optional(),
  }).strict().optional(),
  share: z.object({
    nodeModules: z.boolean().optional(),
    venv: z.boolean().optional(),
    env: z.boolean().optional(),
  }).strict().optional(),
}).strict();

type SettingsFile = z.infer<typeof settingsFileSchema>;

function mergeSettings(defaults: Settings, overrides: SettingsFile): Settings {
  return {
    defaults: { ...defaults.defaults, ...overrides.defaults },
    agents: {
      claude: { ...defaults.agents.claude, ...overrides.agents?.claude },
      codex: { ...defaults.agents.codex, ...overrides.agents?.codex },
    },
    share: { ...defaults.share, ...overrides.share },
  };
}

export function parseSettings(raw: string, file: string): Settings {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new SettingsError(file, errorMessage(err));
  }
  // An empty file parses to null
  const result = settingsFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new SettingsError(file, `${where}: ${issue?.message ?? 'invalid value'}`);
  }
  return mergeSettings(DEFAULT_SETTINGS, result.data);
}

/**
 * Load settings.yaml merged over the defaults. A missing file yields the
 * defaults and writes them out so the user has something to edit.
 */
export async function loadSettings(home: string): Promise<Settings> {
  const file = settingsPath(home);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      await writeDefaultSettings(home);
      return DEFAULT_SETTINGS;
    }
    throw new SettingsError(file, errorMessage(err));
  }
  return parseSettings(raw, file);
}

export async function writeDefaultSettings(home: string): Promise<void> {
  const file = settingsPath(home);
  try {
    await fs.mkdir(home, { recursive: true, mode: 0o700 });
    await fs.writeFile(file, YAML.stringify(DEFAULT_SETTINGS, { indent: 2 }), { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    // Another process got there first, or home is read-only; defaults still apply
    debug(`Did not write ${file}: ${errorMessage(err)}`);
  }
}

export function resolveLaunchConfig(settings: Settings, agentType?: AgentType): AgentLaunchConfig {
  return settings.agents[agentType ?? settings.defaults.agent];
}
