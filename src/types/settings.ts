import type { AgentType } from './config.js';

export interface AgentLaunchConfig {
  /** Binary to run, e.g. `claude`. */
  command: string;
  /** Arguments placed before the task when auto-accept is on. */
  autoAcceptArgs: string[];
  /** Arguments placed before the task when auto-accept is off. */
  manualArgs: string[];
}

export interface ShareSettings {
  nodeModules: boolean;
  venv: boolean;
  env: boolean;
}

export interface Settings {
  defaults: {
    agent: AgentType;
    /** Unset means: ask when a task is given. */
    autoAccept?: boolean;
    diffTool?: string;
    editor?: string;
  };
  agents: Record<AgentType, AgentLaunchConfig>;
  share: ShareSettings;
}
