import { describe, test, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  resolveHome,
  configPath,
  configBackupPath,
  settingsPath,
  repoPath,
  worktreePath,
  notesPath,
} from './paths.js';

const HOME = '/tmp/adeck-home';

describe('resolveHome', () => {
  test('given ADECK_HOME, should use it', () => {
    expect(resolveHome({ ADECK_HOME: '/srv/deck' })).toBe('/srv/deck');
  });

  test('given a relative ADECK_HOME, should resolve it against the cwd', () => {
    expect(resolveHome({ ADECK_HOME: 'deck' })).toBe(path.resolve('deck'));
  });

  test('given no override, should default to ~/.agentdeck', () => {
    expect(resolveHome({})).toBe(path.join(os.homedir(), '.agentdeck'));
  });

  test('given a blank override, should ignore it', () => {
    expect(resolveHome({ ADECK_HOME: '  ' })).toBe(path.join(os.homedir(), '.agentdeck'));
  });
});

describe('paths', () => {
  test('configPath', () => {
    expect(configPath(HOME)).toBe('/tmp/adeck-home/config.json');
  });

  test('configBackupPath', () => {
    expect(configBackupPath(HOME)).toBe('/tmp/adeck-home/config.json.bak');
  });

  test('settingsPath', () => {
    expect(settingsPath(HOME)).toBe('/tmp/adeck-home/settings.yaml');
  });

  test('repoPath', () => {
    expect(repoPath(HOME, 'webapp')).toBe('/tmp/adeck-home/repos/webapp');
  });

  test('worktreePath', () => {
    expect(worktreePath(HOME, 'webapp-main-090000')).toBe('/tmp/adeck-home/worktrees/webapp-main-090000');
  });

  test('notesPath', () => {
    expect(notesPath('/wt')).toBe('/wt/.context/notes.md');
  });
});
