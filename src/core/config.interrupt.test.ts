import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const writeControl = vi.hoisted(() => ({ interrupt: false }));

// Stands in for write-file-atomic: writes the temp file, and when interrupted
// dies before the rename, as a crashed process would.
vi.mock('write-file-atomic', () => ({
  default: async (file: string, data: string, options?: { mode?: number }) => {
    const { writeFile, rename } = await import('node:fs/promises');
    const tmp = `${file}.tmp-1234`;
    if (writeControl.interrupt) {
      await writeFile(tmp, data.slice(0, Math.floor(data.length / 2)));
      throw new Error('process killed');
    }
    await writeFile(tmp, data, { mode: options?.mode });
    await rename(tmp, file);
  },
}));

import { loadConfig, saveConfig } from './config.js';
import { keyed, makeAgent, makeConfig } from '../test-fixtures.js';
import { toSessionKey } from '../lib/session-key.js';

let home: string;

beforeEach(async () => {
  home = await fs.mkdtemp(path.join(os.tmpdir(), 'adeck-interrupt-'));
  writeControl.interrupt = false;
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

describe('saveConfig interrupted mid-write', () => {
  test('given a crash before the rename, should leave the previous config loadable', async () => {
    const before = makeConfig({ agents: keyed(makeAgent()) });
    await saveConfig(home, before);

    writeControl.interrupt = true;
    const saved = await saveConfig(
      home,
      makeConfig({ agents: keyed(makeAgent(), makeAgent({ sessionKey: toSessionKey('adeck-other') })) }),
    );

    const actual = await loadConfig(home);

    expect(saved).toBe(false);
    expect(actual).toEqual(before);
  });
});
