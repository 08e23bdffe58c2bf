import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathExists } from './fs.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'adeck-fs-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('pathExists', () => {
  test('given an existing directory, should return true', async () => {
    expect(await pathExists(dir)).toBe(true);
  });

  test('given nothing at the path, should return false', async () => {
    expect(await pathExists(path.join(dir, 'missing'))).toBe(false);
  });

  test('given a dangling symlink, should return true', async () => {
    const link = path.join(dir, 'node_modules');
    await fs.symlink(path.join(dir, 'gone'), link);

    expect(await pathExists(link)).toBe(true);
  });
});
