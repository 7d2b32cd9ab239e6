import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { Environment } from '../../src/env.js';

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * An Environment rooted entirely inside `root`: fake home, Firefox
 * directory and scratch space. Creates the home, Firefox and tmp directories.
 */
export async function makeTestEnvironment(root: string): Promise<Environment> {
  const homeDir = path.join(root, 'home');
  const configHome = path.join(homeDir, '.config');
  const env: Environment = {
    homeDir,
    tmpDir: path.join(root, 'tmp'),
    configHome,
    firefoxDir: path.join(homeDir, '.mozilla', 'firefox'),
    configFile: path.join(configHome, 'placemarks', 'config.yaml'),
    debug: false,
  };
  await mkdir(env.tmpDir, { recursive: true });
  await mkdir(env.firefoxDir, { recursive: true });
  return env;
}
