/**
 * @relaygate/core - Path resolution and directory management
 *
 * Resolves RELAYGATE_HOME and RELAYGATE_STATE_DIR, and ensures the required
 * subdirectories exist at startup.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the home directory.
 * Priority: RELAYGATE_HOME env var > ~/.relaygate
 */
export function resolveRelaygateHome(): string {
  const fromEnv = process.env['RELAYGATE_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.relaygate');
}

/**
 * Resolve the state directory.
 * Priority: RELAYGATE_STATE_DIR env var > RELAYGATE_HOME
 */
export function resolveStateDir(): string {
  const fromEnv = process.env['RELAYGATE_STATE_DIR'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return resolveRelaygateHome();
}

export const SUBDIR_NAMES = {
  data: 'data',
} as const;

export type SubdirName = keyof typeof SUBDIR_NAMES;

export interface RelaygatePaths {
  home: string;
  stateDir: string;
  config: string; // relaygate.json
  data: string;
  metricsDb: string; // data/metrics.db
}

/**
 * Build the full set of paths.
 * Does NOT create directories -- call `ensureDirectories` for that.
 */
export function buildPaths(): RelaygatePaths {
  const home = resolveRelaygateHome();
  const stateDir = resolveStateDir();
  const data = join(stateDir, SUBDIR_NAMES.data);

  return {
    home,
    stateDir,
    config: join(home, 'relaygate.json'),
    data,
    metricsDb: join(data, 'metrics.db'),
  };
}

/**
 * Ensure all standard directories exist.
 */
export function ensureDirectories(paths?: RelaygatePaths): RelaygatePaths {
  const p = paths ?? buildPaths();

  for (const dir of [p.home, p.stateDir, p.data]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return p;
}
