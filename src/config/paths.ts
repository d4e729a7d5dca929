/**
 * Config Directory Resolution
 *
 * Resolves the momentum home directory in order:
 * 1. MOMENTUM_HOME environment variable
 * 2. ~/.momentum/ (default)
 *
 * Ensures the directory exists with 700 permissions.
 */

import { mkdirSync, chmodSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

const DEFAULT_DIR_NAME = '.momentum';

/**
 * Resolve the momentum home directory path.
 * Does NOT create the directory — call ensureConfigDir() for that.
 */
export function resolveConfigDir(): string {
  const envDir = process.env['MOMENTUM_HOME'];
  if (envDir) {
    return envDir;
  }
  return join(homedir(), DEFAULT_DIR_NAME);
}

/**
 * Ensure the home directory exists with proper permissions.
 * Creates it if missing. Returns the resolved path.
 */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  } else {
    chmodSync(dir, 0o700);
  }
  return dir;
}

/** Resolve path to config.json */
export function projectConfigPath(): string {
  return join(resolveConfigDir(), 'config.json');
}

/** Default directory for dated snapshot files */
export function snapshotsDirPath(): string {
  return join(resolveConfigDir(), 'snapshots');
}

/** Default path to the SQLite history database */
export function historyDbPath(): string {
  return join(resolveConfigDir(), 'history.db');
}
