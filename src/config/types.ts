/**
 * Configuration Types
 *
 * Shape of the project config file. The Zod schema in project-config.ts
 * validates against these.
 */

import type { ScoringConfig } from './scoring-config.js';

/** Where dated history snapshots are kept. */
export interface StorageConfig {
  kind: 'files' | 'sqlite';
  /** Snapshot directory (files) or database file (sqlite). Defaults under MOMENTUM_HOME. */
  path?: string;
}

export interface OutputConfig {
  reportsDir?: string;
  apiDir?: string;
}

/** Root project configuration — stored in ~/.momentum/config.json */
export interface ProjectConfig {
  version: 1;
  /** Tracked repositories in owner/repo form. */
  repositories: string[];
  storage: StorageConfig;
  output: OutputConfig;
  scoring?: ScoringConfig;
}
