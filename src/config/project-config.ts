/**
 * Project Configuration Manager
 *
 * Reads and writes ~/.momentum/config.json.
 * Validates with Zod on read; serializes on write.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { ProjectConfig } from './types.js';
import { ScoringConfigSchema } from './scoring-config.js';
import { ensureConfigDir, projectConfigPath } from './paths.js';
import { FULL_NAME_PATTERN } from '../validators.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const StorageConfigSchema = z.object({
  kind: z.enum(['files', 'sqlite']).default('files'),
  path: z.string().min(1).optional(),
});

const OutputConfigSchema = z.object({
  reportsDir: z.string().min(1).optional(),
  apiDir: z.string().min(1).optional(),
});

const ProjectConfigSchema = z.object({
  version: z.literal(1),
  repositories: z
    .array(z.string().regex(FULL_NAME_PATTERN, 'expected owner/repo'))
    .default([]),
  storage: StorageConfigSchema.default({ kind: 'files' }),
  output: OutputConfigSchema.default({}),
  scoring: ScoringConfigSchema.optional(),
});

export { ProjectConfigSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate project config from ~/.momentum/config.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readProjectConfig(): ProjectConfig | null {
  const filePath = projectConfigPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return ProjectConfigSchema.parse(parsed);
}

/**
 * Write project config to ~/.momentum/config.json.
 * Validates before writing to prevent corrupt configs.
 */
export function writeProjectConfig(config: ProjectConfig): void {
  ProjectConfigSchema.parse(config);
  ensureConfigDir();
  const filePath = projectConfigPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function projectConfigExists(): boolean {
  return existsSync(projectConfigPath());
}

/**
 * Create a default project config scaffold tracking the given repositories.
 */
export function createDefaultConfig(repositories: string[]): ProjectConfig {
  return {
    version: 1,
    repositories: [...new Set(repositories)].sort(),
    storage: { kind: 'files' },
    output: {},
  };
}

/**
 * Project config, or the default scaffold when none has been written yet.
 * Commands that only score and track can run before `init`.
 */
export function loadProjectConfig(): ProjectConfig {
  return readProjectConfig() ?? createDefaultConfig([]);
}
