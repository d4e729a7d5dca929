/**
 * momentum init — Project Setup Command
 *
 * Writes ~/.momentum/config.json from the tracked repositories and the
 * snapshot storage backend. Prompts for both unless --repos is given.
 */

import {
  projectConfigExists,
  writeProjectConfig,
  createDefaultConfig,
} from '../config/project-config.js';
import { projectConfigPath } from '../config/paths.js';
import type { ProjectConfig, StorageConfig } from '../config/types.js';
import { FULL_NAME_PATTERN } from '../validators.js';
import {
  createPrompt,
  askUntil,
  askChoice,
  confirm,
  banner,
  note,
  type LineReader,
  type Parsed,
} from './prompt.js';

const STORAGE_KINDS: readonly StorageConfig['kind'][] = ['files', 'sqlite'];

export interface InitFlags {
  repos?: string;
  storage?: string;
  force?: boolean;
}

export async function runInit(
  flags: InitFlags = {},
  reader?: LineReader
): Promise<ProjectConfig | null> {
  if (flags.repos !== undefined) {
    return initFromFlags(flags);
  }

  banner('momentum init');
  const rl = reader ?? createPrompt();

  try {
    if (projectConfigExists() && !flags.force) {
      if (!(await confirm(rl, `Replace the config at ${projectConfigPath()}?`, false))) {
        note('info', 'Config left unchanged.');
        return null;
      }
    }

    const repositories = await askUntil(
      rl,
      'Repositories to track, comma-separated owner/repo',
      (answer): Parsed<string[]> => {
        const message = validateRepositoryList(answer);
        return message
          ? { ok: false, message }
          : { ok: true, value: parseRepositoryList(answer) };
      }
    );
    const kind = await askChoice(rl, 'Snapshot storage', STORAGE_KINDS, 'files');

    const config = buildInitConfig(repositories, kind);
    writeProjectConfig(config);
    note('ok', `Config saved to ${projectConfigPath()}`);
    printSummary(config);
    return config;
  } catch (error) {
    if (isPromptClosed(error)) {
      console.log('\nInit cancelled.');
      return null;
    }
    throw error;
  } finally {
    rl.close();
  }
}

function initFromFlags(flags: InitFlags): ProjectConfig {
  if (projectConfigExists() && !flags.force) {
    throw new Error(`Config already exists at ${projectConfigPath()}. Pass --force to overwrite.`);
  }

  const error = validateRepositoryList(flags.repos ?? '');
  if (error) throw new Error(error);

  const config = buildInitConfig(
    parseRepositoryList(flags.repos ?? ''),
    parseStorageKind(flags.storage ?? 'files')
  );
  writeProjectConfig(config);
  console.error(`[momentum] Config saved to ${projectConfigPath()}`);
  return config;
}

// ─── Input Helpers ───────────────────────────────────────────

export function parseRepositoryList(raw: string): string[] {
  return raw
    .split(',')
    .map((r) => r.trim())
    .filter(Boolean);
}

/** Error message for an unusable list, or null when every entry is owner/repo. */
export function validateRepositoryList(raw: string): string | null {
  const repositories = parseRepositoryList(raw);
  if (repositories.length === 0) {
    return 'Enter at least one repository.';
  }
  const invalid = repositories.filter((r) => !FULL_NAME_PATTERN.test(r));
  if (invalid.length > 0) {
    return `Invalid repository name(s): ${invalid.join(', ')}`;
  }
  return null;
}

export function buildInitConfig(
  repositories: string[],
  kind: StorageConfig['kind']
): ProjectConfig {
  const config = createDefaultConfig(repositories);
  return { ...config, storage: { kind } };
}

function isStorageKind(value: string): value is StorageConfig['kind'] {
  return STORAGE_KINDS.some((k) => k === value);
}

function parseStorageKind(value: string): StorageConfig['kind'] {
  const kind = value.trim().toLowerCase();
  if (!isStorageKind(kind)) {
    throw new Error(`Unknown storage backend "${value}". Use files or sqlite.`);
  }
  return kind;
}

function isPromptClosed(error: unknown): boolean {
  return error instanceof Error && error.message === 'readline was closed';
}

function printSummary(config: ProjectConfig): void {
  console.log(`  Config:        ${projectConfigPath()}`);
  console.log(`  Repositories:  ${config.repositories.length}`);
  console.log(`  Storage:       ${config.storage.kind}`);

  console.log('\nThen: GITHUB_TOKEN=... momentum collect --out metrics.json');
  console.log('      momentum score --input metrics.json\n');
}

