import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runInit, parseRepositoryList, validateRepositoryList, buildInitConfig } from './init.js';
import type { LineReader } from './prompt.js';

function scripted(answers: string[]): LineReader & { closed: boolean } {
  const reader = {
    closed: false,
    question: (_query: string) => Promise.resolve(answers.shift() ?? ''),
    close: () => {
      reader.closed = true;
    },
  };
  return reader;
}

describe('init command', () => {
  let home: string;
  const originalHome = process.env['MOMENTUM_HOME'];

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'momentum-init-'));
    process.env['MOMENTUM_HOME'] = home;
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalHome === undefined) {
      delete process.env['MOMENTUM_HOME'];
    } else {
      process.env['MOMENTUM_HOME'] = originalHome;
    }
    rmSync(home, { recursive: true, force: true });
  });

  describe('runInit with --repos', () => {
    it('writes the config without prompting', async () => {
      const config = await runInit({ repos: 'acme/rocket, acme/lander', storage: 'sqlite' });

      expect(config).toEqual({
        version: 1,
        repositories: ['acme/lander', 'acme/rocket'],
        storage: { kind: 'sqlite' },
        output: {},
      });
      const saved: unknown = JSON.parse(readFileSync(join(home, 'config.json'), 'utf-8'));
      expect(saved).toEqual(config);
    });

    it('refuses to overwrite an existing config without --force', async () => {
      await runInit({ repos: 'acme/rocket' });

      await expect(runInit({ repos: 'acme/lander' })).rejects.toThrow(
        `Config already exists at ${join(home, 'config.json')}. Pass --force to overwrite.`
      );
    });

    it('overwrites with --force', async () => {
      await runInit({ repos: 'acme/rocket' });
      const config = await runInit({ repos: 'acme/lander', force: true });

      expect(config?.repositories).toEqual(['acme/lander']);
    });

    it('rejects malformed repository names', async () => {
      await expect(runInit({ repos: 'acme/rocket,not-a-repo' })).rejects.toThrow(
        'Invalid repository name(s): not-a-repo'
      );
    });

    it('rejects an unknown storage backend', async () => {
      await expect(runInit({ repos: 'acme/rocket', storage: 'postgres' })).rejects.toThrow(
        'Unknown storage backend "postgres". Use files or sqlite.'
      );
    });
  });

  describe('runInit interactively', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('re-asks for repositories until the list is valid', async () => {
      const rl = scripted(['acme/rocket,not-a-repo', 'acme/rocket, acme/lander', 'SQLITE']);

      const config = await runInit({}, rl);

      expect(config).toEqual({
        version: 1,
        repositories: ['acme/lander', 'acme/rocket'],
        storage: { kind: 'sqlite' },
        output: {},
      });
      expect(console.log).toHaveBeenCalledWith(
        '\x1b[33m[!]\x1b[0m Invalid repository name(s): not-a-repo'
      );
      expect(rl.closed).toBe(true);
    });

    it('defaults to file storage', async () => {
      const config = await runInit({}, scripted(['acme/rocket', '']));

      expect(config?.storage).toEqual({ kind: 'files' });
    });

    it('keeps an existing config when overwrite is declined', async () => {
      await runInit({ repos: 'acme/rocket' });
      const rl = scripted(['n']);

      await expect(runInit({}, rl)).resolves.toBeNull();
      const saved: unknown = JSON.parse(readFileSync(join(home, 'config.json'), 'utf-8'));
      expect(saved).toMatchObject({ repositories: ['acme/rocket'] });
      expect(rl.closed).toBe(true);
    });
  });

  describe('helpers', () => {
    it('splits and trims a repository list', () => {
      expect(parseRepositoryList(' acme/a ,acme/b,, ')).toEqual(['acme/a', 'acme/b']);
    });

    it('validates repository lists', () => {
      expect(validateRepositoryList('acme/a,acme/b')).toBeNull();
      expect(validateRepositoryList(' , ')).toBe('Enter at least one repository.');
      expect(validateRepositoryList('acme')).toBe('Invalid repository name(s): acme');
    });

    it('builds a config with the chosen storage', () => {
      expect(buildInitConfig(['acme/b', 'acme/a'], 'files')).toEqual({
        version: 1,
        repositories: ['acme/a', 'acme/b'],
        storage: { kind: 'files' },
        output: {},
      });
    });
  });
});
