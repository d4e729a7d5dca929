/**
 * momentum collect — Fetch Metrics from GitHub
 *
 * Collects raw metrics for every tracked repository and writes them as a
 * JSON array, ready for `momentum score --input`.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { readProjectConfig } from '../config/project-config.js';
import { resolveGitHubToken } from '../config/credentials.js';
import { GitHubClient } from '../clients/github-client.js';
import { collectAll } from '../orchestrator/metrics-collector.js';
import type { CollectResult, RepositorySource } from '../orchestrator/metrics-collector.js';

export interface CollectCommandOptions {
  out?: string;
  now?: Date;
  /** Defaults to a GitHubClient on GITHUB_TOKEN. */
  source?: RepositorySource;
}

export interface CollectOutcome {
  result: CollectResult;
  json: string;
}

export async function runCollect(options: CollectCommandOptions = {}): Promise<CollectOutcome> {
  const project = readProjectConfig();
  if (!project || project.repositories.length === 0) {
    throw new Error('No repositories configured. Run "momentum init" first.');
  }

  const source = options.source ?? createGitHubClient();
  console.error(`[momentum] Collecting ${project.repositories.length} repositories`);
  const result = await collectAll(source, project.repositories, { now: options.now });

  const json = JSON.stringify(result.metrics, null, 2) + '\n';
  if (options.out) {
    mkdirSync(dirname(options.out), { recursive: true });
    writeFileSync(options.out, json, 'utf-8');
    console.error(`[momentum] ${result.metrics.length} records written to ${options.out}`);
  }

  if (result.failures.length > 0) {
    console.error(`[momentum] ${result.failures.length} repositories failed`);
  }

  return { result, json };
}

function createGitHubClient(): GitHubClient {
  const token = resolveGitHubToken();
  if (!token) {
    throw new Error('GitHub credentials required. Set GITHUB_TOKEN.');
  }
  return new GitHubClient(token);
}
