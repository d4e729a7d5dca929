/**
 * Metrics Collector
 *
 * Turns GitHub API data into RawRepositoryMetrics records for the
 * scoring engine. Each repository is fetched independently; one failure
 * doesn't block the rest of the batch.
 */

import type { GitHubClient } from '../clients/github-client.js';
import type { CommitInfo } from '../clients/types.js';
import { countFeatureCommits, isFeatureCommit as defaultFeaturePredicate } from '../signals/feature-commit.js';
import type { FeatureCommitPredicate } from '../signals/feature-commit.js';
import type { ContributorActivity, RawRepositoryMetrics } from '../types/metrics.js';
import {
  ACTIVITY_WINDOW_DAYS,
  CONTRIBUTOR_WINDOW_DAYS,
  isWithin,
  trailingWindow,
} from './time-range.js';

export type RepositorySource = Pick<
  GitHubClient,
  'getRepository' | 'getCommitsSince' | 'getStargazersSince'
>;

export interface CollectOptions {
  now?: Date;
  isFeatureCommit?: FeatureCommitPredicate;
}

export interface CollectFailure {
  fullName: string;
  error: string;
}

export interface CollectResult {
  metrics: RawRepositoryMetrics[];
  failures: CollectFailure[];
}

/**
 * Fetch one repository's metadata, 30 days of commits and 14 days of stars.
 */
export async function collectRepositoryMetrics(
  client: RepositorySource,
  fullName: string,
  options: CollectOptions = {}
): Promise<RawRepositoryMetrics> {
  const now = options.now ?? new Date();
  const isFeature = options.isFeatureCommit ?? defaultFeaturePredicate;
  const activityWindow = trailingWindow(ACTIVITY_WINDOW_DAYS, now);
  const contributorWindow = trailingWindow(CONTRIBUTOR_WINDOW_DAYS, now);

  const repo = await client.getRepository(fullName);
  const [commits, stars] = await Promise.all([
    client.getCommitsSince(fullName, new Date(contributorWindow.from)),
    client.getStargazersSince(fullName, new Date(activityWindow.from), repo.starsTotal),
  ]);

  const recentCommits = commits.filter((c) => isWithin(c.date, activityWindow));
  const windowCommits = commits.filter((c) => isWithin(c.date, contributorWindow));

  return {
    fullName: repo.fullName,
    starsTotal: repo.starsTotal,
    forksTotal: repo.forksTotal,
    commits14d: recentCommits.length,
    featureCommits14d: countFeatureCommits(
      recentCommits.map((c) => c.subject),
      isFeature
    ),
    starsGained14d: stars.filter((s) => isWithin(s, activityWindow)).length,
    contributors30d: contributorActivity(windowCommits),
    primaryLanguage: repo.primaryLanguage,
    topics: repo.topics,
    description: repo.description,
    url: repo.url,
  };
}

/**
 * Collect every repository in parallel. Failures are logged to stderr and
 * reported back; successful records keep the input order.
 */
export async function collectAll(
  client: RepositorySource,
  fullNames: readonly string[],
  options: CollectOptions = {}
): Promise<CollectResult> {
  const now = options.now ?? new Date();
  const results = await Promise.allSettled(
    fullNames.map((name) => collectRepositoryMetrics(client, name, { ...options, now }))
  );

  const metrics: RawRepositoryMetrics[] = [];
  const failures: CollectFailure[] = [];

  results.forEach((result, i) => {
    const fullName = fullNames[i] ?? '';
    if (result.status === 'fulfilled') {
      metrics.push(result.value);
    } else {
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(`[momentum] Skipping ${fullName}: ${error}`);
      failures.push({ fullName, error });
    }
  });

  return { metrics, failures };
}

function contributorActivity(commits: readonly CommitInfo[]): ContributorActivity[] {
  const counts = new Map<string, number>();
  for (const c of commits) {
    counts.set(c.authorId, (counts.get(c.authorId) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([id, count]) => ({ id, commits: count }))
    .sort((a, b) => b.commits - a.commits || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
