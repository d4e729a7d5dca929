/**
 * Run Summary
 *
 * Distribution statistics over one run's scores and the languages and
 * topics of the repositories scored.
 */

import type { RankedRepository, RawRepositoryMetrics } from '../types/metrics.js';
import type { CountEntry, EcosystemSummary, ScoreDistribution } from './types.js';

export function summarizeScores(repositories: readonly RankedRepository[]): ScoreDistribution {
  const scores = repositories.map((r) => r.score).sort((a, b) => a - b);
  const qualified = repositories.filter((r) => r.qualifies).length;

  if (scores.length === 0) {
    return {
      count: 0,
      qualified: 0,
      min: 0,
      max: 0,
      mean: 0,
      median: 0,
      percentiles: { p25: 0, p50: 0, p75: 0, p90: 0 },
    };
  }

  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  const p50 = percentile(scores, 50);

  return {
    count: scores.length,
    qualified,
    min: scores[0] ?? 0,
    max: scores[scores.length - 1] ?? 0,
    mean: round2(mean),
    median: p50,
    percentiles: {
      p25: percentile(scores, 25),
      p50,
      p75: percentile(scores, 75),
      p90: percentile(scores, 90),
    },
  };
}

/**
 * Most common languages and topics. Topics are compared lowercased;
 * ties are broken by name.
 */
export function summarizeEcosystem(
  metrics: readonly RawRepositoryMetrics[],
  limit = 10
): EcosystemSummary {
  const languages = new Map<string, number>();
  const topics = new Map<string, number>();

  for (const m of metrics) {
    const language = m.primaryLanguage?.trim();
    if (language) {
      languages.set(language, (languages.get(language) ?? 0) + 1);
    }
    for (const topic of new Set((m.topics ?? []).map((t) => t.trim().toLowerCase()))) {
      if (topic) topics.set(topic, (topics.get(topic) ?? 0) + 1);
    }
  }

  return {
    languages: topEntries(languages, limit),
    topics: topEntries(topics, limit),
  };
}

/** Linear interpolation between closest ranks over ascending values. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return round2(low + (high - low) * (rank - lo));
}

function topEntries(counts: Map<string, number>, limit: number): CountEntry[] {
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, limit);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
