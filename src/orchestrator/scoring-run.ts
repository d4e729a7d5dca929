/**
 * Scoring Run
 *
 * One weekly batch: validate every record, score against the previous
 * snapshot, rank, record the new snapshot and attach trends.
 *
 * I/O happens only at the two history boundaries. A single bad record
 * aborts the run before anything is written.
 */

import type { MomentumScorer } from '../scoring/momentum-scorer.js';
import type { TrendTracker } from '../history/trend-tracker.js';
import type { HistorySnapshot } from '../history/types.js';
import type {
  RankedRepository,
  RawRepositoryMetrics,
  ScoredRepository,
} from '../types/metrics.js';
import { assertIsoDate, parseRawBatch } from '../validators.js';

export interface ScoringRunInput {
  /** Run date, YYYY-MM-DD. Supplied by the caller, never read from the clock. */
  date: string;
  repositories: readonly unknown[];
}

export interface ScoringRunDeps {
  scorer: MomentumScorer;
  tracker: TrendTracker;
}

export interface ScoringRunResult {
  date: string;
  previousDate: string | null;
  threshold: number;
  /** Score descending, then fullName ascending. */
  repositories: RankedRepository[];
  qualified: RankedRepository[];
  snapshot: HistorySnapshot;
  /** The validated input records, in input order. */
  metrics: RawRepositoryMetrics[];
}

export function runScoringPass(input: ScoringRunInput, deps: ScoringRunDeps): ScoringRunResult {
  const { scorer, tracker } = deps;
  assertIsoDate(input.date);

  const metrics = parseRawBatch(input.repositories);
  console.error(`[momentum] Scoring ${metrics.length} repositories for ${input.date}`);

  const previous = tracker.getPreviousSnapshot(input.date);
  const scored = scorer.scoreAll(metrics, previous);

  const snapshot = tracker.record(input.date, scored);

  const byName = new Map(metrics.map((m) => [m.fullName, m]));
  const trends = tracker.getTrends(
    scored.map((s) => s.fullName),
    scorer.config.trendWindow,
    input.date
  );
  const repositories = scored.map((s) =>
    rank(s, byName.get(s.fullName), trends.get(s.fullName) ?? [])
  );
  const qualified = repositories.filter((r) => r.qualifies);

  console.error(
    `[momentum] ${qualified.length} of ${repositories.length} repositories qualify ` +
      `(threshold ${scorer.config.threshold})`
  );

  return {
    date: input.date,
    previousDate: previous?.date ?? null,
    threshold: scorer.config.threshold,
    repositories,
    qualified,
    snapshot,
    metrics,
  };
}

function rank(
  scored: ScoredRepository,
  metrics: RawRepositoryMetrics | undefined,
  trend: number[]
): RankedRepository {
  return {
    ...scored,
    trend,
    url: metrics?.url ?? `https://github.com/${scored.fullName}`,
    description: metrics?.description ?? null,
    primaryLanguage: metrics?.primaryLanguage ?? null,
    starsTotal: metrics?.starsTotal ?? 0,
  };
}
