/**
 * Signal Extractor
 *
 * Pure functions that turn one repository's raw metrics into the four
 * bounded sub-signals. No I/O — all data passed in, results returned.
 *
 * Rule constants are fixed so scores stay comparable between runs; only
 * the allow-lists and the contributor knobs come from ScoringConfig.
 */

import type {
  ContributorActivity,
  RawRepositoryMetrics,
  SignalName,
  SubSignalVector,
} from '../types/metrics.js';
import type { ResolvedScoringConfig } from '../config/scoring-config.js';
import { DEFAULT_SCORING_CONFIG } from '../config/scoring-config.js';

export const SIGNAL_MAXIMA: Readonly<Record<SignalName, number>> = {
  commitSurge: 3,
  starVelocity: 3,
  teamTraction: 2,
  ecosystemFit: 2,
};

/** Fixed order used for every tie-break between signals. */
export const SIGNAL_ORDER: readonly SignalName[] = [
  'commitSurge',
  'starVelocity',
  'teamTraction',
  'ecosystemFit',
];

// Commit surge (14-day window)
const COMMIT_FLOOR = 10;
const FEATURE_BONUS_MIN = 3;
const COMMIT_SATURATION = 50;

// Star velocity (14-day window): 1 point at the floor, 3 at saturation,
// logarithmic in between.
const STAR_FLOOR = 10;
const STAR_SATURATION = 300;

// Team traction (30-day window)
const MIN_ACTIVE_CONTRIBUTORS = 2;

/**
 * Extract all four sub-signals. Absent windows, a missing language and
 * empty topics contribute 0.
 */
export function extractSignals(
  raw: RawRepositoryMetrics,
  config: ResolvedScoringConfig = DEFAULT_SCORING_CONFIG
): SubSignalVector {
  const active = countActiveContributors(
    raw.contributors30d ?? [],
    config.activeContributorMinCommits
  );

  return {
    commitSurge: commitSurge(raw.commits14d ?? 0, raw.featureCommits14d ?? 0),
    starVelocity: starVelocity(raw.starsGained14d ?? 0),
    teamTraction: teamTraction(active, config.teamTractionSweetSpot),
    ecosystemFit: ecosystemFit(raw.primaryLanguage ?? null, raw.topics ?? [], config),
  };
}

/**
 * One point for reaching the commit floor, one for enough feature commits,
 * and up to one more scaling with commits past the floor.
 */
export function commitSurge(commits: number, featureCommits: number): number {
  if (commits <= 0) return 0;

  const base = commits >= COMMIT_FLOOR ? 1 : 0;
  const bonus = featureCommits >= FEATURE_BONUS_MIN ? 1 : 0;
  const scaled =
    commits > COMMIT_FLOOR
      ? Math.min(1, (commits - COMMIT_FLOOR) / (COMMIT_SATURATION - COMMIT_FLOOR))
      : 0;

  return bound(base + bonus + scaled, SIGNAL_MAXIMA.commitSurge);
}

/**
 * 0 below the floor, then 1 + 2 · ln(g / 10) / ln(30), saturating at 3
 * from 300 stars on. Lost stars count as none gained.
 */
export function starVelocity(starsGained: number): number {
  const gained = Math.max(0, starsGained);
  if (gained < STAR_FLOOR) return 0;

  const progress = Math.min(
    1,
    Math.log(gained / STAR_FLOOR) / Math.log(STAR_SATURATION / STAR_FLOOR)
  );
  return bound(1 + 2 * progress, SIGNAL_MAXIMA.starVelocity);
}

/**
 * Rewards small active teams: 1 point at two active contributors,
 * rising linearly to 2 at the sweet spot, flat beyond it.
 */
export function teamTraction(activeContributors: number, sweetSpot: number): number {
  if (activeContributors < MIN_ACTIVE_CONTRIBUTORS) return 0;
  if (sweetSpot <= MIN_ACTIVE_CONTRIBUTORS) return SIGNAL_MAXIMA.teamTraction;

  const span = sweetSpot - MIN_ACTIVE_CONTRIBUTORS;
  return bound(
    1 + (activeContributors - MIN_ACTIVE_CONTRIBUTORS) / span,
    SIGNAL_MAXIMA.teamTraction
  );
}

export function ecosystemFit(
  language: string | null,
  topics: readonly string[],
  config: Pick<ResolvedScoringConfig, 'languageAllowlist' | 'devtoolKeywords'>
): number {
  let points = 0;
  if (language && isAllowedLanguage(language, config.languageAllowlist)) points++;
  if (matchDevtoolTopics(topics, config.devtoolKeywords).length > 0) points++;
  return bound(points, SIGNAL_MAXIMA.ecosystemFit);
}

/**
 * Contributors with at least minCommits in the window. Entries sharing an
 * id are merged first so a split record cannot count twice.
 */
export function countActiveContributors(
  contributors: readonly ContributorActivity[],
  minCommits: number
): number {
  const totals = new Map<string, number>();
  for (const c of contributors) {
    totals.set(c.id, (totals.get(c.id) ?? 0) + c.commits);
  }

  let active = 0;
  for (const commits of totals.values()) {
    if (commits >= minCommits) active++;
  }
  return active;
}

export function isAllowedLanguage(language: string, allowlist: readonly string[]): boolean {
  const needle = language.trim().toLowerCase();
  return allowlist.some((l) => l.toLowerCase() === needle);
}

/** Topics matching the keyword set, lowercased, deduped and sorted. */
export function matchDevtoolTopics(
  topics: readonly string[],
  keywords: readonly string[]
): string[] {
  const wanted = new Set(keywords.map((k) => k.toLowerCase()));
  const matched = new Set<string>();
  for (const topic of topics) {
    const t = topic.trim().toLowerCase();
    if (wanted.has(t)) matched.add(t);
  }
  return [...matched].sort();
}

function bound(value: number, max: number): number {
  const rounded = Math.round(value * 100) / 100;
  return Math.min(max, Math.max(0, rounded));
}
