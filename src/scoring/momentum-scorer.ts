/**
 * Momentum Scorer
 *
 * Combines the four sub-signals into a bounded 0–10 score, applies the
 * qualification threshold and computes the change against the
 * immediately preceding snapshot.
 *
 * Given identical metrics and history, output is identical — including
 * the whyMatters text and ranking order.
 */

import type {
  RawRepositoryMetrics,
  ScoredRepository,
  SignalName,
  SubSignalVector,
} from '../types/metrics.js';
import type { HistorySnapshot } from '../history/types.js';
import type { ScoringConfig, ResolvedScoringConfig } from '../config/scoring-config.js';
import { resolveScoringConfig } from '../config/scoring-config.js';
import {
  extractSignals,
  countActiveContributors,
  isAllowedLanguage,
  matchDevtoolTopics,
  SIGNAL_ORDER,
} from '../signals/signal-extractor.js';
import { parseRawMetrics } from '../validators.js';

export const NO_SIGNAL_SUMMARY = 'No notable momentum signals.';

const MAX_REASONS = 3;

export interface MomentumScorerOptions {
  config?: ScoringConfig;
}

export class MomentumScorer {
  readonly config: ResolvedScoringConfig;

  constructor(options: MomentumScorerOptions = {}) {
    this.config = resolveScoringConfig(options.config);
  }

  /**
   * Score one repository.
   * `previous` must be the snapshot immediately before this run (or null).
   * Throws InputContractError on malformed metrics.
   */
  score(raw: RawRepositoryMetrics, previous: HistorySnapshot | null = null): ScoredRepository {
    const metrics = parseRawMetrics(raw);
    const signals = extractSignals(metrics, this.config);
    const score = roundScore(sumSignals(signals));

    const previousScore = previous?.entries[metrics.fullName];
    const scoreChange = previousScore === undefined ? null : roundScore(score - previousScore);

    return {
      fullName: metrics.fullName,
      score,
      signals,
      qualifies: score >= this.config.threshold,
      scoreChange,
      whyMatters: buildWhyMatters(metrics, signals, this.config),
    };
  }

  /**
   * Score a batch against one previous snapshot.
   * Returned in output order: score descending, then fullName ascending.
   */
  scoreAll(
    raws: readonly RawRepositoryMetrics[],
    previous: HistorySnapshot | null = null
  ): ScoredRepository[] {
    return raws.map((raw) => this.score(raw, previous)).sort(compareRanking);
  }
}

export function sumSignals(signals: SubSignalVector): number {
  return SIGNAL_ORDER.reduce((sum, name) => sum + signals[name], 0);
}

/** Ranking order: higher score first, then fullName by code unit. */
export function compareRanking(
  a: Pick<ScoredRepository, 'score' | 'fullName'>,
  b: Pick<ScoredRepository, 'score' | 'fullName'>
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.fullName === b.fullName) return 0;
  return a.fullName < b.fullName ? -1 : 1;
}

/**
 * Short justification from the strongest non-zero signals, strongest first.
 * Equal values keep the fixed signal order.
 */
export function buildWhyMatters(
  raw: RawRepositoryMetrics,
  signals: SubSignalVector,
  config: ResolvedScoringConfig
): string {
  const ranked = SIGNAL_ORDER.map((name, index) => ({ name, index, value: signals[name] }))
    .filter((s) => s.value > 0)
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .slice(0, MAX_REASONS);

  if (ranked.length === 0) return NO_SIGNAL_SUMMARY;
  return ranked.map((s) => describeSignal(s.name, raw, config)).join('; ');
}

function describeSignal(
  name: SignalName,
  raw: RawRepositoryMetrics,
  config: ResolvedScoringConfig
): string {
  switch (name) {
    case 'commitSurge': {
      const commits = raw.commits14d ?? 0;
      const feature = raw.featureCommits14d ?? 0;
      return feature > 0
        ? `${commits} commits in 14 days (${feature} feature)`
        : `${commits} commits in 14 days`;
    }
    case 'starVelocity':
      return `+${raw.starsGained14d ?? 0} stars in 14 days`;
    case 'teamTraction': {
      const active = countActiveContributors(
        raw.contributors30d ?? [],
        config.activeContributorMinCommits
      );
      return `${active} active contributors`;
    }
    case 'ecosystemFit': {
      const parts: string[] = [];
      const language = raw.primaryLanguage?.trim();
      if (language && isAllowedLanguage(language, config.languageAllowlist)) {
        parts.push(`${language} ecosystem`);
      }
      const topics = matchDevtoolTopics(raw.topics ?? [], config.devtoolKeywords);
      if (topics.length > 0) {
        parts.push(`${topics.join(', ')} topics`);
      }
      return parts.join(', ');
    }
  }
}

function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}
