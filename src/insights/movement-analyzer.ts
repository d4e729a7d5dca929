/**
 * Movement Analyzer
 *
 * Pure functions classifying each repository's score movement against the
 * previous run and rendering its trend as a sparkline.
 * No I/O — all data passed in, results returned.
 */

import type { RankedRepository } from '../types/metrics.js';
import type { MovementDirection, MovementInsight, MovementSummary } from './types.js';

const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;
const MAX_SCORE = 10;

export interface MovementOptions {
  /** Changes smaller than this (absolute) count as stable. */
  stableDelta?: number;
  /** How many risers and fallers to keep. */
  limit?: number;
}

export function analyzeMovement(
  repositories: readonly RankedRepository[],
  options: MovementOptions = {}
): MovementSummary {
  const stableDelta = options.stableDelta ?? 0.5;
  const limit = options.limit ?? 5;

  const insights = repositories.map((r) => describeMovement(r, stableDelta));

  const risers = insights
    .filter((i) => i.direction === 'up')
    .sort((a, b) => changeOf(b) - changeOf(a) || byName(a, b))
    .slice(0, limit);

  const fallers = insights
    .filter((i) => i.direction === 'down')
    .sort((a, b) => changeOf(a) - changeOf(b) || byName(a, b))
    .slice(0, limit);

  return { insights, risers, fallers };
}

/**
 * One block character per score, scaled over 0–10.
 */
export function sparkline(trend: readonly number[]): string {
  return trend
    .map((score) => {
      const level = Math.floor((score / MAX_SCORE) * SPARK_CHARS.length);
      const index = Math.min(SPARK_CHARS.length - 1, Math.max(0, level));
      return SPARK_CHARS[index];
    })
    .join('');
}

export function formatScoreChange(change: number | null): string {
  if (change === null) return 'new';
  if (change === 0) return '±0.0';
  return change > 0 ? `+${change.toFixed(1)}` : change.toFixed(1);
}

// ─── Internals ──────────────────────────────────────────────

function describeMovement(repo: RankedRepository, stableDelta: number): MovementInsight {
  const direction = classify(repo.scoreChange, stableDelta);
  const score = repo.score.toFixed(1);

  let message: string;
  switch (direction) {
    case 'new':
      message = `${repo.fullName}: new at ${score}`;
      break;
    case 'stable':
      message = `${repo.fullName}: steady at ${score}`;
      break;
    default:
      message = `${repo.fullName}: ${formatScoreChange(repo.scoreChange)} to ${score}`;
  }

  return {
    fullName: repo.fullName,
    score: repo.score,
    scoreChange: repo.scoreChange,
    direction,
    sparkline: sparkline(repo.trend),
    message,
  };
}

function classify(change: number | null, stableDelta: number): MovementDirection {
  if (change === null) return 'new';
  if (Math.abs(change) < stableDelta) return 'stable';
  return change > 0 ? 'up' : 'down';
}

function changeOf(insight: MovementInsight): number {
  return insight.scoreChange ?? 0;
}

function byName(a: MovementInsight, b: MovementInsight): number {
  if (a.fullName === b.fullName) return 0;
  return a.fullName < b.fullName ? -1 : 1;
}
