/**
 * Insight Types
 *
 * Data structures for week-over-week movement and run-level summaries.
 */

export type MovementDirection = 'new' | 'up' | 'down' | 'stable';

/** How one repository's score moved against the previous run. */
export interface MovementInsight {
  fullName: string;
  score: number;
  scoreChange: number | null;
  direction: MovementDirection;
  sparkline: string;
  message: string;
}

export interface MovementSummary {
  insights: MovementInsight[];
  /** Largest gains first. */
  risers: MovementInsight[];
  /** Largest drops first. */
  fallers: MovementInsight[];
}

export interface ScoreDistribution {
  count: number;
  qualified: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  percentiles: { p25: number; p50: number; p75: number; p90: number };
}

export interface CountEntry {
  name: string;
  count: number;
}

export interface EcosystemSummary {
  languages: CountEntry[];
  topics: CountEntry[];
}
