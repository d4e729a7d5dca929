/**
 * Repository Metric Types
 *
 * Shapes crossing the collector/core boundary and the records the
 * scoring engine hands to report generators.
 */

/** Commits a single contributor made inside the 30-day window. */
export interface ContributorActivity {
  id: string;
  commits: number;
}

/**
 * Raw activity for one repository, as produced by the collector.
 * Absent windows mean no recorded activity, not missing data.
 */
export interface RawRepositoryMetrics {
  fullName: string;
  starsTotal: number;
  forksTotal: number;
  commits14d?: number;
  featureCommits14d?: number;
  /** May be negative when a repository lost stars. */
  starsGained14d?: number;
  contributors30d?: ContributorActivity[];
  primaryLanguage?: string | null;
  topics?: string[];
  description?: string | null;
  url?: string;
}

export type SignalName = 'commitSurge' | 'starVelocity' | 'teamTraction' | 'ecosystemFit';

export interface SubSignalVector {
  commitSurge: number;
  starVelocity: number;
  teamTraction: number;
  ecosystemFit: number;
}

export interface ScoredRepository {
  fullName: string;
  score: number;
  signals: SubSignalVector;
  qualifies: boolean;
  /** null when the previous snapshot does not contain this repository. */
  scoreChange: number | null;
  whyMatters: string;
}

/** A scored repository with its trend and display fields, in run output order. */
export interface RankedRepository extends ScoredRepository {
  trend: number[];
  url: string;
  description: string | null;
  primaryLanguage: string | null;
  starsTotal: number;
}
