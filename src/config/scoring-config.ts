/**
 * Scoring Configuration
 *
 * Every knob the scoring engine recognizes, defined in one place.
 * Projects can override any subset via config.json `scoring`.
 * Missing overrides fall back to defaults.
 */

import { z } from 'zod';

export interface ScoringConfig {
  /** Minimum score for a repository to qualify (inclusive). */
  threshold?: number;
  /** How many recent snapshots feed a trend. */
  trendWindow?: number;
  languageAllowlist?: string[];
  devtoolKeywords?: string[];
  activeContributorMinCommits?: number;
  teamTractionSweetSpot?: number;
}

export type ResolvedScoringConfig = Required<ScoringConfig>;

export const DEFAULT_SCORING_CONFIG: ResolvedScoringConfig = {
  threshold: 7.0,
  trendWindow: 3,
  languageAllowlist: ['go', 'python', 'rust', 'typescript'],
  devtoolKeywords: ['api', 'cli', 'developer-tools', 'devops', 'sdk'],
  activeContributorMinCommits: 5,
  teamTractionSweetSpot: 5,
};

export const ScoringConfigSchema = z.object({
  threshold: z.number().min(0).max(10).optional(),
  trendWindow: z.number().int().positive().optional(),
  languageAllowlist: z.array(z.string().min(1)).optional(),
  devtoolKeywords: z.array(z.string().min(1)).optional(),
  activeContributorMinCommits: z.number().int().positive().optional(),
  teamTractionSweetSpot: z.number().int().min(2).optional(),
});

/**
 * Merge overrides onto defaults and validate the result.
 * Allow-list and keyword entries are lowercased so matching is case-insensitive.
 * Throws a ZodError on out-of-range values.
 */
export function resolveScoringConfig(overrides?: ScoringConfig): ResolvedScoringConfig {
  const o = ScoringConfigSchema.parse(overrides ?? {});
  const d = DEFAULT_SCORING_CONFIG;
  return {
    threshold: o.threshold ?? d.threshold,
    trendWindow: o.trendWindow ?? d.trendWindow,
    languageAllowlist: normalizeList(o.languageAllowlist ?? d.languageAllowlist),
    devtoolKeywords: normalizeList(o.devtoolKeywords ?? d.devtoolKeywords),
    activeContributorMinCommits: o.activeContributorMinCommits ?? d.activeContributorMinCommits,
    teamTractionSweetSpot: o.teamTractionSweetSpot ?? d.teamTractionSweetSpot,
  };
}

function normalizeList(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim().toLowerCase()))].sort();
}
