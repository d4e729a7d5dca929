import { describe, it, expect } from 'vitest';
import { summarizeScores, summarizeEcosystem, percentile } from './run-summary.js';
import type { RankedRepository, RawRepositoryMetrics } from '../types/metrics.js';

function makeRanked(fullName: string, score: number, qualifies = score >= 7): RankedRepository {
  return {
    fullName,
    score,
    signals: { commitSurge: 0, starVelocity: 0, teamTraction: 0, ecosystemFit: 0 },
    qualifies,
    scoreChange: null,
    whyMatters: '',
    trend: [score],
    url: `https://github.com/${fullName}`,
    description: null,
    primaryLanguage: null,
    starsTotal: 0,
  };
}

function makeRaw(
  fullName: string,
  primaryLanguage: string | null,
  topics: string[]
): RawRepositoryMetrics {
  return { fullName, starsTotal: 0, forksTotal: 0, primaryLanguage, topics };
}

describe('run-summary', () => {
  describe('percentile', () => {
    it('interpolates between closest ranks', () => {
      const sorted = [1, 2, 3, 4];
      expect(percentile(sorted, 0)).toBe(1);
      expect(percentile(sorted, 50)).toBe(2.5);
      expect(percentile(sorted, 25)).toBe(1.75);
      expect(percentile(sorted, 100)).toBe(4);
    });

    it('returns the only value for a single element', () => {
      expect(percentile([6.3], 90)).toBe(6.3);
    });
  });

  describe('summarizeScores', () => {
    it('summarizes a run', () => {
      const summary = summarizeScores([
        makeRanked('a/a', 8.0),
        makeRanked('a/b', 2.0),
        makeRanked('a/c', 4.0),
        makeRanked('a/d', 6.0),
      ]);

      expect(summary).toEqual({
        count: 4,
        qualified: 1,
        min: 2,
        max: 8,
        mean: 5,
        median: 5,
        percentiles: { p25: 3.5, p50: 5, p75: 6.5, p90: 7.4 },
      });
    });

    it('returns zeros for an empty run', () => {
      expect(summarizeScores([])).toEqual({
        count: 0,
        qualified: 0,
        min: 0,
        max: 0,
        mean: 0,
        median: 0,
        percentiles: { p25: 0, p50: 0, p75: 0, p90: 0 },
      });
    });
  });

  describe('summarizeEcosystem', () => {
    it('counts languages and lowercased topics, most common first', () => {
      const summary = summarizeEcosystem([
        makeRaw('a/a', 'Rust', ['CLI', 'terminal']),
        makeRaw('a/b', 'Go', ['cli', 'cli']),
        makeRaw('a/c', 'Rust', ['sdk']),
        makeRaw('a/d', null, []),
      ]);

      expect(summary.languages).toEqual([
        { name: 'Rust', count: 2 },
        { name: 'Go', count: 1 },
      ]);
      expect(summary.topics).toEqual([
        { name: 'cli', count: 2 },
        { name: 'sdk', count: 1 },
        { name: 'terminal', count: 1 },
      ]);
    });

    it('limits each list', () => {
      const summary = summarizeEcosystem(
        [makeRaw('a/a', 'Rust', ['x', 'y', 'z'])],
        2
      );
      expect(summary.topics.map((t) => t.name)).toEqual(['x', 'y']);
    });
  });
});
