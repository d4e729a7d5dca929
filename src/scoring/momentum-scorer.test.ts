import { describe, it, expect } from 'vitest';
import {
  MomentumScorer,
  NO_SIGNAL_SUMMARY,
  compareRanking,
  sumSignals,
} from './momentum-scorer.js';
import { InputContractError } from '../errors.js';
import type { RawRepositoryMetrics } from '../types/metrics.js';
import type { HistorySnapshot } from '../history/types.js';

function makeRaw(overrides: Partial<RawRepositoryMetrics> = {}): RawRepositoryMetrics {
  return {
    fullName: 'acme/forge-cli',
    starsTotal: 420,
    forksTotal: 12,
    ...overrides,
  };
}

const FIVE_ACTIVE = ['ana', 'bo', 'cy', 'di', 'ed'].map((id) => ({ id, commits: 6 }));

/** commitSurge 3 + starVelocity 3 + ecosystemFit 1 = 7.0 */
const SEVEN_POINT_REPO = makeRaw({
  fullName: 'acme/seven',
  commits14d: 50,
  featureCommits14d: 3,
  starsGained14d: 300,
  primaryLanguage: 'Go',
});

function snapshot(date: string, entries: Record<string, number>): HistorySnapshot {
  return { date, entries };
}

describe('MomentumScorer', () => {
  const scorer = new MomentumScorer();

  describe('score', () => {
    it('sums the sub-signals and rounds to one decimal', () => {
      const result = scorer.score(
        makeRaw({
          commits14d: 15,
          featureCommits14d: 4,
          starsGained14d: 0,
          contributors30d: [],
          primaryLanguage: 'Rust',
          topics: ['cli'],
        })
      );

      expect(result.signals.commitSurge).toBeGreaterThan(1);
      expect(result.signals.starVelocity).toBe(0);
      expect(result.signals.teamTraction).toBe(0);
      expect(result.signals.ecosystemFit).toBe(2);
      expect(result.score).toBe(Math.round(sumSignals(result.signals) * 10) / 10);
      expect(result.score).toBeGreaterThan(3);
      expect(result.score).toBeLessThanOrEqual(5);
      expect(result.whyMatters).toBe(
        '15 commits in 14 days (4 feature); Rust ecosystem, cli topics'
      );
    });

    it('qualifies a repository exactly at the threshold', () => {
      const result = scorer.score(SEVEN_POINT_REPO);
      expect(result.score).toBe(7);
      expect(result.qualifies).toBe(true);
    });

    it('does not qualify one tenth below the threshold', () => {
      // commitSurge 2.9 + starVelocity 3 + ecosystemFit 1
      const result = scorer.score({ ...SEVEN_POINT_REPO, commits14d: 46 });
      expect(result.score).toBe(6.9);
      expect(result.qualifies).toBe(false);
    });

    it('honors a configured threshold', () => {
      const strict = new MomentumScorer({ config: { threshold: 7.1 } });
      expect(strict.score(SEVEN_POINT_REPO).qualifies).toBe(false);
    });

    it('has a null score change on the first run', () => {
      const result = scorer.score(SEVEN_POINT_REPO, null);
      expect(result.scoreChange).toBeNull();
    });

    it('has a null score change when the previous snapshot lacks the repository', () => {
      const previous = snapshot('2026-10-05', { 'acme/other': 4.2 });
      expect(scorer.score(SEVEN_POINT_REPO, previous).scoreChange).toBeNull();
    });

    it('computes the change against the previous snapshot', () => {
      // commitSurge 2.5 + starVelocity 3 + ecosystemFit 2 = 7.5
      const raw = makeRaw({
        commits14d: 30,
        featureCommits14d: 3,
        starsGained14d: 300,
        primaryLanguage: 'Python',
        topics: ['sdk'],
      });
      const previous = snapshot('2026-10-05', { 'acme/forge-cli': 6.0 });

      const result = scorer.score(raw, previous);
      expect(result.score).toBe(7.5);
      expect(result.scoreChange).toBe(1.5);
      expect(result.qualifies).toBe(true);
    });

    it('rounds a falling score change to one decimal', () => {
      const previous = snapshot('2026-10-05', { 'acme/seven': 8.1 });
      expect(scorer.score(SEVEN_POINT_REPO, previous).scoreChange).toBe(-1.1);
    });

    it('scores zero activity as zero with a neutral summary', () => {
      const result = scorer.score(makeRaw({ starsTotal: 0, forksTotal: 0 }));

      expect(result.signals).toEqual({
        commitSurge: 0,
        starVelocity: 0,
        teamTraction: 0,
        ecosystemFit: 0,
      });
      expect(result.score).toBe(0);
      expect(result.qualifies).toBe(false);
      expect(result.whyMatters).toBe(NO_SIGNAL_SUMMARY);
    });

    it('is deterministic for identical input and history', () => {
      const raw = makeRaw({
        commits14d: 22,
        featureCommits14d: 5,
        starsGained14d: 87,
        contributors30d: FIVE_ACTIVE,
        primaryLanguage: 'TypeScript',
        topics: ['api', 'cli'],
      });
      const previous = snapshot('2026-10-05', { 'acme/forge-cli': 5.5 });

      const first = scorer.score(raw, previous);
      const second = scorer.score(raw, previous);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('keeps the score within 0..10', () => {
      for (const commits of [0, 9, 10, 25, 60]) {
        for (const stars of [-3, 0, 10, 120, 900]) {
          const result = scorer.score(
            makeRaw({
              commits14d: commits,
              featureCommits14d: Math.min(commits, 4),
              starsGained14d: stars,
              contributors30d: FIVE_ACTIVE,
              primaryLanguage: 'Rust',
              topics: ['devops'],
            })
          );
          expect(result.score).toBeGreaterThanOrEqual(0);
          expect(result.score).toBeLessThanOrEqual(10);
        }
      }
    });
  });

  describe('input contract', () => {
    it('rejects a negative star count', () => {
      expect(() => scorer.score(makeRaw({ starsTotal: -1 }))).toThrow(InputContractError);
    });

    it('rejects feature commits exceeding commits', () => {
      expect(() => scorer.score(makeRaw({ commits14d: 2, featureCommits14d: 3 }))).toThrow(
        /feature commits exceed commits/
      );
    });

    it('rejects a malformed identity', () => {
      expect(() => scorer.score(makeRaw({ fullName: 'no-slash' }))).toThrow(InputContractError);
    });

    it('accepts lost stars in the window', () => {
      expect(scorer.score(makeRaw({ starsGained14d: -25 })).signals.starVelocity).toBe(0);
    });
  });

  describe('whyMatters', () => {
    it('cites at most three signals, strongest first', () => {
      // starVelocity 2.35, teamTraction 2, ecosystemFit 2, commitSurge 1
      const result = scorer.score(
        makeRaw({
          commits14d: 10,
          starsGained14d: 100,
          contributors30d: FIVE_ACTIVE,
          primaryLanguage: 'Rust',
          topics: ['cli'],
        })
      );

      expect(result.whyMatters).toBe(
        '+100 stars in 14 days; 5 active contributors; Rust ecosystem, cli topics'
      );
    });

    it('breaks ties by the fixed signal order', () => {
      // commitSurge 2 and teamTraction 2
      const result = scorer.score(
        makeRaw({ commits14d: 10, featureCommits14d: 3, contributors30d: FIVE_ACTIVE })
      );

      expect(result.whyMatters).toBe('10 commits in 14 days (3 feature); 5 active contributors');
    });
  });

  describe('scoreAll', () => {
    it('orders by score descending then fullName ascending', () => {
      const results = scorer.scoreAll([
        makeRaw({ fullName: 'zeta/tool', primaryLanguage: 'Go' }),
        { ...SEVEN_POINT_REPO },
        makeRaw({ fullName: 'alpha/tool', primaryLanguage: 'Rust' }),
        makeRaw({ fullName: 'Beta/tool' }),
      ]);

      expect(results.map((r) => r.fullName)).toEqual([
        'acme/seven',
        'alpha/tool',
        'zeta/tool',
        'Beta/tool',
      ]);
    });

    it('returns an empty list for no repositories', () => {
      expect(scorer.scoreAll([])).toEqual([]);
    });
  });

  describe('compareRanking', () => {
    it('compares names by code unit, not locale', () => {
      const upper = { fullName: 'Zed/app', score: 5 };
      const lower = { fullName: 'abc/app', score: 5 };
      expect(compareRanking(upper, lower)).toBe(-1);
    });
  });
});
