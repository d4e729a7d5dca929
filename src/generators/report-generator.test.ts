import { describe, it, expect } from 'vitest';
import { generateMarkdownReport } from './report-generator.js';
import type { ScoringRunResult } from '../orchestrator/scoring-run.js';
import type { RankedRepository, RawRepositoryMetrics } from '../types/metrics.js';

function makeRanked(overrides: Partial<RankedRepository> & { fullName: string }): RankedRepository {
  return {
    score: 0,
    signals: { commitSurge: 0, starVelocity: 0, teamTraction: 0, ecosystemFit: 0 },
    qualifies: false,
    scoreChange: null,
    whyMatters: 'No notable momentum signals.',
    trend: [],
    url: `https://github.com/${overrides.fullName}`,
    description: null,
    primaryLanguage: null,
    starsTotal: 0,
    ...overrides,
  };
}

function makeRaw(fullName: string, primaryLanguage: string, topics: string[]): RawRepositoryMetrics {
  return { fullName, starsTotal: 0, forksTotal: 0, primaryLanguage, topics };
}

function makeRun(): ScoringRunResult {
  const repositories = [
    makeRanked({
      fullName: 'acme/rocket',
      score: 8.2,
      qualifies: true,
      scoreChange: 1.5,
      trend: [6.7, 8.2],
      whyMatters: '18 commits in 14 days (4 feature); +120 stars in 14 days',
    }),
    makeRanked({
      fullName: 'acme/lander',
      score: 7.0,
      qualifies: true,
      scoreChange: null,
      trend: [7.0],
      whyMatters: '4 active contributors',
    }),
    makeRanked({
      fullName: 'acme/probe',
      score: 3.0,
      scoreChange: -2.0,
      trend: [5.0, 3.0],
    }),
  ];

  return {
    date: '2024-03-15',
    previousDate: '2024-03-08',
    threshold: 7,
    repositories,
    qualified: repositories.filter((r) => r.qualifies),
    snapshot: {
      date: '2024-03-15',
      entries: { 'acme/lander': 7.0, 'acme/probe': 3.0, 'acme/rocket': 8.2 },
    },
    metrics: [
      makeRaw('acme/rocket', 'Rust', ['cli']),
      makeRaw('acme/lander', 'Go', ['cli', 'sdk']),
      makeRaw('acme/probe', 'Rust', []),
    ],
  };
}

function emptyRun(): ScoringRunResult {
  return {
    date: '2024-03-15',
    previousDate: null,
    threshold: 7,
    repositories: [],
    qualified: [],
    snapshot: { date: '2024-03-15', entries: {} },
    metrics: [],
  };
}

describe('report-generator', () => {
  describe('generateMarkdownReport', () => {
    it('starts with the title and comparison date', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines[0]).toBe('# Repository Momentum - 2024-03-15');
      expect(lines[2]).toBe('Compared with the run of 2024-03-08.');
    });

    it('uses a custom title', () => {
      const report = generateMarkdownReport(makeRun(), { title: 'Weekly Gems' });

      expect(report.startsWith('# Weekly Gems - 2024-03-15\n')).toBe(true);
    });

    it('summarizes the run', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines).toContain('| Repositories Scored | 3 |');
      expect(lines).toContain('| Qualified (score ≥ 7.0) | 2 |');
      expect(lines).toContain('| Median Score | 7.00 |');
      expect(lines).toContain('| Top Score | 8.2 |');
    });

    it('lists qualified repositories in rank order', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines).toContain(
        '| 1 | [acme/rocket](https://github.com/acme/rocket) | 8.2 | +1.5 | ▆▇ | ' +
          '18 commits in 14 days (4 feature); +120 stars in 14 days |'
      );
      expect(lines).toContain(
        '| 2 | [acme/lander](https://github.com/acme/lander) | 7.0 | new | ▆ | 4 active contributors |'
      );
      expect(lines.some((l) => l.includes('[acme/probe]'))).toBe(false);
    });

    it('lists risers and fallers', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines).toContain('### Rising');
      expect(lines).toContain('- acme/rocket: +1.5 to 8.2 ▆▇');
      expect(lines).toContain('### Falling');
      expect(lines).toContain('- acme/probe: -2.0 to 3.0 ▅▃');
    });

    it('includes the score distribution', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines).toContain('| Min | 3.00 |');
      expect(lines).toContain('| 25th Percentile | 5.00 |');
      expect(lines).toContain('| 75th Percentile | 7.60 |');
      expect(lines).toContain('| 90th Percentile | 7.96 |');
      expect(lines).toContain('| Max | 8.20 |');
      expect(lines).toContain('| Mean | 6.07 |');
    });

    it('includes the ecosystem breakdown', () => {
      const lines = generateMarkdownReport(makeRun()).split('\n');

      expect(lines).toContain('| Rust | 2 |');
      expect(lines).toContain('| Go | 1 |');
      expect(lines).toContain('**Top topics:** cli (2), sdk (1)');
    });

    it('escapes pipes in table cells', () => {
      const run = makeRun();
      const first = run.qualified[0];
      if (first) first.whyMatters = 'a | b';

      const report = generateMarkdownReport(run);

      expect(report).toContain('| a \\| b |');
    });

    it('handles an empty first run', () => {
      const report = generateMarkdownReport(emptyRun());

      expect(report).toContain('_First run: no previous snapshot to compare with._');
      expect(report).toContain('| Repositories Scored | 0 |');
      expect(report).toContain('_No repositories reached the threshold_');
      expect(report).toContain('_No significant movement_');
      expect(report).not.toContain('## Score Distribution');
      expect(report).not.toContain('## Ecosystem');
    });
  });
});
