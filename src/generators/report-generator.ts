/**
 * Report Generator
 *
 * Transforms a finished scoring run into a Markdown report.
 * All functions are synchronous — no I/O, no API calls.
 */

import type { ScoringRunResult } from '../orchestrator/scoring-run.js';
import type { RankedRepository } from '../types/metrics.js';
import type { MovementInsight } from '../insights/types.js';
import { analyzeMovement, formatScoreChange, sparkline } from '../insights/movement-analyzer.js';
import { summarizeEcosystem, summarizeScores } from '../insights/run-summary.js';

export interface ReportOptions {
  title?: string;
  /** Risers and fallers listed under Movers. */
  moverLimit?: number;
  /** Languages and topics listed under Ecosystem. */
  ecosystemLimit?: number;
}

const DEFAULT_TITLE = 'Repository Momentum';

/**
 * Generate the weekly momentum report.
 * Structured as: Summary / Qualified Repositories / Movers / Score Distribution / Ecosystem
 */
export function generateMarkdownReport(run: ScoringRunResult, options: ReportOptions = {}): string {
  const title = options.title ?? DEFAULT_TITLE;
  const distribution = summarizeScores(run.repositories);
  const movement = analyzeMovement(run.repositories, { limit: options.moverLimit ?? 5 });
  const ecosystem = summarizeEcosystem(run.metrics, options.ecosystemLimit ?? 10);

  const parts: string[] = [];
  parts.push(`# ${title} - ${run.date}`);
  parts.push('');
  parts.push(
    run.previousDate
      ? `Compared with the run of ${run.previousDate}.`
      : '_First run: no previous snapshot to compare with._'
  );
  parts.push('');

  // ── Summary ──
  parts.push('## Summary');
  parts.push('');
  parts.push('| Metric | Value |');
  parts.push('|--------|-------|');
  parts.push(`| Repositories Scored | ${distribution.count} |`);
  parts.push(`| Qualified (score ≥ ${run.threshold.toFixed(1)}) | ${distribution.qualified} |`);
  parts.push(`| Median Score | ${distribution.median.toFixed(2)} |`);
  parts.push(`| Top Score | ${distribution.max.toFixed(1)} |`);
  parts.push('');

  // ── Qualified ──
  parts.push('## Qualified Repositories');
  parts.push('');
  if (run.qualified.length > 0) {
    parts.push('| Rank | Repository | Score | Change | Trend | Why It Matters |');
    parts.push('|------|------------|-------|--------|-------|----------------|');
    run.qualified.forEach((repo, i) => {
      parts.push(formatQualifiedRow(i + 1, repo));
    });
  } else {
    parts.push('_No repositories reached the threshold_');
  }
  parts.push('');

  // ── Movers ──
  parts.push('## Movers');
  parts.push('');
  if (movement.risers.length === 0 && movement.fallers.length === 0) {
    parts.push('_No significant movement_');
    parts.push('');
  } else {
    if (movement.risers.length > 0) {
      parts.push('### Rising');
      parts.push('');
      for (const insight of movement.risers) parts.push(formatMover(insight));
      parts.push('');
    }
    if (movement.fallers.length > 0) {
      parts.push('### Falling');
      parts.push('');
      for (const insight of movement.fallers) parts.push(formatMover(insight));
      parts.push('');
    }
  }

  // ── Distribution ──
  if (distribution.count > 0) {
    parts.push('## Score Distribution');
    parts.push('');
    parts.push('| Statistic | Value |');
    parts.push('|-----------|-------|');
    parts.push(`| Min | ${distribution.min.toFixed(2)} |`);
    parts.push(`| 25th Percentile | ${distribution.percentiles.p25.toFixed(2)} |`);
    parts.push(`| Median | ${distribution.median.toFixed(2)} |`);
    parts.push(`| 75th Percentile | ${distribution.percentiles.p75.toFixed(2)} |`);
    parts.push(`| 90th Percentile | ${distribution.percentiles.p90.toFixed(2)} |`);
    parts.push(`| Max | ${distribution.max.toFixed(2)} |`);
    parts.push(`| Mean | ${distribution.mean.toFixed(2)} |`);
    parts.push('');
  }

  // ── Ecosystem ──
  if (ecosystem.languages.length > 0 || ecosystem.topics.length > 0) {
    parts.push('## Ecosystem');
    parts.push('');
    if (ecosystem.languages.length > 0) {
      parts.push('| Language | Repositories |');
      parts.push('|----------|--------------|');
      for (const entry of ecosystem.languages) {
        parts.push(`| ${escapeCell(entry.name)} | ${entry.count} |`);
      }
      parts.push('');
    }
    if (ecosystem.topics.length > 0) {
      parts.push(`**Top topics:** ${ecosystem.topics.map((t) => `${t.name} (${t.count})`).join(', ')}`);
      parts.push('');
    }
  }

  return parts.join('\n');
}

function formatQualifiedRow(rank: number, repo: RankedRepository): string {
  const cells = [
    String(rank),
    `[${escapeCell(repo.fullName)}](${repo.url})`,
    repo.score.toFixed(1),
    formatScoreChange(repo.scoreChange),
    sparkline(repo.trend),
    escapeCell(repo.whyMatters),
  ];
  return `| ${cells.join(' | ')} |`;
}

function formatMover(insight: MovementInsight): string {
  return `- ${insight.message} ${insight.sparkline}`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
