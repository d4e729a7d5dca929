/**
 * momentum score — Score a Metrics File
 *
 * Reads a JSON array of repository metrics, runs one scoring pass against
 * the configured history, and optionally writes the Markdown report and
 * JSON API files.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { loadProjectConfig } from '../config/project-config.js';
import { withEngine } from '../orchestrator/engine.js';
import type { ScoringRunResult } from '../orchestrator/scoring-run.js';
import { runDateOf } from '../orchestrator/time-range.js';
import { generateMarkdownReport } from '../generators/report-generator.js';
import { buildApiPayload, writeApiFiles } from '../generators/api-generator.js';
import { formatScoreChange, sparkline } from '../insights/movement-analyzer.js';

export interface ScoreOptions {
  input: string;
  /** Run date; defaults to today's UTC date. */
  date?: string;
  markdown?: string;
  apiDir?: string;
  now?: Date;
}

export interface ScoreOutcome {
  run: ScoringRunResult;
  reportPath: string | null;
  apiDir: string | null;
}

export function runScore(options: ScoreOptions): ScoreOutcome {
  const project = loadProjectConfig();
  const now = options.now ?? new Date();
  const date = options.date ?? runDateOf(now);
  const repositories = readMetricsFile(options.input);

  const run = withEngine(project, (engine) => engine.run({ date, repositories }));

  const reportPath =
    options.markdown ??
    (project.output.reportsDir ? join(project.output.reportsDir, `${date}.md`) : null);
  if (reportPath) {
    mkdirSync(dirname(reportPath), { recursive: true });
    writeFileSync(reportPath, generateMarkdownReport(run), 'utf-8');
    console.error(`[momentum] Report written to ${reportPath}`);
  }

  const apiDir = options.apiDir ?? project.output.apiDir ?? null;
  if (apiDir) {
    writeApiFiles(apiDir, buildApiPayload(run, now));
  }

  return { run, reportPath, apiDir };
}

export function readMetricsFile(path: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array of repository metrics`);
  }
  return parsed;
}

/**
 * Plain-text ranking for the terminal.
 */
export function formatRanking(run: ScoringRunResult): string {
  const lines: string[] = [];
  const previous = run.previousDate ? `previous ${run.previousDate}` : 'first run';
  lines.push(`Momentum run ${run.date} (${previous})`);
  lines.push(
    `${run.qualified.length} of ${run.repositories.length} repositories qualify ` +
      `(threshold ${run.threshold.toFixed(1)})`
  );

  if (run.repositories.length === 0) {
    return lines.join('\n');
  }

  lines.push('');
  const width = Math.max(...run.repositories.map((r) => r.fullName.length));
  run.repositories.forEach((repo, i) => {
    const marker = repo.qualifies ? '*' : ' ';
    lines.push(
      `${marker} ${String(i + 1).padStart(2)}. ${repo.fullName.padEnd(width)}  ` +
        `${repo.score.toFixed(1).padStart(4)}  ${formatScoreChange(repo.scoreChange).padStart(5)}  ` +
        sparkline(repo.trend)
    );
  });

  return lines.join('\n');
}
