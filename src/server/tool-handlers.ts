/**
 * MCP Tool Handlers
 *
 * One function per tool. Each validates its arguments, does the work and
 * returns text content; thrown errors become isError results in index.ts.
 */

import { resolveConfigDir } from '../config/paths.js';
import { loadProjectConfig, projectConfigExists } from '../config/project-config.js';
import { resolveGitHubToken } from '../config/credentials.js';
import { withEngine } from '../orchestrator/engine.js';
import { runDateOf } from '../orchestrator/time-range.js';
import { generateMarkdownReport } from '../generators/report-generator.js';
import { runTrend, formatTrend } from '../commands/trend.js';
import { VERSION } from '../version.js';

export type ToolArgs = Record<string, unknown> | undefined;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};

function text(value: string): ToolResult {
  return { content: [{ type: 'text' as const, text: value }] };
}

// ─── score_repositories ──────────────────────────────────────

export function handleScoreRepositories(args: ToolArgs, now: Date = new Date()): ToolResult {
  const repositories = args?.['repositories'];
  if (!Array.isArray(repositories)) {
    throw new Error('repositories is required and must be an array of metrics records');
  }

  const rawDate = args?.['date'];
  if (rawDate !== undefined && typeof rawDate !== 'string') {
    throw new Error('date must be a YYYY-MM-DD string');
  }
  const date = typeof rawDate === 'string' ? rawDate : runDateOf(now);

  const run = withEngine(loadProjectConfig(), (engine) =>
    engine.run({ date, repositories })
  );
  return text(generateMarkdownReport(run));
}

// ─── get_trend ───────────────────────────────────────────────

export function handleGetTrend(args: ToolArgs): ToolResult {
  const fullName = args?.['fullName'];
  if (typeof fullName !== 'string' || !fullName.trim()) {
    throw new Error('fullName is required and must be an owner/repo string');
  }

  return text(formatTrend(runTrend(fullName.trim(), parseWindow(args?.['window']))));
}

function parseWindow(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error('window must be a positive integer');
  }
  return value;
}

// ─── get_capabilities ────────────────────────────────────────

export function handleGetCapabilities(): ToolResult {
  const configured = projectConfigExists();
  const project = loadProjectConfig();
  const token = resolveGitHubToken();

  return withEngine(project, (engine) => {
    const dates = engine.storage.store.listDates();

    const parts: string[] = [];
    parts.push(`# Momentum MCP v${VERSION}`);
    parts.push('');

    parts.push('## Status');
    parts.push('');
    parts.push('| Component | Status |');
    parts.push('|-----------|--------|');
    parts.push(`| Config directory | \`${resolveConfigDir()}\` |`);
    parts.push(
      `| Project config | ${configured ? `✅ ${project.repositories.length} repositories` : '❌ Not configured (defaults in use)'} |`
    );
    parts.push(`| GitHub token | ${token ? '✅ Configured' : '❌ Not configured (collect only)'} |`);
    parts.push(`| Storage | ${engine.storage.kind} at \`${engine.storage.location}\` |`);
    parts.push(
      `| Snapshots | ${dates.length}${dates.length > 0 ? ` (latest ${dates[dates.length - 1] ?? ''})` : ''} |`
    );
    parts.push('');

    parts.push('## Scoring');
    parts.push('');
    parts.push('| Setting | Value |');
    parts.push('|---------|-------|');
    parts.push(`| Threshold | ${engine.config.threshold.toFixed(1)} |`);
    parts.push(`| Trend window | ${engine.config.trendWindow} |`);
    parts.push(`| Languages | ${engine.config.languageAllowlist.join(', ')} |`);
    parts.push(`| Devtool topics | ${engine.config.devtoolKeywords.join(', ')} |`);
    parts.push(`| Active contributor | ≥ ${engine.config.activeContributorMinCommits} commits in 30 days |`);
    parts.push(`| Team sweet spot | ${engine.config.teamTractionSweetSpot} contributors |`);
    parts.push('');

    parts.push('## Tools');
    parts.push('');
    parts.push('- `score_repositories`: score a batch of metrics records for a run date');
    parts.push('- `get_trend`: recent scores for one repository');
    parts.push('- `get_capabilities`: this overview');

    return text(parts.join('\n'));
  });
}
