#!/usr/bin/env node

/**
 * Momentum CLI
 *
 * Score GitHub repository momentum from the command line.
 *
 * Usage:
 *   momentum init [--repos owner/a,owner/b] [--storage files|sqlite]
 *   momentum collect [--out metrics.json]
 *   momentum score --input metrics.json [--date YYYY-MM-DD] [--markdown report.md] [--api-dir dir]
 *   momentum trend owner/repo [--window 5]
 *   momentum status
 */

import { parseArgs, intFlag, requireFlag } from './commands/args.js';
import { runInit } from './commands/init.js';
import { runCollect } from './commands/collect.js';
import { runScore, formatRanking } from './commands/score.js';
import { runTrend, formatTrend } from './commands/trend.js';
import { runStatus } from './commands/status.js';

// ─── Commands ───────────────────────────────────────────────

async function runCollectCommand(flags: Record<string, string>): Promise<string> {
  const out = flags['out'] || undefined;
  const { result, json } = await runCollect({ out });
  if (out) {
    return `Collected ${result.metrics.length} of ${result.metrics.length + result.failures.length} repositories into ${out}`;
  }
  return json.trimEnd();
}

function runScoreCommand(flags: Record<string, string>): string {
  const { run, reportPath, apiDir } = runScore({
    input: requireFlag(flags, 'input'),
    date: flags['date'] || undefined,
    markdown: flags['markdown'] || undefined,
    apiDir: flags['api-dir'] || undefined,
  });

  const lines = [formatRanking(run)];
  if (reportPath || apiDir) lines.push('');
  if (reportPath) lines.push(`Report: ${reportPath}`);
  if (apiDir) lines.push(`API:    ${apiDir}`);
  return lines.join('\n');
}

function runTrendCommand(positionals: string[], flags: Record<string, string>): string {
  const fullName = positionals[0];
  if (!fullName) {
    throw new Error('Usage: momentum trend <owner/repo> [--window n]');
  }
  const window = flags['window'] !== undefined ? intFlag(flags, 'window', 1) : undefined;
  return formatTrend(runTrend(fullName, window));
}

function showHelp(topic?: string): string {
  if (topic) {
    const help = COMMAND_HELP[topic];
    return help ?? `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }
  return MAIN_HELP;
}

const MAIN_HELP = `Momentum CLI - GitHub Repository Momentum Scoring

Usage:
  momentum <command> [options]
  momentum help <command>

Setup:
  init              Choose tracked repositories and snapshot storage

Scoring:
  collect           Fetch 14/30-day activity for tracked repositories from GitHub
  score             Score a metrics file, record the snapshot, write reports
  trend             Show recent scores for one repository

Info:
  status            Show config, credentials, storage and history
  help [command]    Show help for a specific command

Examples:
  momentum init --repos acme/rocket,acme/lander
  momentum collect --out metrics.json
  momentum score --input metrics.json --markdown report.md
  momentum trend acme/rocket --window 5

Environment Variables:
  GITHUB_TOKEN      GitHub personal access token (collect only)
  MOMENTUM_HOME     Config directory (default: ~/.momentum)`;

const COMMAND_HELP: Record<string, string> = {
  init: `momentum init — Project Setup

  Prompts for the repositories to track and the snapshot storage backend,
  then writes config.json. Pass --repos to skip the prompts.

  Options:
    --repos <list>      Comma-separated owner/repo names
    --storage <kind>    files (default) or sqlite
    --force             Overwrite an existing config

  Examples:
    momentum init
    momentum init --repos acme/rocket,acme/lander --storage sqlite`,

  collect: `momentum collect — Fetch Metrics

  Reads repository metadata, 30 days of commits and 14 days of stars for
  every tracked repository. Repositories that fail are logged and skipped.
  Requires GITHUB_TOKEN.

  Options:
    --out <file>        Write the JSON array here instead of stdout

  Examples:
    momentum collect --out metrics.json`,

  score: `momentum score — Score a Metrics File

  Validates every record (one bad record aborts the run before anything is
  written), scores against the previous snapshot, records this run's
  snapshot and prints the ranking. Qualified repositories are marked *.

  Options:
    --input <file>      JSON array of repository metrics (required)
    --date <date>       Run date, YYYY-MM-DD (default: today, UTC)
    --markdown <file>   Write the Markdown report
    --api-dir <dir>     Write <date>.json and latest.json

  Examples:
    momentum score --input metrics.json
    momentum score --input metrics.json --date 2024-03-15 --api-dir public/api`,

  trend: `momentum trend — Score History

  Shows the repository's scores from the most recent snapshots, oldest
  first. Snapshots that don't include the repository are skipped.

  Options:
    --window <n>        Snapshots to look back over (default: scoring.trendWindow)

  Examples:
    momentum trend acme/rocket
    momentum trend acme/rocket --window 8`,

  status: `momentum status — Configuration Status

  Shows:
    - Config directory and file
    - GitHub token status
    - Storage backend and location
    - Snapshot count and latest date
    - Scoring threshold and trend window
    - Tracked repositories

  Examples:
    momentum status`,
};

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, positionals, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'init':
        await runInit({
          repos: flags['repos'],
          storage: flags['storage'] || undefined,
          force: flags['force'] !== undefined,
        });
        return;
      case 'collect':
        output = await runCollectCommand(flags);
        break;
      case 'score':
        output = runScoreCommand(flags);
        break;
      case 'trend':
        output = runTrendCommand(positionals, flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
