/**
 * momentum trend — Score History for One Repository
 */

import { loadProjectConfig } from '../config/project-config.js';
import { withEngine } from '../orchestrator/engine.js';
import { sparkline } from '../insights/movement-analyzer.js';
import { FULL_NAME_PATTERN } from '../validators.js';

export interface TrendOutcome {
  fullName: string;
  window: number;
  scores: number[];
}

export function runTrend(fullName: string, window?: number): TrendOutcome {
  if (!FULL_NAME_PATTERN.test(fullName)) {
    throw new Error(`Expected owner/repo, got "${fullName}"`);
  }

  return withEngine(loadProjectConfig(), (engine) => {
    const size = window ?? engine.config.trendWindow;
    return { fullName, window: size, scores: engine.tracker.getTrend(fullName, size) };
  });
}

export function formatTrend(trend: TrendOutcome): string {
  if (trend.scores.length === 0) {
    return `${trend.fullName}: no recorded scores in the last ${trend.window} runs`;
  }
  const scores = trend.scores.map((s) => s.toFixed(1)).join(' → ');
  return `${trend.fullName}: ${scores}  ${sparkline(trend.scores)}`;
}
