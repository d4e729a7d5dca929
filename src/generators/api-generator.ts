/**
 * API Generator
 *
 * Builds the JSON payload published for each run and writes it as both
 * `<date>.json` and `latest.json`.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ScoringRunResult } from '../orchestrator/scoring-run.js';
import type { SubSignalVector } from '../types/metrics.js';

export const API_NAME = 'Repository Momentum';

export interface ApiRepository {
  rank: number;
  fullName: string;
  url: string;
  description: string | null;
  primaryLanguage: string | null;
  starsTotal: number;
  score: number;
  scoreChange: number | null;
  qualifies: boolean;
  signals: SubSignalVector;
  trend: number[];
  whyMatters: string;
}

export interface ApiPayload {
  name: string;
  date: string;
  dateGenerated: string;
  previousDate: string | null;
  threshold: number;
  repositories: ApiRepository[];
}

export interface ApiFiles {
  dated: string;
  latest: string;
}

export function buildApiPayload(run: ScoringRunResult, generatedAt: Date = new Date()): ApiPayload {
  return {
    name: API_NAME,
    date: run.date,
    dateGenerated: generatedAt.toISOString(),
    previousDate: run.previousDate,
    threshold: run.threshold,
    repositories: run.repositories.map((r, i) => ({
      rank: i + 1,
      fullName: r.fullName,
      url: r.url,
      description: r.description,
      primaryLanguage: r.primaryLanguage,
      starsTotal: r.starsTotal,
      score: r.score,
      scoreChange: r.scoreChange,
      qualifies: r.qualifies,
      signals: { ...r.signals },
      trend: [...r.trend],
      whyMatters: r.whyMatters,
    })),
  };
}

/**
 * Write the payload to `dir`, creating it if needed.
 * `latest.json` is overwritten on every run.
 */
export function writeApiFiles(dir: string, payload: ApiPayload): ApiFiles {
  mkdirSync(dir, { recursive: true });
  const content = JSON.stringify(payload, null, 2) + '\n';

  const dated = join(dir, `${payload.date}.json`);
  const latest = join(dir, 'latest.json');
  writeFileSync(dated, content, 'utf-8');
  writeFileSync(latest, content, 'utf-8');

  console.error(`[momentum] API files written to ${dated} and ${latest}`);
  return { dated, latest };
}
