/**
 * Trend Tracker
 *
 * Records one snapshot per run date and answers history questions for
 * the scorer and the report generators. Storage is injected; the tracker
 * holds no state of its own beyond the default window.
 */

import type { HistorySnapshot, SnapshotStore } from './types.js';
import type { SnapshotInput } from './snapshot-builder.js';
import { buildSnapshot } from './snapshot-builder.js';
import { assertIsoDate } from '../validators.js';
import { DEFAULT_SCORING_CONFIG } from '../config/scoring-config.js';

export interface TrendTrackerOptions {
  /** Snapshots per trend when getTrend is called without a window. */
  window?: number;
}

export class TrendTracker {
  readonly window: number;

  constructor(
    private readonly store: SnapshotStore,
    options: TrendTrackerOptions = {}
  ) {
    this.window = checkWindow(options.window ?? DEFAULT_SCORING_CONFIG.trendWindow);
  }

  /**
   * Write the snapshot for `date`. Recording the same date again
   * replaces it, so a re-run leaves no duplicate history.
   */
  record(date: string, scored: readonly SnapshotInput[]): HistorySnapshot {
    assertIsoDate(date);
    const snapshot = buildSnapshot(date, scored);
    this.store.write(snapshot);
    return snapshot;
  }

  /**
   * Scores from the most recent `window` snapshots, oldest first.
   * Snapshots without the repository are skipped, not zero-filled.
   * With `asOf`, snapshots dated after it are ignored.
   */
  getTrend(fullName: string, window = this.window, asOf?: string): number[] {
    return this.getTrends([fullName], window, asOf).get(fullName) ?? [];
  }

  /**
   * getTrend for many repositories, reading each snapshot once.
   */
  getTrends(
    fullNames: readonly string[],
    window = this.window,
    asOf?: string
  ): Map<string, number[]> {
    checkWindow(window);
    if (asOf !== undefined) assertIsoDate(asOf);

    const dates = this.store
      .listDates()
      .filter((d) => asOf === undefined || d <= asOf)
      .slice(-window);
    const snapshots = dates
      .map((d) => this.store.read(d))
      .filter((s): s is HistorySnapshot => s !== null);

    const trends = new Map<string, number[]>();
    for (const fullName of fullNames) {
      const trend: number[] = [];
      for (const snapshot of snapshots) {
        const score = snapshot.entries[fullName];
        if (score !== undefined) trend.push(score);
      }
      trends.set(fullName, trend);
    }
    return trends;
  }

  /** The single most recent snapshot strictly before `currentDate`. */
  getPreviousSnapshot(currentDate: string): HistorySnapshot | null {
    assertIsoDate(currentDate);
    const earlier = this.store.listDates().filter((d) => d < currentDate);
    const date = earlier[earlier.length - 1];
    return date === undefined ? null : this.store.read(date);
  }

  /**
   * Score in the immediately preceding snapshot, or null when there is
   * no such snapshot or it does not contain the repository.
   */
  getPreviousScore(fullName: string, currentDate: string): number | null {
    return this.getPreviousSnapshot(currentDate)?.entries[fullName] ?? null;
  }
}

function checkWindow(window: number): number {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Trend window must be a positive integer, got ${window}`);
  }
  return window;
}
