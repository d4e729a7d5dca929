/**
 * Snapshot Builder
 *
 * Converts a run's scored repositories into a HistorySnapshot for persistence.
 * Pure function — no I/O.
 */

import type { HistorySnapshot } from './types.js';
import type { ScoredRepository } from '../types/metrics.js';
import { InputContractError } from '../errors.js';

export type SnapshotInput = Pick<ScoredRepository, 'fullName' | 'score'>;

/**
 * Build a snapshot with entries keyed and ordered by fullName, so the same
 * run always serializes to the same bytes.
 */
export function buildSnapshot(date: string, scored: readonly SnapshotInput[]): HistorySnapshot {
  const sorted = [...scored].sort((a, b) =>
    a.fullName === b.fullName ? 0 : a.fullName < b.fullName ? -1 : 1
  );

  const entries: Record<string, number> = {};
  for (const repo of sorted) {
    if (Object.hasOwn(entries, repo.fullName)) {
      throw new InputContractError(`Duplicate repository ${repo.fullName}`, repo.fullName, [
        'fullName: duplicate in snapshot',
      ]);
    }
    entries[repo.fullName] = repo.score;
  }

  return { date, entries };
}

/** Copy a snapshot with entries re-ordered by fullName. */
export function normalizeSnapshot(snapshot: HistorySnapshot): HistorySnapshot {
  return buildSnapshot(
    snapshot.date,
    Object.entries(snapshot.entries).map(([fullName, score]) => ({ fullName, score }))
  );
}
