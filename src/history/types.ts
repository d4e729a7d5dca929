/**
 * History Types
 *
 * Dated score snapshots. Only the final score per repository is
 * persisted — raw metrics and signal breakdowns are recomputed each run.
 */

/** One run's scores, keyed by repository full name. */
export interface HistorySnapshot {
  /** Run date, YYYY-MM-DD. */
  date: string;
  entries: Record<string, number>;
}

/**
 * Minimal storage contract the trend tracker needs.
 * Implementations throw SnapshotStorageError on I/O failure.
 */
export interface SnapshotStore {
  /** All stored dates, ascending. */
  listDates(): string[];
  read(date: string): HistorySnapshot | null;
  /** Replace the snapshot for snapshot.date as a whole. */
  write(snapshot: HistorySnapshot): void;
}
