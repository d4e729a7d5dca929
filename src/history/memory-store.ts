/**
 * In-memory snapshot store. Holds copies, so callers cannot mutate
 * stored history through returned objects.
 */

import type { HistorySnapshot, SnapshotStore } from './types.js';
import { normalizeSnapshot } from './snapshot-builder.js';

export class MemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, HistorySnapshot>();

  listDates(): string[] {
    return [...this.snapshots.keys()].sort();
  }

  read(date: string): HistorySnapshot | null {
    const snapshot = this.snapshots.get(date);
    return snapshot ? normalizeSnapshot(snapshot) : null;
  }

  write(snapshot: HistorySnapshot): void {
    this.snapshots.set(snapshot.date, normalizeSnapshot(snapshot));
  }
}
