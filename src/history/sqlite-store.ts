/**
 * SQLite Snapshot Store
 *
 * Keeps every dated snapshot in one better-sqlite3 database instead of
 * one file per run. Database lives at ~/.momentum/history.db by default.
 *
 * Only final scores are stored — never raw metrics.
 */

import Database from 'better-sqlite3';
import type { HistorySnapshot, SnapshotStore } from './types.js';
import type { StorageOperation } from '../errors.js';
import { SnapshotStorageError } from '../errors.js';
import { historyDbPath, ensureConfigDir } from '../config/paths.js';
import { normalizeSnapshot } from './snapshot-builder.js';

export class SqliteSnapshotStore implements SnapshotStore {
  private db: Database.Database;
  private readonly path: string;

  constructor(dbPath?: string) {
    this.path = dbPath ?? historyDbPath();
    this.db = this.guard('read', () => {
      if (!dbPath) {
        ensureConfigDir();
      }
      const db = new Database(this.path);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      return db;
    });
    this.guard('write', () => this.migrate());
  }

  listDates(): string[] {
    return this.guard('list', () => {
      const rows = this.db
        .prepare(`SELECT run_date FROM snapshots ORDER BY run_date ASC`)
        .all() as SnapshotRow[];
      return rows.map((r) => r.run_date);
    });
  }

  read(date: string): HistorySnapshot | null {
    return this.guard('read', () => {
      const row = this.db
        .prepare(`SELECT run_date FROM snapshots WHERE run_date = ?`)
        .get(date) as SnapshotRow | undefined;
      if (!row) return null;

      const entries = this.db
        .prepare(
          `SELECT full_name, score FROM snapshot_entries
           WHERE run_date = ? ORDER BY full_name ASC`
        )
        .all(date) as EntryRow[];

      return normalizeSnapshot({
        date: row.run_date,
        entries: Object.fromEntries(entries.map((e) => [e.full_name, e.score])),
      });
    });
  }

  /**
   * Replace the snapshot for its date in one transaction.
   */
  write(snapshot: HistorySnapshot): void {
    const normalized = normalizeSnapshot(snapshot);

    this.guard('write', () => {
      const upsertSnapshot = this.db.prepare(`
        INSERT INTO snapshots (run_date) VALUES (@date)
        ON CONFLICT(run_date) DO UPDATE SET created_at = datetime('now')
      `);
      const clearEntries = this.db.prepare(`DELETE FROM snapshot_entries WHERE run_date = ?`);
      const insertEntry = this.db.prepare(`
        INSERT INTO snapshot_entries (run_date, full_name, score)
        VALUES (@date, @fullName, @score)
      `);

      const replace = this.db.transaction((s: HistorySnapshot) => {
        upsertSnapshot.run({ date: s.date });
        clearEntries.run(s.date);
        for (const [fullName, score] of Object.entries(s.entries)) {
          insertEntry.run({ date: s.date, fullName, score });
        }
      });

      replace(normalized);
    });
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        run_date    TEXT PRIMARY KEY,
        created_at  TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS snapshot_entries (
        run_date    TEXT NOT NULL REFERENCES snapshots(run_date),
        full_name   TEXT NOT NULL,
        score       REAL NOT NULL,
        PRIMARY KEY (run_date, full_name)
      );
    `);
  }

  private guard<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SnapshotStorageError(
        `History database ${operation} failed for ${this.path}: ${reason}`,
        operation,
        this.path,
        { cause: error }
      );
    }
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface SnapshotRow {
  run_date: string;
}

interface EntryRow {
  full_name: string;
  score: number;
}
