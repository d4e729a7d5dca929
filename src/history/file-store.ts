/**
 * File Snapshot Store
 *
 * One pretty-printed JSON file per run date: <dir>/<YYYY-MM-DD>.json.
 * Writes go to a temp file first and are renamed into place, so a
 * snapshot either lands whole or not at all.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import type { HistorySnapshot, SnapshotStore } from './types.js';
import type { StorageOperation } from '../errors.js';
import { SnapshotStorageError } from '../errors.js';
import { isIsoDate, parseHistorySnapshot } from '../validators.js';
import { normalizeSnapshot } from './snapshot-builder.js';

const SNAPSHOT_FILE = /^(\d{4}-\d{2}-\d{2})\.json$/;

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly dir: string) {}

  listDates(): string[] {
    if (!existsSync(this.dir)) return [];

    return guard('list', this.dir, () =>
      readdirSync(this.dir)
        .map((name) => SNAPSHOT_FILE.exec(name)?.[1])
        .filter((date): date is string => date !== undefined && isIsoDate(date))
        .sort()
    );
  }

  read(date: string): HistorySnapshot | null {
    const path = this.pathFor(date);
    if (!existsSync(path)) return null;

    return guard('read', path, () => {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      const snapshot = parseHistorySnapshot(parsed);
      if (snapshot.date !== date) {
        throw new SnapshotStorageError(
          `Snapshot file ${path} holds date ${snapshot.date}`,
          'read',
          path
        );
      }
      return normalizeSnapshot(snapshot);
    });
  }

  write(snapshot: HistorySnapshot): void {
    const path = this.pathFor(snapshot.date);
    const tmpPath = `${path}.${process.pid}.tmp`;

    guard('write', path, () => {
      mkdirSync(this.dir, { recursive: true });
      const body = JSON.stringify(normalizeSnapshot(snapshot), null, 2) + '\n';
      try {
        writeFileSync(tmpPath, body, 'utf-8');
        renameSync(tmpPath, path);
      } catch (error) {
        rmSync(tmpPath, { force: true });
        throw error;
      }
    });
  }

  pathFor(date: string): string {
    return join(this.dir, `${date}.json`);
  }
}

function guard<T>(operation: StorageOperation, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof SnapshotStorageError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotStorageError(
      `Snapshot ${operation} failed for ${path}: ${reason}`,
      operation,
      path,
      { cause: error }
    );
  }
}
