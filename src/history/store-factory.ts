/**
 * Snapshot Store Factory
 *
 * Opens the store named by the project's storage config.
 */

import type { StorageConfig } from '../config/types.js';
import { historyDbPath, snapshotsDirPath } from '../config/paths.js';
import type { SnapshotStore } from './types.js';
import { FileSnapshotStore } from './file-store.js';
import { SqliteSnapshotStore } from './sqlite-store.js';

export interface OpenedStore {
  store: SnapshotStore;
  kind: StorageConfig['kind'];
  /** Snapshot directory or database file. */
  location: string;
  close(): void;
}

export function openSnapshotStore(storage: StorageConfig): OpenedStore {
  switch (storage.kind) {
    case 'files': {
      const location = storage.path ?? snapshotsDirPath();
      return {
        store: new FileSnapshotStore(location),
        kind: 'files',
        location,
        close: () => {},
      };
    }
    case 'sqlite': {
      const location = storage.path ?? historyDbPath();
      const store = new SqliteSnapshotStore(storage.path);
      return {
        store,
        kind: 'sqlite',
        location,
        close: () => store.close(),
      };
    }
  }
}
