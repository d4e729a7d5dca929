/**
 * Error Types
 *
 * Input problems and storage problems are kept apart: the first means the
 * collector handed over bad data, the second means the environment failed.
 */

export class InputContractError extends Error {
  constructor(
    message: string,
    public fullName: string | null,
    public issues: string[]
  ) {
    super(message);
    this.name = 'InputContractError';
  }
}

export type StorageOperation = 'list' | 'read' | 'write';

export class SnapshotStorageError extends Error {
  constructor(
    message: string,
    public operation: StorageOperation,
    public path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SnapshotStorageError';
  }
}
