/** Normalise anything thrown into a message string */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Restoring a snapshot failed. The monitored files may be left inconsistent
 * and an operator has to look at them.
 */
export class RollbackFailedError extends Error {
  constructor(
    readonly snapshotId: string,
    readonly reason: unknown,
  ) {
    super(`Rollback to snapshot ${snapshotId} failed: ${errorMessage(reason)}`);
    this.name = 'RollbackFailedError';
  }
}
