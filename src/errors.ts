/**
 * Error taxonomy.
 *
 * Everything a single reconciliation can raise extends {@link SyncError}; the
 * engine turns these into outcomes. {@link ConfigurationError} is the only one
 * meant to stop the process, and only during startup.
 */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source task or its counterpart no longer exists. */
export class NotFoundError extends SyncError {
  constructor(
    public readonly side: 'A' | 'B',
    public readonly id: string,
    message = `${side}:${id} not found`,
  ) {
    super(message);
  }
}

/** The resolver picked the other side; the source change waits for the next pass. */
export class ConflictDeferred extends SyncError {
  constructor(public readonly reason: string) {
    super(`conflict deferred: ${reason}`);
  }
}

export class ValidationError extends SyncError {}

/** A collaborator call failed (transport, HTTP status, unexpected payload). */
export class CollaboratorError extends SyncError {
  constructor(
    public readonly side: 'A' | 'B',
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`${side} ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ConfigurationError extends SyncError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
