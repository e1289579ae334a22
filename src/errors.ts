export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a builder is executed on the pagination path it was not
 * configured for. Always thrown before any backend call.
 */
export class PaginationConflictError extends Error {
  override readonly name = 'PaginationConflictError';

  constructor(
    readonly kind: string,
    readonly configuredMode: 'offset' | 'cursor',
    message?: string,
  ) {
    super(message ?? `Query for kind "${kind}" is configured for ${configuredMode} pagination`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidQueryError extends Error {
  override readonly name = 'InvalidQueryError';

  constructor(readonly kind: string, message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Wraps an error reported by the backend. The original is kept as `cause`. */
export class BackendError extends Error {
  override readonly name: string = 'BackendError';

  constructor(
    readonly kind: string,
    readonly operation: string,
    override readonly cause?: unknown,
    message?: string,
  ) {
    super(message ?? `Datastore ${operation} failed for kind "${kind}": ${String(cause)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A chunked write or delete stopped at its first failing chunk.
 * Chunks before `completedChunks` are committed.
 */
export class BatchError extends BackendError {
  override readonly name = 'BatchError';

  constructor(
    kind: string,
    operation: string,
    readonly completedChunks: number,
    readonly totalChunks: number,
    cause?: unknown,
  ) {
    super(
      kind,
      operation,
      cause,
      `Datastore ${operation} failed for kind "${kind}" at chunk ${completedChunks + 1} of ${totalChunks}: ${String(cause)}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AggregationError extends Error {
  override readonly name = 'AggregationError';

  constructor(readonly kind: string, message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CancelledError extends Error {
  override readonly name = 'CancelledError';

  constructor(
    readonly operation: string,
    override readonly cause?: unknown,
  ) {
    super(`Datastore ${operation} was cancelled`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
