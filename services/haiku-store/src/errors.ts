export class HaikuStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HaikuStoreError';
  }
}

/** Caller-supplied input broke a precondition. Never a backend problem. */
export class ValidationError extends HaikuStoreError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The remote store rejected or failed a command. Raised by the repository
 * whatever the transport's own error type was; the original error is kept as
 * `cause`.
 */
export class PersistenceError extends HaikuStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
