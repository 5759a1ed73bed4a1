/**
 * Error thrown when the durable write behind a mutation fails.
 * The in-memory state is left as it was before the mutation.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to persist ${operation}: ${detail}`);
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown for a score that is not a finite number
 */
export class InvalidScoreError extends Error {
  constructor(public readonly score: number) {
    super(`Score must be a finite number, got ${score}`);
    this.name = 'InvalidScoreError';
  }
}
