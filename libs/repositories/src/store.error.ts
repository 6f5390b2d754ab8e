/**
 * Raised when a durable-store operation fails. Wraps the driver error and
 * names the repository operation that hit it.
 */
export class StoreError extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Task store operation "${operation}" failed: ${detail}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }
}
