// src/metrics/errors.ts
// Error types surfaced by metrics aggregation

/**
 * Base class; `code` and `statusCode` let the HTTP layer render any
 * subclass without knowing it.
 */
export abstract class MetricsError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Scope parameter is not null/undefined/string, or not a valid scope object */
export class InvalidScopeError extends MetricsError {
  readonly code = "INVALID_SCOPE";
  readonly statusCode = 400;

  constructor(received: unknown) {
    super(`Invalid workspace scope: expected a string, got ${describe(received)}`, {
      received: describe(received),
    });
  }
}

/** Storage could not be reached or the snapshot could not be established */
export class StorageUnavailableError extends MetricsError {
  readonly code = "STORAGE_UNAVAILABLE";
  readonly statusCode = 503;

  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Metrics storage unavailable: ${reason}`, undefined, { cause });
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
