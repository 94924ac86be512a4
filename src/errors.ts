/**
 * Structured error types for openapi-snapshot
 *
 * Every failure the core can produce is one of these kinds. The CLI maps the
 * kind to a process exit code so scripts can tell a network problem from a
 * malformed document or a filesystem failure.
 */

export class SnapshotError extends Error {
  constructor(
    message: string,
    public code: string,
    public exitCode: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/**
 * Invalid configuration or flag combination. Never retried.
 */
export class UsageError extends SnapshotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', 1, details);
    this.name = 'UsageError';
  }
}

/**
 * Transport or HTTP status failure.
 *
 * `retryable` marks failures the fetch retry interceptor may attempt again
 * (connection errors, timeouts, body read errors, 429 and 5xx).
 */
export class NetworkError extends SnapshotError {
  constructor(
    message: string,
    public statusCode?: number,
    public retryable: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(message, 'NETWORK_ERROR', 1, { statusCode, retryable, ...details });
    this.name = 'NetworkError';
  }
}

export class ParseError extends SnapshotError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR', 2);
    this.name = 'ParseError';
  }
}

export class ReduceError extends SnapshotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REDUCE_ERROR', 3, details);
    this.name = 'ReduceError';
  }
}

export class OutlineError extends SnapshotError {
  constructor(message: string) {
    super(message, 'OUTLINE_ERROR', 3);
    this.name = 'OutlineError';
  }
}

export class IoError extends SnapshotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'IO_ERROR', 4, details);
    this.name = 'IoError';
  }
}

/**
 * Shutdown requested (SIGINT/SIGTERM) before a one-shot run could finish
 */
export class InterruptedError extends SnapshotError {
  constructor(message: string) {
    super(message, 'INTERRUPTED', 130);
    this.name = 'InterruptedError';
  }
}

/**
 * Helper function to check if an error is a SnapshotError
 */
export function isSnapshotError(error: unknown): error is SnapshotError {
  return error instanceof SnapshotError;
}

/**
 * True for failures that point at a wrong or unreachable URL
 */
export function isUrlRelated(error: unknown): boolean {
  return error instanceof NetworkError || error instanceof ParseError;
}

/**
 * Exit code for any thrown value; unknown errors exit with 1
 */
export function exitCodeFor(error: unknown): number {
  return isSnapshotError(error) ? error.exitCode : 1;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Logging context for a failure; the message travels as the logged error
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isSnapshotError(error)) {
    return {
      name: error.name,
      code: error.code,
      exitCode: error.exitCode,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      stack: error.stack,
    };
  }

  return {};
}
